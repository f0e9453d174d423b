import type { Readable } from 'node:stream';

export type MediaProcessRole = 'player' | 'transcoder';

export type MediaProcessSpec = {
  role: MediaProcessRole;
  command: string;
  args: readonly string[];
  /** Whether stdout is read by the controller (transcoder) or discarded (player). */
  captureStdout: boolean;
};

export type ProcessExit = {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** True when the controller asked the process to stop before it exited. */
  requested: boolean;
};

/**
 * One spawned external media process as seen by the controller.
 */
export interface MediaProcess {
  readonly role: MediaProcessRole;
  readonly name: string;
  readonly pid: number | undefined;
  /** Encoded output; null when stdout is not captured. */
  readonly stdout: Readable | null;
  /** Set once terminate() or kill() was called; never cleared. */
  readonly terminationRequested: boolean;
  /** Exit details once the process has exited, otherwise null. */
  exitStatus(): ProcessExit | null;
  isAlive(): boolean;
  /** Resolves after the chunk is flushed to stdin; rejects with ProcessWriteError. */
  write(chunk: Buffer): Promise<void>;
  /** Closes stdin and sends SIGTERM without waiting. */
  terminate(): void;
  /** Sends SIGKILL if the process is still alive. */
  kill(): void;
  /** terminate(), then kill() if still alive after `graceMs`. */
  stop(graceMs: number): Promise<ProcessExit | null>;
  waitForExit(): Promise<ProcessExit>;
}

export interface ProcessLauncher {
  launch(spec: MediaProcessSpec): Promise<MediaProcess>;
}

/**
 * Clean exits, SIGTERM/SIGKILL, and anything after a requested stop are
 * expected; every other exit is reported as a failure.
 */
export function isExpectedExit(exit: ProcessExit): boolean {
  if (exit.requested || exit.code === 0) {
    return true;
  }
  return exit.signal === 'SIGTERM' || exit.signal === 'SIGKILL';
}

export function describeExit(exit: ProcessExit): string {
  if (exit.signal) {
    return `signal ${exit.signal}`;
  }
  return `code ${exit.code ?? 'unknown'}`;
}
