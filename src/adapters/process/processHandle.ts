import { spawn, type SpawnOptions } from 'node:child_process';
import type { EventEmitter } from 'node:events';
import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';
import { bestEffortSync, errorMessage } from '@/shared/bestEffort';
import { ExecutableNotFoundError, ProcessWriteError, SpawnError } from '@/domain/errors';
import { updates, type UpdateSink } from '@/ports/ControllerBus';
import type {
  MediaProcess,
  MediaProcessRole,
  MediaProcessSpec,
  ProcessExit,
} from '@/ports/MediaProcess';

export const DEFAULT_KILL_GRACE_MS = 2000;

/** The part of a ChildProcess the handle relies on. */
export interface ChildLike extends EventEmitter {
  readonly pid?: number;
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => ChildLike;

export const nodeSpawn: SpawnFn = (command, args, options) => spawn(command, args, options);

export type ProcessHandleOptions = {
  spawnFn?: SpawnFn;
  /** Receives stderr lines that look fatal. */
  updates?: UpdateSink;
};

const BENIGN_STDERR = ['header missing', 'invalid data'];
const FATAL_STDERR = ['fatal', 'critical'];

export type StderrDisposition = 'drop' | 'fatal' | 'log';

export function classifyStderrLine(line: string): StderrDisposition {
  const lower = line.toLowerCase();
  if (!lower.trim() || BENIGN_STDERR.some((needle) => lower.includes(needle))) {
    return 'drop';
  }
  if (FATAL_STDERR.some((needle) => lower.includes(needle))) {
    return 'fatal';
  }
  return 'log';
}

function executableName(command: string): string {
  const parts = command.split(/[\\/]/);
  return parts[parts.length - 1] || command;
}

/**
 * One spawned ffplay/ffmpeg process with piped stdio.
 *
 * `terminate()` never waits. Once termination was requested the handle
 * refuses every further write without touching stdin.
 */
export class ProcessHandle implements MediaProcess {
  public readonly name: string;
  private readonly log: ComponentLogger;
  private exit: ProcessExit | null = null;
  private requested = false;
  private inputBroken: unknown = undefined;
  private readonly exited: Promise<ProcessExit>;

  private constructor(
    public readonly role: MediaProcessRole,
    command: string,
    private readonly child: ChildLike,
    private readonly sink: UpdateSink | undefined,
  ) {
    this.name = executableName(command);
    this.log = createLogger('Media', this.name);
    this.exited = new Promise<ProcessExit>((resolve) => {
      child.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
        this.exit = { code, signal, requested: this.requested };
        this.log.info('process exited', { pid: this.pid, code, signal, requested: this.requested });
        resolve(this.exit);
      });
    });
    child.on('error', (error: Error) => {
      this.log.warn('process error', { pid: this.pid, message: error.message });
    });
    child.stdin?.on('error', (error: NodeJS.ErrnoException) => {
      this.inputBroken = error;
      if (error.code === 'EPIPE') {
        this.log.debug('stdin closed (EPIPE)', { pid: this.pid });
      } else {
        this.log.warn('stdin error', { pid: this.pid, message: error.message });
      }
    });
    this.drainStderr();
  }

  /**
   * Starts `spec.command`. Resolves once the OS reports the process running;
   * rejects with ExecutableNotFoundError or SpawnError.
   */
  public static spawn(spec: MediaProcessSpec, options: ProcessHandleOptions = {}): Promise<ProcessHandle> {
    const spawnFn = options.spawnFn ?? nodeSpawn;
    const log = createLogger('Media', executableName(spec.command));
    log.debug('spawning process', { command: spec.command, args: spec.args.join(' ') });

    let child: ChildLike;
    try {
      child = spawnFn(spec.command, spec.args, {
        stdio: ['pipe', spec.captureStdout ? 'pipe' : 'ignore', 'pipe'],
      });
    } catch (error) {
      return Promise.reject(ProcessHandle.spawnFailure(spec.command, error));
    }

    return new Promise<ProcessHandle>((resolve, reject) => {
      const onSpawn = () => {
        child.off('error', onError);
        const handle = new ProcessHandle(spec.role, spec.command, child, options.updates);
        handle.log.info('process started', { pid: handle.pid, role: spec.role });
        resolve(handle);
      };
      const onError = (error: unknown) => {
        child.off('spawn', onSpawn);
        reject(ProcessHandle.spawnFailure(spec.command, error));
      };
      child.once('spawn', onSpawn);
      child.once('error', onError);
    });
  }

  private static spawnFailure(command: string, error: unknown): Error {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return new ExecutableNotFoundError(executableName(command), error);
    }
    return new SpawnError(executableName(command), error);
  }

  public get pid(): number | undefined {
    return this.child.pid;
  }

  public get stdout(): Readable | null {
    return this.child.stdout;
  }

  public get terminationRequested(): boolean {
    return this.requested;
  }

  public exitStatus(): ProcessExit | null {
    return this.exit;
  }

  public isAlive(): boolean {
    return this.exit === null && this.child.exitCode === null && this.child.signalCode === null;
  }

  public write(chunk: Buffer): Promise<void> {
    const stdin = this.child.stdin;
    if (this.requested || !this.isAlive()) {
      return Promise.reject(new ProcessWriteError(this.name));
    }
    if (this.inputBroken !== undefined) {
      return Promise.reject(new ProcessWriteError(this.name, this.inputBroken));
    }
    if (!stdin || stdin.destroyed || stdin.writableEnded) {
      return Promise.reject(new ProcessWriteError(this.name));
    }
    return new Promise<void>((resolve, reject) => {
      stdin.write(chunk, (error) => {
        if (error) {
          this.inputBroken = error;
          reject(new ProcessWriteError(this.name, error));
          return;
        }
        resolve();
      });
    });
  }

  public terminate(): void {
    if (this.requested) {
      return;
    }
    this.requested = true;
    const stdin = this.child.stdin;
    if (stdin && !stdin.destroyed) {
      bestEffortSync(() => stdin.end(), {
        fallback: undefined,
        onError: 'debug',
        label: 'stdin close failed',
        log: this.log,
      });
    }
    if (this.isAlive()) {
      this.log.debug('sending SIGTERM', { pid: this.pid });
      this.child.kill('SIGTERM');
    }
  }

  public kill(): void {
    this.requested = true;
    if (this.isAlive()) {
      this.log.warn('sending SIGKILL', { pid: this.pid });
      this.child.kill('SIGKILL');
    }
  }

  public async stop(graceMs = DEFAULT_KILL_GRACE_MS): Promise<ProcessExit | null> {
    this.terminate();
    if (!this.isAlive()) {
      return this.exit;
    }
    if (await this.exitsWithin(graceMs)) {
      return this.exit;
    }
    this.kill();
    await this.exitsWithin(graceMs);
    return this.exit;
  }

  public waitForExit(): Promise<ProcessExit> {
    return this.exited;
  }

  private exitsWithin(ms: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), ms);
    });
    return Promise.race([this.exited.then(() => true), timeout]).finally(() => {
      if (timer) {
        clearTimeout(timer);
      }
    });
  }

  private drainStderr(): void {
    const stderr = this.child.stderr;
    if (!stderr) {
      return;
    }
    const lines = createInterface({ input: stderr, crlfDelay: Infinity });
    lines.on('line', (raw) => {
      const line = raw.trim();
      switch (classifyStderrLine(line)) {
        case 'drop':
          return;
        case 'fatal':
          this.log.error('stderr', { pid: this.pid, line });
          this.sink?.emit(updates.error(`${this.name}: ${line}`));
          return;
        case 'log':
          this.log.warn('stderr', { pid: this.pid, line });
          return;
      }
    });
    stderr.on('error', (error: Error) => {
      this.log.debug('stderr read failed', { pid: this.pid, message: errorMessage(error) });
    });
  }
}
