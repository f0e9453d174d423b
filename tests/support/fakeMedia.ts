import { PassThrough } from 'node:stream';
import { ProcessWriteError } from '../../src/domain/errors';
import type {
  MediaProcess,
  MediaProcessRole,
  MediaProcessSpec,
  ProcessExit,
  ProcessLauncher,
} from '../../src/ports/MediaProcess';

let nextPid = 4000;

export class FakeMediaProcess implements MediaProcess {
  public readonly pid = ++nextPid;
  public readonly stdout: PassThrough | null;
  public readonly written: Buffer[] = [];
  public writeError: Error | null = null;
  public stopCalls = 0;
  private requested = false;
  private exit: ProcessExit | null = null;
  private resolveExit: (exit: ProcessExit) => void = () => undefined;
  private readonly exited = new Promise<ProcessExit>((resolve) => {
    this.resolveExit = resolve;
  });

  constructor(
    public readonly role: MediaProcessRole,
    public readonly name: string,
  ) {
    this.stdout = role === 'transcoder' ? new PassThrough() : null;
  }

  public get terminationRequested(): boolean {
    return this.requested;
  }

  public exitStatus(): ProcessExit | null {
    return this.exit;
  }

  public isAlive(): boolean {
    return this.exit === null;
  }

  /** Simulates the process exiting on its own. */
  public exitWith(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.exit) {
      return;
    }
    this.exit = { code, signal, requested: this.requested };
    this.stdout?.end();
    this.resolveExit(this.exit);
  }

  public async write(chunk: Buffer): Promise<void> {
    if (this.requested || this.exit) {
      throw new ProcessWriteError(this.name);
    }
    if (this.writeError) {
      throw new ProcessWriteError(this.name, this.writeError);
    }
    this.written.push(chunk);
  }

  public terminate(): void {
    this.requested = true;
    this.exitWith(null, 'SIGTERM');
  }

  public kill(): void {
    this.requested = true;
    this.exitWith(null, 'SIGKILL');
  }

  public async stop(): Promise<ProcessExit | null> {
    this.stopCalls += 1;
    this.terminate();
    return this.exit;
  }

  public waitForExit(): Promise<ProcessExit> {
    return this.exited;
  }
}

export class FakeLauncher implements ProcessLauncher {
  public readonly launched: FakeMediaProcess[] = [];
  public readonly failures = new Map<MediaProcessRole, Error>();

  public async launch(spec: MediaProcessSpec): Promise<FakeMediaProcess> {
    const failure = this.failures.get(spec.role);
    if (failure) {
      throw failure;
    }
    const proc = new FakeMediaProcess(spec.role, spec.command);
    this.launched.push(proc);
    return proc;
  }

  public byRole(role: MediaProcessRole): FakeMediaProcess[] {
    return this.launched.filter((proc) => proc.role === role);
  }
}
