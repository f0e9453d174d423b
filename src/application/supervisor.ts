import { createLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';
import { whenAborted } from '@/shared/abort';
import { stopWithTimeout } from '@/shared/stopWithTimeout';
import { classifyFailure, type FailureClass } from '@/domain/errors';
import { updates, type CommandQueue } from '@/ports/ControllerBus';
import type { ControllerTask, TaskName } from '@/ports/ControllerTask';
import type { FeaturePort } from '@/ports/FeaturePort';
import type { ProcessRegistry } from '@/application/processRegistry';
import type { UpdateBus } from '@/application/updateBus';

export const DEFAULT_STOP_GRACE_MS = 7000;

type TaskOutcome =
  | { task: ControllerTask; kind: 'returned' }
  | { task: ControllerTask; kind: 'failed'; error: unknown };

export type SupervisorDeps = {
  tasks: readonly ControllerTask[];
  updates: UpdateBus;
  commands: CommandQueue;
  features: FeaturePort;
  processes: ProcessRegistry;
  stopGraceMs?: number;
};

/**
 * Owns the controller's long-running tasks for one run.
 *
 * Failures are routed by their structured kind: fatal ones shut the run down,
 * feature failures switch one capability off, and recoverable ones respawn the
 * task according to its restart policy. `closed` is emitted exactly once,
 * after every task has settled or the grace period ran out.
 */
export class Supervisor {
  private readonly log = createLogger('Controller', 'Supervisor');
  private readonly shutdown = new AbortController();
  private readonly running = new Map<TaskName, Promise<TaskOutcome>>();
  private readonly stopGraceMs: number;
  private monitor: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;
  private closed = false;
  private fatalReason: string | null = null;
  private resolveDone: () => void = () => undefined;
  private readonly donePromise = new Promise<void>((resolve) => {
    this.resolveDone = resolve;
  });

  constructor(private readonly deps: SupervisorDeps) {
    this.stopGraceMs = deps.stopGraceMs ?? DEFAULT_STOP_GRACE_MS;
  }

  public get signal(): AbortSignal {
    return this.shutdown.signal;
  }

  public get isShuttingDown(): boolean {
    return this.shutdown.signal.aborted;
  }

  /** Resolves once `closed` has been emitted. */
  public get done(): Promise<void> {
    return this.donePromise;
  }

  /** Set when a fatal failure ended the run. */
  public get failure(): string | null {
    return this.fatalReason;
  }

  public runningTasks(): TaskName[] {
    return Array.from(this.running.keys());
  }

  public start(): void {
    if (this.monitor) {
      throw new Error('supervisor already started');
    }
    for (const task of this.deps.tasks) {
      this.spawn(task);
    }
    this.log.info('controller started', { tasks: this.runningTasks().join(',') });
    this.monitor = this.monitorLoop();
  }

  /**
   * Signals shutdown, waits up to the grace period for the tasks, then
   * force-kills any media process still alive.
   */
  public stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.performStop();
    }
    return this.stopping;
  }

  private async performStop(): Promise<void> {
    this.beginShutdown('stop requested');
    const monitor = this.monitor;
    if (monitor) {
      await stopWithTimeout('controller tasks', () => monitor, this.stopGraceMs, this.log);
    }
    this.finish();
  }

  private spawn(task: ControllerTask): void {
    this.log.debug('starting task', { task: task.name });
    const outcome = task.run(this.signal).then(
      (): TaskOutcome => ({ task, kind: 'returned' }),
      (error: unknown): TaskOutcome => ({ task, kind: 'failed', error }),
    );
    this.running.set(task.name, outcome);
  }

  private async monitorLoop(): Promise<void> {
    const aborted = whenAborted(this.signal);
    const shutdownSeen = aborted.promise.then(() => null);
    try {
      while (!this.isShuttingDown && this.running.size > 0) {
        const outcome = await Promise.race([...this.running.values(), shutdownSeen]);
        if (!outcome) {
          break;
        }
        this.running.delete(outcome.task.name);
        this.handleOutcome(outcome);
      }
    } finally {
      aborted.dispose();
    }

    this.beginShutdown(this.running.size === 0 ? 'no tasks left' : 'shutdown signalled');
    const remaining = Array.from(this.running.values());
    await stopWithTimeout(
      'remaining tasks',
      async () => {
        await Promise.allSettled(remaining);
      },
      this.stopGraceMs,
      this.log,
    );
    this.finish();
  }

  private handleOutcome(outcome: TaskOutcome): void {
    const { task } = outcome;
    if (outcome.kind === 'returned') {
      this.log.info('task finished', { task: task.name });
      return;
    }

    const { error } = outcome;
    const disposition = classifyFailure(error);
    if (disposition === 'cancelled' && this.isShuttingDown) {
      return;
    }

    const message = errorMessage(error);
    this.log.error('task failed', { task: task.name, kind: disposition, message });
    this.deps.updates.emit(updates.error(`Task ${task.name} failed: ${message}`));

    if (disposition === 'fatal' || this.isMandatoryFeatureFailure(task, disposition)) {
      this.deps.updates.emit(updates.error(`Fatal error in ${task.name}. Stopping.`));
      if (this.fatalReason === null) {
        this.fatalReason = `${task.name}: ${message}`;
      }
      this.beginShutdown(`fatal error in ${task.name}`);
      return;
    }

    if (disposition === 'feature' && task.feature) {
      this.deps.features.disable(task.feature, message);
      this.abandon(task, error);
      return;
    }

    this.restartOrAbandon(task, error);
  }

  private isMandatoryFeatureFailure(task: ControllerTask, disposition: FailureClass): boolean {
    return (
      disposition === 'feature' &&
      task.feature !== undefined &&
      this.deps.features.isMandatory(task.feature)
    );
  }

  private restartOrAbandon(task: ControllerTask, error: unknown): void {
    if (this.isShuttingDown) {
      return;
    }
    switch (task.restart) {
      case 'always':
        this.log.info('restarting task', { task: task.name });
        this.spawn(task);
        return;
      case 'while-feature-enabled':
        if (!task.feature || this.deps.features.isEnabled(task.feature)) {
          this.log.info('restarting task', { task: task.name });
          this.spawn(task);
          return;
        }
        this.abandon(task, error);
        return;
      case 'never':
        if (task.feature) {
          this.deps.features.disable(task.feature, `${task.name} failed`);
        }
        this.abandon(task, error);
        return;
    }
  }

  private abandon(task: ControllerTask, error: unknown): void {
    this.log.warn('task abandoned for this session', { task: task.name });
    task.onAbandoned?.(error);
  }

  private beginShutdown(reason: string): void {
    if (this.isShuttingDown) {
      return;
    }
    this.log.info('shutting down controller', { reason });
    this.shutdown.abort();
    if (!this.deps.commands.tryPush({ kind: 'stop' })) {
      this.log.debug('command queue full; forwarder wakes on abort instead');
    }
  }

  private finish(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    const killed = this.deps.processes.forceKillAll();
    if (killed > 0) {
      this.log.warn('media processes survived shutdown', { killed });
    }
    this.deps.updates.emitTerminal(updates.closed());
    this.log.info('controller closed');
    this.resolveDone();
  }
}
