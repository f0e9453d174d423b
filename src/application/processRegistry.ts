import { createLogger } from '@/shared/logging/logger';
import { bestEffortSync } from '@/shared/bestEffort';
import type { MediaProcess } from '@/ports/MediaProcess';

/**
 * Every media process spawned during a run, so shutdown can force-kill
 * whatever survived the cooperative teardown.
 */
export class ProcessRegistry {
  private readonly log = createLogger('Controller', 'Processes');
  private readonly processes = new Set<MediaProcess>();

  public track(proc: MediaProcess): void {
    this.processes.add(proc);
    void proc.waitForExit().then(() => {
      this.processes.delete(proc);
    });
  }

  public alive(): MediaProcess[] {
    return Array.from(this.processes).filter((proc) => proc.isAlive());
  }

  /** Sends SIGKILL to every process still running. Returns how many were signalled. */
  public forceKillAll(): number {
    const survivors = this.alive();
    for (const proc of survivors) {
      this.log.warn('force-killing media process', { name: proc.name, pid: proc.pid });
      bestEffortSync(() => proc.kill(), {
        fallback: undefined,
        onError: 'debug',
        label: 'force kill failed',
        context: { name: proc.name },
        log: this.log,
      });
    }
    return survivors.length;
  }
}
