import { sleep } from '@/shared/abort';
import type { ClockPort } from '@/ports/ClockPort';

/**
 * Spaces connection attempts at least `minIntervalMs` apart, measured from
 * the start of the previous attempt so slow failures do not add up.
 */
export class ReconnectGate {
  private lastAttemptAt: number | null = null;

  constructor(
    private readonly clock: ClockPort,
    private readonly minIntervalMs: number,
  ) {}

  /** Milliseconds until the next attempt may start. */
  public remainingMs(): number {
    if (this.lastAttemptAt === null) {
      return 0;
    }
    return Math.max(0, this.minIntervalMs - (this.clock.now() - this.lastAttemptAt));
  }

  /** Waits for the interval to pass, then records the new attempt. */
  public async waitTurn(signal: AbortSignal): Promise<void> {
    let remaining = this.remainingMs();
    while (remaining > 0) {
      await sleep(Math.ceil(remaining), signal);
      remaining = this.remainingMs();
    }
    this.lastAttemptAt = this.clock.now();
  }
}
