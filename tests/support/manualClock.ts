import type { ClockPort } from '../../src/ports/ClockPort';

export class ManualClock implements ClockPort {
  constructor(public current = 0) {}

  public now(): number {
    return this.current;
  }

  public advance(ms: number): void {
    this.current += ms;
  }
}
