import { performance } from 'node:perf_hooks';
import type { ClockPort } from '@/ports/ClockPort';

/** Monotonic; wall-clock adjustments do not move it. */
export const systemClock: ClockPort = {
  now: () => performance.now(),
};
