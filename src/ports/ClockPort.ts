export interface ClockPort {
  /** Milliseconds on a monotonic timeline; only differences are meaningful. */
  now(): number;
}
