/** Lower edge of the tunable FM band, in kHz. */
export const MIN_FREQUENCY_KHZ = 87_500;
/** Upper edge of the tunable FM band, in kHz. */
export const MAX_FREQUENCY_KHZ = 108_000;
/** Tuning step used by the +/- shortcuts. */
export const FREQUENCY_STEP_KHZ = 100;

const NUMERIC_MHZ = /^[+-]?(\d+([.,]\d*)?|[.,]\d+)$/;

export function isTunableKhz(khz: number): boolean {
  return Number.isInteger(khz) && khz >= MIN_FREQUENCY_KHZ && khz <= MAX_FREQUENCY_KHZ;
}

/**
 * Parses a frequency written in MHz ("97.3", "97,300") to kHz.
 * Returns null for non-numeric input and for values outside the FM band.
 */
export function mhzToKhz(value: unknown): number | null {
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  if (!NUMERIC_MHZ.test(trimmed)) {
    return null;
  }
  const mhz = Number(trimmed.replace(',', '.'));
  if (!Number.isFinite(mhz) || mhz < MIN_FREQUENCY_KHZ / 1000 || mhz > MAX_FREQUENCY_KHZ / 1000) {
    return null;
  }
  const khz = Math.round(mhz * 1000);
  return isTunableKhz(khz) ? khz : null;
}

/** Renders kHz as MHz with three decimals, or `N/A` when not tuned. */
export function khzToMhzString(khz: number | null | undefined): string {
  if (typeof khz !== 'number' || !Number.isInteger(khz) || khz <= 0) {
    return 'N/A';
  }
  return (khz / 1000).toFixed(3);
}

/** Steps the current frequency, clamped to the band. */
export function stepFrequency(currentKhz: number, direction: 1 | -1): number {
  const next = currentKhz + direction * FREQUENCY_STEP_KHZ;
  return Math.min(MAX_FREQUENCY_KHZ, Math.max(MIN_FREQUENCY_KHZ, next));
}
