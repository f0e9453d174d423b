import type { ComponentLogger } from '@/shared/logging/logger';

export type BestEffortOptions<T> = {
  fallback: T;
  onError?: 'ignore' | 'debug';
  label?: string;
  context?: Record<string, unknown>;
  log?: ComponentLogger;
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function logBestEffortFailure(
  error: unknown,
  options: BestEffortOptions<unknown>,
): void {
  if (options.onError !== 'debug' || !options.log) {
    return;
  }
  options.log.debug(options.label ?? 'best-effort fallback used', {
    ...options.context,
    message: errorMessage(error),
  });
}

export async function bestEffort<T>(
  fn: () => Promise<T>,
  options: BestEffortOptions<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    logBestEffortFailure(error, options);
    return options.fallback;
  }
}

export function bestEffortSync<T>(fn: () => T, options: BestEffortOptions<T>): T {
  try {
    return fn();
  } catch (error) {
    logBestEffortFailure(error, options);
    return options.fallback;
  }
}
