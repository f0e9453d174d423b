import { setTimeout as delay } from 'node:timers/promises';

/** The rejection used by every cancellable wait in the controller. */
export function abortError(signal?: AbortSignal): Error {
  const reason: unknown = signal?.reason;
  if (reason instanceof Error && reason.name === 'AbortError') {
    return reason;
  }
  const error = new Error('The operation was aborted');
  error.name = 'AbortError';
  return error;
}

export function throwIfAborted(signal: AbortSignal): void {
  if (signal.aborted) {
    throw abortError(signal);
  }
}

/** Timed sleep that rejects with an AbortError once `signal` fires. */
export async function sleep(ms: number, signal: AbortSignal): Promise<void> {
  throwIfAborted(signal);
  if (ms <= 0) {
    return;
  }
  try {
    await delay(ms, undefined, { signal });
  } catch {
    throw abortError(signal);
  }
}

/**
 * Resolves when `signal` aborts. The returned `dispose` detaches the listener
 * so long-lived signals do not accumulate handlers.
 */
export function whenAborted(signal: AbortSignal): { promise: Promise<void>; dispose: () => void } {
  if (signal.aborted) {
    return { promise: Promise.resolve(), dispose: () => undefined };
  }
  let onAbort: (() => void) | undefined;
  const promise = new Promise<void>((resolve) => {
    onAbort = () => resolve();
    signal.addEventListener('abort', onAbort, { once: true });
  });
  return {
    promise,
    dispose: () => {
      if (onAbort) {
        signal.removeEventListener('abort', onAbort);
      }
    },
  };
}
