import { createLogger, type ComponentLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';

export type StopResult =
  | { kind: 'stopped' }
  | { kind: 'timeout' }
  | { kind: 'error'; error: unknown };

/**
 * Runs `stopFn` but gives up waiting after `timeoutMs`. A late failure is
 * still logged once the step settles.
 */
export async function stopWithTimeout(
  name: string,
  stopFn: () => Promise<void>,
  timeoutMs: number,
  log: ComponentLogger = createLogger('Controller'),
): Promise<StopResult> {
  let timeoutHandle: NodeJS.Timeout | null = null;
  const stopPromise = (async (): Promise<StopResult> => {
    try {
      await stopFn();
      return { kind: 'stopped' };
    } catch (error) {
      return { kind: 'error', error };
    }
  })();
  const timeoutPromise = new Promise<StopResult>((resolve) => {
    timeoutHandle = setTimeout(() => resolve({ kind: 'timeout' }), timeoutMs);
  });

  const result = await Promise.race([stopPromise, timeoutPromise]).finally(() => {
    if (timeoutHandle) {
      clearTimeout(timeoutHandle);
    }
  });

  if (result.kind === 'stopped') {
    log.debug(`${name} stopped`);
    return result;
  }

  if (result.kind === 'timeout') {
    log.warn(`${name} stop timed out`, { timeoutMs });
    void stopPromise.then((finalResult) => {
      if (finalResult.kind === 'error') {
        log.error(`failed to stop ${name}`, { message: errorMessage(finalResult.error) });
      }
    });
    return result;
  }

  log.error(`failed to stop ${name}`, { message: errorMessage(result.error) });
  return result;
}
