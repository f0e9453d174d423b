import { createLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';
import type { Runtime } from '@/runtime/bootstrap';

/** Longer than the controller's own stop grace, so a clean stop always wins. */
export const FORCE_EXIT_MS = 8000;

export function registerShutdownHandlers(
  runtime: Pick<Runtime, 'stop'>,
  log = createLogger('Server'),
): () => void {
  let shuttingDown = false;

  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    log.info('shutdown requested', { signal });

    // Force-exit watchdog so Ctrl+C cannot hang forever if a stop never resolves.
    const forceExit = setTimeout(() => {
      log.warn('shutdown timed out; forcing exit');
      process.exit(1);
    }, FORCE_EXIT_MS);
    forceExit.unref();

    runtime
      .stop()
      .catch((error: unknown) => {
        log.error('controller stop failed', { message: errorMessage(error) });
      })
      .finally(() => clearTimeout(forceExit));
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
  return () => {
    process.off('SIGINT', shutdown);
    process.off('SIGTERM', shutdown);
  };
}
