import { createLogger } from '@/shared/logging/logger';
import type { Runtime } from '@/runtime/bootstrap';

const FORCE_EXIT_MS = 8000;

export function registerShutdownHandlers(
  runtime: Runtime,
  log = createLogger('Server'),
): void {
  let shuttingDown = false;

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    log.info('shutdown requested', { signal });

    // Force-exit watchdog.
    const forceExit = setTimeout(() => {
      log.warn('shutdown timed out; forcing exit');
      process.exit(1);
    }, FORCE_EXIT_MS);

    try {
      await runtime.stop();
      clearTimeout(forceExit);
      process.exit(0);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error('shutdown failed', { message });
      clearTimeout(forceExit);
      process.exit(1);
    }
  };

  process.on('SIGINT', (signal) => void shutdown(signal));
  process.on('SIGTERM', (signal) => void shutdown(signal));
}
