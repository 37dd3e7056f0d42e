import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

export type StopResult =
  | { kind: 'stopped'; durationMs: number }
  | { kind: 'timeout' }
  | { kind: 'error'; error: unknown };

export type StopLogger = Pick<ComponentLogger, 'info' | 'warn' | 'error'>;

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs `stopFn` with a deadline. A stop that outlives the deadline keeps running; its eventual
 * failure is still logged.
 */
export async function stopWithTimeout(
  name: string,
  stopFn: () => Promise<void>,
  timeoutMs: number,
  log: StopLogger = createLogger('Server'),
): Promise<StopResult> {
  const startedAt = Date.now();
  let timeoutHandle: NodeJS.Timeout | null = null;
  const stopPromise = (async (): Promise<StopResult> => {
    try {
      await stopFn();
      return { kind: 'stopped', durationMs: Date.now() - startedAt };
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

  switch (result.kind) {
    case 'stopped':
      log.info(`service ${name} stopped`, { durationMs: result.durationMs });
      return result;
    case 'timeout':
      log.warn(`service ${name} stop timed out`, { timeoutMs });
      void stopPromise.then((finalResult) => {
        if (finalResult.kind === 'error') {
          log.error(`failed to stop ${name}`, { message: describeError(finalResult.error) });
        }
      });
      return result;
    case 'error':
      log.error(`failed to stop ${name}`, { message: describeError(result.error) });
      return result;
  }
}
