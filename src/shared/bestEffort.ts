import type { ComponentLogger, LogContext } from '@/shared/logging/logger';

/** Where a swallowed failure is reported; failures are always logged at debug. */
export type FailureReport = {
  label: string;
  log: ComponentLogger;
  context?: LogContext;
};

export type BestEffortOptions<T> = FailureReport & { fallback: T };

function reportFailure(error: unknown, report: FailureReport): void {
  report.log.debug(report.label, {
    ...report.context,
    message: error instanceof Error ? error.message : String(error),
  });
}

/** Runs background work whose failure only degrades the result to `fallback`. */
export async function bestEffort<T>(fn: () => Promise<T>, options: BestEffortOptions<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    reportFailure(error, options);
    return options.fallback;
  }
}

export function bestEffortSync<T>(fn: () => T, options: BestEffortOptions<T>): T {
  try {
    return fn();
  } catch (error) {
    reportFailure(error, options);
    return options.fallback;
  }
}

export function safeJsonParse<T>(raw: string, fallback: T, report: FailureReport): T {
  return bestEffortSync((): T => JSON.parse(raw), { ...report, fallback });
}

/** Reads a response body, yielding `fallback` when the stream fails mid-read. */
export function safeReadText(
  response: { text: () => Promise<string> },
  fallback: string,
  report: FailureReport,
): Promise<string> {
  return bestEffort(() => response.text(), { ...report, fallback });
}
