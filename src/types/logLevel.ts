export type LogLevel = 'spam' | 'debug' | 'info' | 'warn' | 'error' | 'none';

export const LOG_LEVELS: readonly LogLevel[] = ['spam', 'debug', 'info', 'warn', 'error', 'none'];

export function findLogLevel(value: string | undefined): LogLevel | null {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? null;
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  return findLogLevel(value) ?? fallback;
}
