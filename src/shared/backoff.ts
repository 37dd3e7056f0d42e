export type BackoffOptions = {
  baseMs: number;
  maxMs: number;
  jitterMs?: number;
  /** Attempts beyond this count stop growing the delay. */
  maxExponent?: number;
  random?: () => number;
};

/**
 * Exponential reconnect delay: `min(max, base * 2^min(attempt, 6)) + jitter`.
 */
export function backoffDelay(attempt: number, options: BackoffOptions): number {
  const exponent = Math.min(Math.max(attempt, 0), options.maxExponent ?? 6);
  const backoff = Math.min(options.maxMs, options.baseMs * 2 ** exponent);
  const jitterMs = options.jitterMs ?? 0;
  if (jitterMs <= 0) {
    return backoff;
  }
  const random = options.random ?? Math.random;
  return backoff + Math.round(random() * jitterMs);
}
