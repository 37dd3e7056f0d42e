export type TimerHandle = {
  cancel: () => void;
};

/**
 * Time source and one-shot timer scheduling, swapped for a manual clock in tests.
 */
export interface ClockPort {
  now(): number;
  setTimer(fn: () => void, delayMs: number): TimerHandle;
  clearTimer(handle: TimerHandle): void;
}
