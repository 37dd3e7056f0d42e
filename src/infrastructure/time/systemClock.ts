import type { ClockPort } from '@/ports/ClockPort';

export const systemClock: ClockPort = {
  now: () => Date.now(),
  setTimer: (fn, delayMs) => {
    const timer = setTimeout(fn, delayMs);
    return { cancel: () => clearTimeout(timer) };
  },
  clearTimer: (handle) => handle.cancel(),
};
