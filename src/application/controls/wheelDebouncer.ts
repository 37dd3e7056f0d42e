import type { ClockPort, TimerHandle } from '@/ports/ClockPort';
import type { RotationEvent } from '@/domain/device/controls';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

interface WheelAccumulator {
  net: number;
  lastActivity: number;
  timer: TimerHandle | null;
}

export type WheelDebouncerOptions = {
  clock: ClockPort;
  quietMs: number;
  onRotation: (event: RotationEvent) => void;
  log?: ComponentLogger;
};

/**
 * Collapses a burst of wheel detents into one rotation event once the wheel has been quiet.
 */
export class WheelDebouncer {
  private readonly wheels = new Map<string, WheelAccumulator>();
  private readonly log: ComponentLogger;

  constructor(private readonly options: WheelDebouncerOptions) {
    this.log = options.log ?? createLogger('Controls', 'Wheel');
  }

  /**
   * Adds a detent delta. When the previous burst already went quiet according to `now` but its
   * timer has not run yet, that burst is returned here and a new one starts.
   */
  public accumulate(controlId: string, delta: number, now: number): RotationEvent | null {
    if (delta === 0) {
      this.log.spam('zero detent ignored', { controlId });
      return null;
    }
    let flushed: RotationEvent | null = null;
    const pending = this.wheels.get(controlId);
    if (pending && now - pending.lastActivity >= this.options.quietMs) {
      flushed = this.flush(controlId, pending);
    }

    const accumulator = this.wheels.get(controlId) ?? { net: 0, lastActivity: now, timer: null };
    accumulator.net += delta;
    accumulator.lastActivity = now;
    this.cancelTimer(accumulator);
    accumulator.timer = this.options.clock.setTimer(() => {
      if (this.wheels.get(controlId) !== accumulator) {
        return;
      }
      accumulator.timer = null;
      const event = this.flush(controlId, accumulator);
      if (event) {
        this.options.onRotation(event);
      }
    }, this.options.quietMs);
    this.wheels.set(controlId, accumulator);
    return flushed;
  }

  public reset(): void {
    for (const accumulator of this.wheels.values()) {
      this.cancelTimer(accumulator);
    }
    this.wheels.clear();
  }

  public pendingCount(controlId: string): number {
    return this.wheels.get(controlId)?.net ?? 0;
  }

  private flush(controlId: string, accumulator: WheelAccumulator): RotationEvent | null {
    this.cancelTimer(accumulator);
    this.wheels.delete(controlId);
    if (accumulator.net === 0) {
      this.log.spam('wheel burst settled with no net movement', { controlId });
      return null;
    }
    return {
      controlId,
      direction: accumulator.net > 0 ? 'clockwise' : 'counterClockwise',
      magnitude: Math.abs(accumulator.net),
    };
  }

  private cancelTimer(accumulator: WheelAccumulator): void {
    if (accumulator.timer) {
      this.options.clock.clearTimer(accumulator.timer);
      accumulator.timer = null;
    }
  }
}
