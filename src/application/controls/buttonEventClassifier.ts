import type { ClockPort, TimerHandle } from '@/ports/ClockPort';
import type { ControlTimingConfig, TimingConfig } from '@/domain/config/types';
import { isDeviceButton, type ButtonEvent, type ButtonPhase, type ButtonState } from '@/domain/device/controls';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

type HeldPhase = 'idle' | 'pressed' | 'long_held' | 'very_long_held';

interface ControlState {
  phase: HeldPhase;
  changedAt: number;
  timer: TimerHandle | null;
  generation: number;
}

export type ClassifierTiming = Pick<TimingConfig, 'longPressMs' | 'veryLongPressMs'> & {
  controls?: Record<string, Partial<ControlTimingConfig>>;
};

export type ButtonEventClassifierOptions = {
  clock: ClockPort;
  timing: ClassifierTiming;
  /** Receives `long_press` and `very_long_press`, which fire from timers rather than frames. */
  onEscalation: (event: ButtonEvent) => void;
  log?: ComponentLogger;
};

/**
 * Per-control press state machine: idle → pressed → long held → very long held → idle.
 */
export class ButtonEventClassifier {
  private readonly controls = new Map<string, ControlState>();
  private readonly clock: ClockPort;
  private readonly timing: ClassifierTiming;
  private readonly onEscalation: (event: ButtonEvent) => void;
  private readonly log: ComponentLogger;

  constructor(options: ButtonEventClassifierOptions) {
    this.clock = options.clock;
    this.timing = options.timing;
    this.onEscalation = options.onEscalation;
    this.log = options.log ?? createLogger('Controls', 'Buttons');
  }

  public classify(controlId: string, state: ButtonState, now: number): ButtonEvent[] {
    return state === 'pressed' ? this.press(controlId, now) : this.release(controlId, now);
  }

  /** Cancels every escalation timer and forgets all controls. */
  public reset(): void {
    for (const state of this.controls.values()) {
      this.cancelTimer(state);
    }
    this.controls.clear();
  }

  public phaseOf(controlId: string): HeldPhase {
    return this.controls.get(controlId)?.phase ?? 'idle';
  }

  public thresholdsFor(controlId: string): ControlTimingConfig {
    const override = this.timing.controls?.[controlId];
    return {
      longPressMs: override?.longPressMs ?? this.timing.longPressMs,
      veryLongPressMs: override?.veryLongPressMs ?? this.timing.veryLongPressMs,
    };
  }

  private press(controlId: string, now: number): ButtonEvent[] {
    const existing = this.controls.get(controlId);
    if (existing && existing.phase !== 'idle') {
      this.log.spam('duplicate press ignored', { controlId, phase: existing.phase });
      return [];
    }
    if (!existing && !isDeviceButton(controlId)) {
      this.log.debug('tracking unrecognised control', { controlId });
    }
    const state: ControlState = existing ?? { phase: 'idle', changedAt: now, timer: null, generation: 0 };
    this.transition(state, 'pressed', now);
    this.controls.set(controlId, state);
    this.arm(controlId, state, this.thresholdsFor(controlId).longPressMs, 'long_held');
    return [];
  }

  private release(controlId: string, now: number): ButtonEvent[] {
    const state = this.controls.get(controlId);
    if (!state || state.phase === 'idle') {
      this.log.spam('release without press ignored', { controlId });
      return [];
    }
    this.cancelTimer(state);
    this.catchUp(controlId, state, now);
    const heldPhase = state.phase;
    this.transition(state, 'idle', now);
    const event = (phase: ButtonPhase): ButtonEvent => ({ controlId, phase, at: now });
    switch (heldPhase) {
      case 'pressed':
        return [event('short_press'), event('short_press_release')];
      case 'long_held':
        return [event('long_press_release')];
      case 'very_long_held':
        return [event('very_long_press_release')];
    }
  }

  /** Emits escalations whose threshold passed before their timer got to run. */
  private catchUp(controlId: string, state: ControlState, now: number): void {
    const { longPressMs, veryLongPressMs } = this.thresholdsFor(controlId);
    if (state.phase === 'pressed' && now - state.changedAt >= longPressMs) {
      this.log.debug('long press escalation overdue at release', { controlId });
      this.escalate(controlId, state, 'long_held', state.changedAt + longPressMs);
    }
    if (state.phase === 'long_held' && now - state.changedAt >= veryLongPressMs) {
      this.escalate(controlId, state, 'very_long_held', state.changedAt + veryLongPressMs);
    }
  }

  private arm(
    controlId: string,
    state: ControlState,
    delayMs: number,
    next: 'long_held' | 'very_long_held',
  ): void {
    const generation = state.generation;
    state.timer = this.clock.setTimer(() => {
      if (this.controls.get(controlId) !== state || state.generation !== generation) {
        return;
      }
      state.timer = null;
      this.escalate(controlId, state, next, this.clock.now(), true);
    }, delayMs);
  }

  private escalate(
    controlId: string,
    state: ControlState,
    next: 'long_held' | 'very_long_held',
    at: number,
    rearm = false,
  ): void {
    this.transition(state, next, at);
    if (rearm && next === 'long_held') {
      this.arm(controlId, state, this.thresholdsFor(controlId).veryLongPressMs, 'very_long_held');
    }
    this.onEscalation({ controlId, phase: next === 'long_held' ? 'long_press' : 'very_long_press', at });
  }

  private transition(state: ControlState, phase: HeldPhase, now: number): void {
    state.phase = phase;
    state.changedAt = now;
    state.generation += 1;
  }

  private cancelTimer(state: ControlState): void {
    if (state.timer) {
      this.clock.clearTimer(state.timer);
      state.timer = null;
    }
  }
}
