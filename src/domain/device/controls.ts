/** Physical controls reported by Mozart devices. Unknown ids are still classified. */
export const DEVICE_BUTTONS = [
  'Bluetooth',
  'Microphone',
  'Next',
  'PlayPause',
  'Preset1',
  'Preset2',
  'Preset3',
  'Preset4',
  'Previous',
  'Volume',
] as const;

export type DeviceButton = (typeof DEVICE_BUTTONS)[number];

export type ButtonState = 'pressed' | 'released';

export type ButtonPhase =
  | 'short_press'
  | 'short_press_release'
  | 'long_press'
  | 'long_press_release'
  | 'very_long_press'
  | 'very_long_press_release';

export type RotationDirection = 'clockwise' | 'counterClockwise';

export interface ButtonEvent {
  controlId: string;
  phase: ButtonPhase;
  at: number;
}

export interface RotationEvent {
  controlId: string;
  direction: RotationDirection;
  magnitude: number;
}

export function isDeviceButton(controlId: string): controlId is DeviceButton {
  return DEVICE_BUTTONS.some((button) => button === controlId);
}
