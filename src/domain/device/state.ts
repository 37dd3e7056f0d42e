import type { SourceInfo } from '@/domain/device/notifications';
import type { PlaybackState } from '@/domain/device/playback';

export interface VolumeSnapshot {
  /** 0..100 as reported by the device. */
  level: number;
  muted: boolean;
  maximum: number;
}

export interface DeviceStateSnapshot {
  source: SourceInfo | null;
  volume: VolumeSnapshot | null;
  playback: {
    state: PlaybackState;
    progress: number | null;
  };
  softwareUpdate: {
    state: string;
    secondsRemaining: number | null;
  } | null;
  softwareVersion: string | null;
  battery: {
    level: number;
    isCharging: boolean;
  } | null;
}

export type DeviceStateField = keyof DeviceStateSnapshot;

export interface DeviceStateChange {
  field: DeviceStateField;
  snapshot: DeviceStateSnapshot;
}

export function emptyDeviceState(): DeviceStateSnapshot {
  return {
    source: null,
    volume: null,
    playback: { state: 'unknown', progress: null },
    softwareUpdate: null,
    softwareVersion: null,
    battery: null,
  };
}
