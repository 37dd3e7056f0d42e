import type { ButtonState } from '@/domain/device/controls';
import type { PlaybackState } from '@/domain/device/playback';

export interface BeolinkPeerRef {
  jid: string;
  friendlyName?: string;
}

export interface SourceInfo {
  id: string;
  name?: string;
  isMultiroomAvailable?: boolean;
}

export type ButtonNotification = { kind: 'button'; controlId: string; state: ButtonState };
export type WheelNotification = { kind: 'wheel'; controlId: string; delta: number };
export type SourceChangeNotification = { kind: 'source_change'; source: SourceInfo };
export type VolumeNotification = {
  kind: 'volume';
  level: number;
  muted?: boolean;
  maximum?: number;
};
export type PlaybackStateNotification = { kind: 'playback_state'; state: PlaybackState };
export type PlaybackProgressNotification = { kind: 'playback_progress'; progress: number };
export type BeolinkNotification = {
  kind: 'beolink';
  leader: BeolinkPeerRef | null;
  listeners: BeolinkPeerRef[];
  sourceId?: string;
};
export type SoftwareUpdateNotification = {
  kind: 'software_update_state';
  state: string;
  secondsRemaining?: number;
};
export type BatteryNotification = { kind: 'battery'; level: number; isCharging?: boolean };

/**
 * Decoded notification frame. Produced by the dispatcher and handed to exactly one sink.
 */
export type RawNotification =
  | ButtonNotification
  | WheelNotification
  | SourceChangeNotification
  | VolumeNotification
  | PlaybackStateNotification
  | PlaybackProgressNotification
  | BeolinkNotification
  | SoftwareUpdateNotification
  | BatteryNotification;

export type NotificationKind = RawNotification['kind'];

/** Notifications consumed by the device state store rather than a classifier. */
export type StateNotification =
  | SourceChangeNotification
  | VolumeNotification
  | PlaybackStateNotification
  | PlaybackProgressNotification
  | SoftwareUpdateNotification
  | BatteryNotification;
