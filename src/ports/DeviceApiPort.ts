import type { PlaybackState } from '@/domain/device/playback';
import type { VolumeSnapshot } from '@/domain/device/state';

export interface BeolinkPeer {
  jid: string;
  friendlyName: string;
}

export interface DeviceSource {
  id: string;
  name: string;
  isEnabled: boolean;
  isPlayable: boolean;
  isMultiroomAvailable: boolean;
}

export interface SoftwareStatus {
  softwareVersion: string;
}

export type PlaybackCommand = 'play' | 'pause' | 'stop' | 'skip' | 'prev';

/**
 * REST surface of a Mozart device, addressed by host. Failures reject with
 * `RemoteCommandFailedError` carrying the HTTP status and the device's detail.
 */
export interface DeviceApiPort {
  getBeolinkPeers(host: string, signal?: AbortSignal): Promise<BeolinkPeer[]>;
  joinLatestBeolinkExperience(host: string, signal?: AbortSignal): Promise<void>;
  joinBeolinkPeer(host: string, jid: string, source?: string, signal?: AbortSignal): Promise<void>;
  expandBeolink(host: string, jid: string, signal?: AbortSignal): Promise<void>;
  unexpandBeolink(host: string, jid: string, signal?: AbortSignal): Promise<void>;
  leaveBeolink(host: string, signal?: AbortSignal): Promise<void>;
  standby(host: string, signal?: AbortSignal): Promise<void>;
  getVolume(host: string, signal?: AbortSignal): Promise<VolumeSnapshot>;
  setVolumeLevel(host: string, level: number, signal?: AbortSignal): Promise<void>;
  setMute(host: string, muted: boolean, signal?: AbortSignal): Promise<void>;
  playbackCommand(host: string, command: PlaybackCommand, signal?: AbortSignal): Promise<void>;
  seekToPosition(host: string, positionMs: number, signal?: AbortSignal): Promise<void>;
  getPlaybackState(host: string, signal?: AbortSignal): Promise<PlaybackState>;
  getSources(host: string, signal?: AbortSignal): Promise<DeviceSource[]>;
  setActiveSource(host: string, sourceId: string, signal?: AbortSignal): Promise<void>;
  getSoftwareStatus(host: string, signal?: AbortSignal): Promise<SoftwareStatus>;
}
