import type { DeviceApiPort, PlaybackCommand } from '@/ports/DeviceApiPort';
import { VOLUME_STEP, type GroupCommand } from '@/domain/beolink/commands';
import { isPlaying } from '@/domain/device/playback';
import type { VolumeSnapshot } from '@/domain/device/state';
import { InvalidParameterError } from '@/domain/errors';

type TransportKind =
  | 'media_pause'
  | 'media_play'
  | 'media_stop'
  | 'media_next_track'
  | 'media_previous_track';

const PLAYBACK_COMMANDS: Record<TransportKind, PlaybackCommand> = {
  media_pause: 'pause',
  media_play: 'play',
  media_stop: 'stop',
  media_next_track: 'skip',
  media_previous_track: 'prev',
};

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Converts a 0..1 level into the device's 0..100 scale, capped at its configured maximum. */
export function volumeTarget(level: number, volume: Pick<VolumeSnapshot, 'maximum'>): number {
  const requested = Math.round(clamp(level, 0, 1) * 100);
  return volume.maximum > 0 ? Math.min(requested, volume.maximum) : requested;
}

export function relativeVolumeTarget(delta: number, volume: VolumeSnapshot): number {
  return volumeTarget(volume.level / 100 + delta, volume);
}

/**
 * Issues one validated group command against the device at `host`.
 */
export async function executeGroupCommand(
  api: DeviceApiPort,
  host: string,
  command: GroupCommand,
  signal?: AbortSignal,
): Promise<void> {
  switch (command.kind) {
    case 'set_volume_level': {
      const volume = await api.getVolume(host, signal);
      await api.setVolumeLevel(host, volumeTarget(command.parameter, volume), signal);
      return;
    }
    case 'set_relative_volume_level': {
      const volume = await api.getVolume(host, signal);
      await api.setVolumeLevel(host, relativeVolumeTarget(command.parameter, volume), signal);
      return;
    }
    case 'volume_up':
    case 'volume_down': {
      const volume = await api.getVolume(host, signal);
      const step = command.kind === 'volume_up' ? VOLUME_STEP : -VOLUME_STEP;
      await api.setVolumeLevel(host, relativeVolumeTarget(step, volume), signal);
      return;
    }
    case 'media_seek':
      await api.seekToPosition(host, Math.round(command.parameter * 1000), signal);
      return;
    case 'mute_volume':
      await api.setMute(host, command.parameter, signal);
      return;
    case 'select_source': {
      const sources = await api.getSources(host, signal);
      const source = sources.find(
        (candidate) =>
          (candidate.id === command.parameter || candidate.name === command.parameter) &&
          candidate.isEnabled &&
          candidate.isPlayable,
      );
      if (!source) {
        const valid = sources
          .filter((candidate) => candidate.isEnabled && candidate.isPlayable)
          .map((candidate) => candidate.id)
          .join(', ');
        throw new InvalidParameterError(`unknown source ${command.parameter}; valid sources: ${valid}`);
      }
      await api.setActiveSource(host, source.id, signal);
      return;
    }
    case 'media_play_pause': {
      const state = await api.getPlaybackState(host, signal);
      await api.playbackCommand(host, isPlaying(state) ? 'pause' : 'play', signal);
      return;
    }
    case 'toggle': {
      const state = await api.getPlaybackState(host, signal);
      if (isPlaying(state)) {
        await api.standby(host, signal);
      } else {
        await api.playbackCommand(host, 'play', signal);
      }
      return;
    }
    case 'media_pause':
    case 'media_play':
    case 'media_stop':
    case 'media_next_track':
    case 'media_previous_track':
      await api.playbackCommand(host, PLAYBACK_COMMANDS[command.kind], signal);
      return;
  }
}
