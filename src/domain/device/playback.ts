export const PLAYBACK_STATES = [
  'started',
  'buffering',
  'paused',
  'stopped',
  'idle',
  'ended',
  'error',
  'unknown',
] as const;

export type PlaybackState = (typeof PLAYBACK_STATES)[number];

export function parsePlaybackState(value: string): PlaybackState {
  return PLAYBACK_STATES.find((state) => state === value) ?? 'unknown';
}

/** `started` and `buffering` count as playing; a fresh device reports `unknown`. */
export function isPlaying(state: PlaybackState): boolean {
  return state === 'started' || state === 'buffering';
}
