import { InvalidParameterError } from '@/domain/errors';

export const FLOAT_COMMANDS = ['set_volume_level', 'media_seek', 'set_relative_volume_level'] as const;
export const BOOL_COMMANDS = ['mute_volume'] as const;
export const STRING_COMMANDS = ['select_source'] as const;
export const BARE_COMMANDS = [
  'volume_up',
  'volume_down',
  'media_play_pause',
  'media_pause',
  'media_play',
  'media_stop',
  'media_next_track',
  'media_previous_track',
  'toggle',
] as const;

export type FloatCommandKind = (typeof FLOAT_COMMANDS)[number];
export type BoolCommandKind = (typeof BOOL_COMMANDS)[number];
export type StringCommandKind = (typeof STRING_COMMANDS)[number];
export type BareCommandKind = (typeof BARE_COMMANDS)[number];
export type LeaderCommandKind = FloatCommandKind | BoolCommandKind | StringCommandKind | BareCommandKind;

export const LEADER_COMMANDS: readonly LeaderCommandKind[] = [
  ...FLOAT_COMMANDS,
  ...BOOL_COMMANDS,
  ...STRING_COMMANDS,
  ...BARE_COMMANDS,
];

/**
 * A command requested locally and executed against whichever device leads the session.
 */
export type GroupCommand =
  | { kind: 'set_volume_level'; parameter: number }
  | { kind: 'set_relative_volume_level'; parameter: number }
  | { kind: 'media_seek'; parameter: number }
  | { kind: 'mute_volume'; parameter: boolean }
  | { kind: 'select_source'; parameter: string }
  | { kind: BareCommandKind };

/** Step applied by `volume_up` and `volume_down` on the 0..1 scale. */
export const VOLUME_STEP = 0.1;

function includes<T extends string>(list: readonly T[], value: string): value is T {
  return list.some((entry) => entry === value);
}

function describe(parameter: unknown): string {
  return typeof parameter === 'string' ? `"${parameter}"` : String(parameter);
}

function coerceFloat(kind: FloatCommandKind, parameter: unknown): number {
  const value =
    typeof parameter === 'number'
      ? parameter
      : typeof parameter === 'string' && parameter.trim() !== ''
        ? Number(parameter)
        : Number.NaN;
  if (!Number.isFinite(value)) {
    throw new InvalidParameterError(`${kind} requires a number, got ${describe(parameter)}`);
  }
  const [min, max] = kind === 'set_volume_level' ? [0, 1] : kind === 'media_seek' ? [0, Infinity] : [-1, 1];
  if (value < min || value > max) {
    throw new InvalidParameterError(`${kind} parameter ${value} is outside ${min}..${max}`);
  }
  return value;
}

function coerceBool(kind: BoolCommandKind, parameter: unknown): boolean {
  if (typeof parameter === 'boolean') return parameter;
  if (typeof parameter === 'string') {
    const normalized = parameter.trim().toLowerCase();
    if (normalized === 'true') return true;
    if (normalized === 'false') return false;
  }
  throw new InvalidParameterError(`${kind} requires a boolean, got ${describe(parameter)}`);
}

/**
 * Validates a command name and its parameter, coercing string parameters from the HTTP surface.
 */
export function parseGroupCommand(kind: string, parameter?: unknown): GroupCommand {
  const absent = parameter === undefined || parameter === null;
  if (includes(FLOAT_COMMANDS, kind)) {
    if (absent) throw new InvalidParameterError(`${kind} requires a parameter`);
    return { kind, parameter: coerceFloat(kind, parameter) };
  }
  if (includes(BOOL_COMMANDS, kind)) {
    if (absent) throw new InvalidParameterError(`${kind} requires a parameter`);
    return { kind, parameter: coerceBool(kind, parameter) };
  }
  if (includes(STRING_COMMANDS, kind)) {
    if (typeof parameter !== 'string' || parameter.trim() === '') {
      throw new InvalidParameterError(`${kind} requires a source id`);
    }
    return { kind, parameter: parameter.trim() };
  }
  if (includes(BARE_COMMANDS, kind)) {
    if (!absent) {
      throw new InvalidParameterError(`${kind} takes no parameter, got ${describe(parameter)}`);
    }
    return { kind };
  }
  throw new InvalidParameterError(`unknown leader command ${kind}; valid commands: ${LEADER_COMMANDS.join(', ')}`);
}
