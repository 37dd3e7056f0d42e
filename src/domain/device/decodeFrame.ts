import { MalformedNotificationError } from '@/domain/errors';
import { parsePlaybackState } from '@/domain/device/playback';
import type {
  BeolinkPeerRef,
  RawNotification,
  SourceInfo,
} from '@/domain/device/notifications';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

class FrameReader {
  constructor(
    private readonly frame: string,
    private readonly type: string,
  ) {}

  public fail(reason: string): never {
    throw new MalformedNotificationError(`${this.type}: ${reason}`, this.frame);
  }

  public string(source: JsonObject, key: string): string {
    const value = source[key];
    if (typeof value !== 'string' || value.length === 0) {
      return this.fail(`${key} must be a non-empty string`);
    }
    return value;
  }

  public optionalString(source: JsonObject, key: string): string | undefined {
    const value = source[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string') {
      return this.fail(`${key} must be a string`);
    }
    return value;
  }

  public number(source: JsonObject, key: string, min?: number, max?: number): number {
    const value = source[key];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      return this.fail(`${key} must be a number`);
    }
    if ((min !== undefined && value < min) || (max !== undefined && value > max)) {
      return this.fail(`${key} out of range`);
    }
    return value;
  }

  public optionalNumber(
    source: JsonObject,
    key: string,
    min?: number,
    max?: number,
  ): number | undefined {
    if (source[key] === undefined || source[key] === null) return undefined;
    return this.number(source, key, min, max);
  }

  public optionalBoolean(source: JsonObject, key: string): boolean | undefined {
    const value = source[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'boolean') {
      return this.fail(`${key} must be a boolean`);
    }
    return value;
  }

  public object(source: JsonObject, key: string): JsonObject {
    const value = source[key];
    if (!isObject(value)) {
      return this.fail(`${key} must be an object`);
    }
    return value;
  }

  public peer(value: unknown, key: string): BeolinkPeerRef {
    if (!isObject(value)) {
      return this.fail(`${key} must be an object`);
    }
    const jid = this.string(value, 'jid');
    const friendlyName = this.optionalString(value, 'friendlyName');
    return friendlyName === undefined ? { jid } : { jid, friendlyName };
  }
}

/**
 * Decodes one WebSocket text frame into a notification.
 * Throws `MalformedNotificationError` for invalid JSON, unknown types or bad fields.
 */
export function decodeFrame(frame: string): RawNotification {
  let parsed: unknown;
  try {
    parsed = JSON.parse(frame);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new MalformedNotificationError(`frame is not valid json: ${message}`, frame);
  }
  if (!isObject(parsed)) {
    throw new MalformedNotificationError('frame is not a json object', frame);
  }
  const type = parsed.type;
  if (typeof type !== 'string') {
    throw new MalformedNotificationError('frame has no type', frame);
  }
  const read = new FrameReader(frame, type);

  switch (type) {
    case 'button': {
      const state = parsed.state;
      if (state !== 'pressed' && state !== 'released') {
        return read.fail('state must be pressed or released');
      }
      return { kind: 'button', controlId: read.string(parsed, 'controlId'), state };
    }
    case 'wheel': {
      const counts = read.number(parsed, 'counts');
      if (!Number.isInteger(counts) || counts === 0) {
        return read.fail('counts must be a non-zero integer');
      }
      const direction = parsed.direction;
      let delta = counts;
      if (direction === 'clockwise') {
        delta = Math.abs(counts);
      } else if (direction === 'counterClockwise') {
        delta = -Math.abs(counts);
      } else if (direction !== undefined && direction !== null) {
        return read.fail('direction must be clockwise or counterClockwise');
      }
      return { kind: 'wheel', controlId: read.string(parsed, 'controlId'), delta };
    }
    case 'source_change': {
      const raw = read.object(parsed, 'source');
      const source: SourceInfo = { id: read.string(raw, 'id') };
      const name = read.optionalString(raw, 'name');
      const multiroom = read.optionalBoolean(raw, 'isMultiroomAvailable');
      if (name !== undefined) source.name = name;
      if (multiroom !== undefined) source.isMultiroomAvailable = multiroom;
      return { kind: 'source_change', source };
    }
    case 'volume':
      return {
        kind: 'volume',
        level: read.number(parsed, 'level', 0, 100),
        muted: read.optionalBoolean(parsed, 'muted'),
        maximum: read.optionalNumber(parsed, 'maximum', 0, 100),
      };
    case 'playback_state':
      return { kind: 'playback_state', state: parsePlaybackState(read.string(parsed, 'state')) };
    case 'playback_progress':
      return { kind: 'playback_progress', progress: read.number(parsed, 'progress', 0) };
    case 'beolink': {
      const rawListeners = parsed.listeners;
      let listeners: BeolinkPeerRef[] = [];
      if (Array.isArray(rawListeners)) {
        listeners = rawListeners.map((entry: unknown) => read.peer(entry, 'listeners[]'));
      } else if (rawListeners !== undefined && rawListeners !== null) {
        return read.fail('listeners must be an array');
      }
      const rawLeader = parsed.leader;
      const leader = rawLeader === undefined || rawLeader === null ? null : read.peer(rawLeader, 'leader');
      const sourceId = read.optionalString(parsed, 'sourceId');
      return sourceId === undefined
        ? { kind: 'beolink', leader, listeners }
        : { kind: 'beolink', leader, listeners, sourceId };
    }
    case 'software_update_state':
      return {
        kind: 'software_update_state',
        state: read.string(parsed, 'state'),
        secondsRemaining: read.optionalNumber(parsed, 'secondsRemaining', 0),
      };
    case 'battery':
      return {
        kind: 'battery',
        level: read.number(parsed, 'level', 0, 100),
        isCharging: read.optionalBoolean(parsed, 'isCharging'),
      };
    default:
      throw new MalformedNotificationError(`unknown notification type ${type}`, frame);
  }
}
