import type {
  BeolinkPeer,
  DeviceApiPort,
  DeviceSource,
  PlaybackCommand,
  SoftwareStatus,
} from '@/ports/DeviceApiPort';
import type { VolumeSnapshot } from '@/domain/device/state';
import { parsePlaybackState, type PlaybackState } from '@/domain/device/playback';
import { RemoteCommandFailedError } from '@/domain/errors';
import { safeJsonParse, safeReadText } from '@/shared/bestEffort';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

type JsonObject = Record<string, unknown>;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type MozartRestClientOptions = {
  requestTimeoutMs: number;
  fetchImpl?: FetchLike;
  log?: ComponentLogger;
};

type RequestOptions = {
  method?: 'GET' | 'POST' | 'PUT';
  body?: JsonObject;
  query?: Record<string, string | undefined>;
  signal?: AbortSignal;
};

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function field(source: unknown, key: string): unknown {
  return isObject(source) ? source[key] : undefined;
}

function numberOr(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

/** Mozart wraps some scalars in objects (`{ level: { level: 40 } }`); accept both shapes. */
function scalar(source: unknown, key: string): unknown {
  const value = field(source, key);
  return isObject(value) ? value[key] : value;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * `DeviceApiPort` over the device's local REST API (`http://<host>/api/v1/...`).
 */
export class MozartRestClient implements DeviceApiPort {
  private readonly log: ComponentLogger;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: MozartRestClientOptions) {
    this.log = options.log ?? createLogger('Mozart', 'Rest');
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  public async getBeolinkPeers(host: string, signal?: AbortSignal): Promise<BeolinkPeer[]> {
    const body = await this.request(host, '/beolink/peers', { signal });
    const items = Array.isArray(body) ? body : field(body, 'items');
    if (!Array.isArray(items)) {
      return [];
    }
    const peers: BeolinkPeer[] = [];
    for (const item of items) {
      const jid = field(item, 'jid');
      if (typeof jid !== 'string' || jid.length === 0) continue;
      const friendlyName = field(item, 'friendlyName');
      peers.push({ jid, friendlyName: typeof friendlyName === 'string' ? friendlyName : jid });
    }
    return peers;
  }

  public async joinLatestBeolinkExperience(host: string, signal?: AbortSignal): Promise<void> {
    await this.request(host, '/beolink/join', { method: 'POST', signal });
  }

  public async joinBeolinkPeer(
    host: string,
    jid: string,
    source?: string,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.request(host, `/beolink/join/${encodeURIComponent(jid)}`, {
      method: 'POST',
      query: { source },
      signal,
    });
  }

  public async expandBeolink(host: string, jid: string, signal?: AbortSignal): Promise<void> {
    await this.request(host, `/beolink/expand/${encodeURIComponent(jid)}`, { method: 'POST', signal });
  }

  public async unexpandBeolink(host: string, jid: string, signal?: AbortSignal): Promise<void> {
    await this.request(host, `/beolink/unexpand/${encodeURIComponent(jid)}`, { method: 'POST', signal });
  }

  public async leaveBeolink(host: string, signal?: AbortSignal): Promise<void> {
    await this.request(host, '/beolink/leave', { method: 'POST', signal });
  }

  public async standby(host: string, signal?: AbortSignal): Promise<void> {
    await this.request(host, '/power/state', { method: 'PUT', body: { value: 'networkStandby' }, signal });
  }

  public async getVolume(host: string, signal?: AbortSignal): Promise<VolumeSnapshot> {
    const body = await this.request(host, '/playback/volume', { signal });
    return {
      level: numberOr(scalar(body, 'level'), 0),
      muted: scalar(body, 'muted') === true,
      maximum: numberOr(field(field(body, 'maximum'), 'level') ?? field(body, 'maximum'), 100),
    };
  }

  public async setVolumeLevel(host: string, level: number, signal?: AbortSignal): Promise<void> {
    await this.request(host, '/playback/volume/level', { method: 'POST', body: { level }, signal });
  }

  public async setMute(host: string, muted: boolean, signal?: AbortSignal): Promise<void> {
    await this.request(host, '/playback/volume/mute', { method: 'POST', body: { muted }, signal });
  }

  public async playbackCommand(
    host: string,
    command: PlaybackCommand,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.request(host, '/playback/command', { method: 'POST', body: { action: command }, signal });
  }

  public async seekToPosition(host: string, positionMs: number, signal?: AbortSignal): Promise<void> {
    await this.request(host, '/playback/command', {
      method: 'POST',
      body: { action: 'seek', positionMs: Math.round(positionMs) },
      signal,
    });
  }

  public async getPlaybackState(host: string, signal?: AbortSignal): Promise<PlaybackState> {
    const body = await this.request(host, '/playback/state', { signal });
    const state = field(body, 'state');
    const value = isObject(state) ? state.value : state;
    return parsePlaybackState(typeof value === 'string' ? value : 'unknown');
  }

  public async getSources(host: string, signal?: AbortSignal): Promise<DeviceSource[]> {
    const body = await this.request(host, '/playback/sources', { signal });
    const items = field(body, 'items');
    if (!Array.isArray(items)) {
      return [];
    }
    const sources: DeviceSource[] = [];
    for (const item of items) {
      const id = field(item, 'id');
      if (typeof id !== 'string' || id.length === 0) continue;
      const name = field(item, 'name');
      sources.push({
        id,
        name: typeof name === 'string' ? name : id,
        isEnabled: field(item, 'isEnabled') === true,
        isPlayable: field(item, 'isPlayable') === true,
        isMultiroomAvailable: field(item, 'isMultiroomAvailable') === true,
      });
    }
    return sources;
  }

  public async setActiveSource(host: string, sourceId: string, signal?: AbortSignal): Promise<void> {
    await this.request(host, `/playback/sources/active/${encodeURIComponent(sourceId)}`, {
      method: 'POST',
      signal,
    });
  }

  public async getSoftwareStatus(host: string, signal?: AbortSignal): Promise<SoftwareStatus> {
    const body = await this.request(host, '/software/update/status', { signal });
    const version = field(body, 'softwareVersion');
    if (typeof version !== 'string') {
      throw new RemoteCommandFailedError('software status response has no version', null, 'missing softwareVersion');
    }
    return { softwareVersion: version };
  }

  private async request(host: string, path: string, options: RequestOptions = {}): Promise<unknown> {
    const method = options.method ?? 'GET';
    const url = this.buildUrl(host, path, options.query);
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener('abort', onAbort, { once: true });
    }
    const timeout = setTimeout(() => controller.abort(), this.options.requestTimeoutMs);
    timeout.unref();

    try {
      this.log.debug('rest request', { method, url });
      const response = await this.fetchImpl(url, {
        method,
        headers: options.body ? { 'content-type': 'application/json' } : undefined,
        body: options.body ? JSON.stringify(options.body) : undefined,
        signal: controller.signal,
      });
      const text = await safeReadText(response, '', { log: this.log, label: 'rest body read failed' });
      if (!response.ok) {
        const detail = text.trim() || response.statusText || `HTTP ${response.status}`;
        throw new RemoteCommandFailedError(
          `${method} ${path} failed with status ${response.status}`,
          response.status,
          detail,
        );
      }
      return text ? safeJsonParse<unknown>(text, null, { log: this.log, label: 'rest body parse failed' }) : null;
    } catch (error) {
      if (error instanceof RemoteCommandFailedError) {
        throw error;
      }
      const detail = controller.signal.aborted && !options.signal?.aborted ? 'request timed out' : describeError(error);
      throw new RemoteCommandFailedError(`${method} ${path} failed: ${detail}`, null, detail, [], { cause: error });
    } finally {
      clearTimeout(timeout);
      options.signal?.removeEventListener('abort', onAbort);
    }
  }

  private buildUrl(host: string, path: string, query?: Record<string, string | undefined>): string {
    const url = new URL(`http://${host}/api/v1${path}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) {
        url.searchParams.set(key, value);
      }
    }
    return url.toString();
  }
}
