import path from 'node:path';
import type { StoragePort } from '@/ports/StoragePort';
import { createLogger } from '@/shared/logging/logger';
import { isValidJid } from '@/domain/beolink/jid';
import type {
  BridgeConfig,
  ConnectionConfig,
  ControlTimingConfig,
  DeviceConfig,
  TimingConfig,
} from '@/domain/config/types';

const CONFIG_PATH = path.resolve(process.cwd(), 'data', 'config.json');

const log = createLogger('Config');

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Device configuration store backed by a JSON file on disk.
 */
export class ConfigRepository {
  private config: BridgeConfig | null = null;

  constructor(
    private readonly storage: StoragePort,
    private readonly filePath = CONFIG_PATH,
  ) {}

  public async load(): Promise<BridgeConfig> {
    const raw = await this.storage.readJson(this.filePath, defaultConfig(), { writeIfMissing: true });
    const { config, filled } = normalizeConfig(raw);
    this.config = config;
    if (filled) {
      await this.storage.writeJson(this.filePath, config);
    }
    log.info('configuration loaded', { devices: config.devices.length });
    return config;
  }

  public get(): BridgeConfig {
    if (!this.config) {
      throw new Error('configuration not loaded');
    }
    return this.config;
  }

  public getDevices(): DeviceConfig[] {
    return this.get().devices;
  }

  public async save(): Promise<void> {
    await this.storage.writeJson(this.filePath, this.get());
  }

  public async update(
    mutator: (config: BridgeConfig) => void | Promise<void>,
  ): Promise<BridgeConfig> {
    const current = this.config ?? (await this.load());
    const before = serializeConfig(current);
    await mutator(current);
    const { config } = normalizeConfig(current);
    if (serializeConfig(config) !== before) {
      config.updatedAt = new Date().toISOString();
    }
    this.config = config;
    await this.save();
    return config;
  }
}

function serializeConfig(config: BridgeConfig): string {
  return JSON.stringify(config, (key, value: unknown) => (key === 'updatedAt' ? undefined : value));
}

export function defaultTiming(): TimingConfig {
  return { longPressMs: 1500, veryLongPressMs: 1500, wheelQuietMs: 250, controls: {} };
}

export function defaultConnection(): ConnectionConfig {
  return {
    notificationPort: 9339,
    reconnectBaseMs: 2000,
    reconnectMaxMs: 30000,
    reconnectJitterMs: 2000,
    heartbeatIntervalMs: 10000,
    heartbeatTimeoutMs: 30000,
    requestTimeoutMs: 5000,
  };
}

export function defaultConfig(): BridgeConfig {
  return {
    devices: [],
    timing: defaultTiming(),
    connection: defaultConnection(),
    discovery: { enabled: true },
    updatedAt: new Date().toISOString(),
  };
}

function positive(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : fallback;
}

function nonEmptyString(value: unknown): string | null {
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : null;
}

function normalizeDevices(raw: unknown): DeviceConfig[] {
  if (!Array.isArray(raw)) return [];
  const devices: DeviceConfig[] = [];
  const serials = new Set<string>();
  raw.forEach((entry: unknown, index) => {
    if (!isObject(entry)) {
      log.warn('dropping device entry that is not an object', { index });
      return;
    }
    const serial = nonEmptyString(entry.serial);
    const host = nonEmptyString(entry.host);
    const jid = nonEmptyString(entry.jid);
    if (!serial || !host || !jid || !isValidJid(jid)) {
      log.warn('dropping malformed device entry', { index, serial, host, jid });
      return;
    }
    if (serials.has(serial)) {
      log.warn('dropping duplicate device entry', { index, serial });
      return;
    }
    serials.add(serial);
    const device: DeviceConfig = { serial, host, jid };
    const model = nonEmptyString(entry.model);
    const name = nonEmptyString(entry.name);
    if (model) device.model = model;
    if (name) device.name = name;
    devices.push(device);
  });
  return devices;
}

function normalizeControls(raw: unknown): Record<string, Partial<ControlTimingConfig>> {
  if (!isObject(raw)) return {};
  const controls: Record<string, Partial<ControlTimingConfig>> = {};
  for (const [controlId, value] of Object.entries(raw)) {
    if (!isObject(value)) continue;
    const override: Partial<ControlTimingConfig> = {};
    if (typeof value.longPressMs === 'number' && value.longPressMs > 0) {
      override.longPressMs = value.longPressMs;
    }
    if (typeof value.veryLongPressMs === 'number' && value.veryLongPressMs > 0) {
      override.veryLongPressMs = value.veryLongPressMs;
    }
    controls[controlId] = override;
  }
  return controls;
}

function normalizeTiming(raw: JsonObject): TimingConfig {
  const defaults = defaultTiming();
  return {
    longPressMs: positive(raw.longPressMs, defaults.longPressMs),
    veryLongPressMs: positive(raw.veryLongPressMs, defaults.veryLongPressMs),
    wheelQuietMs: positive(raw.wheelQuietMs, defaults.wheelQuietMs),
    controls: normalizeControls(raw.controls),
  };
}

function normalizeConnection(raw: JsonObject): ConnectionConfig {
  const defaults = defaultConnection();
  const reconnectBaseMs = positive(raw.reconnectBaseMs, defaults.reconnectBaseMs);
  return {
    notificationPort: positive(raw.notificationPort, defaults.notificationPort),
    reconnectBaseMs,
    reconnectMaxMs: Math.max(reconnectBaseMs, positive(raw.reconnectMaxMs, defaults.reconnectMaxMs)),
    reconnectJitterMs:
      typeof raw.reconnectJitterMs === 'number' && raw.reconnectJitterMs >= 0
        ? raw.reconnectJitterMs
        : defaults.reconnectJitterMs,
    heartbeatIntervalMs: positive(raw.heartbeatIntervalMs, defaults.heartbeatIntervalMs),
    heartbeatTimeoutMs: positive(raw.heartbeatTimeoutMs, defaults.heartbeatTimeoutMs),
    requestTimeoutMs: positive(raw.requestTimeoutMs, defaults.requestTimeoutMs),
  };
}

/**
 * Fills missing sections and drops malformed device entries. `filled` reports whether a whole
 * section had to be created, which is persisted back to disk.
 */
export function normalizeConfig(raw: unknown): { config: BridgeConfig; filled: boolean } {
  const source = isObject(raw) ? raw : {};
  let filled = !isObject(raw);
  const section = (key: string): JsonObject => {
    const value = source[key];
    if (isObject(value)) return value;
    filled = true;
    return {};
  };
  if (!Array.isArray(source.devices)) {
    filled = true;
  }
  const discovery = section('discovery');
  const config: BridgeConfig = {
    devices: normalizeDevices(source.devices),
    timing: normalizeTiming(section('timing')),
    connection: normalizeConnection(section('connection')),
    discovery: { enabled: discovery.enabled !== false },
    updatedAt: nonEmptyString(source.updatedAt) ?? new Date().toISOString(),
  };
  return { config, filled };
}
