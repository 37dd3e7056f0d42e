import type { IncomingMessage, ServerResponse } from 'node:http';
import type { DeviceRegistry } from '@/application/devices/deviceManager';
import type { DeviceRuntime } from '@/application/devices/deviceRuntime';
import type { DeviceDirectory } from '@/application/devices/deviceDirectory';
import type { AnyDeviceEvent } from '@/application/devices/deviceEventBus';
import { BeolinkError, InvalidParameterError, RemoteCommandFailedError } from '@/domain/errors';
import { createLogger, logManager } from '@/shared/logging/logger';
import { logBuffer } from '@/shared/logging/logBuffer';
import { findLogLevel } from '@/types/logLevel';
import { readJsonBody, sendJson } from '@/adapters/http/utils/jsonBody';

type RouteHandler = (
  req: IncomingMessage,
  res: ServerResponse,
  match: RegExpMatchArray,
  pathname: string,
) => Promise<void> | void;

type Route = {
  method?: string;
  pattern: RegExp;
  handler: RouteHandler;
};

type JsonObject = Record<string, unknown>;

type DeviceAction = (runtime: DeviceRuntime, body: JsonObject) => Promise<unknown>;

export type ControlApiOptions = {
  devices: DeviceRegistry & { subscribe(listener: (event: AnyDeviceEvent) => void): () => void };
  directory: DeviceDirectory;
  sseHeartbeatMs?: number;
};

const API_PREFIX = '/api';

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(body: JsonObject, key: string): string | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string' || value.length === 0) {
    throw new InvalidParameterError(`${key} must be a non-empty string`);
  }
  return value;
}

function optionalStringList(body: JsonObject, key: string): string[] | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new InvalidParameterError(`${key} must be a list of strings`);
  }
  return value;
}

function requiredNumber(body: JsonObject, key: string): number {
  const value = body[key];
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed)) {
    throw new InvalidParameterError(`${key} must be a number`);
  }
  return parsed;
}

function errorStatus(error: BeolinkError): number {
  switch (error.code) {
    case 'remote_command_failed':
      return 502;
    case 'connection_lost':
      return 503;
    default:
      return 400;
  }
}

/**
 * HTTP JSON surface for the Beolink group operations, device snapshots, device events and logs.
 */
export class ControlApiHandler {
  private readonly log = createLogger('Http', 'ControlApi');
  private readonly routes: Route[];

  constructor(private readonly options: ControlApiOptions) {
    this.routes = this.buildRoutes();
  }

  public matches(pathname: string): boolean {
    return this.normalizeApiPath(pathname) !== null;
  }

  public async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const rawPathname = ((req.url ?? '').split('?')[0] ?? '').trim() || '/';
    const pathname = this.normalizeApiPath(rawPathname);
    if (!pathname) {
      sendJson(res, 404, { error: 'not-found' });
      return;
    }
    const method = (req.method ?? 'GET').toUpperCase();

    try {
      const handled = await this.dispatchRoute(pathname, method, req, res);
      if (!handled) {
        sendJson(res, 404, { error: 'not-found' });
      }
    } catch (err) {
      this.sendError(res, err, { method, pathname });
    }
  }

  private normalizeApiPath(pathname: string): string | null {
    const raw = (pathname.split('?')[0] ?? '').trim() || '/';
    if (raw !== API_PREFIX && !raw.startsWith(`${API_PREFIX}/`)) {
      return null;
    }
    const trimmed = raw.slice(API_PREFIX.length).replace(/\/+$/, '');
    return trimmed || '/';
  }

  private async dispatchRoute(
    pathname: string,
    method: string,
    req: IncomingMessage,
    res: ServerResponse,
  ): Promise<boolean> {
    let pathMatched = false;
    for (const route of this.routes) {
      const match = pathname.match(route.pattern);
      if (!match) continue;
      pathMatched = true;
      if (route.method && route.method !== method) continue;
      await route.handler(req, res, match, pathname);
      return true;
    }
    if (pathMatched) {
      sendJson(res, 405, { error: 'method-not-allowed' });
      return true;
    }
    return false;
  }

  private buildRoutes(): Route[] {
    return [
      { method: 'GET', pattern: /^\/devices$/, handler: (_req, res) => this.handleDeviceList(res) },
      { method: 'GET', pattern: /^\/devices\/([^/]+)$/, handler: (_req, res, match) => this.handleDevice(res, match[1]) },
      {
        method: 'POST',
        pattern: /^\/devices\/([^/]+)\/beolink\/join$/,
        handler: (req, res, match) =>
          this.handleDeviceAction(req, res, match[1], (runtime, body) =>
            runtime.coordinator.join(optionalString(body, 'jid'), optionalString(body, 'sourceId')),
          ),
      },
      {
        method: 'POST',
        pattern: /^\/devices\/([^/]+)\/beolink\/expand$/,
        handler: (req, res, match) =>
          this.handleDeviceAction(req, res, match[1], async (runtime, body) => {
            const allDiscovered = body.allDiscovered;
            if (allDiscovered !== undefined && typeof allDiscovered !== 'boolean') {
              throw new InvalidParameterError('allDiscovered must be a boolean');
            }
            const results = await runtime.coordinator.expand({
              jids: optionalStringList(body, 'jids'),
              allDiscovered,
            });
            return { results };
          }),
      },
      {
        method: 'POST',
        pattern: /^\/devices\/([^/]+)\/beolink\/unexpand$/,
        handler: (req, res, match) =>
          this.handleDeviceAction(req, res, match[1], async (runtime, body) => {
            const jids = optionalStringList(body, 'jids');
            if (!jids) {
              throw new InvalidParameterError('jids is required');
            }
            return { results: await runtime.coordinator.unexpand(jids) };
          }),
      },
      {
        method: 'POST',
        pattern: /^\/devices\/([^/]+)\/beolink\/leave$/,
        handler: (req, res, match) =>
          this.handleDeviceAction(req, res, match[1], (runtime) => runtime.coordinator.leave()),
      },
      {
        method: 'POST',
        pattern: /^\/devices\/([^/]+)\/beolink\/allstandby$/,
        handler: (req, res, match) =>
          this.handleDeviceAction(req, res, match[1], (runtime) => runtime.coordinator.allStandby()),
      },
      {
        method: 'POST',
        pattern: /^\/devices\/([^/]+)\/beolink\/volume$/,
        handler: (req, res, match) =>
          this.handleDeviceAction(req, res, match[1], (runtime, body) =>
            runtime.coordinator.setVolume(requiredNumber(body, 'level')),
          ),
      },
      {
        method: 'POST',
        pattern: /^\/devices\/([^/]+)\/beolink\/relative-volume$/,
        handler: (req, res, match) =>
          this.handleDeviceAction(req, res, match[1], (runtime, body) =>
            runtime.coordinator.setRelativeVolume(requiredNumber(body, 'delta')),
          ),
      },
      {
        method: 'POST',
        pattern: /^\/devices\/([^/]+)\/beolink\/leader-command$/,
        handler: (req, res, match) =>
          this.handleDeviceAction(req, res, match[1], (runtime, body) => {
            const command = body.command;
            if (typeof command !== 'string' || command.length === 0) {
              throw new InvalidParameterError('command must be a non-empty string');
            }
            return runtime.coordinator.leaderCommand(command, body.parameter ?? undefined);
          }),
      },
      { method: 'GET', pattern: /^\/beolink\/peers$/, handler: (_req, res) => this.handlePeers(res) },
      { method: 'GET', pattern: /^\/events$/, handler: (req, res) => this.handleEventStream(req, res) },
      { method: 'GET', pattern: /^\/logs$/, handler: (_req, res) => this.handleLogsSnapshot(res) },
      { method: 'GET', pattern: /^\/logs\/stream$/, handler: (req, res) => this.handleLogsStream(req, res) },
      { method: 'POST', pattern: /^\/logs\/level$/, handler: (req, res) => this.handleLogLevelUpdate(req, res) },
    ];
  }

  private findDevice(res: ServerResponse, serial: string | undefined): DeviceRuntime | null {
    const runtime = serial ? this.options.devices.get(serial) : null;
    if (!runtime) {
      sendJson(res, 404, { error: 'unknown-device', serial: serial ?? null });
      return null;
    }
    return runtime;
  }

  private handleDeviceList(res: ServerResponse): void {
    const devices = this.options.devices.list().map((runtime) => {
      const snapshot = runtime.snapshot();
      return {
        serial: snapshot.serial,
        jid: snapshot.jid,
        name: snapshot.name,
        available: snapshot.available,
        connection: snapshot.connection,
        topology: snapshot.topology,
      };
    });
    sendJson(res, 200, { devices });
  }

  private handleDevice(res: ServerResponse, serial: string | undefined): void {
    const runtime = this.findDevice(res, serial);
    if (!runtime) return;
    sendJson(res, 200, runtime.snapshot());
  }

  private async handleDeviceAction(
    req: IncomingMessage,
    res: ServerResponse,
    serial: string | undefined,
    action: DeviceAction,
  ): Promise<void> {
    const runtime = this.findDevice(res, serial);
    if (!runtime) return;
    const body = await readJsonBody(req, res);
    if (res.writableEnded) return;
    if (body !== null && body !== undefined && !isObject(body)) {
      sendJson(res, 400, { error: 'invalid_parameter', message: 'request body must be a JSON object' });
      return;
    }
    const result = await action(runtime, body ?? {});
    sendJson(res, 200, { ok: true, ...(isObject(result) ? result : {}), topology: runtime.coordinator.snapshot() });
  }

  private handlePeers(res: ServerResponse): void {
    sendJson(res, 200, { peers: this.options.directory.list() });
  }

  private handleEventStream(req: IncomingMessage, res: ServerResponse): void {
    this.openEventStream(req, res, (write) =>
      this.options.devices.subscribe((event) => write(event.event, event)),
    );
  }

  private handleLogsSnapshot(res: ServerResponse): void {
    sendJson(res, 200, { ...logBuffer.snapshot(), level: logManager.getLevel() });
  }

  private handleLogsStream(req: IncomingMessage, res: ServerResponse): void {
    this.openEventStream(req, res, (write) => logBuffer.subscribe((entry) => write(null, entry)));
  }

  private async handleLogLevelUpdate(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await readJsonBody(req, res);
    if (res.writableEnded) return;
    const raw = isObject(body) && typeof body.level === 'string' ? body.level : undefined;
    const level = findLogLevel(raw);
    if (!level) {
      sendJson(res, 400, { error: 'invalid-log-level' });
      return;
    }
    logManager.configure({ level });
    this.log.info('log level updated', { level });
    sendJson(res, 200, { level });
  }

  private openEventStream(
    req: IncomingMessage,
    res: ServerResponse,
    attach: (write: (event: string | null, data: unknown) => void) => () => void,
  ): void {
    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });
    res.flushHeaders();
    res.write('\n');

    const heartbeat = setInterval(() => {
      if (!res.writableEnded) {
        res.write(': keep-alive\n\n');
      }
    }, this.options.sseHeartbeatMs ?? 25000);

    const unsubscribe = attach((event, data) => {
      if (res.writableEnded) return;
      const prefix = event ? `event: ${event}\n` : '';
      res.write(`${prefix}data: ${JSON.stringify(data)}\n\n`);
    });

    const cleanup = () => {
      unsubscribe();
      clearInterval(heartbeat);
      if (!res.writableEnded) {
        res.end();
      }
    };

    req.on('close', cleanup);
    req.on('error', cleanup);
  }

  private sendError(res: ServerResponse, err: unknown, context: { method: string; pathname: string }): void {
    if (res.headersSent) {
      res.end();
      return;
    }
    if (err instanceof BeolinkError) {
      const status = errorStatus(err);
      this.log[status >= 500 ? 'warn' : 'debug']('control api request rejected', {
        ...context,
        code: err.code,
        message: err.message,
      });
      sendJson(res, status, {
        error: err.code,
        message: err.message,
        ...(err instanceof RemoteCommandFailedError
          ? { status: err.status, detail: err.detail, results: err.results }
          : {}),
      });
      return;
    }
    const message = err instanceof Error ? err.message : String(err);
    this.log.error('control api error', { ...context, message });
    sendJson(res, 500, { error: 'control-api-error' });
  }
}
