import WebSocket from 'ws';
import type { NotificationTransport, TransportConnector } from '@/ports/NotificationTransport';
import { ConnectionLostError } from '@/domain/errors';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

export type MozartTransportOptions = {
  port: number;
  heartbeatIntervalMs: number;
  heartbeatTimeoutMs: number;
  connectTimeoutMs: number;
  log?: ComponentLogger;
};

const CLOSE_GRACE_MS = 1000;

function rawToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Opens the device's notification WebSocket (`ws://<host>:9339/`).
 */
export class MozartNotificationConnector implements TransportConnector {
  private readonly log: ComponentLogger;

  constructor(private readonly options: MozartTransportOptions) {
    this.log = options.log ?? createLogger('Mozart', 'Notifications');
  }

  public connect(host: string, signal?: AbortSignal): Promise<NotificationTransport> {
    const url = `ws://${host}:${this.options.port}/`;
    return new Promise<NotificationTransport>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new ConnectionLostError('connect aborted'));
        return;
      }
      const ws = new WebSocket(url, { handshakeTimeout: this.options.connectTimeoutMs });
      let settled = false;

      const fail = (error: Error) => {
        if (settled) return;
        settled = true;
        signal?.removeEventListener('abort', onAbort);
        ws.removeAllListeners();
        ws.on('error', () => undefined);
        ws.terminate();
        reject(error);
      };
      const onAbort = () => fail(new ConnectionLostError('connect aborted'));
      signal?.addEventListener('abort', onAbort, { once: true });

      ws.once('open', () => {
        if (settled) return;
        settled = true;
        signal?.removeEventListener('abort', onAbort);
        ws.removeAllListeners();
        this.log.debug('notification socket open', { url });
        resolve(new MozartNotificationTransport(ws, url, this.options, this.log));
      });
      ws.once('error', (error) =>
        fail(new ConnectionLostError(`connect to ${url} failed: ${describeError(error)}`, { cause: error })),
      );
      ws.once('close', (code) => fail(new ConnectionLostError(`socket closed during connect (${code})`)));
    });
  }
}

/**
 * Buffers incoming text frames for a single consumer and keeps the socket alive with pings;
 * a socket that misses pongs for `heartbeatTimeoutMs` is terminated and the stream fails.
 */
export class MozartNotificationTransport implements NotificationTransport {
  private readonly queue: string[] = [];
  private wake: (() => void) | null = null;
  private ended: { error: Error | null } | null = null;
  private closing = false;
  private lastPong = Date.now();
  private readonly heartbeat: NodeJS.Timeout;

  constructor(
    private readonly ws: WebSocket,
    private readonly url: string,
    options: Pick<MozartTransportOptions, 'heartbeatIntervalMs' | 'heartbeatTimeoutMs'>,
    private readonly log: ComponentLogger,
  ) {
    ws.on('message', (data, isBinary) => {
      if (isBinary) {
        this.log.debug('ignoring binary notification frame', { url });
        return;
      }
      this.queue.push(rawToString(data));
      this.notify();
    });
    ws.on('pong', () => {
      this.lastPong = Date.now();
    });
    ws.on('close', (code) => {
      this.finish(this.closing ? null : new ConnectionLostError(`socket closed (${code})`));
    });
    ws.on('error', (error) => {
      this.log.warn('notification socket error', { url, message: describeError(error) });
      this.finish(this.closing ? null : new ConnectionLostError(describeError(error), { cause: error }));
    });

    this.heartbeat = setInterval(() => {
      if (this.ws.readyState !== WebSocket.OPEN) return;
      if (Date.now() - this.lastPong > options.heartbeatTimeoutMs) {
        this.log.warn('notification heartbeat lost', { url });
        this.ws.terminate();
        this.finish(new ConnectionLostError('heartbeat timeout'));
        return;
      }
      this.ws.ping();
    }, options.heartbeatIntervalMs);
    this.heartbeat.unref();
  }

  public async *frames(): AsyncIterable<string> {
    while (true) {
      const next = this.queue.shift();
      if (next !== undefined) {
        yield next;
        continue;
      }
      if (this.ended) {
        if (this.ended.error) {
          throw this.ended.error;
        }
        return;
      }
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
  }

  public async close(): Promise<void> {
    if (this.closing) return;
    this.closing = true;
    clearInterval(this.heartbeat);
    if (this.ws.readyState === WebSocket.CLOSED) {
      this.finish(null);
      return;
    }
    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.ws.terminate();
        resolve();
      }, CLOSE_GRACE_MS);
      this.ws.once('close', () => {
        clearTimeout(timer);
        resolve();
      });
      this.ws.close(1000);
    });
    this.finish(null);
    this.log.debug('notification socket closed', { url: this.url });
  }

  private finish(error: Error | null): void {
    if (this.ended) return;
    clearInterval(this.heartbeat);
    this.ended = { error };
    this.notify();
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}
