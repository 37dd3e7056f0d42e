import http from 'node:http';
import type { AddressInfo } from 'node:net';
import type { IncomingMessage, ServerResponse } from 'node:http';
import { createLogger } from '@/shared/logging/logger';
import type { HttpServerConfig } from '@/config/http';
import { ControlApiHandler, type ControlApiOptions } from '@/adapters/http/controlApi/controlApiHandler';
import { sendJson } from '@/adapters/http/utils/jsonBody';

/**
 * Hosts the control API.
 */
export class HttpService {
  private readonly log = createLogger('Http');
  private readonly controlApi: ControlApiHandler;
  private server?: http.Server;

  constructor(
    private readonly config: HttpServerConfig,
    options: ControlApiOptions,
  ) {
    this.controlApi = new ControlApiHandler(options);
  }

  public async start(): Promise<void> {
    if (this.server) {
      return;
    }

    const server = http.createServer((req, res) => {
      this.handleRequest(req, res).catch((error) => {
        const message = error instanceof Error ? error.message : String(error);
        this.log.error('http request failed', { message });
        if (!res.headersSent) {
          sendJson(res, 500, { error: 'http-internal-error' });
        } else {
          res.end();
        }
      });
    });
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server
        .listen(this.config.port, this.config.host, () => {
          this.log.info('control api listening', {
            port: this.port(),
            host: this.config.host,
          });
          resolve();
        })
        .on('error', reject);
    });
  }

  /** Bound port; differs from the configured one when that is 0. */
  public port(): number | null {
    const address = this.server?.address();
    if (!address || typeof address === 'string') {
      return null;
    }
    const info: AddressInfo = address;
    return info.port;
  }

  public async stop(): Promise<void> {
    const server = this.server;
    this.server = undefined;
    if (!server) {
      return;
    }
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
      server.closeAllConnections();
    });
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    this.applyCors(res);

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const pathname = this.normalizePath(req.url ?? '/');

    if (pathname === '/') {
      res.writeHead(302, { Location: '/api/devices' });
      res.end();
      return;
    }

    if (this.controlApi.matches(pathname)) {
      await this.controlApi.handle(req, res);
      return;
    }

    sendJson(res, 404, { error: 'not-found' });
  }

  private applyCors(res: ServerResponse): void {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET,POST,OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
    res.setHeader('Cache-Control', 'no-cache');
  }

  private normalizePath(url: string): string {
    const [path] = url.split('?');
    try {
      return decodeURIComponent(path || '/');
    } catch {
      return path || '/';
    }
  }
}
