import type { ClockPort, TimerHandle } from '@/ports/ClockPort';
import type { NotificationTransport, TransportConnector } from '@/ports/NotificationTransport';
import type { ConnectionState } from '@/domain/device/events';
import { backoffDelay, type BackoffOptions } from '@/shared/backoff';
import { bestEffort } from '@/shared/bestEffort';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

export type ConnectionSupervisorOptions = {
  host: string;
  connector: TransportConnector;
  clock: ClockPort;
  /** Consumes one connected transport; resolves only after `signal` aborts. */
  session: (transport: NotificationTransport, signal: AbortSignal) => Promise<void>;
  backoff: BackoffOptions;
  onStateChange?: (state: ConnectionState) => void;
  onAvailabilityChange?: (available: boolean) => void;
  onConnected?: () => void;
  /** Runs after every lost or failed connection and on stop; used to drop per-control timers. */
  onDisconnected?: () => void;
  log?: ComponentLogger;
};

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Keeps one notification transport connected with exponential backoff until stopped.
 */
export class ConnectionSupervisor {
  private readonly log: ComponentLogger;
  private state: ConnectionState = 'disconnected';
  private available = false;
  private attempts = 0;
  private started = false;
  private reconnectTimer: TimerHandle | null = null;
  private sessionAbort: AbortController | null = null;
  private transport: NotificationTransport | null = null;
  private cycle: Promise<void> | null = null;

  constructor(private readonly options: ConnectionSupervisorOptions) {
    this.log = options.log ?? createLogger('Connection', 'Supervisor').child(null, { host: options.host });
  }

  public getState(): ConnectionState {
    return this.state;
  }

  public isAvailable(): boolean {
    return this.available;
  }

  public start(): void {
    if (this.isStopped()) {
      throw new Error('connection supervisor already stopped');
    }
    if (this.started) {
      return;
    }
    this.started = true;
    this.connect();
  }

  /** Moves to the terminal `stopped` state, cancelling any reconnect and the active session. */
  public async stop(): Promise<void> {
    if (this.isStopped()) {
      return;
    }
    this.setState('stopped');
    if (this.reconnectTimer) {
      this.options.clock.clearTimer(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.sessionAbort?.abort();
    const transport = this.transport;
    if (transport) {
      await this.closeTransport(transport);
    }
    await this.cycle;
    this.options.onDisconnected?.();
    this.log.info('connection supervisor stopped');
  }

  /** Resolves when the current connect/session cycle has finished. */
  public settled(): Promise<void> {
    return this.cycle ?? Promise.resolve();
  }

  private connect(): void {
    this.reconnectTimer = null;
    this.cycle = this.runCycle().catch((error: unknown) => {
      this.log.error('connection cycle failed', { message: describeError(error) });
    });
  }

  private async runCycle(): Promise<void> {
    const abort = new AbortController();
    this.sessionAbort = abort;
    this.setState('connecting');

    let transport: NotificationTransport;
    try {
      transport = await this.options.connector.connect(this.options.host, abort.signal);
    } catch (error) {
      if (this.isStopped()) return;
      this.log.warn('device connection failed', { message: describeError(error), attempt: this.attempts });
      this.afterDisconnect();
      return;
    }
    if (this.isStopped()) {
      await this.closeTransport(transport);
      return;
    }

    this.transport = transport;
    this.attempts = 0;
    this.setState('connected');
    this.log.info('device connected');
    this.options.onConnected?.();

    try {
      await this.options.session(transport, abort.signal);
    } catch (error) {
      if (!this.isStopped()) {
        this.log.warn('notification stream lost', { message: describeError(error) });
      }
    } finally {
      this.transport = null;
      await this.closeTransport(transport);
    }
    if (this.isStopped()) return;
    this.afterDisconnect();
  }

  private afterDisconnect(): void {
    this.setState('disconnected');
    this.options.onDisconnected?.();
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer || this.isStopped()) return;
    const delayMs = backoffDelay(this.attempts, this.options.backoff);
    this.attempts += 1;
    this.log.info('reconnect scheduled', { delayMs, attempt: this.attempts });
    this.reconnectTimer = this.options.clock.setTimer(() => this.connect(), delayMs);
  }

  private setState(next: ConnectionState): void {
    if (this.state === next) return;
    this.state = next;
    this.options.onStateChange?.(next);
    const available = next === 'connected';
    if (available !== this.available) {
      this.available = available;
      this.options.onAvailabilityChange?.(available);
    }
  }

  private isStopped(): boolean {
    return this.state === 'stopped';
  }

  private closeTransport(transport: NotificationTransport): Promise<void> {
    return bestEffort(() => transport.close(), {
      fallback: undefined,
      log: this.log,
      label: 'transport close failed',
    });
  }
}
