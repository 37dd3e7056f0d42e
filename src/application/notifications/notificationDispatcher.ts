import type { NotificationTransport } from '@/ports/NotificationTransport';
import { decodeFrame } from '@/domain/device/decodeFrame';
import { ConnectionLostError, MalformedNotificationError } from '@/domain/errors';
import type {
  BeolinkNotification,
  ButtonNotification,
  RawNotification,
  StateNotification,
  WheelNotification,
} from '@/domain/device/notifications';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

/** One sink per notification family; each decoded notification reaches exactly one of them. */
export interface NotificationSinks {
  button(notification: ButtonNotification): void;
  wheel(notification: WheelNotification): void;
  beolink(notification: BeolinkNotification): void;
  state(notification: StateNotification): void;
}

const MAX_LOGGED_FRAME = 512;

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Drains a device's notification transport and routes decoded frames in arrival order.
 */
export class NotificationDispatcher {
  private readonly log: ComponentLogger;

  constructor(
    private readonly sinks: NotificationSinks,
    log?: ComponentLogger,
  ) {
    this.log = log ?? createLogger('Notifications', 'Dispatcher');
  }

  /**
   * Yields decoded notifications until `signal` aborts. Any other end of the stream throws
   * `ConnectionLostError`; frames that fail to decode are logged and skipped.
   */
  public async *readNotifications(
    transport: NotificationTransport,
    signal: AbortSignal,
  ): AsyncGenerator<RawNotification, void, undefined> {
    const frames = transport.frames()[Symbol.asyncIterator]();
    let exhausted = false;
    try {
      for (;;) {
        let next: IteratorResult<string>;
        try {
          next = await frames.next();
        } catch (error) {
          exhausted = true;
          if (signal.aborted) return;
          if (error instanceof ConnectionLostError) throw error;
          throw new ConnectionLostError(`notification stream failed: ${describeError(error)}`, {
            cause: error,
          });
        }
        if (next.done) {
          exhausted = true;
          if (signal.aborted) return;
          throw new ConnectionLostError('notification stream ended unexpectedly');
        }
        if (signal.aborted) return;
        const notification = this.decode(next.value);
        if (notification) {
          yield notification;
        }
      }
    } finally {
      if (!exhausted && frames.return) {
        await frames.return();
      }
    }
  }

  public async run(transport: NotificationTransport, signal: AbortSignal): Promise<void> {
    for await (const notification of this.readNotifications(transport, signal)) {
      this.route(notification);
    }
  }

  public route(notification: RawNotification): void {
    try {
      switch (notification.kind) {
        case 'button':
          this.sinks.button(notification);
          return;
        case 'wheel':
          this.sinks.wheel(notification);
          return;
        case 'beolink':
          this.sinks.beolink(notification);
          return;
        case 'source_change':
        case 'volume':
        case 'playback_state':
        case 'playback_progress':
        case 'software_update_state':
        case 'battery':
          this.sinks.state(notification);
          return;
      }
    } catch (error) {
      this.log.warn('notification sink failed', {
        kind: notification.kind,
        message: describeError(error),
      });
    }
  }

  private decode(frame: string): RawNotification | null {
    this.log.spam('notification frame', { frame });
    try {
      return decodeFrame(frame);
    } catch (error) {
      if (!(error instanceof MalformedNotificationError)) {
        throw error;
      }
      this.log.warn('dropping malformed notification', {
        message: error.message,
        frame: frame.length > MAX_LOGGED_FRAME ? `${frame.slice(0, MAX_LOGGED_FRAME)}…` : frame,
      });
      return null;
    }
  }
}
