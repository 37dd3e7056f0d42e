/**
 * One established notification stream to a device. `frames()` yields raw text frames and
 * completes normally only after `close()` was called; any other end rejects.
 */
export interface NotificationTransport {
  frames(): AsyncIterable<string>;
  close(): Promise<void>;
}

export interface TransportConnector {
  connect(host: string, signal?: AbortSignal): Promise<NotificationTransport>;
}
