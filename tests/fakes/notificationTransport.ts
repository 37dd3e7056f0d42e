import type { NotificationTransport, TransportConnector } from '../../src/ports/NotificationTransport';

/**
 * Scriptable transport: frames are pushed by the test; `fail` ends the stream with an error.
 */
export class FakeTransport implements NotificationTransport {
  public closed = false;
  private readonly queue: string[] = [];
  private wake: (() => void) | null = null;
  private ended: { error: Error | null } | null = null;

  public push(...frames: string[]): void {
    this.queue.push(...frames);
    this.notify();
  }

  public fail(error = new Error('socket reset')): void {
    this.finish(error);
  }

  /** Ends the stream without `close()`, like a peer that hung up cleanly. */
  public end(): void {
    this.finish(null);
  }

  public async *frames(): AsyncIterable<string> {
    for (;;) {
      const next = this.queue.shift();
      if (next !== undefined) {
        yield next;
        continue;
      }
      if (this.ended) {
        if (this.ended.error) throw this.ended.error;
        return;
      }
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
  }

  public async close(): Promise<void> {
    this.closed = true;
    this.finish(null);
  }

  private finish(error: Error | null): void {
    if (this.ended) return;
    this.ended = { error };
    this.notify();
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}

/**
 * Hands out queued transports (or failures) in order; an empty queue rejects.
 */
export class FakeConnector implements TransportConnector {
  public readonly hosts: string[] = [];
  private readonly outcomes: Array<FakeTransport | Error> = [];

  public enqueue(...outcomes: Array<FakeTransport | Error>): void {
    this.outcomes.push(...outcomes);
  }

  public async connect(host: string): Promise<NotificationTransport> {
    this.hosts.push(host);
    const outcome = this.outcomes.shift() ?? new Error('connection refused');
    if (outcome instanceof Error) {
      throw outcome;
    }
    return outcome;
  }
}

/** Lets queued microtasks and promise chains settle. */
export async function flush(times = 10): Promise<void> {
  for (let i = 0; i < times; i += 1) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}
