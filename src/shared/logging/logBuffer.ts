import { EventEmitter } from 'node:events';

export interface LogEntry {
  line: string;
  timestamp: string;
}

export interface LogSnapshot {
  lines: string[];
  limit: number;
  /** Lines evicted since start because the buffer was full. */
  dropped: number;
  updatedAt: string | null;
}

type LogListener = (entry: LogEntry) => void;

const DEFAULT_LINE_LIMIT = 2000;

/**
 * Rolling buffer of the most recent log lines, served by the control API.
 */
export class LogBuffer extends EventEmitter {
  private lines: string[] = [];
  private dropped = 0;
  private updatedAt: string | null = null;

  constructor(private readonly limit = DEFAULT_LINE_LIMIT) {
    super();
    this.setMaxListeners(0);
  }

  public append(rawLine: string): void {
    if (!rawLine) return;
    const line = rawLine.replace(/\r\n/g, '\n');
    this.lines.push(line);
    const overflow = this.lines.length - this.limit;
    if (overflow > 0) {
      this.lines.splice(0, overflow);
      this.dropped += overflow;
    }
    this.updatedAt = new Date().toISOString();
    this.emit('entry', { line, timestamp: this.updatedAt } satisfies LogEntry);
  }

  public snapshot(): LogSnapshot {
    return {
      lines: [...this.lines],
      limit: this.limit,
      dropped: this.dropped,
      updatedAt: this.updatedAt,
    };
  }

  public subscribe(listener: LogListener): () => void {
    this.on('entry', listener);
    return () => this.off('entry', listener);
  }
}

export const logBuffer = new LogBuffer();
