import { logBuffer } from '@/shared/logging/logBuffer';
import type { LogLevel } from '@/types/logLevel';

export type { LogLevel } from '@/types/logLevel';

/**
 * Structured logger with hierarchical scopes, bound context and optional JSON output.
 * `spam` sits below debug and is used for raw notification frames.
 */
const WEIGHTS: Record<LogLevel, number> = {
  spam: 5,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  none: 100,
};

interface LoggerConfig {
  level: LogLevel;
  json: boolean;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
}

export type LogContext = Record<string, unknown>;

class LogManager {
  private readonly config: LoggerConfig = {
    level: 'info',
    json: false,
    stdout: process.stdout,
    stderr: process.stderr,
  };

  public configure(options: LoggerOptions): void {
    this.config.level = options.level ?? this.config.level;
    this.config.json = options.json ?? this.config.json;
    this.config.stdout = options.stdout ?? this.config.stdout;
    this.config.stderr = options.stderr ?? this.config.stderr;
  }

  public getLevel(): LogLevel {
    return this.config.level;
  }

  public create(component: string, ...scopes: string[]): ComponentLogger {
    return new ComponentLogger(this.config, [component, ...scopes], {});
  }
}

export const logManager = new LogManager();

export function createLogger(component: string, ...scopes: string[]): ComponentLogger {
  return logManager.create(component, ...scopes);
}

/**
 * Logger bound to a set of scopes and a base context merged into every entry.
 */
export class ComponentLogger {
  constructor(
    private readonly config: LoggerConfig,
    private readonly scopes: string[],
    private readonly bound: LogContext,
  ) {}

  /** Derives a logger with an extra scope and/or extra bound context (e.g. a device serial). */
  public child(scope: string | null, context: LogContext = {}): ComponentLogger {
    const scopes = scope ? [...this.scopes, scope] : this.scopes;
    return new ComponentLogger(this.config, scopes, { ...this.bound, ...context });
  }

  public spam(message: string, context?: LogContext): void {
    this.write('spam', message, context);
  }

  public debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  public info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  public warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  public error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  public isEnabled(level: LogLevel): boolean {
    return WEIGHTS[level] >= WEIGHTS[this.config.level];
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isEnabled(level)) {
      return;
    }
    const merged = context ? { ...this.bound, ...context } : this.bound;

    const payload = this.config.json
      ? this.formatJson(level, message, merged)
      : this.formatLine(level, message, merged);

    const stream = level === 'error' || level === 'warn' ? this.config.stderr : this.config.stdout;
    stream.write(`${payload}\n`);
    logBuffer.append(payload);
  }

  private formatLine(level: LogLevel, message: string, context: LogContext): string {
    const ts = new Date().toISOString();
    const scope = this.scopes.join('|');
    return `[${ts}][${level.toUpperCase()}][${scope}]${this.formatContext(context)} ${message}`;
  }

  private formatJson(level: LogLevel, message: string, context: LogContext): string {
    return JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      scopes: this.scopes,
      message,
      context,
    });
  }

  private formatContext(context: LogContext): string {
    const entries = Object.entries(context).filter(([, value]) => value !== undefined);
    if (entries.length === 0) return '';
    const rendered = entries
      .sort(([left], [right]) => left.localeCompare(right))
      .map(([key, value]) => `${key}=${stringifyValue(value)}`)
      .join(' ');
    return ` [${rendered}]`;
  }
}

function stringifyValue(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'string') {
    if (value.length === 0) return '""';
    if (/[\s"\\[\]]/.test(value)) return JSON.stringify(value);
    return value;
  }
  if (value instanceof Error) {
    return JSON.stringify(value.message);
  }
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value);
    } catch {
      return String(value);
    }
  }
  return String(value);
}
