import type { LogLevel } from '@/types/logLevel';

/**
 * Scoped line logger. Text lines read `[ts][LEVEL][Scope|Sub] [k=v ...] message`;
 * JSON mode writes one object per line. `spam` is for per-tick traces
 * (poll ticks, button edges) and stays below debug.
 */
export type { LogLevel } from '@/types/logLevel';

const WEIGHTS: Record<LogLevel, number> = {
  spam: 5,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  none: 100,
};

/** Context keys whose values are credentials; only a prefix is ever printed. */
const SECRET_KEYS = new Set(['token', 'authToken', 'partialKey', 'tokenOverride']);

interface LoggerConfig {
  level: LogLevel;
  json: boolean;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

export type LoggerOptions = Partial<LoggerConfig>;

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

  public create(scopes: string[]): ComponentLogger {
    return new ComponentLogger(this.config, scopes);
  }
}

export const logManager = new LogManager();

export function createLogger(component: string, ...scopes: string[]): ComponentLogger {
  return logManager.create([component, ...scopes]);
}

export class ComponentLogger {
  constructor(
    private readonly config: LoggerConfig,
    private readonly scopes: string[],
  ) {}

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

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (level === 'none' || WEIGHTS[level] < WEIGHTS[this.config.level]) {
      return;
    }
    const safeContext = context ? maskSecrets(context) : {};
    const line = this.config.json
      ? JSON.stringify({
          timestamp: new Date().toISOString(),
          level,
          scopes: this.scopes,
          message,
          context: safeContext,
        })
      : `[${new Date().toISOString()}][${level.toUpperCase()}][${this.scopes.join('|')}]` +
        `${formatContext(safeContext)} ${message}`;
    const stream = level === 'error' || level === 'warn' ? this.config.stderr : this.config.stdout;
    stream.write(`${line}\n`);
  }
}

export function maskSecrets(context: LogContext): LogContext {
  const out: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    out[key] = SECRET_KEYS.has(key) && typeof value === 'string' ? maskValue(value) : value;
  }
  return out;
}

function maskValue(value: string): string {
  return value.length <= 4 ? '***' : `${value.slice(0, 4)}***`;
}

export function formatContext(context: LogContext): string {
  const entries = Object.entries(context);
  if (entries.length === 0) {
    return '';
  }
  return ` [${entries.map(([key, value]) => `${key}=${formatValue(value)}`).join(' ')}]`;
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return value === '' || /[\s"\\[\]]/.test(value) ? JSON.stringify(value) : value;
  }
  if (value instanceof Error) {
    return JSON.stringify(value.message);
  }
  if (value !== null && typeof value === 'object') {
    try {
      return JSON.stringify(value);
    } catch {
      return '[unserializable]';
    }
  }
  return String(value);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
