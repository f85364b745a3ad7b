import type { LogSink } from '@/shared/logging/logFile';
import type { LogLevel } from '@/types/logLevel';

export type { LogLevel } from '@/types/logLevel';

export type LogContext = Record<string, unknown>;

/** `spam` sits below debug for per-tick traces. */
const RANK: Record<LogLevel, number> = {
  spam: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  none: 9,
};

/**
 * Shared, mutable settings: every logger created through `createLogger`
 * sees changes made by `logManager.configure`.
 */
export interface LoggerConfig {
  level: LogLevel;
  json: boolean;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  /** Second destination with its own threshold (the log file). */
  file: LogSink | null;
  fileLevel: LogLevel;
}

export type LoggerOptions = Partial<LoggerConfig>;

function passes(level: LogLevel, threshold: LogLevel): boolean {
  return level !== 'none' && RANK[level] >= RANK[threshold];
}

function renderValue(value: unknown): string {
  if (typeof value === 'string') {
    if (value === '') return '""';
    return /[\s"\\[\]]/.test(value) ? JSON.stringify(value) : value;
  }
  if (typeof value === 'object' && value !== null) {
    try {
      return JSON.stringify(value);
    } catch {
      return String(value);
    }
  }
  return String(value);
}

function renderLine(level: LogLevel, scopes: readonly string[], message: string, context?: LogContext): string {
  const pairs = Object.entries(context ?? {})
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([key, value]) => `${key}=${renderValue(value)}`);
  const suffix = pairs.length > 0 ? ` [${pairs.join(' ')}]` : '';
  return `[${new Date().toISOString()}][${level.toUpperCase()}][${scopes.join('|')}]${suffix} ${message}`;
}

function renderJson(level: LogLevel, scopes: readonly string[], message: string, context?: LogContext): string {
  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    scopes,
    message,
    context: context ?? {},
  });
}

class LogManager {
  private readonly config: LoggerConfig = {
    level: 'info',
    json: false,
    stdout: process.stdout,
    stderr: process.stderr,
    file: null,
    fileLevel: 'none',
  };

  public configure({ level, json, stdout, stderr, file, fileLevel }: LoggerOptions): void {
    const { config } = this;
    if (level) config.level = level;
    if (json !== undefined) config.json = json;
    if (stdout) config.stdout = stdout;
    if (stderr) config.stderr = stderr;
    if (file !== undefined) config.file = file;
    if (fileLevel) config.fileLevel = fileLevel;
  }

  public create(component: string, ...scopes: string[]): ComponentLogger {
    return new ComponentLogger(this.config, [component, ...scopes]);
  }
}

export const logManager = new LogManager();

export function createLogger(component: string, ...scopes: string[]): ComponentLogger {
  return logManager.create(component, ...scopes);
}

/**
 * Logger bound to a scope path such as `Sources|Spotify`.
 */
export class ComponentLogger {
  constructor(
    private readonly config: LoggerConfig,
    private readonly scopes: string[],
  ) {}

  public spam(message: string, context?: LogContext): void {
    this.emit('spam', message, context);
  }

  public debug(message: string, context?: LogContext): void {
    this.emit('debug', message, context);
  }

  public info(message: string, context?: LogContext): void {
    this.emit('info', message, context);
  }

  public warn(message: string, context?: LogContext): void {
    this.emit('warn', message, context);
  }

  public error(message: string, context?: LogContext): void {
    this.emit('error', message, context);
  }

  private emit(level: LogLevel, message: string, context?: LogContext): void {
    const { config } = this;
    const toConsole = passes(level, config.level);
    const toFile = config.file !== null && passes(level, config.fileLevel);
    if (!toConsole && !toFile) {
      return;
    }
    const render = config.json ? renderJson : renderLine;
    const line = render(level, this.scopes, message, context);
    if (toConsole) {
      (level === 'error' ? config.stderr : config.stdout).write(`${line}\n`);
    }
    if (toFile) {
      config.file?.write(line);
    }
  }
}
