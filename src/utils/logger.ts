/**
 * Structured Logger
 *
 * Module-scoped logging with levels, optional JSON lines and timing helpers.
 * Output goes to the console; callers never pass secrets in `data`.
 *
 * @module utils/logger
 */

/**
 * Log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogLevelName = Exclude<keyof typeof LogLevel, 'SILENT'>;

export interface LogEntry {
  timestamp: string;
  level: LogLevelName;
  module: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface LoggerConfig {
  level: LogLevel;
  json: boolean;
  includeTimestamp: boolean;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: LogLevel.INFO,
  json: false,
  includeTimestamp: true,
};

let globalConfig: LoggerConfig = { ...DEFAULT_CONFIG };

function formatEntry(entry: LogEntry, config: LoggerConfig): string {
  if (config.json) {
    return JSON.stringify(entry);
  }

  const parts: string[] = [];
  if (config.includeTimestamp) {
    parts.push(`[${entry.timestamp}]`);
  }
  parts.push(`[${entry.level}]`, `[${entry.module}]`, entry.message);

  if (entry.data && Object.keys(entry.data).length > 0) {
    parts.push(JSON.stringify(entry.data));
  }

  return parts.join(' ');
}

/**
 * Logger bound to one module name.
 *
 * Reads the global configuration at every call unless an override was given,
 * so `setLogLevel` affects loggers created at import time.
 */
export class Logger {
  readonly module: string;
  private overrides: Partial<LoggerConfig>;

  constructor(module: string, overrides: Partial<LoggerConfig> = {}) {
    this.module = module;
    this.overrides = overrides;
  }

  private get config(): LoggerConfig {
    return { ...globalConfig, ...this.overrides };
  }

  private log(level: LogLevel, levelName: LogLevelName, message: string, data?: Record<string, unknown>): void {
    const config = this.config;
    if (level < config.level) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: levelName,
      module: this.module,
      message,
      data,
    };
    const formatted = formatEntry(entry, config);

    switch (level) {
      case LogLevel.ERROR:
        console.error(formatted);
        break;
      case LogLevel.WARN:
        console.warn(formatted);
        break;
      case LogLevel.DEBUG:
        console.debug(formatted);
        break;
      default:
        console.log(formatted);
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, 'DEBUG', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, 'INFO', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, 'WARN', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, 'ERROR', message, data);
  }

  /**
   * Run `fn` and log how long it took at DEBUG, or at ERROR if it threw
   */
  async timed<T>(label: string, fn: () => Promise<T>): Promise<T> {
    const start = performance.now();
    try {
      const result = await fn();
      this.debug(`${label} completed`, { duration: Math.round(performance.now() - start) });
      return result;
    } catch (err) {
      this.error(`${label} failed`, {
        duration: Math.round(performance.now() - start),
        ...errorData(err),
      });
      throw err;
    }
  }

  child(subModule: string): Logger {
    return new Logger(`${this.module}:${subModule}`, this.overrides);
  }
}

/**
 * Log-safe summary of a thrown value
 */
export function errorData(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
    return { error: err.name, message: err.message, ...(code ? { code } : {}) };
  }
  return { error: String(err) };
}

export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}

export function createLogger(module: string, overrides?: Partial<LoggerConfig>): Logger {
  return new Logger(module, overrides);
}

export function setLogLevel(level: LogLevel): void {
  globalConfig.level = level;
}

/** Map a case-insensitive level name to a LogLevel, or null */
export function parseLogLevel(name: string): LogLevel | null {
  switch (name.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'silent':
      return LogLevel.SILENT;
    default:
      return null;
  }
}

export const clockLogger = createLogger('clock');
export const storeLogger = createLogger('store');
export const syncLogger = createLogger('sync');
export const bankLogger = createLogger('bank');
