export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogData = Record<string, unknown> | unknown[] | string | number | boolean;

export class Logger {
  private context: string;
  private minLevel: LogLevel;

  constructor(context: string, minLevel: LogLevel = LogLevel.INFO) {
    this.context = context;
    this.minLevel = minLevel;
  }

  private log(level: LogLevel, message: string, data?: LogData): void {
    if (level < this.minLevel) return;

    const prefix = `[${this.context}]`;
    const formattedMessage = `${prefix} ${message}`;

    switch (level) {
      case LogLevel.DEBUG:
        console.debug(formattedMessage, data ?? '');
        break;
      case LogLevel.INFO:
        console.log(formattedMessage, data ?? '');
        break;
      case LogLevel.WARN:
        console.warn(formattedMessage, data ?? '');
        break;
      case LogLevel.ERROR:
        console.error(formattedMessage, data ?? '');
        break;
    }
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  debug(message: string, data?: LogData): void {
    this.log(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: LogData): void {
    this.log(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: LogData): void {
    this.log(LogLevel.WARN, message, data);
  }

  error(message: string, error?: unknown): void {
    let errorData: LogData | undefined;
    if (error instanceof Error) {
      errorData = { name: error.name, message: error.message, stack: error.stack };
    } else if (error !== undefined && error !== null) {
      errorData = typeof error === 'object' ? { value: error } : String(error);
    }
    this.log(LogLevel.ERROR, message, errorData);
  }
}

/**
 * Parse a level name such as "debug" or "WARN".
 * Unknown or missing names fall back to the given default.
 */
export function parseLogLevel(raw: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  switch (raw?.trim().toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'SILENT':
      return LogLevel.SILENT;
    default:
      return fallback;
  }
}

export function createLogger(context: string): Logger {
  return new Logger(context, parseLogLevel(process.env.LOG_LEVEL));
}
