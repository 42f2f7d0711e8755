// Logging utility for the capability server
// Everything goes to stderr: stdout carries the stdio transport.

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: string;
  error?: Error;
}

export class Logger {
  private logLevel: LogLevel;

  constructor(level: LogLevel = LogLevel.INFO) {
    this.logLevel = level;
  }

  setLogLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return level <= this.logLevel;
  }

  formatMessage(entry: LogEntry): string {
    const levelStr = LogLevel[entry.level];
    const contextStr = entry.context ? `[${entry.context}] ` : '';
    const errorStr = entry.error ? `\nError details: ${entry.error.message}\nStack: ${entry.error.stack}` : '';

    return `${entry.timestamp} ${levelStr}: ${contextStr}${entry.message}${errorStr}`;
  }

  private write(level: LogLevel, message: string, context?: string, error?: Error): void {
    if (!this.shouldLog(level)) return;
    console.error(this.formatMessage({ timestamp: new Date().toISOString(), level, message, context, error }));
  }

  error(message: string, context?: string, error?: Error): void {
    this.write(LogLevel.ERROR, message, context, error);
  }

  warn(message: string, context?: string): void {
    this.write(LogLevel.WARN, message, context);
  }

  info(message: string, context?: string): void {
    this.write(LogLevel.INFO, message, context);
  }

  debug(message: string, context?: string): void {
    this.write(LogLevel.DEBUG, message, context);
  }
}

// Export singleton logger instance
export const logger = new Logger();

export function parseLogLevel(name: string): LogLevel | undefined {
  switch (name.trim().toUpperCase()) {
    case 'ERROR':
      return LogLevel.ERROR;
    case 'WARN':
      return LogLevel.WARN;
    case 'INFO':
      return LogLevel.INFO;
    case 'DEBUG':
      return LogLevel.DEBUG;
    default:
      return undefined;
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
