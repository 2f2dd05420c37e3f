export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Minimum level written; `silent` writes nothing. */
export type LogThreshold = LogLevel | 'silent';

export type LogContext = {
  requestId?: string;
  sessionId?: string;
  domain?: string;
  [key: string]: unknown;
};

export type LogData = Record<string, unknown>;

/**
 * One NDJSON line. Context keys sit beside the event's own data.
 */
export type AppLogRecord = {
  timestamp: string;
  level: LogLevel;
  event: string;
} & LogContext & LogData;

export interface AppLogger {
  debug(event: string, data?: LogData): void;
  info(event: string, data?: LogData): void;
  warn(event: string, data?: LogData): void;
  error(event: string, data?: LogData): void;
  /** Logger whose records also carry `context`. */
  child(context: LogContext): AppLogger;
}
