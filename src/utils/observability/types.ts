export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Fields merged into every record emitted inside a context. */
export type LogContext = {
  requestId?: string;
  domain?: string;
  operation?: string;
  tool?: string;
  [key: string]: unknown;
};

export type LogData = Record<string, unknown>;

/** One NDJSON line. Data fields are redacted before they land here. */
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
  child(context: LogContext): AppLogger;
}
