import type { Color, LogLevel, LogMetadataRecord } from './types';

// Base fields always present
export interface BaseLogMessage {
  level: LogLevel;
  msg: string;
  time: number;
  context?: string;
  reqId?: string;
  err?: Error; // Standard error field
}

export interface Loggable {
  toLog(): LogMetadataRecord; // Custom serialization hook
}

export interface LoggerOptions {
  /**
   * Minimum log level to print.
   * @default 'info' (or LOG_LEVEL)
   */
  level?: LogLevel;
  /**
   * Log format.
   * @default 'auto' (pretty in dev, json in prod)
   */
  format?: 'pretty' | 'json';
  prettyOptions?: {
    colors?: Partial<Record<LogLevel, Color>>;
  };
}

export interface Transport {
  log(message: BaseLogMessage & LogMetadataRecord): void;
}
