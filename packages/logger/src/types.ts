/** Log levels in ascending priority */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'fatal'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const ENVIRONMENTS = ['test', 'development', 'production'] as const;

export type Environment = (typeof ENVIRONMENTS)[number];

export interface EnvironmentConfig {
  minLevel: LogLevel;
  includeStackTraces: boolean;
  bufferSize: number;
}

export interface LogEntry {
  id: string;
  level: LogLevel;
  event_type: string;
  metadata: Record<string, unknown>;
  timestamp: number;
}

/** Receives one serialized JSON line per emitted entry */
export type LogWriter = (line: string) => void;

/** Receives buffered entries on flush */
export type LogFlushHandler = (entries: LogEntry[]) => void | Promise<void>;

export interface Logger {
  /**
   * Create a child logger with additional metadata merged in.
   * Child loggers inherit all parent metadata.
   */
  child(metadata: Record<string, unknown>): Logger;

  debug(event_type: string, metadata?: Record<string, unknown>): void;

  info(event_type: string, metadata?: Record<string, unknown>): void;

  warn(event_type: string, metadata?: Record<string, unknown>): void;

  error(event_type: string, metadata?: Record<string, unknown>): void;

  /**
   * Log at fatal level (flushes the buffer immediately)
   */
  fatal(event_type: string, metadata?: Record<string, unknown>): void;

  /**
   * Hand buffered entries to the flush handler
   */
  flush(): Promise<void>;
}

export interface LoggerConfig {
  environment?: Environment;
  /** Overrides the environment's minimum level */
  minLevel?: LogLevel;
  bufferSize?: number;
  /** Defaults to console.error so stdout stays free for program output */
  write?: LogWriter;
  /** Without a handler nothing is buffered */
  onFlush?: LogFlushHandler;
}
