/** Structured JSON-lines logger with optional buffered flushing */

import { ulid } from 'ulid';
import type {
  Environment,
  EnvironmentConfig,
  LogEntry,
  LogFlushHandler,
  Logger,
  LoggerConfig,
  LogLevel,
  LogWriter,
} from './types.js';

/** Environment-specific configurations */
const ENVIRONMENT_CONFIGS: Record<Environment, EnvironmentConfig> = {
  test: {
    minLevel: 'debug', // Log everything in tests
    includeStackTraces: true,
    bufferSize: 1000,
  },
  development: {
    minLevel: 'info', // Skip debug logs
    includeStackTraces: true,
    bufferSize: 50,
  },
  production: {
    minLevel: 'warn', // Only warnings and errors
    includeStackTraces: false,
    bufferSize: 50,
  },
};

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

const defaultWriter: LogWriter = (line) => {
  console.error(line);
};

class LoggerImpl implements Logger {
  protected metadata: Record<string, unknown>;
  private buffer: LogEntry[] = [];
  private bufferSize: number;
  private environment: Environment;
  private envConfig: EnvironmentConfig;
  private minLevel: LogLevel;
  private write: LogWriter;
  private onFlush?: LogFlushHandler;

  constructor(config: LoggerConfig, parentMetadata: Record<string, unknown> = {}) {
    this.metadata = parentMetadata;
    this.environment = config.environment ?? 'development';
    this.envConfig = ENVIRONMENT_CONFIGS[this.environment];
    this.minLevel = config.minLevel ?? this.envConfig.minLevel;
    this.bufferSize = config.bufferSize ?? this.envConfig.bufferSize;
    this.write = config.write ?? defaultWriter;
    this.onFlush = config.onFlush;

    if (this.bufferSize < 1) {
      throw new Error('LoggerConfig.bufferSize must be at least 1');
    }
  }

  child(metadata: Record<string, unknown>): Logger {
    return new LoggerImpl(
      {
        environment: this.environment,
        minLevel: this.minLevel,
        bufferSize: this.bufferSize,
        write: this.write,
        onFlush: this.onFlush,
      },
      { ...this.metadata, ...metadata },
    );
  }

  debug(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('debug', event_type, metadata);
  }

  info(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('info', event_type, metadata);
  }

  warn(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('warn', event_type, metadata);
  }

  error(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('error', event_type, metadata);
  }

  fatal(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('fatal', event_type, metadata);
    // Fatal logs flush immediately (don't wait for batch)
    this.flush().catch((err: unknown) => {
      this.reportFailure('Failed to flush fatal log', err);
    });
  }

  private log(level: LogLevel, event_type: string, metadata?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const serialized = this.serializeMetadata({ ...this.metadata, ...metadata });
    const timestamp = Date.now();

    this.write(
      JSON.stringify({
        level,
        event_type,
        metadata: serialized,
        timestamp: new Date(timestamp).toISOString(),
      }),
    );

    // Buffer only when someone will receive the entries (skip debug level)
    if (this.onFlush && level !== 'debug') {
      this.buffer.push({
        id: ulid(),
        level,
        event_type,
        metadata: serialized,
        timestamp,
      });

      if (this.buffer.length >= this.bufferSize) {
        this.flush().catch((err: unknown) => {
          this.reportFailure('Failed to auto-flush logs', err);
        });
      }
    }
  }

  async flush(): Promise<void> {
    if (!this.onFlush || this.buffer.length === 0) {
      return;
    }

    const toFlush = [...this.buffer];
    this.buffer = [];

    try {
      await this.onFlush(toFlush);
    } catch (err) {
      // Flush failures are written out, not thrown
      this.reportFailure('Failed to flush logs', err, { entries: toFlush.length });
    }
  }

  /**
   * Errors in metadata become plain objects so they survive JSON.stringify
   */
  protected serializeMetadata(metadata: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(metadata)) {
      result[key] = value instanceof Error ? this.serializeError(value) : value;
    }
    return result;
  }

  protected serializeError(error: Error): Record<string, unknown> {
    const serialized: Record<string, unknown> = {
      name: error.name,
      message: error.message,
    };
    if (this.envConfig.includeStackTraces && error.stack) {
      serialized.stack = error.stack;
    }
    return serialized;
  }

  private reportFailure(
    message: string,
    err: unknown,
    extra: Record<string, unknown> = {},
  ): void {
    this.write(
      JSON.stringify({
        level: 'error',
        event_type: 'logger_flush_failed',
        metadata: {
          message,
          error: err instanceof Error ? this.serializeError(err) : String(err),
          ...extra,
        },
        timestamp: new Date().toISOString(),
      }),
    );
  }
}

export function createLogger(config: LoggerConfig = {}): Logger {
  return new LoggerImpl(config);
}
