/**
 * Structured logging utility.
 *
 * Emits one JSON object per line to stderr (or a supplied sink). The parser
 * logs include resolution and environment defaults at debug level.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: Detailed diagnostic information, suppressed unless debug mode is on
 * - `info`: General informational messages about normal operation
 * - `warn`: Conditions that don't prevent operation but may need attention
 * - `error`: Failures
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Represents a structured log entry with timestamp and metadata.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the log entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;

  readonly level: LogLevel;

  /**
   * Name of the component that generated this log entry.
   * @example "Parser"
   */
  readonly component: string;

  /**
   * Brief snake_case description of the logged event.
   * @example "include_resolved"
   */
  readonly event: string;

  /**
   * Additional structured data associated with the log entry.
   * @example { path: "db.cfgpp", depth: 1 }
   */
  readonly data?: Record<string, unknown>;
}

/**
 * Destination for serialized log lines.
 */
export type LogSink = (line: string) => void;

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerOptions {
  /**
   * Name of the component using this logger.
   */
  readonly component: string;

  /**
   * Whether debug-level logging is enabled.
   * @defaultValue false
   */
  readonly debugMode?: boolean;

  /**
   * Where serialized entries go.
   * @defaultValue writes to `process.stderr`
   */
  readonly sink?: LogSink;
}

function writeToStderr(line: string): void {
  process.stderr.write(line);
}

/** JSON replacer that renders bigint as decimal text. */
function replaceBigInt(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

/**
 * Structured logger that outputs JSON-formatted log entries.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'Parser', debugMode: true });
 * logger.debug('include_resolved', { path: 'db.cfgpp', depth: 1 });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly sink: LogSink;

  /**
   * Creates a new Logger instance.
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.sink = options.sink ?? writeToStderr;
  }

  /**
   * Whether debug entries are emitted.
   */
  get isDebugEnabled(): boolean {
    return this.debugMode;
  }

  /**
   * Logs a debug-level message. No-op unless debug mode is enabled.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
    this.log('debug', event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  /**
   * Creates a logger for a sub-component sharing this logger's settings.
   *
   * @param component - Name of the sub-component.
   * @returns A new Logger.
   */
  child(component: string): Logger {
    return new Logger({ component, debugMode: this.debugMode, sink: this.sink });
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      event,
      ...(data !== undefined ? { data } : {}),
    };

    let line: string;
    try {
      line = JSON.stringify(entry, replaceBigInt);
    } catch (error) {
      // Circular data: keep the entry, drop the payload.
      line = JSON.stringify({
        timestamp: entry.timestamp,
        level,
        component: this.component,
        event,
        serializationError: error instanceof Error ? error.message : String(error),
        originalData: '[unserializable]',
      });
    }

    this.sink(line + '\n');
  }
}

/**
 * Shared logger for the parser, debug output disabled.
 */
export const logger = new Logger({ component: 'cfgpp', debugMode: false });
