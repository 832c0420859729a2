/**
 * Structured logging utility.
 *
 * Emits one JSON object per line on stderr so that option construction in the
 * main process and in workers can be correlated by a log collector.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: Detailed diagnostic information, only written in debug mode
 * - `info`: General informational messages about normal operation
 * - `warn`: Conditions that don't prevent operation but may need attention
 * - `error`: Failures
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * A structured log entry as written to the sink.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the log entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;
  readonly level: LogLevel;
  /**
   * Name of the component that generated this entry.
   * @example "OptionsBuilder"
   */
  readonly component: string;
  /**
   * Short snake_case event name.
   * @example "options_built"
   */
  readonly event: string;
  readonly data?: Record<string, unknown>;
}

/**
 * Destination for serialised log lines. Defaults to stderr.
 */
export type LogSink = (line: string) => void;

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerOptions {
  /** Name of the component using this logger. */
  readonly component: string;
  /**
   * Whether debug-level logging is enabled.
   * @defaultValue false
   */
  readonly debugMode?: boolean;
  /** Where serialised lines go. */
  readonly sink?: LogSink;
  /** Clock, injectable for tests. */
  readonly now?: () => Date;
}

function writeToStderr(line: string): void {
  process.stderr.write(line);
}

/**
 * Structured logger that outputs JSON-formatted log entries.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'OptionsBuilder', debugMode: true });
 * logger.debug('options_built', { maxWorkers: 8 });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly sink: LogSink;
  private readonly now: () => Date;

  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.sink = options.sink ?? writeToStderr;
    this.now = options.now ?? ((): Date => new Date());
  }

  /**
   * Returns a logger for a sub-component sharing this logger's sink and mode.
   *
   * @param component - Name of the child component.
   */
  child(component: string): Logger {
    return new Logger({
      component,
      debugMode: this.debugMode,
      sink: this.sink,
      now: this.now,
    });
  }

  isDebugEnabled(): boolean {
    return this.debugMode;
  }

  /**
   * Logs a debug-level message. No-op unless debug mode is enabled.
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

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const entry: LogEntry =
      data === undefined
        ? { timestamp: this.now().toISOString(), level, component: this.component, event }
        : { timestamp: this.now().toISOString(), level, component: this.component, event, data };

    this.sink(serializeEntry(entry) + '\n');
  }
}

/**
 * Serialises an entry, falling back to a marker when `data` cannot be
 * represented as JSON (cycles, BigInt).
 */
function serializeEntry(entry: LogEntry): string {
  try {
    return JSON.stringify(entry);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      component: entry.component,
      event: entry.event,
      serializationError: message,
      originalData: '[unserializable]',
    });
  }
}

/**
 * A logger that discards everything. Used when callers pass no logger.
 */
export const silentLogger = new Logger({ component: 'silent', sink: () => undefined });
