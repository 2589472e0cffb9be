/**
 * Structured logging utility.
 *
 * Writes one JSON object per line to stderr, keeping stdout free for the
 * value a query prints.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: diagnostic detail, only written in debug mode
 * - `info`: normal operation
 * - `warn`: conditions that may need attention
 * - `error`: failures
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * A structured log entry.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;

  readonly level: LogLevel;

  /**
   * Component that produced the entry.
   * @example "cli"
   */
  readonly component: string;

  /**
   * Short snake_case name of the event.
   * @example "document_loaded"
   */
  readonly event: string;

  /**
   * Additional JSON-serializable context.
   * @example { path: "package.version" }
   */
  readonly data?: Record<string, unknown>;

  /** Set when `data` could not be serialized. */
  readonly serializationError?: string;

  /** Placeholder for `data` when it could not be serialized. */
  readonly originalData?: string;
}

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

  /**
   * Destination for serialized lines.
   * @defaultValue process.stderr
   */
  readonly sink?: (line: string) => void;
}

/**
 * Structured logger that outputs JSON lines to stderr.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'cli', debugMode: true });
 * logger.debug('path_parsed', { segments: 3 });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly sink: (line: string) => void;

  /**
   * Creates a new Logger instance.
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.sink =
      options.sink ??
      ((line: string): void => {
        process.stderr.write(line);
      });
  }

  /** Whether debug entries are written. */
  get isDebugEnabled(): boolean {
    return this.debugMode;
  }

  /**
   * Logs a debug-level message. No-op unless debug mode is on.
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

  /**
   * Logs an info-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  /**
   * Logs a warning-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  /**
   * Logs an error-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
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
    return new Logger({
      component: `${this.component}.${component}`,
      debugMode: this.debugMode,
      sink: this.sink,
    });
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      event,
    };

    if (data === undefined) {
      this.sink(JSON.stringify(entry) + '\n');
      return;
    }

    let line: string;
    try {
      line = JSON.stringify({ ...entry, data });
    } catch (error) {
      const fallback: LogEntry = {
        ...entry,
        serializationError: error instanceof Error ? error.message : String(error),
        originalData: '[unserializable]',
      };
      line = JSON.stringify(fallback);
    }
    this.sink(line + '\n');
  }
}
