/**
 * Structured logging for the validation engine and CLI.
 *
 * Log entries are single JSON lines written to stderr so that report output
 * on stdout stays machine-readable.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
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

  /** Severity level of the log entry. */
  readonly level: LogLevel;

  /**
   * Name of the component that generated this log entry.
   * @example "ProtocolAggregator"
   */
  readonly component: string;

  /**
   * Short snake_case event name.
   * @example "protocol_validated"
   */
  readonly event: string;

  /**
   * Additional structured data associated with the log entry.
   * @example { sectionCount: 12, guidelineAdherence: false }
   */
  readonly data?: Record<string, unknown>;
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

  /** Receives each serialized line. Defaults to `process.stderr.write`. */
  readonly sink?: (line: string) => void;

  /** Clock used for timestamps (injectable for testing). */
  readonly now?: () => Date;
}

/**
 * Structured logger that outputs JSON-formatted log entries.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'pqa', debugMode: true });
 * logger.info('rules_loaded', { sections: 9 });
 * logger.debug('section_validated', { section: 'objectives', score: 55 });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly sink: (line: string) => void;
  private readonly now: () => Date;

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
    this.now = options.now ?? ((): Date => new Date());
  }

  /**
   * Logs a debug-level message. Only emitted when debugMode is enabled.
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

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const entry: LogEntry =
      data === undefined
        ? { timestamp: this.now().toISOString(), level, component: this.component, event }
        : { timestamp: this.now().toISOString(), level, component: this.component, event, data };

    let line: string;
    try {
      line = JSON.stringify(entry);
    } catch (error) {
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

