/**
 * Structured logging utility.
 *
 * Every entry is a single JSON line. The default sink is stderr so that
 * stdout stays reserved for the membership listing.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: Detailed diagnostic information, emitted only in debug mode
 * - `info`: General informational messages about normal operation
 * - `warn`: Anomalies that are reported but do not abort the run
 * - `error`: Fatal conditions
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

  /**
   * Severity level of the log entry.
   */
  readonly level: LogLevel;

  /**
   * Name of the component that generated this log entry.
   * @example "assignment"
   */
  readonly component: string;

  /**
   * Short snake_case name of the logged event.
   * @example "variable_overwritten"
   */
  readonly event: string;

  /**
   * Additional structured data associated with the log entry.
   * @example { node: "foo0", key: "zookeeper_id" }
   */
  readonly data?: Record<string, unknown>;
}

/**
 * Destination for serialized log lines. Each call receives one line
 * including its trailing newline.
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
   * When `false` (default), debug() calls are no-ops.
   * @defaultValue false
   */
  readonly debugMode?: boolean;

  /**
   * Where serialized entries are written.
   * @defaultValue writes to process.stderr
   */
  readonly sink?: LogSink;
}

function stderrSink(line: string): void {
  process.stderr.write(line);
}

/**
 * Structured logger that outputs JSON-formatted log entries.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'vcluster', debugMode: true });
 * logger.info('topology_generated', { nodes: 3 });
 * logger.warn('variable_overwritten', { node: 'foo0', key: 'zookeeper_id' });
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
    this.sink = options.sink ?? stderrSink;
  }

  /**
   * Returns a logger for another component that shares this logger's
   * sink and debug setting.
   *
   * @param component - Name of the child component.
   */
  child(component: string): Logger {
    return new Logger({ component, debugMode: this.debugMode, sink: this.sink });
  }

  /**
   * Whether debug-level entries are emitted.
   */
  get isDebugEnabled(): boolean {
    return this.debugMode;
  }

  /**
   * Logs a debug-level message. No-op unless debugMode is enabled.
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
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      event,
      ...(data !== undefined ? { data } : {}),
    };

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

/**
 * Creates a logger that writes to an in-memory array. Used by tests and by
 * callers that want to inspect anomalies after a run.
 *
 * @param component - Component name for the logger.
 * @param debugMode - Whether debug entries are kept.
 * @returns The logger and the array its entries are parsed into.
 */
export function createMemoryLogger(
  component: string,
  debugMode = false
): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = new Logger({
    component,
    debugMode,
    sink: (line) => {
      entries.push(JSON.parse(line) as LogEntry);
    },
  });
  return { logger, entries };
}
