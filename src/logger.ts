import { appendFileSync } from 'fs';

import { toJSONLine } from './json';

/**
 * The category of a log entry; `INFO` and `ERROR` are the ones in use, but the set is open.
 */
export type LogCategory = 'INFO' | 'ERROR' | (string & {});

/**
 * The additional values that describe a logged event; e.g. the action, an error message, the body of a request.
 */
export type LogFields = Record<string, unknown>;

/**
 * A structured log entry; once written, it occupies exactly one line and it's never edited.
 */
export interface LogEntry<Fields extends LogFields = LogFields> {
  /**
   * The category of the entry, used to filter and count entries.
   */
  tipo: LogCategory;
  /**
   * The details of the event, including the time (ISO 8601, UTC) in which the entry was created.
   */
  log_datos: Fields & { timestamp: string };
}

/**
 * A destination of log entries.
 */
export interface LogSink {
  /**
   * A human-readable identification of the destination; e.g. a file path.
   */
  readonly target: string;
  /**
   * Write an entry as a single line; it may throw.
   */
  write(entry: LogEntry): void;
}

/**
 * Serialize an entry to its single-line JSON form (no trailing newline).
 */
export const serializeLogEntry = (entry: LogEntry): string => toJSONLine(entry);

/**
 * Write the entries on the standard output (e.g. ingested by CloudWatch in a Lambda function).
 */
export class ConsoleLogSink implements LogSink {
  readonly target = 'stdout';

  write(entry: LogEntry): void {
    console.log(serializeLogEntry(entry));
  }
}

/**
 * Append the entries to a JSON Lines file; each write opens the file in append mode and closes it.
 */
export class FileLogSink implements LogSink {
  constructor(readonly target: string) {}

  write(entry: LogEntry): void {
    appendFileSync(this.target, serializeLogEntry(entry).concat('\n'), { encoding: 'utf-8' });
  }
}

/**
 * Structured logging of events on two sinks: the primary one (always attempted)
 * and the secondary one (best-effort: its failures never reach the caller).
 */
export class EventLogger {
  primary: LogSink;
  secondary?: LogSink;

  constructor(options: { primary?: LogSink; secondary?: LogSink } = {}) {
    this.primary = options.primary ?? new ConsoleLogSink();
    this.secondary = options.secondary;
  }

  /**
   * Build a new entry of the category, stamping the current time.
   */
  record<Fields extends LogFields>(category: LogCategory, fields: Fields): LogEntry<Fields> {
    return { tipo: category, log_datos: { ...fields, timestamp: new Date().toISOString() } };
  }

  /**
   * Write the entry on the primary sink.
   */
  emit(entry: LogEntry): void {
    this.primary.write(entry);
  }

  /**
   * Write the entry on the secondary sink, or on a file at `path`, if specified.
   * In case of failure, an error entry is emitted on the primary sink only.
   */
  persist(entry: LogEntry, path?: string): void {
    const sink = path ? new FileLogSink(path) : this.secondary;
    if (!sink) return;

    try {
      sink.write(entry);
    } catch (err) {
      this.emit(
        this.record('ERROR', {
          action: 'append_log_file',
          message: 'failed to append log file',
          error: `could not write to ${sink.target}`,
          path: sink.target,
          reason: err instanceof Error ? err.message : String(err)
        })
      );
    }
  }

  /**
   * Write the entry on both the sinks.
   */
  write(entry: LogEntry): void {
    this.emit(entry);
    this.persist(entry);
  }

  /**
   * Shortcut to record and write an informative entry.
   */
  info(fields: LogFields): LogEntry {
    const entry = this.record('INFO', fields);
    this.write(entry);
    return entry;
  }

  /**
   * Shortcut to record and write an error entry.
   */
  error(fields: LogFields): LogEntry {
    const entry = this.record('ERROR', fields);
    this.write(entry);
    return entry;
  }
}
