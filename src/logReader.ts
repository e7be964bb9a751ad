import { existsSync, readFileSync } from 'fs';

import { isJSONObject } from './json';
import { EventLogger, LogCategory } from './logger';

/**
 * The category used to count the entries that don't have one.
 */
export const UNKNOWN_CATEGORY = 'UNKNOWN';

/**
 * An entry as read from a log file: any JSON object, expected (but not guaranteed) to be a `LogEntry`.
 */
export interface StoredLogEntry {
  tipo?: unknown;
  log_datos?: unknown;
  [key: string]: unknown;
}

/**
 * Offline queries on a JSON Lines log file, as written by the `EventLogger`.
 */
export class LogReader {
  /**
   * The default file to read.
   */
  path: string;
  /**
   * Where to report the lines that can't be parsed (primary sink only).
   */
  protected logger: EventLogger;

  constructor(options: { path: string; logger?: EventLogger }) {
    this.path = options.path;
    this.logger = options.logger ?? new EventLogger();
  }

  /**
   * Load all the entries of the log file; if the file doesn't exist, there are no entries.
   * Blank lines are ignored; malformed lines are skipped and reported.
   * It throws if the path exists but can't be read as a file (e.g. it's a directory).
   */
  loadAll(path = this.path): StoredLogEntry[] {
    if (!existsSync(path)) return [];

    const entries: StoredLogEntry[] = [];
    const lines = readFileSync(path, { encoding: 'utf-8' }).split('\n');
    lines.forEach((rawLine, index): void => {
      const line = rawLine.trim();
      if (!line) return;

      const entry = this.parseLine(line);
      if (entry) entries.push(entry);
      else
        this.logger.emit(
          this.logger.record('ERROR', {
            action: 'load_logs',
            message: `invalid json on line ${index + 1} of ${path}`,
            line: index + 1,
            path
          })
        );
    });
    return entries;
  }
  private parseLine(line: string): StoredLogEntry | null {
    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch (error) {
      return null;
    }
    return isJSONObject(value) ? value : null;
  }

  /**
   * Get the entries of a category, in their original order.
   */
  filterByCategory(entries: StoredLogEntry[], category: LogCategory): StoredLogEntry[] {
    return entries.filter(entry => entry.tipo === category);
  }

  /**
   * Count the entries by category; the entries without a category are counted as `UNKNOWN`.
   */
  countByCategory(entries: StoredLogEntry[]): Record<string, number> {
    const counts = new Map<string, number>();
    entries.forEach(entry => {
      const category = typeof entry.tipo === 'string' ? entry.tipo : UNKNOWN_CATEGORY;
      counts.set(category, (counts.get(category) ?? 0) + 1);
    });
    return Object.fromEntries(counts);
  }
}
