import { LogEntry, LogSink } from '../logger';

/**
 * Keep the written entries in memory, to inspect them.
 */
export class MemoryLogSink implements LogSink {
  readonly target = 'memory';
  entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }
}

/**
 * A sink that always fails writing.
 */
export class BrokenLogSink implements LogSink {
  constructor(readonly target: string) {}

  write(): void {
    throw new Error('disk full');
  }
}
