import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ConsoleLogSink, EventLogger, FileLogSink, serializeLogEntry } from '../logger';
import { BrokenLogSink, MemoryLogSink } from './memoryLogSink';

const NOW = '2026-01-02T03:04:05.678Z';

describe('EventLogger', () => {
  let dir: string;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(NOW));
    dir = mkdtempSync(join(tmpdir(), 'event-logger-'));
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  describe('record', () => {
    it('merges the current timestamp into the fields, under the category', () => {
      const logger = new EventLogger({ primary: new MemoryLogSink() });

      const entry = logger.record('INFO', { action: 'create_movie', status: 'success' });

      expect(entry).toEqual({
        tipo: 'INFO',
        log_datos: { action: 'create_movie', status: 'success', timestamp: NOW }
      });
    });

    it('does not let a field override the timestamp', () => {
      const logger = new EventLogger({ primary: new MemoryLogSink() });

      const entry = logger.record('ERROR', { timestamp: 'yesterday' });

      expect(entry.log_datos.timestamp).toBe(NOW);
    });

    it('writes nothing', () => {
      const primary = new MemoryLogSink();
      const logger = new EventLogger({ primary });

      logger.record('INFO', { action: 'noop' });

      expect(primary.entries).toHaveLength(0);
    });
  });

  describe('emit', () => {
    it('prints a single JSON line on the console by default', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const logger = new EventLogger();

      logger.emit(logger.record('INFO', { action: 'test' }));

      expect(log).toHaveBeenCalledTimes(1);
      expect(log).toHaveBeenCalledWith(`{"tipo":"INFO","log_datos":{"action":"test","timestamp":"${NOW}"}}`);
    });

    it('coerces the values JSON does not support', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const sink = new ConsoleLogSink();

      sink.write({ tipo: 'INFO', log_datos: { timestamp: NOW, count: 12345678901234567890n, tags: new Set(['a']) } });

      expect(log).toHaveBeenCalledWith(
        `{"tipo":"INFO","log_datos":{"timestamp":"${NOW}","count":12345678901234567890,"tags":["a"]}}`
      );
    });

    it('does not touch the secondary sink', () => {
      const primary = new MemoryLogSink();
      const secondary = new MemoryLogSink();
      const logger = new EventLogger({ primary, secondary });

      logger.emit(logger.record('INFO', { action: 'test' }));

      expect(primary.entries).toHaveLength(1);
      expect(secondary.entries).toHaveLength(0);
    });
  });

  describe('persist', () => {
    it('appends one line per entry to the file', () => {
      const path = join(dir, 'log.jsonl');
      const logger = new EventLogger({ primary: new MemoryLogSink(), secondary: new FileLogSink(path) });
      const first = logger.record('INFO', { action: 'first' });
      const second = logger.record('ERROR', { action: 'second' });

      logger.persist(first);
      logger.persist(second);

      expect(readFileSync(path, 'utf-8')).toBe(`${serializeLogEntry(first)}\n${serializeLogEntry(second)}\n`);
    });

    it('writes to the file at the given path, instead of the secondary sink', () => {
      const path = join(dir, 'other.jsonl');
      const secondary = new MemoryLogSink();
      const logger = new EventLogger({ primary: new MemoryLogSink(), secondary });
      const entry = logger.record('INFO', { action: 'elsewhere' });

      logger.persist(entry, path);

      expect(readFileSync(path, 'utf-8')).toBe(`${serializeLogEntry(entry)}\n`);
      expect(secondary.entries).toHaveLength(0);
    });

    it('reports a failure of the file on the primary sink only, without throwing', () => {
      const path = join(dir, 'missing-folder', 'log.jsonl');
      const primary = new MemoryLogSink();
      const logger = new EventLogger({ primary, secondary: new FileLogSink(path) });

      expect(() => logger.persist(logger.record('INFO', { action: 'test' }))).not.toThrow();

      expect(primary.entries).toEqual([
        {
          tipo: 'ERROR',
          log_datos: {
            action: 'append_log_file',
            message: 'failed to append log file',
            error: `could not write to ${path}`,
            path,
            reason: expect.stringContaining('ENOENT'),
            timestamp: NOW
          }
        }
      ]);
    });

    it('reports any failure of the secondary sink', () => {
      const primary = new MemoryLogSink();
      const logger = new EventLogger({ primary, secondary: new BrokenLogSink('/var/log/movies.jsonl') });

      logger.persist(logger.record('INFO', { action: 'test' }));

      expect(primary.entries).toHaveLength(1);
      expect(primary.entries[0].log_datos).toMatchObject({
        error: 'could not write to /var/log/movies.jsonl',
        reason: 'disk full'
      });
    });

    it('does nothing without a secondary sink', () => {
      const primary = new MemoryLogSink();
      const logger = new EventLogger({ primary });

      logger.persist(logger.record('INFO', { action: 'test' }));

      expect(primary.entries).toHaveLength(0);
    });
  });

  describe('write', () => {
    it('emits and persists the entry', () => {
      const primary = new MemoryLogSink();
      const secondary = new MemoryLogSink();
      const logger = new EventLogger({ primary, secondary });
      const entry = logger.record('INFO', { action: 'test' });

      logger.write(entry);

      expect(primary.entries).toEqual([entry]);
      expect(secondary.entries).toEqual([entry]);
    });

    it('records and writes through the shortcuts', () => {
      const primary = new MemoryLogSink();
      const logger = new EventLogger({ primary });

      const info = logger.info({ action: 'a' });
      const error = logger.error({ action: 'b' });

      expect(info.tipo).toBe('INFO');
      expect(error.tipo).toBe('ERROR');
      expect(primary.entries).toEqual([info, error]);
    });
  });
});
