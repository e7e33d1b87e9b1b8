import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  createLogger,
  configureLogging,
  resetLogging,
  NEVER_LOG_FIELDS,
  META_STRING_MAX_LENGTH,
  type LogEntry,
  type LogSink,
} from './logger.js';

// ---------------------------------------------------------------------------
// Test sink that captures log entries
// ---------------------------------------------------------------------------

function createTestSink(): { sink: LogSink; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const sink: LogSink = (entry: LogEntry) => {
    entries.push(entry);
  };
  return { sink, entries };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('Logger', () => {
  let entries: LogEntry[];

  beforeEach(() => {
    const test = createTestSink();
    entries = test.entries;
    configureLogging({ level: 'debug', sink: test.sink });
  });

  afterEach(() => {
    resetLogging();
  });

  // -----------------------------------------------------------------------
  // Log entry structure
  // -----------------------------------------------------------------------

  describe('log entry structure', () => {
    it('emits level, component and msg', () => {
      const logger = createLogger('server');
      logger.info('listening');

      expect(entries).toHaveLength(1);
      expect(entries[0].level).toBe('info');
      expect(entries[0].component).toBe('server');
      expect(entries[0].msg).toBe('listening');
    });

    it('timestamp is ISO 8601 format', () => {
      const logger = createLogger('server');
      logger.info('test');

      const ts = entries[0].ts;
      expect(new Date(ts).toISOString()).toBe(ts);
    });

    it('includes metadata when provided', () => {
      const logger = createLogger('server');
      logger.info('bound', { address: '127.0.0.1:50051' });

      expect(entries[0].meta).toEqual({ address: '127.0.0.1:50051' });
    });

    it('omits meta field when no metadata is provided', () => {
      const logger = createLogger('server');
      logger.info('simple message');

      expect(entries[0].meta).toBeUndefined();
    });
  });

  // -----------------------------------------------------------------------
  // Level filtering
  // -----------------------------------------------------------------------

  describe('level filtering', () => {
    it('drops entries below the configured level', () => {
      configureLogging({ level: 'warn' });
      const logger = createLogger('server');

      logger.debug('d');
      logger.info('i');
      logger.warn('w');
      logger.error('e');

      expect(entries.map((e) => e.level)).toEqual(['warn', 'error']);
    });

    it('resetLogging restores the info level', () => {
      configureLogging({ level: 'error' });
      resetLogging();
      const test = createTestSink();
      configureLogging({ sink: test.sink });

      createLogger('server').debug('hidden');
      createLogger('server').info('shown');

      expect(test.entries.map((e) => e.msg)).toEqual(['shown']);
    });
  });

  // -----------------------------------------------------------------------
  // Promoted fields
  // -----------------------------------------------------------------------

  describe('promoted fields', () => {
    it('moves call fields from meta to the top level', () => {
      const logger = createLogger('dispatch');
      logger.info('decision', {
        call: 'call-7',
        stage: 'request',
        duration_ms: 12,
        ok: true,
        continue: true,
      });

      expect(entries[0].call).toBe('call-7');
      expect(entries[0].stage).toBe('request');
      expect(entries[0].duration_ms).toBe(12);
      expect(entries[0].ok).toBe(true);
      expect(entries[0].meta).toEqual({ continue: true });
    });

    it('withContext binds fields to every entry', () => {
      const logger = createLogger('dispatch').withContext({ call: 'call-1', method: 'POST' });
      logger.info('one');
      logger.warn('two');

      expect(entries.map((e) => [e.call, e.method])).toEqual([
        ['call-1', 'POST'],
        ['call-1', 'POST'],
      ]);
    });

    it('child appends a sub-component and keeps context', () => {
      const logger = createLogger('server').withContext({ call: 'call-2' }).child('dispatch');
      logger.info('hi');

      expect(entries[0].component).toBe('server:dispatch');
      expect(entries[0].call).toBe('call-2');
    });
  });

  // -----------------------------------------------------------------------
  // Sanitization
  // -----------------------------------------------------------------------

  describe('sanitization', () => {
    it('never logs deny-listed keys, regardless of case', () => {
      const logger = createLogger('plugin');
      logger.info('headers', {
        Authorization: 'Bearer test-secret',
        Cookie: 'sid=1',
        token: 'test-token',
        'Content-Type': 'application/json',
      });

      expect(entries[0].meta).toEqual({ 'Content-Type': 'application/json' });
    });

    it('contains authorization and cookie in the deny list', () => {
      expect(NEVER_LOG_FIELDS.has('authorization')).toBe(true);
      expect(NEVER_LOG_FIELDS.has('cookie')).toBe(true);
    });

    it('drops meta entirely when every key is denied', () => {
      createLogger('plugin').info('secret only', { secret: 'test-secret' });
      expect(entries[0].meta).toBeUndefined();
    });

    it('truncates long strings', () => {
      const long = 'x'.repeat(META_STRING_MAX_LENGTH + 10);
      createLogger('plugin').info('long', { body: long });

      expect(entries[0].meta?.['body']).toBe('x'.repeat(META_STRING_MAX_LENGTH) + '...[truncated]');
    });

    it('serializes errors', () => {
      const err = new Error('boom');
      createLogger('plugin').error('failed', { error: err });

      expect(entries[0].meta?.['error']).toMatchObject({ name: 'Error', message: 'boom' });
    });
  });
});
