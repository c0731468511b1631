import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createLogger, setGlobalLogLevel, setLogOutput, LogLevel } from '../src/core/logger.js';
import type { LogEntry } from '../src/core/logger.js';

describe('Structured Logging', () => {
  let captured: LogEntry[];

  beforeEach(() => {
    captured = [];
    setLogOutput((entry) => captured.push(entry));
    setGlobalLogLevel(LogLevel.DEBUG);
  });

  afterEach(() => {
    setLogOutput();
    setGlobalLogLevel(LogLevel.INFO);
  });

  it('tags entries with the module name', () => {
    createLogger('Chain').info('hello');
    expect(captured).toHaveLength(1);
    expect(captured[0].module).toBe('Chain');
    expect(captured[0].message).toBe('hello');
    expect(captured[0].level).toBe('INFO');
  });

  it('logs all levels', () => {
    const log = createLogger('m');
    log.debug('d');
    log.info('i');
    log.warn('w');
    log.error('e');
    expect(captured.map(e => e.level)).toEqual(['DEBUG', 'INFO', 'WARN', 'ERROR']);
  });

  it('omits empty context', () => {
    createLogger('m').info('empty', {});
    expect(captured[0].context).toBeUndefined();
  });

  it('respects the global level', () => {
    setGlobalLogLevel(LogLevel.WARN);
    const log = createLogger('m');
    log.info('i');
    log.warn('w');
    expect(captured.map(e => e.level)).toEqual(['WARN']);
  });

  it('SILENT suppresses everything', () => {
    setGlobalLogLevel(LogLevel.SILENT);
    createLogger('m').error('e');
    expect(captured).toHaveLength(0);
  });

  it('writes ISO timestamps', () => {
    createLogger('m').info('t');
    expect(new Date(captured[0].timestamp).toISOString()).toBe(captured[0].timestamp);
  });

  describe('child loggers', () => {
    it('merge their context into every entry', () => {
      const log = createLogger('Executor').child({ actingIdentity: 'alice' });
      log.debug('batch', { calls: 2 });
      expect(captured[0].module).toBe('Executor');
      expect(captured[0].context).toEqual({ actingIdentity: 'alice', calls: 2 });
    });

    it('let call-site context win over inherited keys', () => {
      createLogger('m').child({ depth: 0 }).info('nested', { depth: 3 });
      expect(captured[0].context).toEqual({ depth: 3 });
    });

    it('follow the global level', () => {
      const log = createLogger('m').child({ a: 1 });
      setGlobalLogLevel(LogLevel.WARN);
      log.info('dropped');
      log.warn('kept');
      expect(captured.map(e => e.message)).toEqual(['kept']);
    });

    it('leave the parent context alone', () => {
      const parent = createLogger('m').child({ a: 1 });
      parent.child({ b: 2 });
      parent.info('x');
      expect(captured[0].context).toEqual({ a: 1 });
    });

    it('stack their contexts', () => {
      createLogger('m').child({ a: 1 }).child({ b: 2 }).info('x');
      expect(captured[0].context).toEqual({ a: 1, b: 2 });
    });
  });
});
