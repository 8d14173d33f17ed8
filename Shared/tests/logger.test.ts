import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Logger } from '../Utils/logger.js';

describe('Logger', () => {
  let spy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    spy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    spy.mockRestore();
  });

  function lastLine(): string {
    return String(spy.mock.calls[spy.mock.calls.length - 1][0]);
  }

  describe('level filtering', () => {
    it('should log at or above the configured level', () => {
      const log = new Logger('test');
      log.setLevel('warn');

      log.debug('skip');
      log.info('skip');
      log.warn('show');
      log.error('show');

      expect(spy).toHaveBeenCalledTimes(2);
    });

    it('should only log errors at error level', () => {
      const log = new Logger('test');
      log.setLevel('error');

      log.debug('skip');
      log.info('skip');
      log.warn('skip');
      log.error('show');

      expect(spy).toHaveBeenCalledTimes(1);
    });
  });

  describe('output format', () => {
    it('should include timestamp, level, context, and message', () => {
      const log = new Logger('fathom:responder');
      log.setLevel('info');
      log.info('connection opened');

      expect(lastLine()).toMatch(/^\[.+\] \[INFO\] \[fathom:responder\] connection opened$/);
    });

    it('should include JSON data when provided', () => {
      const log = new Logger('svc');
      log.setLevel('info');
      log.info('with data', { executionId: 'exec_1' });

      expect(lastLine()).toMatch(/ with data \{"executionId":"exec_1"\}$/);
    });

    it('should serialize Error objects with message, name and code', () => {
      const log = new Logger('svc');
      log.setLevel('error');
      log.error('spawn failed', Object.assign(new Error('boom'), { code: 'ENOENT' }));

      const output = lastLine();
      expect(output).toContain('"message":"boom"');
      expect(output).toContain('"name":"Error"');
      expect(output).toContain('"code":"ENOENT"');
    });

    it('should not write to stdout', () => {
      const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
      const log = new Logger('test');
      log.setLevel('info');
      log.info('test message');

      expect(spy).toHaveBeenCalled();
      expect(stdoutSpy).not.toHaveBeenCalled();
      stdoutSpy.mockRestore();
    });
  });

  describe('bound fields', () => {
    it('should stamp bound fields on lines without data', () => {
      const log = new Logger('svc').with({ connectionId: 'conn_a' });
      log.setLevel('info');
      log.info('ping');

      expect(lastLine()).toMatch(/ ping \{"connectionId":"conn_a"\}$/);
    });

    it('should merge bound fields before object data', () => {
      const log = new Logger('svc').with({ connectionId: 'conn_a' });
      log.setLevel('info');
      log.info('ack', { executionId: 'exec_1' });

      expect(lastLine()).toMatch(/ ack \{"connectionId":"conn_a","executionId":"exec_1"\}$/);
    });

    it('should wrap errors and primitives under their own keys', () => {
      const log = new Logger('svc').with({ connectionId: 'conn_a' });
      log.setLevel('info');

      log.info('count', 3);
      expect(lastLine()).toMatch(/ count \{"connectionId":"conn_a","data":3\}$/);

      log.info('failed', new Error('nope'));
      expect(lastLine()).toContain('"error":{"message":"nope","name":"Error"');
    });

    it('should carry bound fields into children', () => {
      const log = new Logger('fathom').with({ connectionId: 'conn_b' });
      log.setLevel('info');
      log.child('initiator').info('hello');

      expect(lastLine()).toMatch(/\[fathom:initiator\] hello \{"connectionId":"conn_b"\}$/);
    });
  });

  describe('child logger', () => {
    it('should inherit parent log level', () => {
      const parent = new Logger('p');
      parent.setLevel('warn');
      const child = parent.child('c');

      child.info('skip');
      child.warn('show');

      expect(spy).toHaveBeenCalledTimes(1);
    });
  });

  describe('setContext', () => {
    it('should change the context prefix', () => {
      const log = new Logger('old');
      log.setLevel('info');
      log.setContext('new');
      log.info('msg');

      expect(lastLine()).toContain('[new]');
      expect(lastLine()).not.toContain('[old]');
    });
  });

  describe('LOG_LEVEL env var', () => {
    const originalLevel = process.env.LOG_LEVEL;

    afterEach(() => {
      if (originalLevel === undefined) {
        delete process.env.LOG_LEVEL;
      } else {
        process.env.LOG_LEVEL = originalLevel;
      }
    });

    it('should read initial level from LOG_LEVEL env var', () => {
      process.env.LOG_LEVEL = 'debug';
      expect(new Logger('test').getLevel()).toBe('debug');
    });

    it('should default to info for invalid LOG_LEVEL', () => {
      process.env.LOG_LEVEL = 'verbose';
      expect(new Logger('test').getLevel()).toBe('info');
    });
  });
});
