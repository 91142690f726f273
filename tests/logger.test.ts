import * as fs from 'fs';
import * as path from 'path';
import { Logger, LogLevel } from '../src/utils/logger';
import { makeTempDir, removeDir, touch } from './helpers';

describe('Logger', () => {
  const originalEnv = process.env;
  let consoleLogSpy: jest.SpyInstance;
  let consoleWarnSpy: jest.SpyInstance;
  let consoleErrorSpy: jest.SpyInstance;

  beforeEach(() => {
    process.env = { ...originalEnv, NODE_ENV: 'test' };
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
    consoleWarnSpy = jest.spyOn(console, 'warn').mockImplementation();
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
    process.env = originalEnv;
    Logger.setLogLevel(LogLevel.INFO);
  });

  describe('Log Levels', () => {
    it('should route levels to the matching console method', () => {
      Logger.setLogLevel(LogLevel.DEBUG);

      Logger.debug('debug line');
      Logger.info('info line');
      Logger.warn('warn line');
      Logger.error('error line');

      expect(consoleLogSpy).toHaveBeenCalledTimes(2);
      expect(consoleWarnSpy).toHaveBeenCalledTimes(1);
      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
      expect(consoleLogSpy.mock.calls[0][0]).toContain('[DEBUG] debug line');
      expect(consoleWarnSpy.mock.calls[0][0]).toContain('[WARN ] warn line');
    });

    it('should respect WARN level', () => {
      Logger.setLogLevel(LogLevel.WARN);

      Logger.debug('hidden');
      Logger.info('hidden');
      Logger.warn('shown');

      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(consoleWarnSpy).toHaveBeenCalledTimes(1);
    });

    it('should parse level names and default to info', () => {
      expect(Logger.parseLogLevel('DEBUG')).toBe(LogLevel.DEBUG);
      expect(Logger.parseLogLevel('warn')).toBe(LogLevel.WARN);
      expect(Logger.parseLogLevel('error')).toBe(LogLevel.ERROR);
      expect(Logger.parseLogLevel('verbose')).toBe(LogLevel.INFO);
    });
  });

  describe('Structured Context', () => {
    it('should append context as JSON', () => {
      Logger.info('Downloaded', { file: 'a.opus', size: 3 });

      const line = String(consoleLogSpy.mock.calls[0][0]);
      expect(line.endsWith('Downloaded {"file":"a.opus","size":3}')).toBe(true);
    });

    it('should include the error message in error logs', () => {
      Logger.error('Download pipeline failed', new Error('disk full'));

      const line = String(consoleErrorSpy.mock.calls[0][0]);
      expect(line.endsWith('Download pipeline failed: disk full')).toBe(true);
    });
  });

  describe('Operation Tracing', () => {
    it('should generate unique trace IDs', () => {
      const first = Logger.startOperation('one');
      const second = Logger.startOperation('two');
      expect(first).not.toBe(second);
      Logger.endOperation(first);
      Logger.endOperation(second);
    });

    it('should log completion with duration and success flag', () => {
      const traceId = Logger.startOperation('playlist');
      Logger.endOperation(traceId, true, { successful: 2 });

      const line = String(consoleLogSpy.mock.calls[0][0]);
      expect(line).toContain('Operation completed: playlist');
      expect(line).toMatch(/\(\d+ms\)/);
      expect(line).toContain('"successful":2,"success":true');
    });

    it('should log failed operations as warnings', () => {
      const traceId = Logger.startOperation('cleanup');
      Logger.endOperation(traceId, false);

      expect(consoleWarnSpy).toHaveBeenCalledTimes(1);
    });

    it('should ignore unknown trace IDs', () => {
      expect(() => Logger.endOperation('missing')).not.toThrow();
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });
  });

  describe('File Logging', () => {
    let logDir: string;

    beforeEach(() => {
      logDir = makeTempDir('opus-shelf-logs-');
    });

    afterEach(() => {
      Logger.setLogDirectory('./logs');
      removeDir(logDir);
    });

    it('should write one JSON line per entry to the daily file', () => {
      process.env.NODE_ENV = 'development';
      Logger.setLogDirectory(logDir);

      Logger.info('Test log', { field: 'value' });
      Logger.warn('Second');

      const today = new Date().toISOString().split('T')[0];
      const lines = fs.readFileSync(path.join(logDir, `${today}.log`), 'utf8').trim().split('\n');
      expect(lines).toHaveLength(2);

      const first = JSON.parse(lines[0]);
      expect(first.level).toBe('INFO');
      expect(first.message).toBe('Test log');
      expect(first.context).toEqual({ field: 'value' });
    });

    it('should not write files under NODE_ENV=test', () => {
      Logger.setLogDirectory(logDir);
      Logger.info('console only');

      expect(fs.readdirSync(logDir)).toEqual([]);
    });

    it('should report an unwritable log directory once and keep logging', () => {
      process.env.NODE_ENV = 'development';
      const blocker = touch(logDir, 'not-a-dir');
      Logger.setLogDirectory(path.join(blocker, 'nested'));

      expect(() => {
        Logger.info('first');
        Logger.info('second');
      }).not.toThrow();

      const fileErrors = consoleErrorSpy.mock.calls.filter((call) => String(call[0]).startsWith('[logger]'));
      expect(fileErrors).toHaveLength(1);
      expect(consoleLogSpy).toHaveBeenCalledTimes(2);
    });
  });
});
