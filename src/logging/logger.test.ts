import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { Logger, type LogEntry } from './logger.js';

async function readEntries(path: string): Promise<LogEntry[]> {
  const content = await readFile(path, 'utf-8');
  return content
    .trim()
    .split('\n')
    .map((line): LogEntry => JSON.parse(line));
}

describe('Logger', () => {
  let testDir: string;
  let logPath: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `logger-test-${randomUUID()}`);
    await mkdir(testDir, { recursive: true });
    logPath = join(testDir, 'test.log');
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('log level filtering', () => {
    it('should filter logs below configured level', async () => {
      const logger = new Logger({ level: 'warn', path: logPath });

      await logger.debug('debug message');
      await logger.info('info message');
      await logger.warn('warn message');
      await logger.error('error message');

      const entries = await readEntries(logPath);
      expect(entries.map(e => e.level)).toEqual(['warn', 'error']);
    });

    it('should log all levels when set to debug', async () => {
      const logger = new Logger({ level: 'debug', path: logPath });

      await logger.debug('debug');
      await logger.info('info');
      await logger.warn('warn');
      await logger.error('error');

      expect(await readEntries(logPath)).toHaveLength(4);
    });

    it('should report which levels it writes', () => {
      const logger = new Logger({ level: 'warn', path: logPath });

      expect(logger.shouldLog('debug')).toBe(false);
      expect(logger.shouldLog('info')).toBe(false);
      expect(logger.shouldLog('warn')).toBe(true);
      expect(logger.shouldLog('error')).toBe(true);
    });
  });

  describe('structured JSON format', () => {
    it('should write timestamp, level and message', async () => {
      const logger = new Logger({ level: 'info', path: logPath });
      await logger.info('command received');

      const [entry] = await readEntries(logPath);
      expect(entry?.level).toBe('info');
      expect(entry?.message).toBe('command received');
      expect(new Date(entry?.timestamp ?? '').toISOString()).toBe(entry?.timestamp);
      expect(entry?.context).toBeUndefined();
    });

    it('should merge default context with per-call context', async () => {
      const logger = new Logger({ level: 'info', path: logPath }, { commandId: 'cmd-1' });
      await logger.info('tool executed', { toolName: 'assign_exercise' });

      const [entry] = await readEntries(logPath);
      expect(entry?.context).toEqual({ commandId: 'cmd-1', toolName: 'assign_exercise' });
    });

    it('should create directories for nested log paths', async () => {
      const nested = join(testDir, 'logs', 'app.log');
      const logger = new Logger({ level: 'info', path: nested });
      await logger.info('hello');

      expect(await readEntries(nested)).toHaveLength(1);
    });
  });

  describe('error logging', () => {
    it('should include the stack trace for Error instances', async () => {
      const logger = new Logger({ level: 'error', path: logPath });
      await logger.error('store write failed', new Error('disk full'), { operation: 'persist' });

      const [entry] = await readEntries(logPath);
      expect(entry?.stack).toContain('Error: disk full');
      expect(entry?.context?.operation).toBe('persist');
    });

    it('should record non-Error values as errorDetails', async () => {
      const logger = new Logger({ level: 'error', path: logPath });
      await logger.error('capability failed', 'exit code 2');

      const [entry] = await readEntries(logPath);
      expect(entry?.context?.errorDetails).toBe('exit code 2');
      expect(entry?.stack).toBeUndefined();
    });
  });

  describe('log rotation', () => {
    it('should rotate when the file exceeds maxSize', async () => {
      const logger = new Logger({ level: 'info', path: logPath, maxSize: 100, maxFiles: 3 });

      for (let i = 0; i < 10; i++) {
        await logger.info(`Message ${i} with some extra content to fill space`);
      }

      const files = await logger.listLogFiles();
      expect(files[0]).toBe(logPath);
      expect(files).toContain(`${logPath}.1`);
    });

    it('should keep at most maxFiles rotated files', async () => {
      const logger = new Logger({ level: 'info', path: logPath, maxSize: 50, maxFiles: 2 });

      for (let i = 0; i < 20; i++) {
        await logger.info(`Message ${i} with padding content`);
      }

      const files = await logger.listLogFiles();
      expect(files).toEqual([logPath, `${logPath}.1`, `${logPath}.2`]);
    });
  });

  describe('child logger', () => {
    it('should inherit config and merge context', async () => {
      const parent = new Logger({ level: 'info', path: logPath }, { tutorId: 'tutor-1' });
      const child = parent.child({ commandId: 'cmd-9' });
      await child.info('child message');

      const [entry] = await readEntries(logPath);
      expect(entry?.context).toEqual({ tutorId: 'tutor-1', commandId: 'cmd-9' });
    });
  });
});
