import { describe, it, expect, beforeEach, vi } from 'vitest';
import { StructuredLogger, formatDuration, isLogLevel } from '../../src/lib/logger.js';
import type { LogEntry } from '../../src/lib/logger.js';
import { ConfigError } from '../../src/lib/errors.js';

describe('StructuredLogger', () => {
  let lines: string[];
  let logger: StructuredLogger;

  const entries = (): LogEntry[] => lines.map((line) => JSON.parse(line) as LogEntry);

  beforeEach(() => {
    lines = [];
    logger = new StructuredLogger('Test', { minLevel: 'info', write: (line) => lines.push(line) });
  });

  it('should write one JSON entry per line', () => {
    logger.info('hello', { url: 'https://api.example.com' });

    expect(lines).toHaveLength(1);
    const [entry] = entries();
    expect(entry.level).toBe('info');
    expect(entry.message).toBe('hello');
    expect(entry.component).toBe('Test');
    expect(entry.context).toEqual({ url: 'https://api.example.com' });
  });

  it('should drop entries below the minimum level', () => {
    logger.debug('hidden');
    logger.warn('shown');

    expect(entries().map((e) => e.message)).toEqual(['shown']);
  });

  it('should honour setMinLevel', () => {
    logger.setMinLevel('error');
    logger.warn('hidden');
    logger.error('shown');

    expect(entries().map((e) => e.level)).toEqual(['error']);
    expect(logger.getMinLevel()).toBe('error');
  });

  it('should include error name and code without a stack by default', () => {
    logger.error('failed', new ConfigError('bad'));

    expect(entries()[0].error).toEqual({ name: 'ConfigError', message: 'bad', code: 'CONFIG_ERROR' });
  });

  it('should include the stack when enabled', () => {
    logger.setIncludeStack(true);
    logger.error('failed', new Error('boom'));

    expect(entries()[0].error?.stack).toContain('Error: boom');
  });

  describe('trackAsync', () => {
    it('should return the result and log the duration at debug level', async () => {
      logger.setMinLevel('debug');

      await expect(logger.trackAsync('Token request', async () => 'ok')).resolves.toBe('ok');

      const [entry] = entries();
      expect(entry.level).toBe('debug');
      expect(entry.message).toBe('Token request completed');
      expect(typeof entry.context?.duration).toBe('number');
    });

    it('should log and rethrow failures', async () => {
      const failure = new Error('boom');

      await expect(
        logger.trackAsync('Token request', () => Promise.reject(failure), { url: 'https://idp.example.com' })
      ).rejects.toBe(failure);

      const [entry] = entries();
      expect(entry.level).toBe('warn');
      expect(entry.message).toBe('Token request failed');
      expect(entry.context?.url).toBe('https://idp.example.com');
    });
  });

  it('should write to stderr by default', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const defaultLogger = new StructuredLogger('Default');

    defaultLogger.warn('to stderr');

    expect(write).toHaveBeenCalledTimes(1);
    expect(String(write.mock.calls[0][0])).toContain('"message":"to stderr"');
    write.mockRestore();
  });
});

describe('helpers', () => {
  it('isLogLevel should accept only known levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });

  it('formatDuration should format ms and seconds', () => {
    expect(formatDuration(250)).toBe('250ms');
    expect(formatDuration(1500)).toBe('1.50s');
  });
});
