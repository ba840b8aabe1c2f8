import { describe, it, expect, vi, afterEach } from 'vitest';
import { isLogThreshold, Logger } from '../logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should format level, message and context', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    new Logger('info').info('User registered', { userId: 'u-1' });

    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0][0]).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[INFO\] User registered \{"userId":"u-1"\}$/
    );
  });

  it('should drop messages below the threshold', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = new Logger('warn');
    logger.info('hidden');
    logger.warn('shown');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should print nothing when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    new Logger('silent').error('hidden', new Error('boom'));

    expect(error).not.toHaveBeenCalled();
  });

  it('should include the error message for errors', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    new Logger('debug').error('Health check failed', new Error('timeout'));

    expect(error.mock.calls[0][0]).toContain('[ERROR] Health check failed {"error":"timeout"');
  });

  it('should only accept its own level names as thresholds', () => {
    expect(isLogThreshold('warn')).toBe(true);
    expect(isLogThreshold('silent')).toBe(true);
    expect(isLogThreshold('toString')).toBe(false);
    expect(isLogThreshold('constructor')).toBe(false);
    expect(isLogThreshold(undefined)).toBe(false);
  });
});
