import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createLogger, getLogLevel, LogLevel, parseLogLevel, setLogLevel } from '../src/logger.js';

describe('parseLogLevel()', () => {
  it('maps level names case-insensitively', () => {
    expect(parseLogLevel('trace')).toBe(LogLevel.TRACE);
    expect(parseLogLevel('DEBUG')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('Warn')).toBe(LogLevel.WARN);
    expect(parseLogLevel('silent')).toBe(LogLevel.SILENT);
  });

  it('returns null for missing or unknown names', () => {
    expect(parseLogLevel(undefined)).toBeNull();
    expect(parseLogLevel('')).toBeNull();
    expect(parseLogLevel('verbose')).toBeNull();
  });
});

describe('createLogger()', () => {
  let previous: LogLevel;
  const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
  const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

  beforeEach(() => {
    previous = getLogLevel();
    logSpy.mockClear();
    warnSpy.mockClear();
    errorSpy.mockClear();
  });

  afterEach(() => {
    setLogLevel(previous);
  });

  it('prefixes messages with a timestamp and scope', () => {
    setLogLevel(LogLevel.INFO);
    createLogger('Scan').info('hello');
    expect(logSpy).toHaveBeenCalledOnce();
    expect(logSpy.mock.calls[0][0]).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\.\d{3} \[Scan\] hello$/);
  });

  it('marks debug and trace lines', () => {
    setLogLevel(LogLevel.TRACE);
    const log = createLogger('BLE');
    log.debug('d');
    log.trace('t');
    expect(logSpy.mock.calls[0][0]).toMatch(/ \[BLE:debug\] d$/);
    expect(logSpy.mock.calls[1][0]).toMatch(/ \[BLE:trace\] t$/);
  });

  it('keeps leading newlines before the timestamp', () => {
    setLogLevel(LogLevel.INFO);
    createLogger('Sync').info('\nStopped.');
    expect(logSpy.mock.calls[0][0]).toMatch(/^\n\d{4}-.* \[Sync\] Stopped\.$/);
  });

  it('filters below the current level', () => {
    setLogLevel(LogLevel.WARN);
    const log = createLogger('X');
    log.trace('t');
    log.debug('d');
    log.info('i');
    log.warn('w');
    log.error('e');
    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledOnce();
    expect(errorSpy).toHaveBeenCalledOnce();
  });

  it('is silent at SILENT', () => {
    setLogLevel(LogLevel.SILENT);
    createLogger('X').error('e');
    expect(errorSpy).not.toHaveBeenCalled();
  });
});
