/**
 * Tests for the leveled console logger
 */

import { LogLevel, Logger } from '../src/utils/logger';

describe('Logger', () => {
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should drop messages below the minimum level', () => {
    const log = new Logger({ minLevel: LogLevel.WARN });

    log.info('not shown');
    log.debug('not shown either');

    expect(logSpy).not.toHaveBeenCalled();
  });

  it('should prefix child loggers with their scope', () => {
    const log = new Logger({ minLevel: LogLevel.DEBUG }).child('smtp').child('probe');

    log.info('connected');

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy.mock.calls[0][0]).toMatch(/^\[[^\]]+\] \[INFO\] \[smtp:probe\] connected$/);
  });

  it('should share the level between a logger and its children', () => {
    const root = new Logger({ minLevel: LogLevel.DEBUG });
    const child = root.child('dns');

    root.setMinLevel(LogLevel.ERROR);
    child.info('hidden');

    expect(child.getMinLevel()).toBe(LogLevel.ERROR);
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('should print error name and message as metadata', () => {
    const log = new Logger({ minLevel: LogLevel.DEBUG });

    log.error('refresh failed', new TypeError('bad list'));

    const output: string = errorSpy.mock.calls[0][0];
    expect(output).toContain('[ERROR] refresh failed\n');
    expect(output).toContain('"name": "TypeError"');
    expect(output).toContain('"message": "bad list"');
  });

  it('should append object metadata as JSON', () => {
    const log = new Logger({ minLevel: LogLevel.DEBUG });

    log.info('done', { count: 2 });

    expect(logSpy.mock.calls[0][0]).toMatch(/\[INFO\] done\n\{\n {2}"count": 2\n\}$/);
  });
});
