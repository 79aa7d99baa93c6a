/**
 * Unit tests for the structured logger
 */

import { LogLevel, Logger } from '../logger';

describe('Logger', () => {
  let consoleLog: jest.SpyInstance;
  let consoleWarn: jest.SpyInstance;

  beforeEach(() => {
    consoleLog = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    consoleWarn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    consoleLog.mockRestore();
    consoleWarn.mockRestore();
  });

  it('should drop entries below the minimum level', () => {
    const logger = new Logger();

    logger.debug('hidden');
    logger.info('shown');

    expect(logger.getRecentEntries().map((e) => e.message)).toEqual(['shown']);
    expect(consoleLog).toHaveBeenCalledTimes(1);
  });

  it('should format the level, instance id and context', () => {
    const logger = new Logger();

    logger.child('A').warn('Low fund', { fund: 5 });

    expect(consoleWarn).toHaveBeenCalledWith(expect.stringMatching(/ WARN \[A\] Low fund \{"fund":5\}$/));
  });

  it('should share level and buffer with child loggers', () => {
    const logger = new Logger();
    const child = logger.child('A');
    const grandchild = child.child('B');

    logger.setLevel(LogLevel.WARN);
    child.info('hidden');
    grandchild.warn('kept');

    const entries = child.getRecentEntries();
    expect(entries).toHaveLength(1);
    expect(entries[0].instanceId).toBe('B');
    expect(entries[0].level).toBe(LogLevel.WARN);
  });
});
