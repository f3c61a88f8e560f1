/**
 * @fileoverview Unit tests for the logger helpers
 */

import { childLogger, consoleLogger, createConsoleLogger, noopLogger } from '../../../src';
import { recordingLogger } from '../../helpers/dispatch';

describe('Loggers', () => {
  let info: jest.SpyInstance;
  let warn: jest.SpyInstance;
  let debug: jest.SpyInstance;

  beforeEach(() => {
    info = jest.spyOn(console, 'info').mockImplementation(() => undefined);
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should prefix the level and omit empty metadata', () => {
    consoleLogger.info('hello');
    consoleLogger.warn('careful', { key: 'k1' });
    consoleLogger.info('quiet', {});

    expect(info).toHaveBeenNthCalledWith(1, '[INFO] hello');
    expect(warn).toHaveBeenCalledWith('[WARN] careful', { key: 'k1' });
    expect(info).toHaveBeenNthCalledWith(2, '[INFO] quiet');
  });

  it('should filter by level and name the component', () => {
    const logger = createConsoleLogger({ level: 'warn', name: 'command-bus' });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('Slow dispatch', { duration: 1500 });

    expect(debug).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[WARN] [command-bus] Slow dispatch', { duration: 1500 });
  });

  it('should bind metadata in child loggers', () => {
    const parent = recordingLogger();
    const child = childLogger(parent, { typeId: 'orders.place' });

    child.error('failed', { attempt: 2 });

    expect(parent.error).toHaveBeenCalledWith('failed', { typeId: 'orders.place', attempt: 2 });
  });

  it('should discard everything with the noop logger', () => {
    noopLogger.error('ignored');

    expect(info).not.toHaveBeenCalled();
  });
});
