// logger.test.ts - Unit tests for the console logger
//
// Copyright 2026 baaaht project

import { describe, it, expect, afterEach, jest } from '@jest/globals';
import { ConsoleLogger, isLogLevel, levelFromEnv } from '../../src/logger.js';

describe('ConsoleLogger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should prefix lines and serialize metadata', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new ConsoleLogger('worker', 'info');

    logger.info('started', { pending: 2 });

    expect(log).toHaveBeenCalledWith('[worker] [INFO] started', '{"pending":2}');
  });

  it('should pass an empty string when there is no metadata', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = new ConsoleLogger('worker', 'info');

    logger.warn('slow');

    expect(warn).toHaveBeenCalledWith('[worker] [WARN] slow', '');
  });

  it('should drop messages below the minimum level', () => {
    const debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new ConsoleLogger('worker', 'error');

    logger.debug('hidden');
    logger.info('hidden');
    logger.error('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('[worker] [ERROR] shown', '');
  });

  it('should emit debug lines at debug level', () => {
    const debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    const logger = new ConsoleLogger('worker', 'debug');

    logger.debug('details');

    expect(debug).toHaveBeenCalledWith('[worker] [DEBUG] details', '');
  });
});

describe('levelFromEnv', () => {
  it('should read LOG_LEVEL case-insensitively', () => {
    expect(levelFromEnv({ LOG_LEVEL: 'DEBUG' })).toBe('debug');
    expect(levelFromEnv({ LOG_LEVEL: 'warn' })).toBe('warn');
  });

  it('should fall back to info', () => {
    expect(levelFromEnv({})).toBe('info');
    expect(levelFromEnv({ LOG_LEVEL: 'verbose' })).toBe('info');
  });
});

describe('isLogLevel', () => {
  it('should recognize the four levels', () => {
    expect(isLogLevel('error')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
  });
});
