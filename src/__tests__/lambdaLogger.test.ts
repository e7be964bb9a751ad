import { afterEach, describe, expect, it, vi } from 'vitest';

import { LambdaLogger, getLambdaLogLevel, setLambdaLogLevel } from '../lambdaLogger';

describe('LambdaLogger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('logs from INFO up when no level is set', () => {
    vi.stubEnv('AWS_LAMBDA_LOG_LEVEL', '');
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);

    const logger = new LambdaLogger();
    logger.debug('hidden');
    logger.info('shown', { n: 1 });

    expect(getLambdaLogLevel()).toBe('INFO');
    expect(debug).not.toHaveBeenCalled();
    expect(info).toHaveBeenCalledWith({ summary: 'shown', n: 1 });
  });

  it('follows the level of the function', () => {
    vi.stubEnv('AWS_LAMBDA_LOG_LEVEL', 'warn');
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const error = new Error('careful');

    const logger = new LambdaLogger();
    logger.info('hidden');
    logger.warn('shown', error, { n: 2 });

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith({ summary: 'shown', n: 2, error });
  });

  it('prints nothing at FATAL', () => {
    vi.stubEnv('AWS_LAMBDA_LOG_LEVEL', 'INFO');
    setLambdaLogLevel('FATAL');
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    new LambdaLogger().error('hidden', new Error('x'));

    expect(consoleError).not.toHaveBeenCalled();
  });

  it('ignores unknown levels', () => {
    vi.stubEnv('AWS_LAMBDA_LOG_LEVEL', 'constructor');

    expect(getLambdaLogLevel()).toBe('INFO');
  });
});
