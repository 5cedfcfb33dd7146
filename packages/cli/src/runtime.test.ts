import { describe, it, expect, afterEach, vi } from 'vitest';
import { defaultConfig } from '@recall/shared';
import { createLogger } from './runtime';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('applies the configured level when logging to a file', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const config = defaultConfig();
    config.logging = { level: 'warn', jsonlPath: '/dev/null' };

    const logger = createLogger(config).child({ component: 'indexing' });
    logger.debug('Corpus rebuilt: 3 documents');
    logger.warn('1 message failed');

    expect(debugSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith('[component=indexing] 1 message failed');
  });

  it('applies the configured level on the console', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const config = defaultConfig();
    config.logging = { level: 'error' };

    createLogger(config).info('hidden');

    expect(infoSpy).not.toHaveBeenCalled();
  });
});
