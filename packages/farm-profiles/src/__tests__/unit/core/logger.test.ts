/**
 * Logger Tests
 */

import { describe, it, expect, vi, afterEach, beforeEach } from 'vitest';
import { Logger, createLogger } from '../../../core/utils/logger.js';

describe('Logger', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-03-01T12:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it('writes a readable line in pretty mode', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = new Logger({ level: 'debug', service: 'farm-profiles:test', pretty: true });

    logger.warn('Progress callback failed', { index: 0 });

    expect(warn).toHaveBeenCalledWith(
      '[2024-03-01T12:00:00.000Z] WARN farm-profiles:test: Progress callback failed {"index":0}'
    );
  });

  it('writes JSON lines otherwise', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const logger = new Logger({ level: 'debug', service: 'farm-profiles:test', pretty: false });

    logger.info('Bulk create started', { items: 2 });

    expect(info).toHaveBeenCalledWith(
      '{"timestamp":"2024-03-01T12:00:00.000Z","level":"info","service":"farm-profiles:test","message":"Bulk create started","items":2}'
    );
  });

  it('reads LOG_LEVEL on every call when no level is fixed', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const logger = createLogger('test');

    vi.stubEnv('LOG_LEVEL', 'info');
    logger.debug('hidden');
    vi.stubEnv('LOG_LEVEL', 'debug');
    logger.debug('shown');

    expect(debug).toHaveBeenCalledTimes(1);
  });
});
