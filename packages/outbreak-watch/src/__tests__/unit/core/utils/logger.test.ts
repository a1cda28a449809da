import { describe, it, expect, vi, afterEach } from 'vitest';
import { Logger } from '../../../../core/utils/logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should drop entries below the configured level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const log = new Logger({ level: 'warn', service: 'test', pretty: false });

    log.debug('hidden');
    log.warn('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should merge child context into JSON entries', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const log = new Logger({
      level: 'debug',
      service: 'test',
      pretty: false,
      context: { module: 'store' },
    }).child({ subscriberId: 'alice' });

    log.error('write failed', { attempt: 2 });

    const entry: unknown = JSON.parse(String(error.mock.calls[0]?.[0]));
    expect(entry).toMatchObject({
      level: 'error',
      service: 'test',
      message: 'write failed',
      module: 'store',
      subscriberId: 'alice',
      attempt: 2,
    });
  });

  it('should print a single line in pretty mode', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const log = new Logger({ level: 'info', service: 'test', pretty: true });

    log.info('ready');

    expect(String(info.mock.calls[0]?.[0])).toMatch(/^\[.+\] INFO test: ready$/);
  });
});
