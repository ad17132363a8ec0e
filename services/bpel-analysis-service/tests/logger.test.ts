/**
 * Logger Tests
 */

import { describe, it, expect, jest, afterEach } from '@jest/globals';
import { createLogger } from '../../../shared/utils';

describe('createLogger', () => {
  const originalLevel = process.env.LOG_LEVEL;
  const spyOnLog = () => jest.spyOn(console, 'log').mockImplementation(() => undefined);

  afterEach(() => {
    jest.restoreAllMocks();
    if (originalLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLevel;
    }
  });

  it('writes one JSON line per entry', () => {
    const log = spyOnLog();
    createLogger('svc', 'debug').info('hello', { n: 1 });

    expect(log).toHaveBeenCalledTimes(1);
    const line: unknown = JSON.parse(String(log.mock.calls[0][0]));
    expect(line).toMatchObject({ level: 'info', service: 'svc', message: 'hello', n: 1 });
  });

  it('filters by LOG_LEVEL', () => {
    const log = spyOnLog();
    process.env.LOG_LEVEL = 'warn';
    createLogger('svc').info('hidden');

    expect(log).not.toHaveBeenCalled();
  });

  it('falls back to info for unknown levels, including inherited object keys', () => {
    const log = spyOnLog();
    for (const level of ['verbose', 'toString', 'constructor']) {
      process.env.LOG_LEVEL = level;
      const logger = createLogger('svc');
      logger.debug('hidden');
      logger.info('shown');
    }

    expect(log).toHaveBeenCalledTimes(3);
  });
});
