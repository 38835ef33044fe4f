import { describe, it, expect } from '@jest/globals';
import { Logger } from '@/utils/logger';
import { createTestConfig } from '../helpers/fixtures';

describe('Logger', () => {
  it('is a process-wide singleton', () => {
    const config = createTestConfig();

    expect(Logger.getInstance(config)).toBe(Logger.getInstance(config));
  });

  it('accepts structured metadata at every level', () => {
    const logger = Logger.getInstance(createTestConfig());

    expect(() => {
      logger.debug('debug line', { method: 'getblockcount' });
      logger.info('info line');
    }).not.toThrow();
  });
});
