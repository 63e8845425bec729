import { describe, expect, it } from '@jest/globals';
import { createLogger } from '../../../src/util/logging.js';

describe('Logging', () => {
  it('should take its level from LOG_LEVEL', () => {
    const original = process.env.LOG_LEVEL;
    process.env.LOG_LEVEL = 'warn';
    try {
      expect(createLogger().level).toBe('warn');
    } finally {
      process.env.LOG_LEVEL = original;
    }
  });

  it('should bind the service name and extra bindings', () => {
    const logger = createLogger({ mode: 'test' });
    expect(logger.bindings()).toMatchObject({ service: 'jeju-trip-skill', mode: 'test' });
  });

  it('should log objects with PII without throwing', () => {
    const logger = createLogger();
    expect(() => {
      logger.info({ callbackUrl: 'https://x.test/cb?token=abc' }, 'Callback delivered');
      logger.error({ err: new Error('boom') }, 'failed');
    }).not.toThrow();
  });
});
