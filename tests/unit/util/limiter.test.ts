import { describe, expect, it, jest } from '@jest/globals';
import { getLimiter, getAllLimiterStats, scheduleWithLimit } from '../../../src/util/limiter.js';

describe('Limiter', () => {
  it('should reuse limiter for same host', () => {
    expect(getLimiter('openapi.naver.com')).toBe(getLimiter('openapi.naver.com'));
  });

  it('should execute function with rate limiting', async () => {
    const testFn = jest.fn<() => Promise<string>>().mockResolvedValue('result');
    await expect(scheduleWithLimit('api.search.brave.com', testFn)).resolves.toBe('result');
    expect(testFn).toHaveBeenCalledTimes(1);
  });

  it('should report idle stats per host', () => {
    getLimiter('stats.test');
    expect(getAllLimiterStats()['stats.test']).toEqual({ queued: 0, running: 0 });
  });

  it('should not list hosts that never made a request', () => {
    expect(getAllLimiterStats()['non-existent.test']).toBeUndefined();
  });
});
