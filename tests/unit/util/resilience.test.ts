import { describe, expect, it, jest } from '@jest/globals';
import { boundedAttempt, isBreakerOpen, retryOnce, withBreaker } from '../../../src/util/resilience.js';
import { never } from '../../helpers/fakes.js';

describe('boundedAttempt', () => {
  it('returns the value when the task finishes in time', async () => {
    await expect(boundedAttempt(async () => 'done', 200)).resolves.toEqual({ ok: true, value: 'done' });
  });

  it('reports a timeout and aborts the task signal', async () => {
    let seen: AbortSignal | undefined;
    const res = await boundedAttempt((signal) => {
      seen = signal;
      return never<string>();
    }, 20);
    expect(res).toEqual({ ok: false, reason: 'timeout' });
    expect(seen?.aborted).toBe(true);
  });

  it('reports task errors without rejecting', async () => {
    const boom = new Error('boom');
    const res = await boundedAttempt(async () => {
      throw boom;
    }, 200);
    expect(res).toEqual({ ok: false, reason: 'error', error: boom });
  });
});

describe('retryOnce', () => {
  it('retries a failure once', async () => {
    const fn = jest.fn<() => Promise<string>>().mockRejectedValueOnce(new Error('first')).mockResolvedValueOnce('ok');
    await expect(retryOnce(fn, 1)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('gives up after the second failure', async () => {
    const fn = jest.fn<() => Promise<string>>().mockRejectedValue(new Error('down'));
    await expect(retryOnce(fn, 1)).rejects.toThrow('down');
    expect(fn).toHaveBeenCalledTimes(2);
  });
});

describe('withBreaker', () => {
  it('passes results through while closed', async () => {
    await expect(withBreaker('unit-test', async () => 42)).resolves.toBe(42);
    expect(isBreakerOpen(new Error('x'))).toBe(false);
  });
});
