import { afterEach, describe, expect, it, jest } from '@jest/globals';
import { ExternalFetchError, postJSON } from '../../../src/util/fetch.js';
import * as limiter from '../../../src/util/limiter.js';

describe('postJSON', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('schedules the POST on the target host pool', async () => {
    const schedule = jest
      .spyOn(limiter, 'scheduleWithLimit')
      .mockRejectedValue(new ExternalFetchError('network', 'network_error'));

    await expect(postJSON('https://callback.test/cb?token=test-token', { ok: true })).rejects.toThrow('network_error');
    expect(schedule).toHaveBeenCalledWith('callback.test', expect.any(Function));
  });

  it('rejects an invalid URL before scheduling', async () => {
    const schedule = jest.spyOn(limiter, 'scheduleWithLimit');
    await expect(postJSON('not a url', {})).rejects.toThrow('invalid_url');
    expect(schedule).not.toHaveBeenCalled();
  });
});
