import { describe, expect, it } from '@jest/globals';
import { createCallbackDispatcher, runCallbackJob, type CallbackJob } from '../../../src/core/callback_dispatcher.js';
import { simpleText } from '../../../src/core/composers.js';
import { fakeLlm, fakeSender, never, testLog } from '../../helpers/fakes.js';

const CB_URL = 'https://callback.test/cb?token=test-token';

const job = (patch: Partial<CallbackJob> = {}): CallbackJob => ({
  userId: 'u1',
  utterance: '커플',
  draft: 'DRAFT',
  callbackUrl: CB_URL,
  deadline: Date.now() + 50,
  ...patch,
});

function deps(llm = fakeLlm(), sender = fakeSender()) {
  return { llm, sender, system: 'SYSTEM', cfg: { concurrency: 2, retryDelayMs: 1 }, log: testLog };
}

describe('runCallbackJob', () => {
  it('posts the refined text', async () => {
    const d = deps();
    d.llm.complete.mockResolvedValue('REFINED');
    const out = await runCallbackJob(job(), d);

    expect(out).toEqual({ delivered: true, refined: true, text: 'REFINED' });
    expect(d.llm.complete).toHaveBeenCalledWith(
      { system: 'SYSTEM', user: '커플', draft: 'DRAFT', maxTokens: undefined },
      expect.any(AbortSignal),
    );
    expect(d.sender.send).toHaveBeenCalledWith(CB_URL, simpleText('REFINED'));
  });

  it('posts the draft when refinement exceeds the budget', async () => {
    const d = deps();
    d.llm.complete.mockImplementation(() => never<string>());
    const out = await runCallbackJob(job({ deadline: Date.now() + 20 }), d);

    expect(out).toEqual({ delivered: true, refined: false, text: 'DRAFT' });
    expect(d.sender.send).toHaveBeenCalledWith(CB_URL, simpleText('DRAFT'));
  });

  it('posts the draft without asking the model once the deadline has passed', async () => {
    const d = deps();
    const out = await runCallbackJob(job({ deadline: Date.now() - 1 }), d);

    expect(out).toEqual({ delivered: true, refined: false, text: 'DRAFT' });
    expect(d.llm.complete).not.toHaveBeenCalled();
    expect(d.sender.send).toHaveBeenCalledWith(CB_URL, simpleText('DRAFT'));
  });

  it('posts the draft when the model errors', async () => {
    const d = deps();
    d.llm.complete.mockRejectedValue(new Error('HTTP_500'));
    const out = await runCallbackJob(job(), d);
    expect(out.text).toBe('DRAFT');
    expect(out.delivered).toBe(true);
  });

  it('skips the model when it is disabled', async () => {
    const d = deps(fakeLlm(false));
    await runCallbackJob(job(), d);
    expect(d.llm.complete).not.toHaveBeenCalled();
    expect(d.sender.send).toHaveBeenCalledWith(CB_URL, simpleText('DRAFT'));
  });

  it('retries a failed POST exactly once', async () => {
    const d = deps(fakeLlm(false));
    d.sender.send.mockRejectedValueOnce(new Error('HTTP_502'));
    const out = await runCallbackJob(job(), d);
    expect(out.delivered).toBe(true);
    expect(d.sender.send).toHaveBeenCalledTimes(2);
  });

  it('gives up after the retry without throwing', async () => {
    const d = deps(fakeLlm(false));
    d.sender.send.mockRejectedValue(new Error('network_error'));
    const out = await runCallbackJob(job(), d);
    expect(out).toEqual({ delivered: false, refined: false, text: 'DRAFT' });
    expect(d.sender.send).toHaveBeenCalledTimes(2);
  });
});

describe('createCallbackDispatcher', () => {
  it('runs queued jobs in the background and drains on idle', async () => {
    const d = deps();
    d.llm.complete.mockResolvedValue('REFINED');
    const dispatcher = createCallbackDispatcher(d);

    dispatcher.enqueue(job({ userId: 'a' }));
    dispatcher.enqueue(job({ userId: 'b', callbackUrl: 'https://callback.test/other' }));
    expect(dispatcher.pending()).toBe(2);

    await dispatcher.onIdle();
    expect(dispatcher.pending()).toBe(0);
    expect(d.sender.send).toHaveBeenCalledTimes(2);
    expect(d.sender.send).toHaveBeenCalledWith('https://callback.test/other', simpleText('REFINED'));
  });

  it('counts time spent in the queue against each job deadline', async () => {
    const d = { ...deps(), cfg: { concurrency: 1, retryDelayMs: 1 } };
    d.llm.complete.mockImplementation(() => never<string>());
    const postedAt: number[] = [];
    d.sender.send.mockImplementation(async () => {
      postedAt.push(Date.now());
    });
    const dispatcher = createCallbackDispatcher(d);

    const enqueuedAt = Date.now();
    const deadline = enqueuedAt + 150;
    for (const userId of ['a', 'b', 'c']) dispatcher.enqueue(job({ userId, deadline }));
    await dispatcher.onIdle();

    expect(postedAt).toHaveLength(3);
    // Without a shared deadline the third post would land near 450ms.
    for (const t of postedAt) expect(t - enqueuedAt).toBeLessThan(260);
  });
});
