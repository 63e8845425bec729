import { beforeEach, describe, expect, it } from '@jest/globals';
import { createStore, type SessionStore } from '../../../src/core/session_store.js';
import { emptySlots, extractSlots } from '../../../src/core/slots.js';

describe('SessionStore (in-memory)', () => {
  let t: number;
  let store: SessionStore;

  beforeEach(() => {
    t = 1_000_000;
    store = createStore({ ttlSec: 60, maxEntries: 100 }, { now: () => t });
  });

  it('creates an empty session on first read', async () => {
    const s = await store.get('u1');
    expect(s).toEqual({ userId: 'u1', slots: emptySlots(), updatedAt: 1_000_000 });
    expect(store.size()).toBe(1);
  });

  it('merges updates and returns the merged session', async () => {
    await store.update('u1', { nights: '2' });
    t += 1000;
    const s = await store.update('u1', { lodging: '호텔' });
    expect(s.slots).toEqual({ ...emptySlots(), nights: '2', lodging: '호텔' });
    expect(s.updatedAt).toBe(1_001_000);
  });

  it('leaves a session unchanged when merging unrecognised text', async () => {
    const before = await store.update('u1', { nights: '2', vibe: '바다·해변' });
    const after = await store.update('u1', extractSlots('음 글쎄요'));
    expect(after.slots).toEqual(before.slots);
  });

  it('returns copies that do not alias the stored session', async () => {
    const s = await store.update('u1', { nights: '2' });
    s.slots.nights = '9';
    expect((await store.get('u1')).slots.nights).toBe('2');
  });

  it('clears a stale session on its next read', async () => {
    await store.update('u1', { nights: '2' });
    t += 60_000;
    expect((await store.get('u1')).slots.nights).toBe('2');
    t += 1;
    const s = await store.get('u1');
    expect(s.slots).toEqual(emptySlots());
    expect(s.updatedAt).toBe(1_060_001);
  });

  it('resets every slot, and is a no-op for unknown users', async () => {
    await store.reset('nobody');
    expect(store.size()).toBe(0);

    await store.update('u1', { nights: '2', group: '커플' });
    await store.reset('u1');
    expect((await store.get('u1')).slots).toEqual(emptySlots());
  });

  it('evicts the least recently updated session at capacity', async () => {
    const small = createStore({ ttlSec: 60, maxEntries: 2 }, { now: () => t });
    await small.update('a', { nights: '1' });
    await small.update('b', { nights: '2' });
    await small.update('a', { lodging: '호텔' });
    await small.update('c', { nights: '3' });

    expect(small.size()).toBe(2);
    expect((await small.get('a')).slots.lodging).toBe('호텔');
    expect((await small.get('b')).slots.nights).toBeUndefined();
  });

  it('serializes concurrent updates for one user', async () => {
    const results = await Promise.all([
      store.update('u1', { nights: '2' }),
      store.update('u1', { lodging: '호텔' }),
      store.update('u1', { vibe: '산·자연' }),
    ]);
    expect(results[2]?.slots).toEqual({ ...emptySlots(), nights: '2', lodging: '호텔', vibe: '산·자연' });
  });
});
