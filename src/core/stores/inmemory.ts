import Bottleneck from 'bottleneck';
import type { SessionConfig } from '../../config/session.js';
import { emptySlots, mergeSlots, type PartialSlots, type TripSlots } from '../slots.js';
import type { Session, SessionStore, StoreOptions } from '../session_store.js';

interface Entry {
  slots: TripSlots;
  updatedAt: number;
}

export function createInMemoryStore(cfg: SessionConfig, opts: StoreOptions = {}): SessionStore {
  // Map order doubles as recency order: entries are re-inserted when touched.
  const store = new Map<string, Entry>();
  const ttlMs = cfg.ttlSec * 1000;
  const now = opts.now ?? Date.now;

  // One single-slot queue per user id; different users never wait on each other.
  const queues = new Bottleneck.Group({ maxConcurrent: 1 });

  function serialized<T>(id: string, fn: () => T): Promise<T> {
    return queues.key(id).schedule(async () => fn());
  }

  function touch(id: string, entry: Entry): void {
    entry.updatedAt = now();
    store.delete(id);
    store.set(id, entry);
  }

  function insert(id: string): Entry {
    while (store.size >= cfg.maxEntries) {
      const oldest = store.keys().next();
      if (oldest.done) break;
      store.delete(oldest.value);
    }
    const fresh: Entry = { slots: emptySlots(), updatedAt: now() };
    store.set(id, fresh);
    return fresh;
  }

  function getEntry(id: string): Entry {
    const entry = store.get(id);
    if (!entry) return insert(id);
    if (now() - entry.updatedAt > ttlMs) {
      entry.slots = emptySlots();
      touch(id, entry);
    }
    return entry;
  }

  const snapshot = (id: string, entry: Entry): Session => ({
    userId: id,
    slots: { ...entry.slots },
    updatedAt: entry.updatedAt,
  });

  return {
    async get(id: string): Promise<Session> {
      return serialized(id, () => snapshot(id, getEntry(id)));
    },

    async update(id: string, patch: PartialSlots): Promise<Session> {
      return serialized(id, () => {
        const entry = getEntry(id);
        entry.slots = mergeSlots(entry.slots, patch);
        touch(id, entry);
        return snapshot(id, entry);
      });
    },

    async reset(id: string): Promise<void> {
      await serialized(id, () => {
        const entry = store.get(id);
        if (!entry) return;
        entry.slots = emptySlots();
        touch(id, entry);
      });
    },

    size(): number {
      return store.size;
    },
  };
}
