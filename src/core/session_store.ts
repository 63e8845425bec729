import type { SessionConfig } from '../config/session.js';
import type { PartialSlots, TripSlots } from './slots.js';
import { createInMemoryStore } from './stores/inmemory.js';

export interface Session {
  userId: string;
  slots: TripSlots;
  updatedAt: number;
}

/**
 * Per-user trip-preference sessions. Every operation is serialized per user
 * id and returns a snapshot copy. A session idle for longer than the TTL is
 * cleared on its next access.
 */
export interface SessionStore {
  /** Creates or returns the user's session. */
  get(userId: string): Promise<Session>;
  /** Merges non-empty values and returns the merged session. */
  update(userId: string, patch: PartialSlots): Promise<Session>;
  /** Clears every slot; no-op for an unknown user. */
  reset(userId: string): Promise<void>;
  size(): number;
}

export interface StoreOptions {
  now?: () => number;
}

export function createStore(cfg: SessionConfig, opts: StoreOptions = {}): SessionStore {
  return createInMemoryStore(cfg, opts);
}
