import type { SessionConfig } from '../config/session.js';
import type { CarriedSlotsT } from '../schemas/intent.js';
import type { Logger } from '../util/logging.js';
import { createInMemorySessionMemory } from './stores/inmemory.js';

export type TurnRole = 'user' | 'assistant';

export type Turn = Readonly<{ role: TurnRole; content: string; timestamp: number }>;

export type CarriedSlotsPatch = { [K in keyof CarriedSlotsT]?: CarriedSlotsT[K] | null };

/** Releases a pin taken with {@link SessionMemory.retain}. Safe to call twice. */
export type ReleaseFn = () => void;

/**
 * Per-session turn history and carried slots.
 *
 * Only the orchestrator writes to it, and only from inside the session's
 * exclusive region. `append` and `setSlots` create an unknown session on the fly
 * as a fallback; callers are expected to `create()` first.
 */
export interface SessionMemory {
  create(): string;
  has(sessionId: string): boolean;
  append(sessionId: string, turn: Turn): void;
  /** Most recent `maxTurns` turns, oldest first. */
  getHistory(sessionId: string, maxTurns: number): Turn[];
  getSlots(sessionId: string): CarriedSlotsT;
  /** Merges `patch`; null, undefined, blank and empty-list values never overwrite. */
  setSlots(sessionId: string, patch: CarriedSlotsPatch): void;
  /** Pins the session so eviction skips it until released. */
  retain(sessionId: string): ReleaseFn;
  clear(sessionId: string): void;
  size(): number;
  /** Applies the age policy now; returns the number of evicted sessions. */
  sweep(now?: number): number;
  dispose(): void;
}

export interface SessionMemoryOptions {
  now?: () => number;
  log?: Logger;
}

export function createSessionMemory(cfg: SessionConfig, opts: SessionMemoryOptions = {}): SessionMemory {
  return createInMemorySessionMemory(cfg, opts);
}
