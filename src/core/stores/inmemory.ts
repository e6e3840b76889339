import { DEFAULT_RETENTION_WINDOWS, type SessionConfig } from '../../config/session.js';
import type { CarriedSlotsT } from '../../schemas/intent.js';
import { generateSessionId } from '../session_manager.js';
import type { CarriedSlotsPatch, ReleaseFn, SessionMemory, SessionMemoryOptions, Turn } from '../session_store.js';

interface Entry {
  turns: Turn[];
  slots: CarriedSlotsT;
  lastAccessedAt: number;
  pins: number;
}

function copySlots(slots: CarriedSlotsT): CarriedSlotsT {
  const out: CarriedSlotsT = { ...slots };
  if (slots.favoriteGenres) out.favoriteGenres = [...slots.favoriteGenres];
  if (slots.preferredNetworks) out.preferredNetworks = [...slots.preferredNetworks];
  return out;
}

function text(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function list(value: string[] | null | undefined): string[] | undefined {
  return value && value.length > 0 ? [...value] : undefined;
}

export function createInMemorySessionMemory(cfg: SessionConfig, opts: SessionMemoryOptions = {}): SessionMemory {
  const store = new Map<string, Entry>();
  const now = opts.now ?? Date.now;
  const ttlMs = cfg.ttlSec * 1000;
  const maxTurns = Math.max(cfg.maxTurns ?? cfg.historyWindow * DEFAULT_RETENTION_WINDOWS, cfg.historyWindow);

  let sweeper: NodeJS.Timeout | undefined;
  if (ttlMs > 0) {
    sweeper = setInterval(() => sweep(), cfg.sweepIntervalMs);
    sweeper.unref();
  }

  function isExpired(entry: Entry, at: number): boolean {
    return ttlMs > 0 && entry.pins === 0 && at - entry.lastAccessedAt > ttlMs;
  }

  function live(id: string): Entry | undefined {
    const entry = store.get(id);
    if (!entry) return undefined;
    if (isExpired(entry, now())) {
      store.delete(id);
      return undefined;
    }
    return entry;
  }

  function insert(id: string): Entry {
    const entry: Entry = { turns: [], slots: {}, lastAccessedAt: now(), pins: 0 };
    store.set(id, entry);
    enforceCapacity(id);
    return entry;
  }

  function getOrCreate(id: string): Entry {
    const entry = live(id) ?? insert(id);
    entry.lastAccessedAt = now();
    return entry;
  }

  // Least recently used unpinned sessions go first; `keep` is the one just touched.
  function enforceCapacity(keep: string): void {
    if (cfg.maxSessions <= 0 || store.size <= cfg.maxSessions) return;
    const candidates = [...store.entries()]
      .filter(([id, entry]) => id !== keep && entry.pins === 0)
      .sort((a, b) => a[1].lastAccessedAt - b[1].lastAccessedAt);
    for (const [id] of candidates) {
      if (store.size <= cfg.maxSessions) break;
      store.delete(id);
      opts.log?.debug({ sessionId: id }, 'session_evicted_capacity');
    }
  }

  function sweep(at: number = now()): number {
    let evicted = 0;
    for (const [id, entry] of store.entries()) {
      if (isExpired(entry, at)) {
        store.delete(id);
        evicted++;
      }
    }
    if (evicted > 0) opts.log?.debug({ evicted, remaining: store.size }, 'session_sweep');
    return evicted;
  }

  return {
    create(): string {
      let id = generateSessionId();
      while (store.has(id)) id = generateSessionId();
      insert(id);
      return id;
    },

    has(id: string): boolean {
      return live(id) !== undefined;
    },

    append(id: string, turn: Turn): void {
      const entry = getOrCreate(id);
      entry.turns.push(Object.freeze({ role: turn.role, content: turn.content, timestamp: turn.timestamp }));
      if (entry.turns.length > maxTurns) entry.turns.splice(0, entry.turns.length - maxTurns);
    },

    getHistory(id: string, maxTurns: number): Turn[] {
      const entry = live(id);
      if (!entry || !Number.isFinite(maxTurns) || maxTurns <= 0) return [];
      entry.lastAccessedAt = now();
      return entry.turns.slice(-Math.floor(maxTurns));
    },

    getSlots(id: string): CarriedSlotsT {
      const entry = live(id);
      return entry ? copySlots(entry.slots) : {};
    },

    setSlots(id: string, patch: CarriedSlotsPatch): void {
      const entry = getOrCreate(id);
      const next: CarriedSlotsT = { ...entry.slots };
      const lastSeriesId = text(patch.lastSeriesId);
      if (lastSeriesId) next.lastSeriesId = lastSeriesId;
      const lastSeriesTitle = text(patch.lastSeriesTitle);
      if (lastSeriesTitle) next.lastSeriesTitle = lastSeriesTitle;
      const lastGenreFilter = text(patch.lastGenreFilter);
      if (lastGenreFilter) next.lastGenreFilter = lastGenreFilter;
      const lastNetworkFilter = text(patch.lastNetworkFilter);
      if (lastNetworkFilter) next.lastNetworkFilter = lastNetworkFilter;
      const favoriteGenres = list(patch.favoriteGenres);
      if (favoriteGenres) next.favoriteGenres = favoriteGenres;
      const preferredNetworks = list(patch.preferredNetworks);
      if (preferredNetworks) next.preferredNetworks = preferredNetworks;
      entry.slots = next;
    },

    retain(id: string): ReleaseFn {
      const entry = getOrCreate(id);
      entry.pins++;
      let released = false;
      return () => {
        if (released) return;
        released = true;
        entry.pins = Math.max(0, entry.pins - 1);
        entry.lastAccessedAt = now();
      };
    },

    clear(id: string): void {
      store.delete(id);
    },

    size(): number {
      return store.size;
    },

    sweep,

    dispose(): void {
      if (sweeper) clearInterval(sweeper);
      sweeper = undefined;
      store.clear();
    },
  };
}
