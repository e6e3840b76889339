import { z } from 'zod';

// Stored turns per session when SESSION_MAX_TURNS is unset, as a multiple of the window.
export const DEFAULT_RETENTION_WINDOWS = 5;

const SessionConfigSchema = z
  .object({
    historyWindow: z.coerce.number().int().min(1).default(10),
    maxTurns: z.coerce.number().int().min(1).optional(),
    ttlSec: z.coerce.number().int().min(0).default(86400),
    maxSessions: z.coerce.number().int().min(0).default(1000),
    sweepIntervalMs: z.coerce.number().int().min(1000).default(60_000),
  })
  .transform((cfg) => ({
    ...cfg,
    maxTurns: Math.max(cfg.maxTurns ?? cfg.historyWindow * DEFAULT_RETENTION_WINDOWS, cfg.historyWindow),
  }));

export interface SessionConfig {
  historyWindow: number;
  /** Turns kept per session; older ones are dropped on append. Never below `historyWindow`. */
  maxTurns?: number;
  ttlSec: number;
  maxSessions: number;
  sweepIntervalMs: number;
}

/**
 * `ttlSec` and `maxSessions` of 0 disable the corresponding eviction policy.
 */
export function loadSessionConfig(): SessionConfig {
  return SessionConfigSchema.parse({
    historyWindow: process.env.SESSION_HISTORY_WINDOW || undefined,
    maxTurns: process.env.SESSION_MAX_TURNS || undefined,
    ttlSec: process.env.SESSION_TTL_SEC || undefined,
    maxSessions: process.env.SESSION_MAX_SESSIONS || undefined,
    sweepIntervalMs: process.env.SESSION_SWEEP_INTERVAL_MS || undefined,
  });
}
