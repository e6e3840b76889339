import { randomUUID } from 'node:crypto';

const MAX_SESSION_ID_LENGTH = 64;

/**
 * Generate a new session ID
 */
export function generateSessionId(): string {
  return `session_${Date.now()}_${randomUUID().slice(0, 8)}`;
}

/**
 * Trim a caller-supplied id; blank or oversized ids count as absent.
 */
export function normalizeSessionId(provided?: string | null): string | undefined {
  const id = (provided ?? '').trim();
  if (!id || id.length > MAX_SESSION_ID_LENGTH) return undefined;
  return id;
}
