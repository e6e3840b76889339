/**
 * Redaction utilities for logs. Masks credentials that can leak through request
 * bodies, headers or error messages from the catalog and LLM providers.
 * Redaction is off when LOG_LEVEL=debug.
 */

const SECRET_KEYS = new Set(['apikey', 'api_key', 'pin', 'token', 'authorization', 'password', 'secret']);

function scrubString(input: string): string {
  let out = input;
  // Authorization headers copied into messages
  out = out.replace(/\bBearer\s+[A-Za-z0-9\-._~+/]+=*/g, 'Bearer [REDACTED]');
  // Inline JSON credentials such as {"apikey":"..."}
  out = out.replace(
    /("(?:apikey|api_key|pin|token|password)"\s*:\s*")[^"]*(")/gi,
    '$1[REDACTED]$2',
  );
  // OpenAI-style secret keys
  out = out.replace(/\bsk-[A-Za-z0-9_-]{8,}\b/g, '[REDACTED_KEY]');
  return out;
}

function scrubDeep(value: unknown, seen = new WeakSet<object>()): unknown {
  if (typeof value === 'string') return scrubString(value);
  if (typeof value !== 'object' || value === null) return value;
  if (value instanceof Error) {
    return { type: value.name, message: scrubString(value.message) };
  }
  if (seen.has(value)) return value;
  seen.add(value);
  if (Array.isArray(value)) {
    return value.map((v) => scrubDeep(v, seen));
  }
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    out[k] = SECRET_KEYS.has(k.toLowerCase()) ? '[REDACTED]' : scrubDeep(v, seen);
  }
  return out;
}

/**
 * Scrub credential-like patterns from a log argument.
 */
export function scrubSecrets(arg: unknown, enabled: boolean): unknown {
  if (!enabled) return arg;
  return scrubDeep(arg);
}

/**
 * Convenience for messages.
 */
export function scrubMessage(msg: string, enabled: boolean): string {
  return enabled ? scrubString(msg) : msg;
}
