import pino from 'pino';
import { scrubMessage, scrubSecrets } from './redact.js';

export type Logger = pino.Logger;

/**
 * Creates a pino logger with secret redaction unless LOG_LEVEL=debug.
 */
export function createLogger(bindings?: Record<string, unknown>): Logger {
  const level = process.env.LOG_LEVEL ?? 'info';
  const redactEnabled = level !== 'debug';

  const log = pino({
    level,
    base: bindings ?? null,
    hooks: {
      logMethod(args, method) {
        const scrubbed = args.map((a: unknown) =>
          typeof a === 'string' ? scrubMessage(a, redactEnabled) : scrubSecrets(a, redactEnabled),
        );
        Reflect.apply(method, this, scrubbed);
      },
    },
  });
  return log;
}

/**
 * Logger that drops everything. Handy for wiring components in tests and scripts.
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
