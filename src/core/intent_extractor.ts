import { Intent, RawExtraction, type IntentT, type SlotSetT } from '../schemas/intent.js';
import type { Logger } from '../util/logging.js';
import { isTimeoutError, withTimeout } from '../util/resilience.js';
import { safeExtractJson, type LlmClient } from './llm.js';
import { getPrompt, renderPrompt } from './prompts.js';
import type { Turn } from './session_store.js';

export interface IntentExtraction {
  intent: IntentT;
  slots: SlotSetT;
  confidence: number;
  /** Set when the result is a fallback rather than the model's answer. */
  failure?: 'llm' | 'parse';
}

/**
 * The model answered, but not with something the dispatcher can trust.
 * Never leaves this module.
 */
export class IntentParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IntentParseError';
  }
}

const PLACEHOLDERS = new Set(['', 'null', 'none', 'unknown', 'n/a', 'na', 'undefined', '-']);
const MIN_YEAR = 1900;
const MAX_YEAR = 2100;
const DEFAULT_CONFIDENCE = 0.5;

function fallback(failure: 'llm' | 'parse'): IntentExtraction {
  return { intent: 'UNKNOWN', slots: {}, confidence: 0, failure };
}

function cleanText(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim().replace(/^["'“”‘’]+|["'“”‘’]+$/g, '').trim();
  return PLACEHOLDERS.has(trimmed.toLowerCase()) ? undefined : trimmed;
}

function cleanYear(value: unknown): number | undefined {
  const n = typeof value === 'number' ? value : typeof value === 'string' ? Number(value.trim()) : Number.NaN;
  if (!Number.isInteger(n) || n < MIN_YEAR || n > MAX_YEAR) return undefined;
  return n;
}

export function normalizeSlots(raw: Record<string, unknown>): SlotSetT {
  const slots: SlotSetT = {};
  const title = cleanText(raw.title);
  if (title) slots.title = title;
  const genre = cleanText(raw.genre);
  if (genre) slots.genre = genre;
  const network = cleanText(raw.network);
  if (network) slots.network = network;
  const year = cleanYear(raw.year);
  if (year !== undefined) slots.year = year;
  return slots;
}

export function normalizeConfidence(value: unknown): number {
  const n = typeof value === 'number' ? value : typeof value === 'string' ? Number.parseFloat(value) : Number.NaN;
  if (!Number.isFinite(n)) return DEFAULT_CONFIDENCE;
  return Math.min(1, Math.max(0, n));
}

/**
 * Validates the model's structured reply. Throws {@link IntentParseError} for
 * anything outside the closed intent set or the expected shape.
 */
export function parseIntentResponse(raw: string): IntentExtraction {
  const json = safeExtractJson(raw);
  if (json === undefined) throw new IntentParseError('no_json_object');
  const parsed = RawExtraction.safeParse(json);
  if (!parsed.success) throw new IntentParseError('unexpected_shape');
  const intent = Intent.safeParse(parsed.data.intent.trim().toUpperCase());
  if (!intent.success) throw new IntentParseError(`unknown_intent:${parsed.data.intent.slice(0, 40)}`);
  return {
    intent: intent.data,
    slots: intent.data === 'UNKNOWN' ? {} : normalizeSlots(parsed.data.slots ?? {}),
    confidence: normalizeConfidence(parsed.data.confidence),
  };
}

export function formatHistory(history: readonly Turn[]): string {
  if (history.length === 0) return '(no earlier messages)';
  return history
    .map((t) => `${t.role === 'user' ? 'User' : 'Assistant'}: ${t.content}`)
    .join('\n');
}

/**
 * One LLM call per turn, mapped onto the closed intent set. Never rejects: a
 * failed or slow call yields UNKNOWN with `failure: 'llm'`, a malformed answer
 * UNKNOWN with `failure: 'parse'`.
 */
export class IntentExtractor {
  constructor(
    private readonly llm: LlmClient,
    private readonly log: Logger,
    private readonly opts: { timeoutMs: number },
  ) {}

  async extract(history: readonly Turn[], latestMessage: string): Promise<IntentExtraction> {
    let raw: string;
    try {
      const template = await getPrompt('intent_extractor');
      const prompt = renderPrompt(template, { history: formatHistory(history), message: latestMessage });
      raw = await withTimeout(this.opts.timeoutMs, (signal) =>
        this.llm.complete(prompt, { responseFormat: 'json', signal }),
      );
    } catch (error) {
      this.log.warn({ err: error, timeout: isTimeoutError(error) }, 'intent_llm_failed');
      return fallback('llm');
    }

    try {
      const result = parseIntentResponse(raw);
      this.log.debug({ intent: result.intent, slots: result.slots, confidence: result.confidence }, 'intent_extracted');
      return result;
    } catch (error) {
      this.log.debug({ err: error, raw: raw.slice(0, 300) }, 'intent_parse_failed');
      return fallback('parse');
    }
  }
}
