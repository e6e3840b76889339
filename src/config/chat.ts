import { z } from 'zod';

export const TieBreakPolicy = z.enum(['exact_then_first', 'first']);
export type TieBreakPolicyT = z.infer<typeof TieBreakPolicy>;

const ChatConfigSchema = z.object({
  topK: z.coerce.number().int().min(1).max(20).default(5),
  minConfidence: z.coerce.number().min(0).max(1).default(0.35),
  tieBreak: TieBreakPolicy.default('exact_then_first'),
  llmTimeoutMs: z.coerce.number().int().min(100).default(15_000),
  catalogTimeoutMs: z.coerce.number().int().min(100).default(8000),
});

export type ChatConfig = z.infer<typeof ChatConfigSchema>;

export function loadChatConfig(): ChatConfig {
  return ChatConfigSchema.parse({
    topK: process.env.CHAT_TOP_K || undefined,
    minConfidence: process.env.CHAT_MIN_CONFIDENCE || undefined,
    tieBreak: process.env.CHAT_TIE_BREAK || undefined,
    llmTimeoutMs: process.env.LLM_TIMEOUT_MS || undefined,
    catalogTimeoutMs: process.env.CATALOG_TIMEOUT_MS || undefined,
  });
}

/**
 * Full config with every default applied. Tests override single fields from here.
 */
export function defaultChatConfig(overrides: Partial<ChatConfig> = {}): ChatConfig {
  return { ...ChatConfigSchema.parse({}), ...overrides };
}
