import { z } from 'zod';

const optionalNumber = z.coerce.number().optional();

const LlmConfigSchema = z.object({
  baseUrl: z.string().url().default('https://api.openai.com/v1'),
  apiKey: z.string().default(''),
  model: z.string().min(1).default('gpt-4o-mini'),
  fallbackModels: z.array(z.string().min(1)).default([]),
  temperature: optionalNumber,
  jsonTemperature: optionalNumber,
  maxTokens: optionalNumber,
  topP: optionalNumber,
});

export type LlmConfig = z.infer<typeof LlmConfigSchema>;

export function loadLlmConfig(): LlmConfig {
  const models = (process.env.LLM_MODELS ?? '')
    .split(',')
    .map((m) => m.trim())
    .filter(Boolean);
  return LlmConfigSchema.parse({
    baseUrl: process.env.LLM_PROVIDER_BASEURL || undefined,
    apiKey: process.env.LLM_API_KEY || process.env.OPENAI_API_KEY || undefined,
    model: process.env.LLM_MODEL || undefined,
    fallbackModels: models,
    temperature: process.env.LLM_TEMPERATURE || undefined,
    jsonTemperature: process.env.LLM_TEMPERATURE_JSON || undefined,
    maxTokens: process.env.LLM_MAX_TOKENS || undefined,
    topP: process.env.LLM_TOP_P || undefined,
  });
}
