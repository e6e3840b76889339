import { z } from 'zod';
import type { LlmConfig } from '../config/llm.js';
import { httpFetch, isAbortError, readErrorBody } from '../util/fetch.js';
import type { Logger } from '../util/logging.js';

export type ResponseFormat = 'text' | 'json';

export interface CompleteOptions {
  responseFormat?: ResponseFormat;
  signal?: AbortSignal;
}

/**
 * Text-in, text-out language model capability. Output is untrusted and callers
 * validate it before use.
 */
export interface LlmClient {
  complete(prompt: string, opts?: CompleteOptions): Promise<string>;
}

export class LlmError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'LlmError';
  }
}

const ChatCompletionResponse = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullish() }).nullish() }))
    .default([]),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
    })
    .nullish(),
});

// Simple token counter (approximate, for logs only)
function countTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

function buildGenParams(cfg: LlmConfig, format: ResponseFormat) {
  const temperature = format === 'json'
    ? (cfg.jsonTemperature ?? cfg.temperature ?? 0.2)
    : (cfg.temperature ?? 0.5);
  return { temperature, maxTokens: cfg.maxTokens, topP: cfg.topP };
}

/**
 * Try to extract a JSON object from an LLM response safely.
 * Returns undefined if no valid JSON object can be found.
 */
export function safeExtractJson(text: string): unknown | undefined {
  const m = text.match(/\{[\s\S]*\}/);
  if (!m) return undefined;
  try {
    return JSON.parse(m[0]);
  } catch {
    return undefined;
  }
}

/**
 * Client for any OpenAI-compatible `/chat/completions` endpoint. Tries the
 * preferred model first, then each fallback model; rejects with {@link LlmError}
 * when none produced text or when the caller aborted.
 */
export function createChatCompletionsClient(
  cfg: LlmConfig,
  log: Logger,
): LlmClient {
  const models = [cfg.model, ...cfg.fallbackModels.filter((m) => m !== cfg.model)];
  const url = `${cfg.baseUrl.replace(/\/$/, '')}/chat/completions`;

  async function tryModel(model: string, prompt: string, format: ResponseFormat, signal?: AbortSignal): Promise<string | null> {
    const params = buildGenParams(cfg, format);
    const body = {
      model,
      messages: [{ role: 'user', content: prompt }],
      temperature: params.temperature,
      ...(params.maxTokens !== undefined ? { max_tokens: params.maxTokens } : {}),
      ...(params.topP !== undefined ? { top_p: params.topP } : {}),
      ...(format === 'json' ? { response_format: { type: 'json_object' } } : {}),
    };
    const started = Date.now();
    try {
      const res = await httpFetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Authorization: `Bearer ${cfg.apiKey}` },
        body: JSON.stringify(body),
        signal,
      });
      if (!res.ok) {
        log.debug({ model, status: res.status, body: await readErrorBody(res) }, 'llm_model_failed');
        return null;
      }
      const parsed = ChatCompletionResponse.safeParse(await res.json());
      if (!parsed.success) {
        log.debug({ model }, 'llm_unexpected_payload');
        return null;
      }
      const content = parsed.data.choices[0]?.message?.content?.trim() ?? '';
      log.debug(
        {
          model,
          ms: Date.now() - started,
          outputTokens: countTokens(content),
          usage: parsed.data.usage ?? undefined,
        },
        'llm_model_done',
      );
      return content || null;
    } catch (error) {
      if (isAbortError(error) || signal?.aborted) {
        throw new LlmError('llm_aborted', { cause: error });
      }
      log.debug({ model, err: error }, 'llm_model_error');
      return null;
    }
  }

  return {
    async complete(prompt: string, opts: CompleteOptions = {}): Promise<string> {
      const trimmed = prompt.trim();
      if (!trimmed) throw new LlmError('llm_empty_prompt');
      if (!cfg.apiKey) throw new LlmError('llm_not_configured');
      const format = opts.responseFormat ?? 'text';
      log.debug({ inputTokens: countTokens(trimmed), format }, 'llm_call');

      for (const model of models) {
        if (opts.signal?.aborted) throw new LlmError('llm_aborted');
        const out = await tryModel(model, trimmed, format, opts.signal);
        if (out) return out;
      }
      log.warn({ models }, 'llm_all_models_failed');
      throw new LlmError('llm_all_models_failed');
    },
  };
}
