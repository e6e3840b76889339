import { readFile } from 'node:fs/promises';
import fs from 'node:fs';
import path from 'node:path';

export type PromptName = 'intent_extractor' | 'general_chat';

const memo = new Map<PromptName, string>();

/**
 * Prompt templates sit beside the compiled modules (`dist/prompts`, copied by the
 * build) or in the package's `src/prompts`. `PROMPTS_DIR` overrides both.
 */
export function resolvePromptsDir(moduleDir: string = __dirname): string {
  const candidates: string[] = [];
  if (process.env.PROMPTS_DIR) candidates.push(path.resolve(process.env.PROMPTS_DIR));
  candidates.push(path.join(moduleDir, '..', 'prompts'));
  const packaged = path.join(moduleDir, '..', '..', 'src', 'prompts');
  candidates.push(packaged);
  return candidates.find((c) => fs.existsSync(c)) ?? packaged;
}

export async function getPrompt(name: PromptName): Promise<string> {
  const cached = memo.get(name);
  if (cached !== undefined) return cached;
  const text = (await readFile(path.join(resolvePromptsDir(), `${name}.md`), 'utf-8')).trim();
  if (!text) throw new Error(`prompt_empty:${name}`);
  memo.set(name, text);
  return text;
}

export async function preloadPrompts(): Promise<void> {
  await Promise.all([getPrompt('intent_extractor'), getPrompt('general_chat')]);
}

/**
 * Fills `{name}` placeholders. Unknown placeholders are left as they are.
 */
export function renderPrompt(template: string, vars: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match: string, key: string) => vars[key] ?? match);
}
