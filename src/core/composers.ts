import type { SeriesDetail, SeriesSummary } from '../catalog/types.js';
import type { Logger } from '../util/logging.js';
import { isTimeoutError, withTimeout } from '../util/resilience.js';
import { formatHistory } from './intent_extractor.js';
import type { LlmClient } from './llm.js';
import { getPrompt, renderPrompt } from './prompts.js';
import type { PreferenceCriteria } from './series_ranker.js';
import type { Turn } from './session_store.js';
import type { ClarifyReason } from './slot_resolution.js';

export type NotFoundLookup = 'series' | 'similar' | 'recommendations';

export type TurnOutcome =
  | { kind: 'series_list'; query: string; series: SeriesSummary[] }
  | { kind: 'series_detail'; series: SeriesDetail }
  | { kind: 'similar'; referenceTitle: string; series: SeriesSummary[] }
  | { kind: 'recommendations'; criteria: PreferenceCriteria; series: SeriesSummary[] }
  | { kind: 'not_found'; query: string; lookup: NotFoundLookup }
  | { kind: 'catalog_unavailable' }
  | { kind: 'clarify'; reason: ClarifyReason }
  | { kind: 'chat' };

export interface ComposeContext {
  /** Turns before the current message, oldest first. */
  history: readonly Turn[];
  message: string;
}

const OVERVIEW_MAX = 160;

export const CATALOG_UNAVAILABLE_REPLY =
  "Sorry, I'm having trouble reaching the TV catalog right now. Please try again in a moment.";

export const CHAT_FALLBACK_REPLY =
  "Happy to help you find something to watch! Name a series you like, or tell me a genre or network you're in the mood for.";

const CLARIFY_REPLIES: Record<ClarifyReason, string> = {
  missing_title: 'Which series do you mean? Tell me its title.',
  missing_reference: 'Which series should I find similar shows for?',
  missing_preference: "What are you in the mood for? Tell me a genre or a network and I'll suggest some series.",
  unclear:
    "I'm not sure what you're looking for. You can ask me to find a series by title, tell you about a show, find shows similar to one you like, or recommend series by genre or network.",
};

/** Reply to an empty message. */
export const HELP_REPLY = CLARIFY_REPLIES.unclear;

export function truncate(text: string, max = OVERVIEW_MAX): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  if (flat.length <= max) return flat;
  const cut = flat.slice(0, max);
  const lastSpace = cut.lastIndexOf(' ');
  const base = lastSpace > max * 0.6 ? cut.slice(0, lastSpace) : cut;
  return `${base.replace(/[\s,.;:]+$/, '')}…`;
}

function headline(series: SeriesSummary): string {
  const meta = [series.year !== undefined ? String(series.year) : undefined, series.network].filter(Boolean);
  const genres = series.genres.slice(0, 3);
  let line = series.title;
  if (meta.length > 0) line += ` (${meta.join(', ')})`;
  if (genres.length > 0) line += ` — ${genres.join(', ')}`;
  return line;
}

function listLines(series: readonly SeriesSummary[]): string[] {
  const lines: string[] = [];
  series.forEach((s, i) => {
    lines.push(`${i + 1}. ${headline(s)}`);
    if (s.overview) lines.push(`   ${truncate(s.overview)}`);
  });
  return lines;
}

export function composeSeriesList(query: string, series: readonly SeriesSummary[]): string {
  return [`I found ${series.length} series matching "${query}":`, ...listLines(series)].join('\n');
}

export function composeSeriesDetail(series: SeriesDetail): string {
  const lines = [series.year !== undefined ? `${series.title} (${series.year})` : series.title];
  if (series.network) lines.push(`Network: ${series.network}`);
  if (series.genres.length > 0) lines.push(`Genres: ${series.genres.join(', ')}`);
  if (series.status) lines.push(`Status: ${series.status}`);
  if (series.firstAired) lines.push(`First aired: ${series.firstAired}`);
  if (series.averageRuntime) lines.push(`Runtime: about ${series.averageRuntime} min per episode`);
  if (series.overview) lines.push('', series.overview.trim());
  return lines.join('\n');
}

export function composeSimilar(referenceTitle: string, series: readonly SeriesSummary[]): string {
  return [`If you liked ${referenceTitle}, you might enjoy:`, ...listLines(series)].join('\n');
}

export function describeCriteria(criteria: PreferenceCriteria): string {
  let text = criteria.genre ? `${criteria.genre} series` : 'series';
  if (criteria.network) text += ` on ${criteria.network}`;
  if (criteria.year !== undefined) text += ` from ${criteria.year}`;
  return text;
}

export function composeRecommendations(criteria: PreferenceCriteria, series: readonly SeriesSummary[]): string {
  return [`Here are some ${describeCriteria(criteria)} you might like:`, ...listLines(series)].join('\n');
}

export function composeNotFound(query: string, lookup: NotFoundLookup): string {
  switch (lookup) {
    case 'series':
      return `I couldn't find any series matching "${query}". Could you check the title or try another name?`;
    case 'similar':
      return `I couldn't find series similar to ${query} in the catalog.`;
    case 'recommendations':
      return `I couldn't find any ${query}. Try a different genre or network.`;
  }
}

export function composeClarify(reason: ClarifyReason): string {
  return CLARIFY_REPLIES[reason];
}

/**
 * Turns a dispatch outcome into reply text. Everything except `chat` is a
 * template over catalog fields; `chat` asks the LLM and falls back to a fixed
 * reply when it fails.
 */
export class ResponseComposer {
  constructor(
    private readonly llm: LlmClient,
    private readonly log: Logger,
    private readonly opts: { timeoutMs: number },
  ) {}

  async compose(outcome: TurnOutcome, ctx: ComposeContext): Promise<string> {
    switch (outcome.kind) {
      case 'series_list':
        return composeSeriesList(outcome.query, outcome.series);
      case 'series_detail':
        return composeSeriesDetail(outcome.series);
      case 'similar':
        return composeSimilar(outcome.referenceTitle, outcome.series);
      case 'recommendations':
        return composeRecommendations(outcome.criteria, outcome.series);
      case 'not_found':
        return composeNotFound(outcome.query, outcome.lookup);
      case 'catalog_unavailable':
        return CATALOG_UNAVAILABLE_REPLY;
      case 'clarify':
        return composeClarify(outcome.reason);
      case 'chat':
        return this.composeChat(ctx);
    }
  }

  private async composeChat(ctx: ComposeContext): Promise<string> {
    try {
      const template = await getPrompt('general_chat');
      const prompt = renderPrompt(template, { history: formatHistory(ctx.history), message: ctx.message });
      const reply = await withTimeout(this.opts.timeoutMs, (signal) =>
        this.llm.complete(prompt, { responseFormat: 'text', signal }),
      );
      const text = reply.trim();
      return text || CHAT_FALLBACK_REPLY;
    } catch (error) {
      this.log.warn({ err: error, timeout: isTimeoutError(error) }, 'chat_llm_failed');
      return CHAT_FALLBACK_REPLY;
    }
  }
}
