import type { CarriedSlotsT } from '../schemas/intent.js';
import type { IntentExtraction } from './intent_extractor.js';

export type ClarifyReason = 'missing_title' | 'missing_reference' | 'missing_preference' | 'unclear';

export type SeriesTarget =
  | { by: 'title'; title: string }
  | { by: 'id'; id: string; title?: string };

export type ResolvedAction =
  | { kind: 'search'; title: string; year?: number; network?: string }
  | { kind: 'details'; target: SeriesTarget }
  | { kind: 'similar'; target: SeriesTarget }
  | { kind: 'recommend'; genre?: string; network?: string; year?: number }
  | { kind: 'chat' }
  | { kind: 'clarify'; reason: ClarifyReason };

/**
 * Fresh title first, then the series discussed last.
 */
function seriesTarget(title: string | null | undefined, carried: CarriedSlotsT): SeriesTarget | undefined {
  if (title) return { by: 'title', title };
  if (carried.lastSeriesId) return { by: 'id', id: carried.lastSeriesId, title: carried.lastSeriesTitle };
  return undefined;
}

/**
 * Fills the slots an intent needs from this turn's extraction, falling back to the
 * session's carried slots. Pure: no I/O, no LLM.
 */
export function resolveAction(
  extraction: Pick<IntentExtraction, 'intent' | 'slots' | 'confidence'>,
  carried: CarriedSlotsT,
  opts: { minConfidence: number },
): ResolvedAction {
  const { intent, slots, confidence } = extraction;
  if (intent === 'UNKNOWN' || confidence < opts.minConfidence) {
    return { kind: 'clarify', reason: 'unclear' };
  }

  switch (intent) {
    case 'GENERAL_CHAT':
      return { kind: 'chat' };

    case 'SEARCH_BY_TITLE': {
      const title = slots.title || carried.lastSeriesTitle;
      if (!title) return { kind: 'clarify', reason: 'missing_title' };
      return {
        kind: 'search',
        title,
        ...(typeof slots.year === 'number' ? { year: slots.year } : {}),
        ...(slots.network ? { network: slots.network } : {}),
      };
    }

    case 'GET_DETAILS': {
      const target = seriesTarget(slots.title, carried);
      return target ? { kind: 'details', target } : { kind: 'clarify', reason: 'missing_title' };
    }

    case 'FIND_SIMILAR': {
      const target = seriesTarget(slots.title, carried);
      return target ? { kind: 'similar', target } : { kind: 'clarify', reason: 'missing_reference' };
    }

    case 'RECOMMEND_BY_PREFERENCE': {
      const genre = slots.genre || carried.lastGenreFilter || carried.favoriteGenres?.[0];
      const network = slots.network || carried.lastNetworkFilter;
      if (!genre && !network) return { kind: 'clarify', reason: 'missing_preference' };
      return {
        kind: 'recommend',
        ...(genre ? { genre } : {}),
        ...(network ? { network } : {}),
        ...(typeof slots.year === 'number' ? { year: slots.year } : {}),
      };
    }
  }
}
