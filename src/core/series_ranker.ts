import type { SeriesSummary } from '../catalog/types.js';
import type { TieBreakPolicyT } from '../config/chat.js';

export interface PreferenceCriteria {
  genre?: string;
  network?: string;
  year?: number;
}

function norm(value: string): string {
  return value.trim().toLowerCase().replace(/\s+/g, ' ');
}

/**
 * Picks the series a title refers to when a search returns several candidates.
 * `exact_then_first`: exact case-insensitive title match, else the first
 * (most relevant) result. `first`: always the first result.
 */
export function pickBestMatch(
  results: readonly SeriesSummary[],
  title: string,
  policy: TieBreakPolicyT = 'exact_then_first',
): SeriesSummary | undefined {
  if (results.length === 0) return undefined;
  if (policy === 'exact_then_first') {
    const wanted = norm(title);
    const exact = results.find((s) => norm(s.title) === wanted);
    if (exact) return exact;
  }
  return results[0];
}

function matchesGenre(series: SeriesSummary, genre: string): boolean {
  const wanted = norm(genre);
  return series.genres.some((g) => {
    const have = norm(g);
    return have === wanted || have.includes(wanted) || wanted.includes(have);
  });
}

function matchesNetwork(series: SeriesSummary, network: string): boolean {
  return series.network !== undefined && norm(series.network).includes(norm(network));
}

export function overlapScore(series: SeriesSummary, criteria: PreferenceCriteria): number {
  let score = 0;
  if (criteria.genre && matchesGenre(series, criteria.genre)) score++;
  if (criteria.network && matchesNetwork(series, criteria.network)) score++;
  if (criteria.year !== undefined && series.year === criteria.year) score++;
  return score;
}

/**
 * Re-ranks catalog results by how many requested preferences they match.
 * Equal scores keep catalog relevance order.
 */
export function rankByPreference(
  series: readonly SeriesSummary[],
  criteria: PreferenceCriteria,
  limit: number,
): SeriesSummary[] {
  return series
    .map((s, index) => ({ s, index, score: overlapScore(s, criteria) }))
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .slice(0, limit)
    .map(({ s }) => s);
}
