import { AUTHOR_BONUS, MATCH_THRESHOLD } from '../config/lookup/constants';
import { LookupQuery, Selection } from '../types';
import { CrossrefItem } from './sources/crossref.schema';
import { EuropePmcResult } from './sources/europePmc.schema';
import { normalizeLastName } from './textNormalizer';
import { titleSimilarity } from './similarity';

/**
 * Title similarity plus author adjustments for a Crossref work:
 * +0.30 when the first listed author matches, +0.10 when a later author does,
 * -0.05 when authors are listed and none match. Not clamped to 1.
 */
export function scoreCrossrefItem(item: CrossrefItem, query: LookupQuery): number {
  const base = titleSimilarity(item.title?.[0] ?? '', query.title);
  const target = normalizeLastName(query.firstAuthorLastName);
  if (!target) return base;

  const authors = item.author ?? [];
  if (authors.length === 0) return base;

  const first = normalizeLastName(authors[0]?.family);
  if (first && first === target) return base + AUTHOR_BONUS.firstAuthor;

  if (authors.some((author) => normalizeLastName(author?.family) === target)) {
    return base + AUTHOR_BONUS.otherAuthor;
  }
  return base - AUTHOR_BONUS.mismatchPenalty;
}

/** Europe PMC only exposes `firstAuthor` ("Miller J"), so only that name is compared. */
export function scoreEuropePmcResult(result: EuropePmcResult, query: LookupQuery): number {
  const base = titleSimilarity(result.title ?? '', query.title);
  const target = normalizeLastName(query.firstAuthorLastName);
  if (!target) return base;

  const surname = (result.firstAuthor ?? '').trim().split(' ')[0];
  const first = normalizeLastName(surname);
  if (first && first === target) return base + AUTHOR_BONUS.firstAuthor;
  return base;
}

/**
 * Highest-scoring record; the earliest wins ties. Below the threshold nothing is selected.
 */
export function pickBest<T>(
  records: readonly T[],
  score: (record: T) => number,
  threshold = MATCH_THRESHOLD
): Selection<T> {
  let best: T | null = null;
  let bestScore = -1;

  for (const record of records) {
    const s = score(record);
    if (s > bestScore) {
      best = record;
      bestScore = s;
    }
  }

  if (best === null || bestScore < threshold) {
    return { record: null, score: 0 };
  }
  return { record: best, score: bestScore };
}

export function roundScore(score: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(score * factor) / factor;
}
