import { SequenceMatcher } from 'difflib';
import { normalizeText } from './textNormalizer';

/**
 * difflib ratio (Ratcliff/Obershelp with the autojunk heuristic for inputs of
 * 200+ characters). Inputs are put in a fixed order so that ratio(a, b) === ratio(b, a).
 */
export function sequenceRatio(a: string, b: string): number {
  const [first, second] = a <= b ? [a, b] : [b, a];
  return new SequenceMatcher(null, first, second).ratio();
}

/** Similarity in [0, 1] of two titles after normalisation; 0 when either is empty. */
export function titleSimilarity(left: string | null | undefined, right: string | null | undefined): number {
  if (!left || !right) return 0;
  return sequenceRatio(normalizeText(left), normalizeText(right));
}
