import { CrossrefMatch, EuropePmcMatch, Match, SourceOutcome } from '../types';

/** Crossref wins ties; Europe PMC must score strictly higher to take over. */
export function pickPrimaryMatch(
  crossref: SourceOutcome<CrossrefMatch>,
  europePmc: SourceOutcome<EuropePmcMatch>
): Match | null {
  if (crossref.status === 'match' && europePmc.status === 'match') {
    return europePmc.match.score > crossref.match.score ? europePmc.match : crossref.match;
  }
  if (crossref.status === 'match') return crossref.match;
  if (europePmc.status === 'match') return europePmc.match;
  return null;
}
