import type { BaseLogger } from 'pino';
import { PAGE_SIZE, SCORE_DECIMALS, SOURCES } from '../../config/lookup/constants';
import { EuropePmcMatch, LookupQuery, SourceOutcome } from '../../types';
import { pickBest, roundScore, scoreEuropePmcResult } from '../scoring';
import { JsonGetter, UpstreamError } from '../upstreamClient';
import { EuropePmcResult, europePmcResponseSchema, europePmcResultSchema } from './europePmc.schema';

/**
 * First full-text entry styled "pdf" or ending in ".pdf"; otherwise the
 * Europe PMC render link when the article has a PMCID.
 */
export function extractEuropePmcPdfUrl(result: EuropePmcResult): string | null {
  for (const entry of result.fullTextUrlList?.fullTextUrl ?? []) {
    const url = entry?.url ?? '';
    const style = (entry?.documentStyle ?? '').toLowerCase();
    if (url && (style === 'pdf' || url.toLowerCase().endsWith('.pdf'))) {
      return url;
    }
  }

  const pmcid = (result.pmcid ?? '').trim();
  if (pmcid) return `${SOURCES.EUROPE_PMC_ARTICLES}/${pmcid}?pdf=render`;
  return null;
}

export function buildEuropePmcMatch(result: EuropePmcResult, score: number): EuropePmcMatch {
  return {
    source: 'europe_pmc',
    title: result.title ?? '',
    doi: result.doi ?? null,
    journal: result.journalTitle ?? null,
    year: result.pubYear ?? null,
    authors: result.authorString ? [result.authorString] : [],
    firstAuthorLastName: result.firstAuthor ?? null,
    score: roundScore(score, SCORE_DECIMALS),
    pdfUrl: extractEuropePmcPdfUrl(result),
    isOpenAccess: (result.isOpenAccess ?? '').toLowerCase() === 'y'
  };
}

export function parseEuropePmcResults(payload: unknown): EuropePmcResult[] {
  const parsed = europePmcResponseSchema.safeParse(payload);
  if (!parsed.success) return [];
  const results: EuropePmcResult[] = [];
  for (const raw of parsed.data?.resultList?.result ?? []) {
    const result = europePmcResultSchema.safeParse(raw);
    if (result.success) results.push(result.data);
  }
  return results;
}

export function buildEuropePmcQuery(query: LookupQuery): string {
  return `TITLE:"${query.title}" AND AUTH:"${query.firstAuthorLastName}"`;
}

export async function fetchEuropePmcMatch(
  client: JsonGetter,
  query: LookupQuery,
  log: BaseLogger
): Promise<SourceOutcome<EuropePmcMatch>> {
  let payload: unknown;
  try {
    payload = await client.getJson(SOURCES.EUROPE_PMC_SEARCH, {
      query: buildEuropePmcQuery(query),
      format: 'json',
      pageSize: PAGE_SIZE.europePmc
    });
  } catch (err) {
    if (!(err instanceof UpstreamError)) throw err;
    log.warn({ source: 'europe_pmc', status: err.status, err: err.message }, 'source unavailable');
    return { status: 'no_match' };
  }

  const { record, score } = pickBest(parseEuropePmcResults(payload), (result) =>
    scoreEuropePmcResult(result, query)
  );
  if (!record) return { status: 'no_match' };
  return { status: 'match', match: buildEuropePmcMatch(record, score) };
}
