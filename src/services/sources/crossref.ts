import type { BaseLogger } from 'pino';
import { PAGE_SIZE, SCORE_DECIMALS, SOURCES } from '../../config/lookup/constants';
import { CrossrefMatch, LookupQuery, SourceOutcome } from '../../types';
import { pickBest, roundScore, scoreCrossrefItem } from '../scoring';
import { JsonGetter, UpstreamError } from '../upstreamClient';
import { dedupeUrls } from '../urlDedupe';
import { CrossrefItem, crossrefItemSchema, crossrefResponseSchema } from './crossref.schema';

export function extractCrossrefPdfLinks(item: CrossrefItem): string[] {
  const links: string[] = [];
  for (const link of item.link ?? []) {
    const url = link?.URL ?? '';
    const contentType = (link?.['content-type'] ?? '').toLowerCase();
    if (url && contentType.includes('pdf')) links.push(url);
  }
  return dedupeUrls(links);
}

function extractYear(item: CrossrefItem): string | null {
  const year = item.issued?.['date-parts']?.[0]?.[0];
  return year === null || year === undefined ? null : String(year);
}

function formatAuthors(item: CrossrefItem) {
  const names: string[] = [];
  let firstAuthorLastName: string | null = null;

  for (const [index, author] of (item.author ?? []).entries()) {
    const given = (author?.given ?? '').trim();
    const family = (author?.family ?? '').trim();
    if (index === 0 && family) firstAuthorLastName = family;
    const name = [given, family].filter(Boolean).join(' ');
    if (name) names.push(name);
  }

  return { names, firstAuthorLastName };
}

export function buildCrossrefMatch(item: CrossrefItem, score: number): CrossrefMatch {
  const { names, firstAuthorLastName } = formatAuthors(item);
  return {
    source: 'crossref',
    title: item.title?.[0] ?? '',
    doi: item.DOI ?? null,
    publisher: item.publisher ?? null,
    year: extractYear(item),
    authors: names,
    firstAuthorLastName,
    score: roundScore(score, SCORE_DECIMALS),
    pdfLinks: extractCrossrefPdfLinks(item)
  };
}

/** Items that fail the schema are skipped rather than failing the whole page. */
export function parseCrossrefItems(payload: unknown): CrossrefItem[] {
  const parsed = crossrefResponseSchema.safeParse(payload);
  if (!parsed.success) return [];
  const items: CrossrefItem[] = [];
  for (const raw of parsed.data?.message?.items ?? []) {
    const item = crossrefItemSchema.safeParse(raw);
    if (item.success) items.push(item.data);
  }
  return items;
}

export async function fetchCrossrefMatch(
  client: JsonGetter,
  query: LookupQuery,
  log: BaseLogger
): Promise<SourceOutcome<CrossrefMatch>> {
  let payload: unknown;
  try {
    payload = await client.getJson(SOURCES.CROSSREF_WORKS, {
      'query.title': query.title,
      rows: PAGE_SIZE.crossref
    });
  } catch (err) {
    if (!(err instanceof UpstreamError)) throw err;
    log.warn({ source: 'crossref', status: err.status, err: err.message }, 'source unavailable');
    return { status: 'no_match' };
  }

  const { record, score } = pickBest(parseCrossrefItems(payload), (item) =>
    scoreCrossrefItem(item, query)
  );
  if (!record) return { status: 'no_match' };
  return { status: 'match', match: buildCrossrefMatch(record, score) };
}
