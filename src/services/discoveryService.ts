import type { BaseLogger } from 'pino';
import { config } from '../config/env';
import { MESSAGES } from '../config/lookup/constants';
import { DiscoveryResult, LookupQuery } from '../types';
import { logger } from '../utils/logger';
import { pickPrimaryMatch } from './matchSelector';
import { fetchCrossrefMatch } from './sources/crossref';
import { fetchEuropePmcMatch } from './sources/europePmc';
import { fetchUnpaywallUrl } from './sources/unpaywall';
import { JsonGetter, UpstreamClient } from './upstreamClient';
import { dedupeUrls } from './urlDedupe';

export interface DiscoveryOptions {
  client?: JsonGetter;
  unpaywallEmail?: string;
  log?: BaseLogger;
}

export type DiscoverPaper = (query: LookupQuery, options?: DiscoveryOptions) => Promise<DiscoveryResult>;

async function runDiscovery(
  client: JsonGetter,
  query: LookupQuery,
  unpaywallEmail: string,
  log: BaseLogger
): Promise<DiscoveryResult> {
  const [crossref, europePmc] = await Promise.all([
    fetchCrossrefMatch(client, query, log),
    fetchEuropePmcMatch(client, query, log)
  ]);

  const match = pickPrimaryMatch(crossref, europePmc);
  const doi = match?.doi || (crossref.status === 'match' ? crossref.match.doi : null);

  const candidates: string[] = [];
  if (europePmc.status === 'match' && europePmc.match.pdfUrl) {
    candidates.push(europePmc.match.pdfUrl);
  }
  if (crossref.status === 'match') {
    candidates.push(...crossref.match.pdfLinks);
  }
  if (doi && unpaywallEmail) {
    const openAccessUrl = await fetchUnpaywallUrl(client, doi, unpaywallEmail, log);
    if (openAccessUrl) candidates.push(openAccessUrl);
  }

  const warnings: string[] = [];
  if (doi && !unpaywallEmail) {
    warnings.push(MESSAGES.missingContactEmail);
  }

  const candidateUrls = dedupeUrls(candidates);
  log.info(
    { source: match?.source ?? null, doi: doi ?? null, candidates: candidateUrls.length },
    'lookup resolved'
  );

  return { match, candidateUrls, warnings, crossref, europePmc };
}

export const discoverPaper: DiscoverPaper = async (query, options = {}) => {
  const unpaywallEmail = (options.unpaywallEmail ?? config.UNPAYWALL_EMAIL ?? '').trim();
  const log = options.log ?? logger;
  if (options.client) {
    return runDiscovery(options.client, query, unpaywallEmail, log);
  }

  const client = new UpstreamClient();
  try {
    return await runDiscovery(client, query, unpaywallEmail, log);
  } finally {
    await client.close();
  }
};
