import pino from 'pino';
import { describe, expect, it, vi } from 'vitest';
import { MESSAGES, SOURCES } from '../src/config/lookup/constants';
import { discoverPaper } from '../src/services/discoveryService';
import { QueryParams, UpstreamError } from '../src/services/upstreamClient';

const log = pino({ level: 'silent' });
const TITLE = 'Editing CAR-T cells with CRISPR-Cas9 improves persistence';
const query = { title: 'Editing CAR-T cells with CRISPR Cas9 improves persistence', firstAuthorLastName: 'Miller' };

const crossrefPage = {
  message: {
    items: [
      {
        title: [TITLE],
        DOI: '10.1000/match',
        author: [{ given: 'Ada', family: 'Miller' }],
        link: [
          { URL: 'https://publisher.example.org/match.pdf', 'content-type': 'application/pdf' },
          { URL: 'https://publisher.example.org/match.xml', 'content-type': 'text/xml' }
        ]
      }
    ]
  }
};

const europePmcPage = {
  resultList: {
    result: [
      {
        title: TITLE,
        doi: '10.1000/match',
        firstAuthor: 'Miller A',
        pmcid: 'PMC1234567'
      }
    ]
  }
};

/** Serves canned payloads by URL; unknown URLs answer 404. */
function fakeClient(routes: Record<string, unknown>) {
  return {
    getJson: vi.fn(async (url: string, _params?: QueryParams) => {
      const payload = routes[url];
      if (payload instanceof Error) throw payload;
      if (payload === undefined) throw new UpstreamError(`HTTP 404 from ${url}`, 404);
      return payload;
    })
  };
}

describe('discoverPaper', () => {
  it('merges candidates from every source in order', async () => {
    const client = fakeClient({
      [SOURCES.CROSSREF_WORKS]: crossrefPage,
      [SOURCES.EUROPE_PMC_SEARCH]: europePmcPage,
      [`${SOURCES.UNPAYWALL}/10.1000/match`]: {
        best_oa_location: { url_for_pdf: 'https://publisher.example.org/match.pdf' },
        oa_locations: []
      }
    });

    const result = await discoverPaper(query, { client, unpaywallEmail: 'test@example.org', log });

    expect(result.match?.source).toBe('crossref');
    expect(result.candidateUrls).toEqual([
      'https://europepmc.org/articles/PMC1234567?pdf=render',
      'https://publisher.example.org/match.pdf'
    ]);
    expect(result.warnings).toEqual([]);
    expect(result.crossref.status).toBe('match');
    expect(result.europePmc.status).toBe('match');
  });

  it('warns instead of calling Unpaywall without a contact address', async () => {
    const client = fakeClient({
      [SOURCES.CROSSREF_WORKS]: crossrefPage,
      [SOURCES.EUROPE_PMC_SEARCH]: { resultList: { result: [] } }
    });

    const result = await discoverPaper(query, { client, unpaywallEmail: '', log });

    expect(result.warnings).toEqual([MESSAGES.missingContactEmail]);
    expect(result.candidateUrls).toEqual(['https://publisher.example.org/match.pdf']);
    expect(client.getJson).toHaveBeenCalledTimes(2);
  });

  it('uses the Europe PMC match and its DOI when Crossref is down', async () => {
    const client = fakeClient({
      [SOURCES.CROSSREF_WORKS]: new UpstreamError('HTTP 503', 503),
      [SOURCES.EUROPE_PMC_SEARCH]: europePmcPage,
      [`${SOURCES.UNPAYWALL}/10.1000/match`]: {
        best_oa_location: { url: 'https://repository.example.org/record/42' }
      }
    });

    const result = await discoverPaper(query, { client, unpaywallEmail: 'test@example.org', log });

    expect(result.match?.source).toBe('europe_pmc');
    expect(result.crossref).toEqual({ status: 'no_match' });
    expect(result.candidateUrls).toEqual([
      'https://europepmc.org/articles/PMC1234567?pdf=render',
      'https://repository.example.org/record/42'
    ]);
  });

  it('returns an empty bundle when every source fails', async () => {
    const client = fakeClient({
      [SOURCES.CROSSREF_WORKS]: new UpstreamError('Network error: fetch failed', 0),
      [SOURCES.EUROPE_PMC_SEARCH]: new UpstreamError('HTTP 500', 500)
    });

    const result = await discoverPaper(query, { client, unpaywallEmail: 'test@example.org', log });

    expect(result).toEqual({
      match: null,
      candidateUrls: [],
      warnings: [],
      crossref: { status: 'no_match' },
      europePmc: { status: 'no_match' }
    });
  });
});
