export interface LookupQuery {
  title: string;
  firstAuthorLastName: string;
}

export type SourceName = 'crossref' | 'europe_pmc';

interface BaseMatch {
  readonly title: string;
  readonly doi: string | null;
  readonly year: string | null;
  readonly authors: readonly string[];
  readonly firstAuthorLastName: string | null;
  readonly score: number;
}

export interface CrossrefMatch extends BaseMatch {
  readonly source: 'crossref';
  readonly publisher: string | null;
  readonly pdfLinks: readonly string[];
}

export interface EuropePmcMatch extends BaseMatch {
  readonly source: 'europe_pmc';
  readonly journal: string | null;
  readonly pdfUrl: string | null;
  readonly isOpenAccess: boolean;
}

export type Match = CrossrefMatch | EuropePmcMatch;

/** Outcome of one source adapter; a failed upstream call is reported as `no_match`. */
export type SourceOutcome<M extends Match = Match> =
  | { status: 'match'; match: M }
  | { status: 'no_match' };

export interface DiscoveryResult {
  match: Match | null;
  candidateUrls: string[];
  warnings: string[];
  crossref: SourceOutcome<CrossrefMatch>;
  europePmc: SourceOutcome<EuropePmcMatch>;
}

export interface Selection<T> {
  record: T | null;
  score: number;
}

export interface DownloadEntry {
  url: string;
  filename: string;
  createdAt: number;
}

export interface FullTextResponse {
  body: Buffer;
  contentType: string | null;
  contentDisposition: string | null;
}
