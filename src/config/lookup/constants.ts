export const SOURCES = {
  CROSSREF_WORKS: 'https://api.crossref.org/works',
  EUROPE_PMC_SEARCH: 'https://www.ebi.ac.uk/europepmc/webservices/rest/search',
  EUROPE_PMC_ARTICLES: 'https://europepmc.org/articles',
  UNPAYWALL: 'https://api.unpaywall.org/v2'
};

export const PAGE_SIZE = {
  crossref: 15,
  europePmc: 15
};

export const MATCH_THRESHOLD = 0.45;

export const AUTHOR_BONUS = {
  firstAuthor: 0.3,
  otherAuthor: 0.1,
  mismatchPenalty: 0.05
};

export const SCORE_DECIMALS = 3;

export const MESSAGES = {
  missingContactEmail: 'UNPAYWALL_EMAIL is not set. Add it to increase legal full-text coverage.',
  noMatch: 'No likely match found in the currently configured legal-access sources.',
  tokenNotFound: 'Download token not found or expired. Run lookup again to create a fresh token.'
};
