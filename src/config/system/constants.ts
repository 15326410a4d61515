export const USER_AGENT = 'paper-puller/0.1 (+legal open-access lookup)';

export const RATE_LIMIT_ALLOWLIST = ['127.0.0.1', '::1'];

// Upstream metadata calls made while resolving a lookup.
export const LOOKUP_HTTP_TIMEOUT_MS = 20_000;
export const LOOKUP_CONNECT_TIMEOUT_MS = 10_000;

// The one-off full-text fetch behind /api/download.
export const DOWNLOAD_HTTP_TIMEOUT_MS = 120_000;
export const DOWNLOAD_CONNECT_TIMEOUT_MS = 20_000;

export const DOWNLOAD_TOKEN_TTL_MS = 30 * 60 * 1000;

export const FILENAME_MAX_LENGTH = 140;
