const ALLOWED_PROTOCOLS = new Set(['http:', 'https:']);

function canonicalUrl(raw: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch {
    return null;
  }
  if (!ALLOWED_PROTOCOLS.has(parsed.protocol) || !parsed.hostname) return null;
  return parsed.href;
}

/** Keeps http(s) URLs with a host, in first-seen order, without duplicates. */
export function dedupeUrls(urls: readonly string[]): string[] {
  const seen = new Set<string>();
  const deduped: string[] = [];
  for (const raw of urls) {
    const url = canonicalUrl(raw);
    if (url && !seen.has(url)) {
      seen.add(url);
      deduped.push(url);
    }
  }
  return deduped;
}
