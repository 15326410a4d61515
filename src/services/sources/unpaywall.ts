import type { BaseLogger } from 'pino';
import { SOURCES } from '../../config/lookup/constants';
import { JsonGetter, UpstreamError } from '../upstreamClient';
import { UnpaywallResponse, unpaywallResponseSchema } from './unpaywall.schema';

export function pickOpenAccessUrl(payload: UnpaywallResponse): string | null {
  const best = payload?.best_oa_location;
  const direct = best?.url_for_pdf || best?.url;
  if (direct) return direct;

  for (const location of payload?.oa_locations ?? []) {
    const url = location?.url_for_pdf || location?.url;
    if (url) return url;
  }
  return null;
}

/** Encodes each DOI segment and keeps the slashes, so `#`, `?` and `;` stay inside the path. */
export function unpaywallDoiPath(doi: string): string {
  return doi.split('/').map(encodeURIComponent).join('/');
}

/** Best legal open-access URL for a DOI; a 404 means Unpaywall has no record. */
export async function fetchUnpaywallUrl(
  client: JsonGetter,
  doi: string,
  email: string,
  log: BaseLogger
): Promise<string | null> {
  if (!doi || !email) return null;

  let payload: unknown;
  try {
    payload = await client.getJson(`${SOURCES.UNPAYWALL}/${unpaywallDoiPath(doi)}`, { email });
  } catch (err) {
    if (!(err instanceof UpstreamError)) throw err;
    if (err.status === 404) {
      log.debug({ source: 'unpaywall', doi }, 'no open-access record');
    } else {
      log.warn({ source: 'unpaywall', status: err.status, err: err.message }, 'source unavailable');
    }
    return null;
  }

  const parsed = unpaywallResponseSchema.safeParse(payload);
  if (!parsed.success) return null;
  return pickOpenAccessUrl(parsed.data);
}
