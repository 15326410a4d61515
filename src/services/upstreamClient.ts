import { Agent } from 'undici';
import {
  DOWNLOAD_CONNECT_TIMEOUT_MS,
  DOWNLOAD_HTTP_TIMEOUT_MS,
  LOOKUP_CONNECT_TIMEOUT_MS,
  LOOKUP_HTTP_TIMEOUT_MS,
  USER_AGENT
} from '../config/system/constants';
import { FullTextResponse } from '../types';

export type QueryParams = Record<string, string | number>;

/** Raised for non-2xx responses (status set) and for timeouts or transport failures (status 0). */
export class UpstreamError extends Error {
  constructor(
    message: string,
    public readonly status: number
  ) {
    super(message);
    this.name = 'UpstreamError';
  }
}

export interface JsonGetter {
  getJson(url: string, params?: QueryParams): Promise<unknown>;
}

interface UpstreamClientOptions {
  timeoutMs?: number;
  connectTimeoutMs?: number;
  userAgent?: string;
  fetchImpl?: typeof fetch;
}

function withParams(url: string, params?: QueryParams): string {
  if (!params) return url;
  const search = new URLSearchParams(
    Object.entries(params).map<[string, string]>(([k, v]) => [k, String(v)])
  );
  return `${url}?${search.toString()}`;
}

function connectionPool(connectTimeoutMs: number): Agent {
  return new Agent({ connect: { timeout: connectTimeoutMs } });
}

/**
 * `timeoutMs` covers the body read as well as the response headers; the
 * dispatcher's shorter connect timeout bounds opening the socket.
 */
async function timedFetch<T>(
  fetchImpl: typeof fetch,
  url: string,
  init: RequestInit,
  dispatcher: Agent,
  timeoutMs: number,
  read: (res: Response) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await fetchImpl(url, { ...init, dispatcher, redirect: 'follow', signal: controller.signal });
    if (!res.ok) {
      throw new UpstreamError(`HTTP ${res.status} from ${url}`, res.status);
    }
    return await read(res);
  } catch (err) {
    if (err instanceof UpstreamError) throw err;
    if (err instanceof Error && err.name === 'AbortError') {
      throw new UpstreamError(`Request timeout after ${timeoutMs}ms: ${url}`, 0);
    }
    throw new UpstreamError(`Network error: ${err instanceof Error ? err.message : String(err)}`, 0);
  } finally {
    clearTimeout(timeout);
  }
}

/**
 * JSON GET client shared by every upstream call of one lookup. Holds its own
 * connection pool; call `close()` once the lookup is done.
 */
export class UpstreamClient implements JsonGetter {
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;
  private readonly dispatcher: Agent;

  constructor(options: UpstreamClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? LOOKUP_HTTP_TIMEOUT_MS;
    this.dispatcher = connectionPool(options.connectTimeoutMs ?? LOOKUP_CONNECT_TIMEOUT_MS);
    this.headers = {
      'User-Agent': options.userAgent ?? USER_AGENT,
      Accept: 'application/json'
    };
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async getJson(url: string, params?: QueryParams): Promise<unknown> {
    const target = withParams(url, params);
    return timedFetch(
      this.fetchImpl,
      target,
      { headers: this.headers },
      this.dispatcher,
      this.timeoutMs,
      async (res) => {
        try {
          return await res.json();
        } catch (err) {
          throw new UpstreamError(`Invalid JSON from ${target}: ${(err as Error).message}`, res.status);
        }
      }
    );
  }

  async close(): Promise<void> {
    await this.dispatcher.close();
  }
}

export async function fetchFullText(
  url: string,
  fetchImpl: typeof fetch = fetch
): Promise<FullTextResponse> {
  const dispatcher = connectionPool(DOWNLOAD_CONNECT_TIMEOUT_MS);
  try {
    return await timedFetch(
      fetchImpl,
      url,
      { headers: { 'User-Agent': USER_AGENT, Accept: 'application/pdf,*/*' } },
      dispatcher,
      DOWNLOAD_HTTP_TIMEOUT_MS,
      async (res) => ({
        body: Buffer.from(await res.arrayBuffer()),
        contentType: res.headers.get('content-type'),
        contentDisposition: res.headers.get('content-disposition')
      })
    );
  } finally {
    await dispatcher.close();
  }
}
