import { DOWNLOAD_TOKEN_TTL_MS } from '../config/system/constants';
import { DownloadEntry } from '../types';

/**
 * Token → resolved URL cache behind /api/download. Asynchronous so a shared
 * cache can back it when several instances serve the same clients.
 */
export interface DownloadStore {
  put(token: string, entry: DownloadEntry): Promise<void>;
  get(token: string): Promise<DownloadEntry | null>;
  /** Drops entries older than the TTL and returns how many were removed. */
  sweep(now: number): Promise<number>;
}

export class InMemoryDownloadStore implements DownloadStore {
  private readonly entries = new Map<string, DownloadEntry>();

  constructor(private readonly ttlMs: number = DOWNLOAD_TOKEN_TTL_MS) {}

  async put(token: string, entry: DownloadEntry): Promise<void> {
    this.entries.set(token, entry);
  }

  async get(token: string): Promise<DownloadEntry | null> {
    return this.entries.get(token) ?? null;
  }

  async sweep(now: number): Promise<number> {
    let removed = 0;
    for (const [token, entry] of this.entries) {
      if (now - entry.createdAt > this.ttlMs) {
        this.entries.delete(token);
        removed += 1;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }
}
