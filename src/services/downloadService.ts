import { randomUUID } from 'crypto';
import { FILENAME_MAX_LENGTH } from '../config/system/constants';
import { DownloadEntry } from '../types';
import { DownloadStore } from './downloadStore';

export function sanitizeFilename(raw: string): string {
  let cleaned = raw.replace(/[^a-zA-Z0-9._-]+/g, '_').replace(/^_+|_+$/g, '');
  if (!cleaned) cleaned = 'paper';
  if (!cleaned.toLowerCase().endsWith('.pdf')) cleaned = `${cleaned}.pdf`;
  return cleaned.slice(0, FILENAME_MAX_LENGTH);
}

export function filenameFromContentDisposition(header: string | null | undefined): string | null {
  if (!header) return null;
  const match = /filename\*?=(?:UTF-8'')?"?([^";]+)"?/.exec(header);
  const filename = match?.[1]?.trim();
  return filename ? sanitizeFilename(filename) : null;
}

export async function registerDownload(
  store: DownloadStore,
  url: string,
  title: string,
  now: number
): Promise<string> {
  await store.sweep(now);
  const token = randomUUID().replace(/-/g, '');
  await store.put(token, { url, filename: sanitizeFilename(title || 'paper'), createdAt: now });
  return token;
}

export async function resolveDownload(
  store: DownloadStore,
  token: string,
  now: number
): Promise<DownloadEntry | null> {
  await store.sweep(now);
  return store.get(token);
}
