import { DiscoverPaper, discoverPaper } from '../services/discoveryService';
import { DownloadStore, InMemoryDownloadStore } from '../services/downloadStore';
import { fetchFullText } from '../services/upstreamClient';
import { FullTextResponse } from '../types';

export interface ServerDependencies {
  discover: DiscoverPaper;
  downloads: DownloadStore;
  fetchFullText: (url: string) => Promise<FullTextResponse>;
  now: () => number;
}

export function defaultDependencies(): ServerDependencies {
  return {
    discover: discoverPaper,
    downloads: new InMemoryDownloadStore(),
    fetchFullText: (url) => fetchFullText(url),
    now: () => Date.now()
  };
}
