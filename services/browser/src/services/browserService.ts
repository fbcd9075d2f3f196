import type { ObjectStoreAdapter, StoreCallOptions } from '@keyspace/storage';
import {
  formatSize,
  parentOf,
  type CacheDescription,
  type DirectoryView,
  type LoadOutcome,
  type MetricsCache,
  type PathResolver,
  type QueryParams
} from '@keyspace/vfs';

export interface DirectoryBody {
  path: string;
  parent: string | null;
  breadcrumbs: Array<{ name: string; path: string }>;
  directories: Array<{
    name: string;
    path: string;
    size: string;
    size_display: string;
    file_count: number;
    modified: string | null;
    cached: boolean;
  }>;
  files: Array<{ name: string; path: string; size: number; size_display: string; modified: string }>;
  total_size: string;
  total_size_display: string;
  total_files: number;
  folder_count: number;
  file_count: number;
}

export interface DocumentBody {
  key: string;
  name: string;
  size: number;
  size_display: string;
  modified: string;
  parent: string;
  content: string;
  parsed: boolean;
  download_url: string;
}

export type BrowseResult =
  | { type: 'directory'; body: DirectoryBody }
  | { type: 'document'; body: DocumentBody }
  | { type: 'redirect'; location: string; statusCode: 301 | 302 }
  | { type: 'not_found' };

export interface BrowserService {
  browse(path: string, query: QueryParams, options?: StoreCallOptions): Promise<BrowseResult>;
  snapshot(): CacheDescription;
  reloadSnapshot(): Promise<LoadOutcome>;
}

export interface BrowserServiceDeps {
  store: ObjectStoreAdapter;
  cache: MetricsCache;
  resolver: PathResolver;
  signedUrlTtlSeconds: number;
  inlineMaxBytes: number;
}

/** Percent-encodes each segment of a key, keeping the delimiter readable. */
export const encodeKeyPath = (key: string, delimiter = '/') =>
  `/${key.split(delimiter).map(encodeURIComponent).join('/')}`;

export const serializeView = (view: DirectoryView): DirectoryBody => ({
  path: view.prefix,
  parent: view.parent,
  breadcrumbs: view.breadcrumbs,
  directories: view.directories.map((entry) => ({
    name: entry.name,
    path: entry.prefix,
    size: entry.size.toString(),
    size_display: entry.sizeDisplay,
    file_count: entry.count,
    modified: entry.modified ? entry.modified.toISOString() : null,
    cached: entry.source === 'snapshot'
  })),
  files: view.files.map((entry) => ({
    name: entry.name,
    path: entry.key,
    size: entry.size,
    size_display: entry.sizeDisplay,
    modified: entry.modified.toISOString()
  })),
  total_size: view.totalSize.toString(),
  total_size_display: view.totalSizeDisplay,
  total_files: view.totalCount,
  folder_count: view.directoryCount,
  file_count: view.fileCount
});

const prettyPrint = (body: string): { content: string; parsed: boolean } => {
  try {
    return { content: JSON.stringify(JSON.parse(body), null, 2), parsed: true };
  } catch {
    return { content: body, parsed: false };
  }
};

export const createBrowserService = (deps: BrowserServiceDeps): BrowserService => {
  const { store, cache, resolver, signedUrlTtlSeconds, inlineMaxBytes } = deps;
  const location = (key: string) => encodeKeyPath(key, store.delimiter);

  return {
    async browse(path, query, options = {}) {
      const state = await resolver.resolve({ path, query }, options);

      switch (state.kind) {
        case 'not_found':
          return { type: 'not_found' };
        case 'redirect':
          return { type: 'redirect', location: location(state.target), statusCode: state.permanent ? 301 : 302 };
        case 'directory':
          return { type: 'directory', body: serializeView(state.view) };
        case 'file': {
          const { meta } = state;
          if (!state.inline) {
            const url = await store.issueTemporaryUrl(meta.key, signedUrlTtlSeconds, options);
            return { type: 'redirect', location: url, statusCode: 302 };
          }
          if (meta.size > inlineMaxBytes) {
            return { type: 'redirect', location: location(meta.key), statusCode: 302 };
          }

          const [object, downloadUrl] = await Promise.all([
            store.getObject(meta.key, options),
            store.issueTemporaryUrl(meta.key, signedUrlTtlSeconds, options)
          ]);
          const name = meta.key.slice(meta.key.lastIndexOf(store.delimiter) + 1);
          return {
            type: 'document',
            body: {
              key: meta.key,
              name,
              size: object.meta.size,
              size_display: formatSize(object.meta.size),
              modified: object.meta.lastModified.toISOString(),
              parent: parentOf(meta.key, store.delimiter) ?? '',
              ...prettyPrint(object.body),
              download_url: downloadUrl
            }
          };
        }
      }
    },

    snapshot() {
      return cache.describe();
    },

    async reloadSnapshot() {
      return cache.reload();
    }
  };
};
