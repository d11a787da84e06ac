import { fileType } from './utils.js';

export const SCHEMA_VERSION = '2.0';

export type PostRecord = {
  author: string;
  post_date: string | null;
  post_text: string;
  post_number: number; // 1-based, contiguous across reply pages
  post_id: string; // `${thread_id}-${post_number}`
  content_hash: string | null;
};

export type AssetRecord = {
  filename: string;
  url: string;
  size: number | null;
  download_count: number | null;
  checksum: string | null;
  post_number: number | null;
  mime_type: string | null;
  etag: string | null;
  last_modified: string | null;
};

export type ThreadRecord = {
  thread_id: string;
  title: string;
  url: string;
  author: string;
  post_date: string | null;
  posts: PostRecord[]; // posts[0] is the original post
  replies: number;
  views: number;
  assets: AssetRecord[];
};

export type ThreadState = {
  thread_id: string;
  url: string;
  last_seen_at: string;
  reply_count_seen: number;
  views_seen: number;
  last_modified?: string | null;
};

export type PostState = {
  post_id: string;
  thread_id: string;
  post_number: number;
  content_hash: string;
  observed_at: string;
  edited_at?: string | null;
};

export type AssetState = {
  url: string;
  filename: string;
  content_hash: string;
  mime_type: string | null;
  size: number | null;
  downloaded_at: string;
  etag: string | null;
  last_modified: string | null;
};

export type CrawlState = {
  schema_version: string;
  last_updated: string | null;
  threads: Record<string, ThreadState>;
  posts: Record<string, PostState>;
  assets: Record<string, AssetState>;
};

export type AssetCategory = 'no_assets' | 'mixed' | (string & {});

export function postId(threadId: string, postNumber: number): string {
  return `${threadId}-${postNumber}`;
}

export function emptyState(): CrawlState {
  return { schema_version: SCHEMA_VERSION, last_updated: null, threads: {}, posts: {}, assets: {} };
}

/** Sorted distinct extensions across a thread's assets, e.g. ['.gz', '.xml'] */
export function assetTypes(thread: Pick<ThreadRecord, 'assets'>): string[] {
  const types = new Set<string>();
  for (const a of thread.assets) {
    const ft = fileType(a.filename);
    if (ft) types.add(ft);
  }
  return [...types].sort();
}

export function assetTypeCategory(thread: Pick<ThreadRecord, 'assets'>): AssetCategory {
  const types = assetTypes(thread);
  if (types.length === 0) return 'no_assets';
  if (types.length > 1) return 'mixed';
  return types[0].replace(/^\./, '');
}

export type ThreadMetadataFile = ThreadRecord & {
  assets: (AssetRecord & { file_type: string })[];
  asset_types: string[];
  asset_type_category: AssetCategory;
  schema_version: string;
  scraped_at: string;
};

export function toMetadataFile(thread: ThreadRecord, scrapedAt: string): ThreadMetadataFile {
  return {
    ...thread,
    assets: thread.assets.map((a) => ({ ...a, file_type: fileType(a.filename) })),
    asset_types: assetTypes(thread),
    asset_type_category: assetTypeCategory(thread),
    schema_version: SCHEMA_VERSION,
    scraped_at: scrapedAt
  };
}
