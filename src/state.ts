import fs from 'node:fs';
import { z } from 'zod';
import type { Logger } from './config.js';
import { CrawlError, ErrorCode, toErrorMessage } from './errors.js';
import { readJson, toJson, writeJson } from './storage.js';
import {
  emptyState,
  SCHEMA_VERSION,
  type AssetRecord,
  type AssetState,
  type CrawlState,
  type PostRecord,
  type PostState,
  type ThreadRecord,
  type ThreadState
} from './types.js';
import { threadIdFromUrl } from './utils.js';

const ThreadStateSchema = z.object({
  thread_id: z.string(),
  url: z.string(),
  last_seen_at: z.string(),
  reply_count_seen: z.number().int().nonnegative(),
  views_seen: z.number().int().nonnegative(),
  last_modified: z.string().nullable().optional()
});

const PostStateSchema = z.object({
  post_id: z.string(),
  thread_id: z.string(),
  post_number: z.number().int().positive(),
  content_hash: z.string(),
  observed_at: z.string(),
  edited_at: z.string().nullable().optional()
});

const AssetStateSchema = z.object({
  url: z.string(),
  filename: z.string(),
  content_hash: z.string(),
  mime_type: z.string().nullable(),
  size: z.number().int().nonnegative().nullable(),
  downloaded_at: z.string(),
  etag: z.string().nullable(),
  last_modified: z.string().nullable()
});

const CrawlStateSchema = z.object({
  schema_version: z.string(),
  last_updated: z.string().nullable(),
  threads: z.record(ThreadStateSchema),
  posts: z.record(PostStateSchema).default({}),
  assets: z.record(AssetStateSchema).default({})
});

const LegacyManifestSchema = z.array(z.string());

export type PostChange = 'new' | 'unchanged' | 'edited' | 'skipped';

type StoreOptions = {
  stateFile: string;
  manifestFile?: string;
  logger?: Logger;
  now?: () => Date;
};

export function parseState(data: unknown): CrawlState {
  const parsed: CrawlState = CrawlStateSchema.parse(data);
  return parsed;
}

/**
 * Ledger of what earlier runs saw: threads by id, posts by post id, assets
 * by URL. Decides what needs (re)fetching and is written out whole after
 * every completed thread.
 */
export class DeltaStateStore {
  private state: CrawlState;
  private opts: StoreOptions;
  private logger: Logger;
  private now: () => Date;

  constructor(opts: StoreOptions, state: CrawlState = emptyState()) {
    this.opts = opts;
    this.state = state;
    this.logger = opts.logger ?? console;
    this.now = opts.now ?? (() => new Date());
  }

  static deserialize(json: string, opts: StoreOptions): DeltaStateStore {
    return new DeltaStateStore(opts, parseState(JSON.parse(json)));
  }

  serialize(): string {
    return toJson(this.state);
  }

  snapshot(): CrawlState {
    return structuredClone(this.state);
  }

  get counts(): { threads: number; posts: number; assets: number } {
    return {
      threads: Object.keys(this.state.threads).length,
      posts: Object.keys(this.state.posts).length,
      assets: Object.keys(this.state.assets).length
    };
  }

  /**
   * State file if there is a readable one, otherwise a migrated legacy
   * manifest, otherwise empty.
   */
  load(): CrawlState {
    const fromFile = this.readStateFile();
    if (fromFile) {
      if (fromFile.schema_version !== SCHEMA_VERSION) {
        this.logger.log(`[state] upgrading schema ${fromFile.schema_version} -> ${SCHEMA_VERSION}`);
        fromFile.schema_version = SCHEMA_VERSION;
      }
      this.state = fromFile;
      this.logger.log(`[state] loaded: ${this.counts.threads} threads, ${this.counts.posts} posts, ${this.counts.assets} assets`);
      return this.state;
    }

    const migrated = this.migrateManifest();
    if (migrated) {
      this.state = migrated;
      this.save();
      this.retireManifest();
      this.logger.log(`[state] migrated legacy manifest: ${this.counts.threads} threads`);
      return this.state;
    }

    this.state = emptyState();
    this.logger.log('[state] no state found, starting fresh');
    return this.state;
  }

  /** Atomic write of the whole ledger. A failed write is logged and the in-memory state kept. */
  save(): boolean {
    this.state.last_updated = this.now().toISOString();
    try {
      writeJson(this.opts.stateFile, this.state);
      return true;
    } catch (err) {
      const error = new CrawlError(ErrorCode.PERSISTENCE_ERROR, `Could not save state: ${toErrorMessage(err)}`, false, {
        stateFile: this.opts.stateFile
      });
      this.logger.warn(`[state] ${error.message}`);
      return false;
    }
  }

  visitedUrls(): Set<string> {
    return new Set(Object.values(this.state.threads).map((t) => t.url));
  }

  getPost(id: string): PostState | undefined {
    return this.state.posts[id];
  }

  getAsset(url: string): AssetState | undefined {
    return this.state.assets[url];
  }

  /** Only reply growth triggers a re-fetch; view counts drift on their own. */
  shouldRefetchThread(threadId: string, currentReplies: number, currentViews: number): boolean {
    const stored = this.state.threads[threadId];
    if (!stored) return true;
    if (currentViews !== stored.views_seen) {
      this.logger.log(`[state] thread ${threadId} views ${stored.views_seen} -> ${currentViews}`);
    }
    return currentReplies > stored.reply_count_seen;
  }

  /**
   * An asset never downloaded is always wanted. Otherwise ETag comparison
   * when both sides have one, else Last-Modified; without a stored validator
   * staleness cannot be told and the answer is no.
   */
  shouldRedownloadAsset(url: string, serverEtag: string | null, serverLastModified: string | null): boolean {
    const stored = this.state.assets[url];
    if (!stored) return true;
    if (!stored.etag && !stored.last_modified) return false;
    if (stored.etag && serverEtag) return stored.etag !== serverEtag;
    if (stored.last_modified && serverLastModified) return stored.last_modified !== serverLastModified;
    return false;
  }

  recordThread(thread: ThreadRecord, lastModified?: string | null): ThreadState {
    const entry: ThreadState = {
      thread_id: thread.thread_id,
      url: thread.url,
      last_seen_at: this.now().toISOString(),
      reply_count_seen: thread.replies,
      views_seen: thread.views
    };
    const prior = this.state.threads[thread.thread_id]?.last_modified;
    const lm = lastModified ?? prior;
    if (lm) entry.last_modified = lm;
    this.state.threads[thread.thread_id] = entry;
    return entry;
  }

  /** Posts without text have no fingerprint and are not tracked. */
  recordPost(threadId: string, post: PostRecord): PostChange {
    if (!post.content_hash) return 'skipped';
    const at = this.now().toISOString();
    const prior = this.state.posts[post.post_id];

    if (!prior) {
      this.state.posts[post.post_id] = {
        post_id: post.post_id,
        thread_id: threadId,
        post_number: post.post_number,
        content_hash: post.content_hash,
        observed_at: at
      };
      return 'new';
    }

    if (prior.content_hash === post.content_hash) {
      this.state.posts[post.post_id] = { ...prior, observed_at: at };
      return 'unchanged';
    }

    this.state.posts[post.post_id] = { ...prior, content_hash: post.content_hash, observed_at: at, edited_at: at };
    return 'edited';
  }

  /** Only downloaded assets (those with a checksum) are recorded. */
  recordAsset(asset: AssetRecord): AssetState | null {
    if (!asset.checksum) return null;
    const entry: AssetState = {
      url: asset.url,
      filename: asset.filename,
      content_hash: asset.checksum,
      mime_type: asset.mime_type,
      size: asset.size,
      downloaded_at: this.now().toISOString(),
      etag: asset.etag,
      last_modified: asset.last_modified
    };
    this.state.assets[asset.url] = entry;
    return entry;
  }

  private readStateFile(): CrawlState | null {
    try {
      const data = readJson(this.opts.stateFile);
      if (data === undefined) return null;
      return parseState(data);
    } catch (err) {
      this.logger.warn(`[state] could not read ${this.opts.stateFile}: ${toErrorMessage(err)}`);
      return null;
    }
  }

  private migrateManifest(): CrawlState | null {
    const file = this.opts.manifestFile;
    if (!file) return null;
    try {
      const data = readJson(file);
      if (data === undefined) return null;
      const urls = LegacyManifestSchema.parse(data);
      const state = emptyState();
      const at = this.now().toISOString();
      for (const url of urls) {
        const id = threadIdFromUrl(url);
        if (!id) continue;
        state.threads[id] = { thread_id: id, url, last_seen_at: at, reply_count_seen: 0, views_seen: 0 };
      }
      return state;
    } catch (err) {
      this.logger.warn(`[state] could not migrate ${file}: ${toErrorMessage(err)}`);
      return null;
    }
  }

  private retireManifest() {
    const file = this.opts.manifestFile;
    if (!file) return;
    try {
      fs.renameSync(file, `${file}.migrated`);
    } catch (err) {
      this.logger.warn(`[state] could not retire ${file}: ${toErrorMessage(err)}`);
    }
  }
}
