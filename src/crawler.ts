import fs from 'node:fs';
import path from 'node:path';
import type { CrawlConfig, Logger } from './config.js';
import { CrawlError, ErrorCode, toErrorMessage } from './errors.js';
import { ForumExtractor } from './extract.js';
import { createGotTransport, HttpClient, type HttpTransport } from './http.js';
import { threadDir, uniqueFilePath } from './paths.js';
import { logSummary, writeAssetTypeIndex, type CrawlSummary } from './report.js';
import { writeJson, ensureDir } from './storage.js';
import { DeltaStateStore } from './state.js';
import { ResponseTelemetry } from './telemetry.js';
import { AdaptiveThrottler, type Clock, type RandomSource } from './throttle.js';
import { assetTypeCategory, toMetadataFile, type AssetRecord, type ThreadRecord } from './types.js';
import { inferMimeType, sanitizeFilename, setPageParam, sha256, sleep, threadIdFromUrl } from './utils.js';

export type CrawlerDeps = {
  transport?: HttpTransport;
  sleep?: (ms: number) => Promise<void>;
  clock?: Clock;
  random?: RandomSource;
  now?: () => Date;
  logger?: Logger;
};

type Tally = {
  assetsDownloaded: number;
  assetsSkipped: number;
  assetsFailed: number;
  postsNew: number;
  postsEdited: number;
};

function range(from: number, to: number): number[] {
  const out: number[] = [];
  for (let n = from; n <= to; n++) out.push(n);
  return out;
}

/**
 * Discover → Diff → ProcessEach → Finalize over one forum board.
 * Threads are handled one after another; the pages and downloads of a single
 * thread share the fetcher's concurrency limit.
 */
export class Crawler {
  readonly telemetry: ResponseTelemetry;
  readonly throttler: AdaptiveThrottler;
  readonly http: HttpClient;
  readonly extractor: ForumExtractor;
  readonly store: DeltaStateStore;
  private cfg: CrawlConfig;
  private logger: Logger;
  private now: () => Date;
  private tally: Tally = Crawler.emptyTally();

  constructor(cfg: CrawlConfig, deps: CrawlerDeps = {}) {
    this.cfg = cfg;
    this.logger = deps.logger ?? console;
    this.now = deps.now ?? (() => new Date());

    this.telemetry = new ResponseTelemetry();
    this.throttler = new AdaptiveThrottler({
      tokensPerSecond: cfg.tokensPerSecond,
      capacity: cfg.bucketCapacity,
      initialBackoffMs: cfg.initialBackoffMs,
      maxBackoffMs: cfg.maxBackoffMs,
      jitter: cfg.jitter,
      clock: deps.clock,
      random: deps.random
    });
    this.http = new HttpClient({
      transport: deps.transport ?? createGotTransport({ userAgent: cfg.userAgent, timeoutMs: cfg.timeoutMs }),
      throttler: this.throttler,
      telemetry: this.telemetry,
      allowedDomains: cfg.allowedDomains,
      concurrency: cfg.concurrency,
      maxRetries: cfg.maxRetries,
      retryableStatuses: cfg.retryableStatuses,
      initialBackoffMs: cfg.initialBackoffMs,
      maxBackoffMs: cfg.maxBackoffMs,
      sleep: deps.sleep ?? sleep,
      logger: this.logger
    });
    this.extractor = new ForumExtractor({
      allowedDomains: cfg.allowedDomains,
      assetExtensions: cfg.assetExtensions,
      pageProbeLimit: cfg.pageProbeLimit,
      logger: this.logger
    });
    this.store = new DeltaStateStore({
      stateFile: cfg.stateFile,
      manifestFile: cfg.manifestFile,
      logger: this.logger,
      now: this.now
    });
  }

  private static emptyTally(): Tally {
    return { assetsDownloaded: 0, assetsSkipped: 0, assetsFailed: 0, postsNew: 0, postsEdited: 0 };
  }

  async run(): Promise<CrawlSummary> {
    this.tally = Crawler.emptyTally();
    this.store.load();

    const discovered = await this.discover();
    const visited = this.store.visitedUrls();
    const queue = discovered.filter((url) => !visited.has(url));
    this.logger.log(`[crawl] ${discovered.length} threads discovered, ${queue.length} new`);

    const processed: ThreadRecord[] = [];
    let failed = 0;
    for (const [i, url] of queue.entries()) {
      this.logger.log(`[crawl] (${i + 1}/${queue.length}) ${url}`);
      try {
        processed.push(await this.processThread(url));
      } catch (err) {
        failed += 1;
        this.logger.error(`[crawl] thread failed ${url}: ${toErrorMessage(err)}`);
      }
    }

    if (processed.length > 0) {
      const file = writeAssetTypeIndex(this.cfg.outputDir, processed);
      this.logger.log(`[crawl] wrote ${file}`);
    }

    const summary: CrawlSummary = {
      discovered: discovered.length,
      queued: queue.length,
      succeeded: processed.length,
      failed,
      skipped: discovered.length - queue.length,
      ...this.tally,
      selectorMisses: this.extractor.missCounts(),
      telemetry: this.telemetry.snapshot()
    };
    logSummary(summary, this.telemetry.summaryLines(), this.logger);
    return summary;
  }

  /** Thread URLs from every board page plus the configured extras. Only the root page is required. */
  async discover(): Promise<string[]> {
    const root = this.cfg.boardUrl;
    let html: string;
    try {
      html = await this.http.html(root);
    } catch (err) {
      throw new CrawlError(ErrorCode.DISCOVERY_FAILED, `Could not fetch board ${root}: ${toErrorMessage(err)}`, false, {
        url: root
      });
    }

    const links = new Set(this.extractor.threadLinks(html, root));
    const pageCount = this.extractor.boardPageCount(html);
    this.logger.log(`[crawl] board has ${pageCount} page(s)`);

    const rest = await Promise.all(
      range(2, pageCount).map(async (n) => {
        const pageUrl = setPageParam(root, n);
        try {
          const found = this.extractor.threadLinks(await this.http.html(pageUrl), pageUrl);
          if (found.length === 0) this.logger.warn(`[crawl] no threads on ${pageUrl}`);
          return found;
        } catch (err) {
          this.logger.warn(`[crawl] skipping board page ${pageUrl}: ${toErrorMessage(err)}`);
          return [];
        }
      })
    );
    for (const found of rest) for (const url of found) links.add(url);
    for (const url of this.cfg.extraThreadUrls) links.add(url);
    return [...links];
  }

  /**
   * Fetches every page of one thread, downloads what is new or stale and
   * writes metadata.json. The ledger is updated and saved only once the
   * thread's output is on disk.
   */
  async processThread(url: string): Promise<ThreadRecord> {
    const threadId = threadIdFromUrl(url);
    if (!threadId) throw new CrawlError(ErrorCode.PARSE_FAILURE, `No thread id in ${url}`, false, { url });

    const firstHtml = await this.http.html(url);
    const replyPages = await Promise.all(
      range(2, this.extractor.threadPageCount(firstHtml)).map(async (n) => {
        const pageUrl = setPageParam(url, n);
        return { url: pageUrl, html: await this.http.html(pageUrl) };
      })
    );
    const thread = this.extractor.thread(firstHtml, url, replyPages);
    if (!thread) throw new CrawlError(ErrorCode.PARSE_FAILURE, `No thread id in ${url}`, false, { url });

    const dir = threadDir(this.cfg.outputDir, assetTypeCategory(thread), thread.post_date, threadId, thread.title);
    const taken = new Set<string>();
    thread.assets = await Promise.all(thread.assets.map((a) => this.resolveAsset(a, dir, taken)));

    writeJson(path.join(dir, 'metadata.json'), toMetadataFile(thread, this.now().toISOString()), { sortKeys: true });

    for (const post of thread.posts) {
      const change = this.store.recordPost(threadId, post);
      if (change === 'new') this.tally.postsNew += 1;
      else if (change === 'edited') this.tally.postsEdited += 1;
    }
    this.store.recordThread(thread);
    for (const asset of thread.assets) this.store.recordAsset(asset);
    this.store.save();

    this.logger.log(`[crawl] thread ${threadId}: ${thread.posts.length} posts, ${thread.assets.length} assets -> ${dir}`);
    return thread;
  }

  /** Downloads an asset unless the ledger says the copy on record is current. Failures leave the record unfilled. */
  private async resolveAsset(asset: AssetRecord, dir: string, taken: Set<string>): Promise<AssetRecord> {
    const stored = this.store.getAsset(asset.url);
    if (stored) {
      let needed = false;
      try {
        const v = await this.http.validators(asset.url);
        needed = this.store.shouldRedownloadAsset(asset.url, v.etag, v.lastModified);
      } catch (err) {
        this.logger.warn(`[download] could not check ${asset.url}: ${toErrorMessage(err)}`);
      }
      if (!needed) {
        this.tally.assetsSkipped += 1;
        return {
          ...asset,
          checksum: stored.content_hash,
          size: stored.size,
          mime_type: stored.mime_type,
          etag: stored.etag,
          last_modified: stored.last_modified
        };
      }
    }

    try {
      const res = await this.http.download(asset.url, this.cfg.maxDownloadBytes);
      ensureDir(dir);
      const file = uniqueFilePath(dir, sanitizeFilename(asset.filename), taken);
      const filename = path.basename(file);
      fs.writeFileSync(file, res.body);
      this.tally.assetsDownloaded += 1;
      this.logger.log(`[download] ${asset.url} -> ${filename} (${res.body.length} bytes)`);
      return {
        ...asset,
        filename,
        size: res.body.length,
        checksum: sha256(res.body),
        mime_type: inferMimeType(filename, res.contentType),
        etag: res.etag,
        last_modified: res.lastModified
      };
    } catch (err) {
      this.tally.assetsFailed += 1;
      this.logger.warn(`[download] failed ${asset.url}: ${toErrorMessage(err)}`);
      return asset;
    }
  }
}
