import path from 'node:path';

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

export type CrawlConfig = {
  boardUrl: string;
  allowedDomains: string[]; // every outbound URL must be on one of these hosts
  outputDir: string; // thread folders land under here
  stateFile: string;
  manifestFile: string; // legacy flat list of visited URLs, migrated once
  concurrency: number; // in-flight HTTP operations, pages and downloads alike
  timeoutMs: number;
  maxRetries: number;
  retryableStatuses: number[];
  initialBackoffMs: number;
  maxBackoffMs: number;
  tokensPerSecond: number;
  bucketCapacity: number;
  jitter: number;
  maxDownloadBytes: number;
  pageProbeLimit: number; // board pages to try when pagination is not detectable
  assetExtensions: string[];
  extraThreadUrls: string[];
  userAgent: string;
};

export const DEFAULT_BOARD_URL = 'https://forum.malighting.com/forum/board/35-grandma2-macro-share/';

export function defaultConfig(overrides: Partial<CrawlConfig> = {}): CrawlConfig {
  const boardUrl = overrides.boardUrl ?? DEFAULT_BOARD_URL;
  return {
    boardUrl,
    allowedDomains: [new URL(boardUrl).hostname],
    outputDir: path.resolve('output/threads'),
    stateFile: path.resolve('scraper_state.json'),
    manifestFile: path.resolve('manifest.json'),
    concurrency: 8,
    timeoutMs: 30000,
    maxRetries: 5,
    retryableStatuses: [429, 500, 502, 503, 504],
    initialBackoffMs: 2000,
    maxBackoffMs: 60000,
    tokensPerSecond: 0.67,
    bucketCapacity: 8,
    jitter: 0.1,
    maxDownloadBytes: 50 * 1024 * 1024,
    pageProbeLimit: 30,
    assetExtensions: ['.xml', '.zip', '.gz', '.show'],
    extraThreadUrls: [],
    userAgent: 'forum-harvester/0.1 (+polite incremental crawler)',
    ...overrides
  };
}

function int(v: string | undefined, fallback: number): number {
  if (!v) return fallback;
  const n = parseInt(v, 10);
  return Number.isFinite(n) ? n : fallback;
}

function float(v: string | undefined, fallback: number): number {
  if (!v) return fallback;
  const n = parseFloat(v);
  return Number.isFinite(n) ? n : fallback;
}

function list(v: string | undefined): string[] | undefined {
  if (!v) return undefined;
  const items = v.split(',').map((s) => s.trim()).filter(Boolean);
  return items.length ? items : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CrawlConfig {
  const base = defaultConfig({ boardUrl: env.BOARD_URL || DEFAULT_BOARD_URL });
  return {
    ...base,
    allowedDomains: list(env.ALLOWED_DOMAINS) ?? base.allowedDomains,
    outputDir: env.OUTPUT_DIR ? path.resolve(env.OUTPUT_DIR) : base.outputDir,
    stateFile: env.STATE_FILE ? path.resolve(env.STATE_FILE) : base.stateFile,
    manifestFile: env.MANIFEST_FILE ? path.resolve(env.MANIFEST_FILE) : base.manifestFile,
    concurrency: Math.max(1, int(env.CONCURRENCY, base.concurrency)),
    timeoutMs: int(env.TIMEOUT_MS, base.timeoutMs),
    maxRetries: Math.max(1, int(env.MAX_RETRIES, base.maxRetries)),
    initialBackoffMs: int(env.INITIAL_BACKOFF_MS, base.initialBackoffMs),
    maxBackoffMs: int(env.MAX_BACKOFF_MS, base.maxBackoffMs),
    tokensPerSecond: float(env.TOKENS_PER_SECOND, base.tokensPerSecond),
    bucketCapacity: int(env.BUCKET_CAPACITY, base.bucketCapacity),
    maxDownloadBytes: int(env.MAX_DOWNLOAD_BYTES, base.maxDownloadBytes),
    pageProbeLimit: int(env.PAGE_PROBE_LIMIT, base.pageProbeLimit),
    extraThreadUrls: list(env.EXTRA_THREAD_URLS) ?? base.extraThreadUrls,
    userAgent: env.USER_AGENT || base.userAgent
  };
}
