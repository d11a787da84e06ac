import path from 'node:path';
import type { Logger } from './config.js';
import { writeJson } from './storage.js';
import type { TelemetrySnapshot } from './telemetry.js';
import { assetTypes, type ThreadRecord } from './types.js';
import { fileType } from './utils.js';

export const ASSET_INDEX_FILE = 'asset_type_index.json';

type ThreadRef = { thread_id: string; title: string; url: string };

export type AssetTypeIndex = {
  by_type: Record<string, (ThreadRef & { files: string[] })[]>;
  multi_type_threads: (ThreadRef & { asset_types: string[] })[];
};

export type CrawlSummary = {
  discovered: number;
  queued: number;
  succeeded: number;
  failed: number;
  skipped: number;
  assetsDownloaded: number;
  assetsSkipped: number;
  assetsFailed: number;
  postsNew: number;
  postsEdited: number;
  selectorMisses: Record<string, number>;
  telemetry: TelemetrySnapshot;
};

/** Groups threads by attachment extension. Threads without attachments are left out. */
export function buildAssetTypeIndex(threads: ThreadRecord[]): AssetTypeIndex {
  const index: AssetTypeIndex = { by_type: {}, multi_type_threads: [] };
  for (const t of threads) {
    const ref = { thread_id: t.thread_id, title: t.title, url: t.url };
    const types = assetTypes(t);
    for (const type of types) {
      const files = t.assets.filter((a) => fileType(a.filename) === type).map((a) => a.filename);
      (index.by_type[type] ??= []).push({ ...ref, files });
    }
    if (types.length > 1) index.multi_type_threads.push({ ...ref, asset_types: types });
  }
  return index;
}

export function writeAssetTypeIndex(dir: string, threads: ThreadRecord[]): string {
  const file = path.join(dir, ASSET_INDEX_FILE);
  writeJson(file, buildAssetTypeIndex(threads), { sortKeys: true });
  return file;
}

export function summaryLines(s: CrawlSummary): string[] {
  const lines = [
    `threads discovered: ${s.discovered}`,
    `threads queued: ${s.queued} (skipped ${s.skipped} already seen)`,
    `threads succeeded: ${s.succeeded}`,
    `threads failed: ${s.failed}`,
    `posts new: ${s.postsNew}, edited: ${s.postsEdited}`,
    `assets downloaded: ${s.assetsDownloaded}, unchanged: ${s.assetsSkipped}, failed: ${s.assetsFailed}`
  ];
  const misses = Object.entries(s.selectorMisses);
  if (misses.length) {
    lines.push('selector misses:');
    for (const [name, n] of misses) lines.push(`  ${name}: ${n}`);
  }
  return lines;
}

export function logSummary(s: CrawlSummary, telemetryLines: string[], logger: Logger = console) {
  for (const line of summaryLines(s)) logger.log(`[crawl] ${line}`);
  for (const line of telemetryLines) logger.log(`[http] ${line}`);
}
