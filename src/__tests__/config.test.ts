import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { DEFAULT_BOARD_URL, defaultConfig, loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    const cfg = loadConfig({});
    expect(cfg.boardUrl).toBe(DEFAULT_BOARD_URL);
    expect(cfg.allowedDomains).toEqual(['forum.malighting.com']);
    expect(cfg.outputDir).toBe(path.resolve('output/threads'));
    expect(cfg.stateFile).toBe(path.resolve('scraper_state.json'));
    expect(cfg).toMatchObject({
      concurrency: 8,
      maxRetries: 5,
      initialBackoffMs: 2000,
      maxBackoffMs: 60000,
      tokensPerSecond: 0.67,
      bucketCapacity: 8,
      pageProbeLimit: 30,
      assetExtensions: ['.xml', '.zip', '.gz', '.show'],
      retryableStatuses: [429, 500, 502, 503, 504],
      extraThreadUrls: []
    });
  });

  it('reads overrides from the environment', () => {
    const cfg = loadConfig({
      BOARD_URL: 'https://forum.example.com/forum/board/1-files/',
      ALLOWED_DOMAINS: 'forum.example.com, files.example.com',
      OUTPUT_DIR: 'tmp/out',
      CONCURRENCY: '3',
      TOKENS_PER_SECOND: '1.5',
      MAX_DOWNLOAD_BYTES: '1024',
      EXTRA_THREAD_URLS: 'https://forum.example.com/forum/thread/9-a/,https://forum.example.com/forum/thread/10-b/'
    });

    expect(cfg.boardUrl).toBe('https://forum.example.com/forum/board/1-files/');
    expect(cfg.allowedDomains).toEqual(['forum.example.com', 'files.example.com']);
    expect(cfg.outputDir).toBe(path.resolve('tmp/out'));
    expect(cfg.concurrency).toBe(3);
    expect(cfg.tokensPerSecond).toBe(1.5);
    expect(cfg.maxDownloadBytes).toBe(1024);
    expect(cfg.extraThreadUrls).toEqual([
      'https://forum.example.com/forum/thread/9-a/',
      'https://forum.example.com/forum/thread/10-b/'
    ]);
  });

  it('derives the allow-list from the board URL', () => {
    expect(loadConfig({ BOARD_URL: 'https://forum.example.com/forum/board/1-files/' }).allowedDomains).toEqual([
      'forum.example.com'
    ]);
  });

  it('ignores unusable numbers and keeps concurrency at least one', () => {
    const cfg = loadConfig({ TIMEOUT_MS: 'soon', CONCURRENCY: '0' });
    expect(cfg.timeoutMs).toBe(30000);
    expect(cfg.concurrency).toBe(1);
  });
});

describe('defaultConfig', () => {
  it('applies overrides last', () => {
    expect(defaultConfig({ concurrency: 2 }).concurrency).toBe(2);
  });
});
