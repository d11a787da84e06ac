#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig } from './config.js';
import { Crawler } from './crawler.js';
import { CrawlError, toErrorMessage } from './errors.js';

type Command = 'crawl' | 'help';

function parseCommand(arg: string | undefined): Command {
  return arg === 'crawl' ? 'crawl' : 'help';
}

async function main() {
  const cmd = parseCommand(process.argv[2]);
  switch (cmd) {
    case 'crawl':
      await runCrawl();
      break;
    case 'help':
    default:
      printHelp();
  }
}

async function runCrawl() {
  const cfg = loadConfig();
  console.log(`[crawl] board: ${cfg.boardUrl}`);
  console.log(`[crawl] output: ${cfg.outputDir}`);
  console.log(`[crawl] state: ${cfg.stateFile}`);
  const summary = await new Crawler(cfg).run();
  if (summary.failed > 0) process.exitCode = 2;
}

function printHelp() {
  console.log('Usage:');
  console.log('  npm run crawl     # Crawl the board and download new threads and attachments');
  console.log('Env:');
  console.log('  BOARD_URL=https://forum.example.com/forum/board/1-files/');
  console.log('  ALLOWED_DOMAINS=forum.example.com OUTPUT_DIR=output/threads STATE_FILE=scraper_state.json');
  console.log('  CONCURRENCY=8 TIMEOUT_MS=30000 MAX_RETRIES=5 INITIAL_BACKOFF_MS=2000 MAX_BACKOFF_MS=60000');
  console.log('  TOKENS_PER_SECOND=0.67 BUCKET_CAPACITY=8 MAX_DOWNLOAD_BYTES=52428800 PAGE_PROBE_LIMIT=30');
  console.log('  MANIFEST_FILE=manifest.json EXTRA_THREAD_URLS=url1,url2 USER_AGENT=...');
}

main().catch((err) => {
  if (err instanceof CrawlError) console.error(`[crawl] ${err.code}: ${err.message}`);
  else console.error(`[crawl] ${toErrorMessage(err)}`);
  process.exit(1);
});
