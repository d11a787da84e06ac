import * as cheerio from 'cheerio';
import type { AnyNode } from 'domhandler';
import type { Logger } from './config.js';
import { SelectorChain } from './selectors.js';
import { postId, type AssetRecord, type PostRecord, type ThreadRecord } from './types.js';
import { contentHash, ensureAbsoluteUrl, isAllowedHost, parseCount, textClean, threadIdFromUrl, urlBasename } from './utils.js';

export const UNKNOWN_TITLE = 'Unknown Title';
export const UNKNOWN_AUTHOR = 'Unknown';

const PAGE_LINK_RE = /\/page\/(\d+)\/|[?&]pageNo=(\d+)/;
const PAGE_OF_RE = /Page\s+\d+\s+of\s+(\d+)/i;
const REPLIES_RE = /([\d.,]+)\s*(?:replies|antworten)/i;
const VIEWS_RE = /([\d.,]+)\s*(?:views|ansichten)/i;

export type ThreadPage = {
  title: string;
  posts: PostRecord[];
  assets: AssetRecord[];
  replies: number;
  views: number;
};

type ExtractorOptions = {
  allowedDomains: string[];
  assetExtensions: string[];
  pageProbeLimit: number;
  logger?: Logger;
};

/**
 * HTML → records for the forum's board and thread pages. Every field goes
 * through a selector chain, and a field that cannot be found comes back as
 * its sentinel instead of failing the page.
 */
export class ForumExtractor {
  private opts: ExtractorOptions;
  private chains: {
    title: SelectorChain;
    posts: SelectorChain;
    author: SelectorChain;
    date: SelectorChain;
    content: SelectorChain;
    stats: SelectorChain;
    pagination: SelectorChain;
    threadLinks: SelectorChain;
    attachments: SelectorChain;
  };

  constructor(opts: ExtractorOptions) {
    this.opts = opts;
    const log = opts.logger ?? console;
    this.chains = {
      title: new SelectorChain(
        'thread_title',
        ['h1.topic-title', '.contentTitle', 'h1[itemprop="headline"]', '.topicHeader h1', 'article.message:first-child h2'],
        log
      ),
      posts: new SelectorChain('post_elements', ['article.message', '.message', '[data-role="message"]', '.post', '.forumPost'], log),
      author: new SelectorChain('post_author', ['.username', '.author', '[itemprop="author"]', '.postAuthor', '.userInfo h3'], log),
      date: new SelectorChain('post_date', ['time[datetime]', '.datetime', '[data-timestamp]', '.postDate'], log),
      content: new SelectorChain(
        'post_content',
        ['.messageContent', '.messageText', '[itemprop="text"]', '.postContent', '.postBody'],
        log
      ),
      stats: new SelectorChain('thread_stats', ['.stats', '.threadStats', '[data-stats]', '.topicStats'], log),
      pagination: new SelectorChain('pagination', ['.pageNavigation a', '.pagination a', '[role="navigation"] a', '.pageNav a'], log),
      threadLinks: new SelectorChain(
        'thread_links',
        ['a.wbbTopicLink', '.topicLink', 'a[data-topic-id]', 'a[href*="/forum/thread/"]'],
        log
      ),
      attachments: new SelectorChain(
        'attachments',
        [
          'a.messageAttachment',
          'a.attachment, a[class*="attachment"]',
          '.attachmentList a[href*="/attachment/"]',
          'a[href*="file-download"], a[href*="/attachment/"]'
        ],
        log
      )
    };
  }

  /** Chain name → number of documents on which every selector missed. */
  missCounts(): Record<string, number> {
    const out: Record<string, number> = {};
    for (const chain of Object.values(this.chains)) {
      if (chain.misses > 0) out[chain.name] = chain.misses;
    }
    return out;
  }

  threadLinks(html: string, pageUrl: string): string[] {
    const $ = cheerio.load(html);
    const found = this.chains.threadLinks.selectAll($.root());
    if (!found) return [];
    const links: string[] = [];
    found.each((_, a) => {
      const abs = ensureAbsoluteUrl(pageUrl, $(a).attr('href'));
      if (!abs || !isAllowedHost(abs, this.opts.allowedDomains)) return;
      const u = new URL(abs);
      u.hash = '';
      u.searchParams.delete('pageNo');
      const clean = u.toString();
      if (threadIdFromUrl(clean)) links.push(clean);
    });
    return [...new Set(links)];
  }

  /** Board page count; falls back to the probe ceiling when nothing on the page says. */
  boardPageCount(html: string): number {
    const detected = this.detectPageCount(cheerio.load(html));
    return detected ?? Math.max(1, this.opts.pageProbeLimit);
  }

  threadPageCount(html: string): number {
    return this.detectPageCount(cheerio.load(html)) ?? 1;
  }

  /** One page of a thread. Attachment links resolve against `pageUrl`. */
  threadPage(html: string, threadId: string, pageUrl: string): ThreadPage {
    const $ = cheerio.load(html);
    const root = $.root();

    const titleEl = this.chains.title.selectOne(root);
    const title = titleEl ? textClean(titleEl.text()) || UNKNOWN_TITLE : UNKNOWN_TITLE;

    const postEls = this.chains.posts.selectAll(root);
    const posts: PostRecord[] = [];
    const postIndex = new Map<AnyNode, number>();
    postEls?.each((i, el) => {
      const n = i + 1;
      postIndex.set(el, n);
      posts.push(this.post($(el), threadId, n));
    });

    const { replies, views } = this.stats(root);

    return {
      title,
      posts,
      assets: this.assets($, root, postIndex, pageUrl),
      replies,
      views
    };
  }

  /**
   * First page plus any reply pages, in page order, → one record. Null when
   * the URL carries no thread id.
   */
  thread(html: string, url: string, replyPages: { url: string; html: string }[] = []): ThreadRecord | null {
    const threadId = threadIdFromUrl(url);
    if (!threadId) return null;
    const pages = [{ url, html }, ...replyPages].map((p) => this.threadPage(p.html, threadId, p.url));
    return mergeThreadPages(threadId, url, pages);
  }

  private post<T extends AnyNode>(el: cheerio.Cheerio<T>, threadId: string, n: number): PostRecord {
    const authorEl = this.chains.author.selectOne(el);
    const author = authorEl ? textClean(authorEl.text()) || UNKNOWN_AUTHOR : UNKNOWN_AUTHOR;

    let postDate: string | null = null;
    const dateEl = this.chains.date.selectOne(el);
    if (dateEl) {
      postDate = dateEl.attr('datetime') || dateEl.attr('data-timestamp') || textClean(dateEl.text()) || null;
    }

    const contentEl = this.chains.content.selectOne(el);
    const text = contentEl ? textClean(contentEl.text()) : '';

    return {
      author,
      post_date: postDate,
      post_text: text,
      post_number: n,
      post_id: postId(threadId, n),
      content_hash: contentHash(text)
    };
  }

  private stats<T extends AnyNode>(root: cheerio.Cheerio<T>): { replies: number; views: number } {
    const el = this.chains.stats.selectOne(root);
    if (!el) return { replies: 0, views: 0 };
    const text = el.text();
    return {
      replies: parseCount(text.match(REPLIES_RE)?.[1]) ?? 0,
      views: parseCount(text.match(VIEWS_RE)?.[1]) ?? 0
    };
  }

  private assets<T extends AnyNode>(
    $: cheerio.CheerioAPI,
    root: cheerio.Cheerio<T>,
    postIndex: Map<AnyNode, number>,
    pageUrl: string
  ): AssetRecord[] {
    const links = this.chains.attachments.selectAll(root);
    if (!links) return [];

    const exts = this.opts.assetExtensions.map((e) => e.toLowerCase());
    const seen = new Set<string>();
    const assets: AssetRecord[] = [];

    links.each((_, a) => {
      const link = $(a);
      const href = link.attr('href');
      const url = ensureAbsoluteUrl(pageUrl, href);
      if (!url || !isAllowedHost(url, this.opts.allowedDomains) || seen.has(url)) return;

      const nameEl = link.find('span.messageAttachmentFilename').first();
      let filename = textClean(nameEl.text());
      if (!filename) {
        const clone = link.clone();
        clone.find('span.messageAttachmentMeta').remove();
        filename = textClean(clone.text()) || urlBasename(url);
      }
      if (!exts.some((ext) => filename.toLowerCase().endsWith(ext))) return;

      let postNumber: number | null = null;
      for (const parent of link.parents().toArray()) {
        const n = postIndex.get(parent);
        if (n !== undefined) {
          postNumber = n;
          break;
        }
      }

      seen.add(url);
      assets.push({
        filename,
        url,
        size: null,
        download_count: downloadCount(link.find('span.messageAttachmentMeta').first().text()),
        checksum: null,
        post_number: postNumber,
        mime_type: null,
        etag: null,
        last_modified: null
      });
    });

    return assets;
  }

  private detectPageCount($: cheerio.CheerioAPI): number | null {
    let max = 0;
    const collect = (href: string | undefined) => {
      const m = href?.match(PAGE_LINK_RE);
      if (m) max = Math.max(max, parseInt(m[1] ?? m[2], 10));
    };

    this.chains.pagination.selectAll($.root())?.each((_, a) => collect($(a).attr('href')));
    if (max > 1) return max;

    $('a[href]').each((_, a) => collect($(a).attr('href')));
    if (max > 1) return max;

    const info = $.root().text().match(PAGE_OF_RE);
    if (info) return Math.max(1, parseInt(info[1], 10));

    return max === 1 ? 1 : null;
  }
}

/** "5.07 kB – 317 Downloads" → 317 */
export function downloadCount(meta: string): number | null {
  const parts = meta.split('–');
  if (parts.length < 2 || !/Downloads/i.test(parts[1])) return null;
  return parseCount(parts[1].trim().split(/\s+/)[0]);
}

/**
 * Joins a thread's pages in page order. Post numbers continue across pages
 * and each asset's owning post number moves with its post.
 */
export function mergeThreadPages(threadId: string, url: string, pages: ThreadPage[]): ThreadRecord {
  const posts: PostRecord[] = [];
  const assets: AssetRecord[] = [];
  const seenAssets = new Set<string>();

  for (const page of pages) {
    const offset = posts.length;
    for (const p of page.posts) {
      const n = offset + p.post_number;
      posts.push({ ...p, post_number: n, post_id: postId(threadId, n) });
    }
    for (const a of page.assets) {
      if (seenAssets.has(a.url)) continue;
      seenAssets.add(a.url);
      assets.push({ ...a, post_number: a.post_number === null ? null : offset + a.post_number });
    }
  }

  const first = pages[0];
  const op = posts[0];
  return {
    thread_id: threadId,
    title: first?.title ?? UNKNOWN_TITLE,
    url,
    author: op?.author ?? UNKNOWN_AUTHOR,
    post_date: op?.post_date ?? null,
    posts,
    replies: first?.replies ?? 0,
    views: first?.views ?? 0,
    assets
  };
}
