import fs from 'node:fs';
import { describe, expect, it } from 'vitest';
import { downloadCount, ForumExtractor, mergeThreadPages, UNKNOWN_AUTHOR, UNKNOWN_TITLE } from '../extract.js';
import { contentHash } from '../utils.js';
import { silentLogger } from './helpers.js';

const BOARD = 'https://forum.example.com/forum/board/35-macros/';
const THREAD = 'https://forum.example.com/forum/thread/101-blink-macro/';
const THREAD_P2 = `${THREAD}?pageNo=2`;

function fixture(name: string): string {
  return fs.readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf-8');
}

function extractor(pageProbeLimit = 30) {
  return new ForumExtractor({
    allowedDomains: ['forum.example.com'],
    assetExtensions: ['.xml', '.zip', '.gz', '.show'],
    pageProbeLimit,
    logger: silentLogger()
  });
}

describe('ForumExtractor.threadLinks', () => {
  it('returns absolute, allow-listed, de-duplicated thread URLs', () => {
    expect(extractor().threadLinks(fixture('board.html'), BOARD)).toEqual([
      'https://forum.example.com/forum/thread/101-blink-macro/',
      'https://forum.example.com/forum/thread/102-fader-tricks/'
    ]);
  });

  it('falls back to any link into /forum/thread/', () => {
    const html = '<ul><li><a href="/forum/thread/7-plain-link/">plain</a></li></ul>';
    expect(extractor().threadLinks(html, BOARD)).toEqual(['https://forum.example.com/forum/thread/7-plain-link/']);
  });
});

describe('page counts', () => {
  it('reads the highest page from pagination links', () => {
    expect(extractor().boardPageCount(fixture('board.html'))).toBe(3);
    expect(extractor().threadPageCount(fixture('thread-page1.html'))).toBe(2);
  });

  it('uses "Page X of Y" text when there are no page links', () => {
    expect(extractor().boardPageCount('<p>Page 1 of 4</p>')).toBe(4);
  });

  it('tries pages up to the ceiling on a board that does not say', () => {
    expect(extractor(12).boardPageCount('<p>threads</p>')).toBe(12);
  });

  it('treats a thread without pagination as a single page', () => {
    expect(extractor().threadPageCount('<p>one page</p>')).toBe(1);
  });
});

describe('ForumExtractor.threadPage', () => {
  it('extracts title, stats, posts and attachments', () => {
    const page = extractor().threadPage(fixture('thread-page1.html'), '101', THREAD);

    expect(page.title).toBe('Blink macro for the desk');
    expect(page.replies).toBe(2);
    expect(page.views).toBe(1234);
    expect(page.posts).toEqual([
      {
        author: 'lamp_op',
        post_date: '2023-05-14T18:22:00+02:00',
        post_text: 'First post text',
        post_number: 1,
        post_id: '101-1',
        content_hash: contentHash('First post text')
      },
      {
        author: 'helper',
        post_date: '2023-05-15T09:00:00Z',
        post_text: 'Thanks, see also',
        post_number: 2,
        post_id: '101-2',
        content_hash: contentHash('Thanks, see also')
      }
    ]);
  });

  it('keeps only allow-listed attachments with a wanted extension', () => {
    const page = extractor().threadPage(fixture('thread-page1.html'), '101', THREAD);

    expect(page.assets.map((a) => [a.filename, a.url, a.download_count, a.post_number])).toEqual([
      ['blink.xml', 'https://forum.example.com/forum/attachment/555-blink-xml/', 317, 1],
      ['pack.zip', 'https://forum.example.com/forum/attachment/556-pack-zip/', 1024, 2]
    ]);
    expect(page.assets[0]).toMatchObject({ size: null, checksum: null, mime_type: null, etag: null, last_modified: null });
  });

  it('takes the filename from the link text when there is no filename element', () => {
    const page = extractor().threadPage(fixture('thread-page2.html'), '101', THREAD_P2);
    expect(page.assets[0]).toMatchObject({ filename: 'v2.xml', download_count: null, post_number: 1 });
  });

  it('falls back to sentinels on a page with nothing recognisable', () => {
    const ex = extractor();
    const page = ex.threadPage('<html><body><p>nothing</p></body></html>', '9', THREAD);

    expect(page).toEqual({ title: UNKNOWN_TITLE, posts: [], assets: [], replies: 0, views: 0 });
    expect(ex.missCounts()).toMatchObject({ thread_title: 1, post_elements: 1, thread_stats: 1 });
  });

  it('fills missing post fields with sentinels', () => {
    const page = extractor().threadPage('<article class="message"><p>bare</p></article>', '9', THREAD);
    expect(page.posts).toEqual([
      { author: UNKNOWN_AUTHOR, post_date: null, post_text: '', post_number: 1, post_id: '9-1', content_hash: null }
    ]);
  });

  it('reads a post date from data-timestamp when there is no datetime attribute', () => {
    const html =
      '<article class="message"><span class="datetime" data-timestamp="1684080000">yesterday</span>' +
      '<div class="messageContent">hi</div></article>';
    expect(extractor().threadPage(html, '9', THREAD).posts[0].post_date).toBe('1684080000');
  });

  it('resolves relative attachment links against the thread page', () => {
    const html = '<article class="message"><a class="messageAttachment" href="file-download/9-x.xml">x.xml</a></article>';
    const page = extractor().threadPage(html, '101', THREAD);
    expect(page.assets.map((a) => a.url)).toEqual([
      'https://forum.example.com/forum/thread/101-blink-macro/file-download/9-x.xml'
    ]);
  });
});

describe('ForumExtractor.thread', () => {
  it('builds a record from the first page', () => {
    const thread = extractor().thread(fixture('thread-page1.html'), THREAD);
    expect(thread).toMatchObject({
      thread_id: '101',
      title: 'Blink macro for the desk',
      url: THREAD,
      author: 'lamp_op',
      post_date: '2023-05-14T18:22:00+02:00',
      replies: 2,
      views: 1234
    });
    expect(thread?.posts).toHaveLength(2);
  });

  it('merges reply pages after the first', () => {
    const thread = extractor().thread(fixture('thread-page1.html'), THREAD, [
      { url: THREAD_P2, html: fixture('thread-page2.html') }
    ]);
    expect(thread?.posts.map((p) => p.post_id)).toEqual(['101-1', '101-2', '101-3']);
    expect(thread?.assets.map((a) => a.filename)).toEqual(['blink.xml', 'pack.zip', 'v2.xml']);
  });

  it('returns null for a URL without a thread id', () => {
    expect(extractor().thread(fixture('thread-page1.html'), BOARD)).toBeNull();
  });
});

describe('mergeThreadPages', () => {
  it('numbers posts across pages and drops repeated attachments', () => {
    const ex = extractor();
    const p1 = ex.threadPage(fixture('thread-page1.html'), '101', THREAD);
    const p2 = ex.threadPage(fixture('thread-page2.html'), '101', THREAD_P2);
    const thread = mergeThreadPages('101', THREAD, [p1, p2]);

    expect(thread.posts.map((p) => [p.post_number, p.post_id, p.post_text])).toEqual([
      [1, '101-1', 'First post text'],
      [2, '101-2', 'Thanks, see also'],
      [3, '101-3', 'Updated version attached']
    ]);
    expect(thread.assets.map((a) => [a.filename, a.post_number])).toEqual([
      ['blink.xml', 1],
      ['pack.zip', 2],
      ['v2.xml', 3]
    ]);
    expect(thread.replies).toBe(2);
    expect(thread.views).toBe(1234);
  });
});

describe('downloadCount', () => {
  it.each([
    ['5.07 kB – 317 Downloads', 317],
    ['3 MB – 2.500 Downloads', 2500],
    ['12 kB', null],
    ['', null]
  ])('%s -> %s', (meta, expected) => {
    expect(downloadCount(meta)).toBe(expected);
  });
});
