import * as cheerio from 'cheerio';
import { describe, expect, it } from 'vitest';
import { SelectorChain } from '../selectors.js';
import { silentLogger } from './helpers.js';

function root(html: string) {
  return cheerio.load(html).root();
}

describe('SelectorChain', () => {
  it('uses the first selector that matches', () => {
    const logger = silentLogger();
    const chain = new SelectorChain('title', ['h1.topic', '.title'], logger);

    const found = chain.selectOne(root('<h1 class="topic">A</h1><div class="title">B</div>'));
    expect(found?.text()).toBe('A');
    expect(chain.lastSuccessfulIndex).toBe(0);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('falls back in declared order and warns', () => {
    const logger = silentLogger();
    const chain = new SelectorChain('title', ['h1.topic', '.title', 'h2'], logger);

    const found = chain.selectOne(root('<h2>C</h2><div class="title">B</div>'));
    expect(found?.text()).toBe('B');
    expect(chain.lastSuccessfulIndex).toBe(1);
    expect(logger.warn).toHaveBeenCalledWith('[extract] title: fallback selector #2 (.title)');
  });

  it('keeps using the selector that worked last, even when an earlier one matches again', () => {
    const chain = new SelectorChain('title', ['h1.topic', '.title'], silentLogger());
    chain.selectOne(root('<div class="title">first</div>'));

    const found = chain.selectOne(root('<h1 class="topic">A</h1><div class="title">B</div>'));
    expect(found?.text()).toBe('B');
    expect(chain.lastSuccessfulIndex).toBe(1);
  });

  it('moves on when the remembered selector stops matching', () => {
    const chain = new SelectorChain('title', ['h1.topic', '.title'], silentLogger());
    chain.selectOne(root('<div class="title">first</div>'));

    const found = chain.selectOne(root('<h1 class="topic">A</h1>'));
    expect(found?.text()).toBe('A');
    expect(chain.lastSuccessfulIndex).toBe(0);
  });

  it('returns every match for selectAll', () => {
    const chain = new SelectorChain('posts', ['article.message'], silentLogger());
    const found = chain.selectAll(root('<article class="message">1</article><article class="message">2</article>'));
    expect(found?.length).toBe(2);
  });

  it('returns null and counts a miss when nothing matches', () => {
    const logger = silentLogger();
    const chain = new SelectorChain('author', ['.username', '.author'], logger);

    expect(chain.selectAll(root('<p>none</p>'))).toBeNull();
    expect(chain.selectOne(root('<p>none</p>'))).toBeNull();
    expect(chain.misses).toBe(2);
    expect(chain.lastSuccessfulIndex).toBe(0);
    expect(logger.warn).toHaveBeenCalledWith('[extract] author: all selectors failed');
  });

  it('refuses an empty chain', () => {
    expect(() => new SelectorChain('empty', [])).toThrow('Selector chain empty needs at least one selector');
  });
});
