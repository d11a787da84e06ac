import type * as cheerio from 'cheerio';
import type { AnyNode, Element } from 'domhandler';
import type { Logger } from './config.js';

/**
 * Ordered CSS selectors for one logical field. The selector that matched
 * last time is tried first; otherwise they are tried in declared order and
 * the first one with a non-empty match wins and is remembered.
 *
 * A miss never throws. Callers pick their own sentinel for `null` / `[]`.
 */
export class SelectorChain {
  readonly name: string;
  readonly selectors: readonly string[];
  private lastIndex = 0;
  private missCount = 0;
  private logger: Logger;

  constructor(name: string, selectors: readonly string[], logger: Logger = console) {
    if (selectors.length === 0) throw new Error(`Selector chain ${name} needs at least one selector`);
    this.name = name;
    this.selectors = selectors;
    this.logger = logger;
  }

  get lastSuccessfulIndex(): number {
    return this.lastIndex;
  }

  get misses(): number {
    return this.missCount;
  }

  selectAll<T extends AnyNode>(scope: cheerio.Cheerio<T>): cheerio.Cheerio<Element> | null {
    const first = scope.find(this.selectors[this.lastIndex]);
    if (first.length > 0) return first;

    for (let i = 0; i < this.selectors.length; i++) {
      if (i === this.lastIndex) continue;
      const found = scope.find(this.selectors[i]);
      if (found.length > 0) {
        if (i > 0) this.logger.warn(`[extract] ${this.name}: fallback selector #${i + 1} (${this.selectors[i]})`);
        this.lastIndex = i;
        return found;
      }
    }

    this.missCount += 1;
    this.logger.warn(`[extract] ${this.name}: all selectors failed`);
    return null;
  }

  selectOne<T extends AnyNode>(scope: cheerio.Cheerio<T>): cheerio.Cheerio<Element> | null {
    const all = this.selectAll(scope);
    return all ? all.first() : null;
  }
}
