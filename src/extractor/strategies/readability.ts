import { JSDOM } from 'jsdom';
import { Readability } from '@mozilla/readability';

import type { RegionStrategy } from './index.js';
import { MainContentStrategy } from './main-content.js';

/**
 * Readability region strategy.
 *
 * Uses Mozilla Readability to find the article content. Readability
 * mutates the document it reads, so it runs on a separate parse of the
 * page; the article HTML is then mounted into a detached container of the
 * caller's document.
 *
 * If Readability cannot extract content, falls back to the main-element
 * strategy.
 */
export class ReadabilityStrategy implements RegionStrategy {
  private readonly fallback = new MainContentStrategy();

  selectRegion(html: string, url: string, document: Document): Element | null {
    const scratch = new JSDOM(html, { url });
    const article = new Readability(scratch.window.document).parse();

    if (!article || !article.content) {
      return this.fallback.selectRegion(html, url, document);
    }

    const container = document.createElement('div');
    container.innerHTML = article.content;
    return container;
  }
}
