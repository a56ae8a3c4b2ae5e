import { JSDOM } from 'jsdom';
import type TurndownService from 'turndown';

import type { ExtractionStrategy, OutputFormat } from '../types.js';
import { getStrategy } from './strategies/index.js';
import { createTurndownService } from './markdown.js';
import { blockText, pruneRegion } from './text.js';

/**
 * Structural parse of one HTML document.
 */
export interface ParsedDocument {
  /** Raw `href` values of every anchor, in document order. */
  links: string[];
  /** The main text of the page, rendered in the configured format. */
  text: string;
  /** Base URL for resolving `links` (honours `<base href>`). */
  baseUrl: string;
}

/**
 * The parse capability used by the content extractor.
 */
export interface HtmlParser {
  parse(html: string, url: string): ParsedDocument;
}

/**
 * Options for `createHtmlParser`.
 */
export interface HtmlParserOptions {
  extraction: ExtractionStrategy;
  format: OutputFormat;
}

/**
 * Create a jsdom-backed HtmlParser.
 *
 * Links are read from the whole document before the main region is
 * selected and pruned.
 */
export function createHtmlParser(options: HtmlParserOptions): HtmlParser {
  const strategy = getStrategy(options.extraction);
  const turndown: TurndownService | undefined =
    options.format === 'markdown' ? createTurndownService() : undefined;

  function render(region: Element): string {
    if (turndown) {
      return turndown.turndown(region.innerHTML);
    }
    return blockText(region);
  }

  return {
    parse(html: string, url: string): ParsedDocument {
      const dom = new JSDOM(html, { url });
      const document = dom.window.document;

      const links: string[] = [];
      for (const anchor of Array.from(document.querySelectorAll('a[href]'))) {
        const href = anchor.getAttribute('href');
        if (href !== null) {
          links.push(href);
        }
      }

      const region = strategy.selectRegion(html, url, document);
      let text = '';
      if (region) {
        pruneRegion(region);
        text = render(region);
      }

      return { links, text, baseUrl: document.baseURI };
    },
  };
}
