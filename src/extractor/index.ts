import type { CrawlConfig, NormalizedUrl, PageResult } from '../types.js';
import { tryNormalizeUrl } from '../crawler/base.js';
import { createHtmlParser } from './html-parser.js';
import type { HtmlParser, ParsedDocument } from './html-parser.js';

export { createHtmlParser } from './html-parser.js';
export type { HtmlParser, HtmlParserOptions, ParsedDocument } from './html-parser.js';
export {
  MainContentStrategy,
  ReadabilityStrategy,
  getStrategy,
} from './strategies/index.js';
export type { RegionStrategy } from './strategies/index.js';
export { createTurndownService } from './markdown.js';
export { blockText, pruneRegion, BLOCK_SELECTOR, NON_CONTENT_SELECTOR } from './text.js';

/**
 * Error thrown when a page body cannot be turned into a PageResult.
 */
export class ParseError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'ParseError';
  }
}

/**
 * Turns a fetched page body into a PageResult.
 */
export interface Extractor {
  extract(body: string, pageUrl: string): PageResult;
}

/**
 * Adapter between the crawler and the HTML parse capability.
 *
 * The parser decides what the main text is; the extractor resolves every
 * discovered href against the page and normalizes it, dropping hrefs that
 * are not http(s) URLs and repeats within the page.
 */
export class ContentExtractor implements Extractor {
  constructor(private readonly parser: HtmlParser) {}

  /**
   * Extract the main text and outgoing links of a page.
   *
   * @param body - The page's HTML
   * @param pageUrl - The URL the body was served from
   * @throws ParseError for an empty body or when the parser fails
   */
  extract(body: string, pageUrl: string): PageResult {
    if (body.trim() === '') {
      throw new ParseError(`Empty document: ${pageUrl}`, pageUrl);
    }

    let parsed: ParsedDocument;
    try {
      parsed = this.parser.parse(body, pageUrl);
    } catch (error) {
      throw new ParseError(
        `Failed to parse ${pageUrl}: ${error instanceof Error ? error.message : String(error)}`,
        pageUrl,
        error,
      );
    }

    const links: NormalizedUrl[] = [];
    const seen = new Set<NormalizedUrl>();
    let invalidLinks = 0;

    for (const href of parsed.links) {
      const link = tryNormalizeUrl(href, parsed.baseUrl);
      if (link === undefined) {
        invalidLinks++;
        continue;
      }
      if (!seen.has(link)) {
        seen.add(link);
        links.push(link);
      }
    }

    return {
      url: pageUrl,
      mainText: parsed.text,
      links,
      invalidLinks,
    };
  }
}

/**
 * Create a ContentExtractor using the jsdom parser configured for the crawl.
 */
export function createExtractor(
  config: Pick<CrawlConfig, 'extraction' | 'format'>,
): ContentExtractor {
  return new ContentExtractor(
    createHtmlParser({ extraction: config.extraction, format: config.format }),
  );
}
