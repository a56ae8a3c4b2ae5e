import type { CrawlSummary } from '../types.js';
import type { UserCrawlConfig } from '../config.js';
import { validateAndMergeConfig } from '../config.js';
import { createFetcher } from '../fetcher/index.js';
import { createExtractor } from '../extractor/index.js';
import { cleanOutputDir, createOutputWriter } from '../output/index.js';
import { Crawler } from '../crawler/scheduler.js';

/**
 * Crawl from a set of seed URLs and append the main text of every page
 * to flat files under the output directory.
 *
 * This is the main SDK entry point. It validates the configuration,
 * creates the fetcher, extractor and output writer, runs the crawler and
 * releases the fetcher afterwards. Per-page failures never reject; they
 * are counted in the returned summary.
 *
 * @param userConfig - Config with at least `startUrls`. All other fields
 *   fall back to CONFIG_DEFAULTS.
 * @returns The crawl summary
 * @throws ConfigError for invalid configuration
 *
 * @example
 * ```typescript
 * const summary = await crawlSite({
 *   startUrls: ['https://docs.example.com/'],
 *   maxDepth: 2,
 *   outputDir: './pages',
 * });
 * console.log(`${summary.pagesWritten} pages written`);
 * ```
 */
export async function crawlSite(userConfig: UserCrawlConfig): Promise<CrawlSummary> {
  const config = validateAndMergeConfig(userConfig);

  if (config.clean) {
    await cleanOutputDir(config.outputDir);
  }

  const fetcher = createFetcher({
    timeoutMs: config.timeoutMs,
    headers: config.headers,
  });
  const extractor = createExtractor(config);
  const writer = createOutputWriter(config);

  try {
    const crawler = new Crawler(
      {
        maxDepth: config.maxDepth,
        concurrency: config.concurrency,
        sameHostOnly: config.sameHostOnly,
        includePatterns: config.includePatterns,
        excludePatterns: config.excludePatterns,
        outputDir: config.outputDir,
        onEvent: config.onEvent,
        signal: config.signal,
      },
      fetcher,
      extractor,
      writer,
    );
    return await crawler.run(config.startUrls);
  } finally {
    fetcher.close();
  }
}

// Default export
export default crawlSite;

// Re-export building blocks for advanced usage
export { createFetcher, FetchError, DEFAULT_USER_AGENT } from '../fetcher/index.js';
export type { Fetcher, FetchedPage, FetcherOptions } from '../fetcher/index.js';
export { createExtractor, ContentExtractor, ParseError } from '../extractor/index.js';
export type { Extractor, HtmlParser, ParsedDocument } from '../extractor/index.js';
export { createOutputWriter, TextFileWriter, OutputWriteError } from '../output/index.js';
export type { OutputWriter } from '../output/index.js';
export { Crawler, Frontier, VisitedSet, normalizeUrl, InvalidUrlError } from '../crawler/index.js';
export type { CrawlerOptions } from '../crawler/index.js';
export { ConfigError, loadConfigFile, validateAndMergeConfig } from '../config.js';
export type { UserCrawlConfig, ConfigFile } from '../config.js';
export { CONFIG_DEFAULTS } from '../types.js';
export type {
  CrawlConfig,
  CrawlEvent,
  CrawlSummary,
  PageResult,
  WorkItem,
  NormalizedUrl,
} from '../types.js';
