import type {
  CrawlEvent,
  CrawlSummary,
  FailureKind,
  NormalizedUrl,
  PageResult,
  SkipReason,
  WorkItem,
} from '../types.js';
import type { Fetcher, FetchedPage } from '../fetcher/index.js';
import { FetchError } from '../fetcher/index.js';
import type { Extractor } from '../extractor/index.js';
import type { OutputWriter } from '../output/index.js';
import { createSummary, tryNormalizeUrl, VisitedSet } from './base.js';
import { Frontier } from './frontier.js';
import { CrawlScope } from './scope.js';
import type { ScopeOptions } from './scope.js';

/**
 * Options for a Crawler.
 */
export interface CrawlerOptions extends ScopeOptions {
  /** Deepest link depth that is still fetched; seeds are depth 0. */
  maxDepth: number;
  /** Number of work items processed at the same time. */
  concurrency: number;
  /** Reported back in the summary. */
  outputDir: string;
  onEvent?: (event: CrawlEvent) => void;
  /** Aborting stops new fetches; in-flight items finish. */
  signal?: AbortSignal;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Breadth-first crawler with a bounded pool of concurrent workers.
 *
 * Workers share one Frontier and one VisitedSet. Each work item goes
 * through fetch, extract, write and enqueue in that order; items complete
 * out of order across workers. No failure stops the crawl: every failed
 * item is counted, reported through `onEvent`, and dropped.
 */
export class Crawler {
  private readonly visited = new VisitedSet();
  private readonly frontier: Frontier;
  private readonly scope: CrawlScope;
  private readonly summary: CrawlSummary;
  private started = false;

  constructor(
    private readonly options: CrawlerOptions,
    private readonly fetcher: Fetcher,
    private readonly extractor: Extractor,
    private readonly writer: OutputWriter,
  ) {
    this.frontier = new Frontier(options.maxDepth);
    this.scope = new CrawlScope(options);
    this.summary = createSummary(options.outputDir);
  }

  /**
   * Crawl from the given seed URLs until the frontier terminates.
   *
   * @returns Counts of everything fetched, written, failed and skipped
   */
  async run(seeds: string[]): Promise<CrawlSummary> {
    if (this.started) {
      throw new Error('Crawler.run() can only be called once per instance');
    }
    this.started = true;
    const startTime = Date.now();

    this.seed(seeds);

    const signal = this.options.signal;
    const onAbort = (): void => {
      this.summary.cancelled = true;
      this.frontier.close();
    };
    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    try {
      const workerCount = Math.max(1, this.options.concurrency);
      await Promise.all(
        Array.from({ length: workerCount }, () => this.work()),
      );
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    this.summary.durationMs = Date.now() - startTime;
    this.emit({ type: 'crawl:complete', summary: this.summary });
    return this.summary;
  }

  /**
   * Normalize and claim the seeds, queueing them at depth 0.
   */
  private seed(seeds: string[]): void {
    for (const raw of seeds) {
      const url = tryNormalizeUrl(raw);
      if (url === undefined) {
        this.skip(raw, 0, 'invalid-url');
        continue;
      }

      this.scope.addSeed(url);
      if (!this.visited.tryClaim(url)) {
        this.skip(url, 0, 'duplicate');
        continue;
      }
      this.frontier.push({ url, depth: 0 });
    }
  }

  /**
   * One worker: take items until the frontier terminates.
   */
  private async work(): Promise<void> {
    for (
      let item = await this.frontier.take();
      item !== undefined;
      item = await this.frontier.take()
    ) {
      try {
        await this.process(item);
      } catch (error) {
        // Unexpected failure: stop the other workers and surface it
        this.frontier.close();
        throw error;
      } finally {
        this.frontier.complete();
      }
    }
  }

  /**
   * Fetch, extract, write and enqueue the children of one work item.
   */
  private async process(item: WorkItem): Promise<void> {
    const { url, depth } = item;

    let page: FetchedPage;
    try {
      page = await this.fetcher.fetch(url);
    } catch (error) {
      const status = error instanceof FetchError ? error.statusCode : undefined;
      this.fail(item, 'fetch', errorMessage(error), status);
      return;
    }

    // A redirect target is claimed too, so it is not crawled a second time
    // under its own URL.
    const finalUrl = tryNormalizeUrl(page.finalUrl);
    if (finalUrl !== undefined && finalUrl !== url && !this.visited.tryClaim(finalUrl)) {
      this.skip(finalUrl, depth, 'duplicate');
      return;
    }

    if (page.status < 200 || page.status >= 300) {
      this.fail(item, 'fetch', `HTTP ${page.status} for ${page.finalUrl}`, page.status);
      return;
    }
    this.summary.pagesFetched++;
    this.emit({ type: 'fetch:success', url, depth, status: page.status });

    let result: PageResult;
    try {
      result = this.extractor.extract(page.body, page.finalUrl);
    } catch (error) {
      this.fail(item, 'parse', errorMessage(error));
      return;
    }
    this.emit({
      type: 'extract:success',
      url,
      depth,
      links: result.links.length,
      chars: result.mainText.length,
    });

    if (result.mainText.trim() === '') {
      this.summary.emptyPages++;
    } else {
      try {
        const filePath = await this.writer.write(url, result.mainText);
        this.summary.pagesWritten++;
        this.emit({ type: 'write:success', url, depth, filePath });
      } catch (error) {
        this.fail(item, 'write', errorMessage(error));
      }
    }

    this.summary.invalidUrls += result.invalidLinks;
    this.enqueue(result.links, depth + 1);
  }

  /**
   * Offer discovered links to the frontier at `depth`.
   *
   * A link beyond the depth limit is not claimed, so a shorter path found
   * by another worker can still schedule it.
   */
  private enqueue(links: NormalizedUrl[], depth: number): void {
    for (const link of links) {
      if (!this.scope.allows(link)) {
        this.skip(link, depth, 'out-of-scope');
      } else if (!this.frontier.accepts(depth) && !this.visited.has(link)) {
        this.skip(link, depth, 'over-depth');
      } else if (!this.visited.tryClaim(link)) {
        this.skip(link, depth, 'duplicate');
      } else {
        this.frontier.push({ url: link, depth });
      }
    }
  }

  private skip(url: string, depth: number, reason: SkipReason): void {
    switch (reason) {
      case 'duplicate':
        this.summary.duplicatesSkipped++;
        break;
      case 'over-depth':
        this.summary.overDepthSkipped++;
        break;
      case 'out-of-scope':
        this.summary.outOfScopeSkipped++;
        break;
      case 'invalid-url':
        this.summary.invalidUrls++;
        break;
      default: {
        const _exhaustive: never = reason;
        throw new Error(`Unknown skip reason: ${_exhaustive}`);
      }
    }
    this.emit({ type: 'link:skipped', url, depth, reason });
  }

  private fail(
    item: WorkItem,
    kind: FailureKind,
    reason: string,
    status?: number,
  ): void {
    const { url, depth } = item;
    this.summary.failures.push({ url, kind, reason });

    switch (kind) {
      case 'fetch':
        this.summary.fetchFailures++;
        this.emit({ type: 'fetch:failure', url, depth, error: reason, status });
        break;
      case 'parse':
        this.summary.parseFailures++;
        this.emit({ type: 'extract:failure', url, depth, error: reason });
        break;
      case 'write':
        this.summary.writeFailures++;
        this.emit({ type: 'write:failure', url, depth, error: reason });
        break;
      default: {
        const _exhaustive: never = kind;
        throw new Error(`Unknown failure kind: ${_exhaustive}`);
      }
    }
  }

  private emit(event: CrawlEvent): void {
    this.options.onEvent?.(event);
  }
}
