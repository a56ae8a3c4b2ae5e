/**
 * Canonical string form of an http(s) URL, as produced by `normalizeUrl`.
 */
export type NormalizedUrl = string;

/**
 * One unit of frontier work: a URL paired with its discovery depth.
 */
export interface WorkItem {
  readonly url: NormalizedUrl;
  readonly depth: number;
}

/**
 * Extraction result for one fetched page.
 */
export interface PageResult {
  url: NormalizedUrl;
  mainText: string;
  /** Resolved, normalized links in document order, without repeats. */
  links: NormalizedUrl[];
  /** Number of hrefs that could not be turned into an http(s) URL. */
  invalidLinks: number;
}

/** Which region of a document counts as its main text. */
export type ExtractionStrategy = 'main' | 'readability';

/** How the selected region is rendered into the output files. */
export type OutputFormat = 'text' | 'markdown';

/** Why a discovered URL was not scheduled. */
export type SkipReason = 'duplicate' | 'over-depth' | 'out-of-scope' | 'invalid-url';

/** Stage at which processing of a work item failed. */
export type FailureKind = 'fetch' | 'parse' | 'write';

/**
 * A work item whose processing failed at some stage.
 */
export interface FailedUrl {
  url: string;
  kind: FailureKind;
  reason: string;
}

/**
 * Structured events emitted while crawling.
 */
export type CrawlEvent =
  | { type: 'fetch:success'; url: string; depth: number; status: number }
  | { type: 'fetch:failure'; url: string; depth: number; error: string; status?: number }
  | { type: 'extract:success'; url: string; depth: number; links: number; chars: number }
  | { type: 'extract:failure'; url: string; depth: number; error: string }
  | { type: 'write:success'; url: string; depth: number; filePath: string }
  | { type: 'write:failure'; url: string; depth: number; error: string }
  | { type: 'link:skipped'; url: string; depth: number; reason: SkipReason }
  | { type: 'crawl:complete'; summary: CrawlSummary };

/**
 * Counts reported at the end of a crawl run.
 */
export interface CrawlSummary {
  pagesFetched: number;
  pagesWritten: number;
  /** Pages fetched and parsed whose main text was empty (nothing written). */
  emptyPages: number;
  fetchFailures: number;
  parseFailures: number;
  writeFailures: number;
  duplicatesSkipped: number;
  overDepthSkipped: number;
  outOfScopeSkipped: number;
  invalidUrls: number;
  failures: FailedUrl[];
  outputDir: string;
  durationMs: number;
  /** True when the run was stopped through its abort signal. */
  cancelled: boolean;
}

/**
 * Full configuration for a crawl run.
 */
export interface CrawlConfig {
  // Seeds
  startUrls: string[];

  // Scope
  maxDepth: number;
  sameHostOnly: boolean;
  includePatterns?: string[];
  excludePatterns?: string[];

  // Fetching
  concurrency: number;
  timeoutMs: number;
  headers?: Record<string, string>;

  // Extraction
  extraction: ExtractionStrategy;
  format: OutputFormat;

  // Output
  outputDir: string;
  segmentLimit: number;
  clean: boolean;

  // Events
  onEvent?: (event: CrawlEvent) => void;
  signal?: AbortSignal;
}

/**
 * Default configuration values, merged under user-provided values.
 */
export const CONFIG_DEFAULTS = {
  maxDepth: 5,
  concurrency: 3,
  timeoutMs: 30_000,
  sameHostOnly: true,
  extraction: 'main',
  format: 'text',
  outputDir: './crawled_pages',
  segmentLimit: 3,
  clean: false,
} as const satisfies Partial<CrawlConfig>;
