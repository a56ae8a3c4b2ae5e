import type { CrawlSummary, NormalizedUrl } from '../types.js';

/** URL schemes the crawler is able to fetch. */
const FETCHABLE_PROTOCOLS = ['http:', 'https:'];

/**
 * Error thrown when a string cannot be turned into a fetchable URL.
 */
export class InvalidUrlError extends Error {
  constructor(
    message: string,
    public readonly input: string,
  ) {
    super(message);
    this.name = 'InvalidUrlError';
  }
}

/**
 * Normalize a URL for deduplication purposes.
 *
 * - Resolves `raw` against `base` when it is relative
 * - Lowercases scheme and hostname, drops the default port
 * - Resolves `.` and `..` path segments
 * - Strips the fragment and a bare trailing `?`
 * - Strips trailing slashes from the pathname (unless the path is just "/")
 *
 * The query string is kept. Feeding the result back in returns it unchanged.
 *
 * @throws InvalidUrlError for empty, unparsable or non-http(s) input
 */
export function normalizeUrl(raw: string, base?: string): NormalizedUrl {
  const trimmed = raw.trim();
  if (trimmed === '') {
    throw new InvalidUrlError('Empty URL', raw);
  }

  let parsed: URL;
  try {
    parsed = new URL(trimmed, base);
  } catch {
    throw new InvalidUrlError(`Malformed URL: ${trimmed}`, raw);
  }

  if (!FETCHABLE_PROTOCOLS.includes(parsed.protocol)) {
    throw new InvalidUrlError(
      `Unsupported scheme "${parsed.protocol}" in ${trimmed}`,
      raw,
    );
  }

  parsed.hash = '';
  if (parsed.search === '') {
    parsed.search = '';
  }

  const pathname = parsed.pathname.replace(/\/+$/, '');
  parsed.pathname = pathname === '' ? '/' : pathname;

  return parsed.href;
}

/**
 * Normalize a URL, returning undefined instead of throwing.
 */
export function tryNormalizeUrl(
  raw: string,
  base?: string,
): NormalizedUrl | undefined {
  try {
    return normalizeUrl(raw, base);
  } catch (error) {
    if (error instanceof InvalidUrlError) {
      return undefined;
    }
    throw error;
  }
}

/**
 * The set of URLs already scheduled during one crawl run.
 *
 * Append-only. `tryClaim` is synchronous, so no other worker can run
 * between its membership check and its insert.
 */
export class VisitedSet {
  private set = new Set<NormalizedUrl>();

  /**
   * Record a URL as scheduled.
   *
   * @returns true the first time a URL is claimed, false on every later call
   */
  tryClaim(url: NormalizedUrl): boolean {
    if (this.set.has(url)) {
      return false;
    }
    this.set.add(url);
    return true;
  }

  has(url: NormalizedUrl): boolean {
    return this.set.has(url);
  }

  get size(): number {
    return this.set.size;
  }
}

/**
 * Create a summary with every counter at zero.
 */
export function createSummary(outputDir: string): CrawlSummary {
  return {
    pagesFetched: 0,
    pagesWritten: 0,
    emptyPages: 0,
    fetchFailures: 0,
    parseFailures: 0,
    writeFailures: 0,
    duplicatesSkipped: 0,
    overDepthSkipped: 0,
    outOfScopeSkipped: 0,
    invalidUrls: 0,
    failures: [],
    outputDir,
    durationMs: 0,
    cancelled: false,
  };
}
