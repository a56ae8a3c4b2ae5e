import type { NormalizedUrl } from '../types.js';

/**
 * Options restricting which discovered links the crawler follows.
 */
export interface ScopeOptions {
  /** Only follow links whose host is one of the seed hosts. */
  sameHostOnly: boolean;
  /** Glob-style patterns; only paths matching at least one are followed. */
  includePatterns?: string[];
  /** Glob-style patterns; paths matching any of these are not followed. */
  excludePatterns?: string[];
}

/**
 * Convert a glob-style pattern to a RegExp matched against a URL pathname.
 *
 * - `*` matches any characters except `/`
 * - `**` matches any characters including `/`
 * - `?` matches a single character other than `/`
 */
export function globToRegex(pattern: string): RegExp {
  let regexStr = '';
  let i = 0;
  while (i < pattern.length) {
    const char = pattern[i];
    if (char === '*' && pattern[i + 1] === '*' && pattern[i + 2] === '/') {
      // /**/foo also matches /foo
      regexStr += '(?:.*/)?';
      i += 3;
    } else if (char === '*' && pattern[i + 1] === '*') {
      regexStr += '.*';
      i += 2;
    } else if (char === '*') {
      regexStr += '[^/]*';
      i++;
    } else if (char === '?') {
      regexStr += '[^/]';
      i++;
    } else if ('.+^${}()|[]\\'.includes(char)) {
      regexStr += '\\' + char;
      i++;
    } else {
      regexStr += char;
      i++;
    }
  }
  return new RegExp('^' + regexStr + '$');
}

/**
 * Decides whether a normalized URL lies inside the crawl.
 */
export class CrawlScope {
  private readonly hosts = new Set<string>();
  private readonly include: RegExp[];
  private readonly exclude: RegExp[];

  constructor(private readonly options: ScopeOptions) {
    this.include = (options.includePatterns ?? []).map(globToRegex);
    this.exclude = (options.excludePatterns ?? []).map(globToRegex);
  }

  /**
   * Register the host of a seed URL as in scope.
   */
  addSeed(url: NormalizedUrl): void {
    this.hosts.add(new URL(url).host);
  }

  /**
   * Test whether a discovered link should be followed.
   */
  allows(url: NormalizedUrl): boolean {
    const parsed = new URL(url);

    if (this.options.sameHostOnly && !this.hosts.has(parsed.host)) {
      return false;
    }

    if (
      this.include.length > 0 &&
      !this.include.some((re) => re.test(parsed.pathname))
    ) {
      return false;
    }

    return !this.exclude.some((re) => re.test(parsed.pathname));
  }
}
