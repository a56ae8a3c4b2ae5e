import type { CrawlConfig, CrawlEvent, CrawlSummary } from '../types.js';

/**
 * Output verbosity level for the CLI.
 */
export type Verbosity = 'normal' | 'verbose' | 'quiet';

/**
 * Create an event handler that reports crawl progress on stderr, so it
 * doesn't interfere with stdout output.
 *
 * - quiet mode: no output
 * - normal mode: one line per fetched page, plus every failure
 * - verbose mode: also status codes, output files and skipped links
 */
export function createProgressReporter(
  verbosity: Verbosity,
): (event: CrawlEvent) => void {
  let fetchedCount = 0;

  if (verbosity === 'quiet') {
    return () => {};
  }

  return (event: CrawlEvent) => {
    switch (event.type) {
      case 'fetch:success':
        fetchedCount++;
        if (verbosity === 'verbose') {
          process.stderr.write(
            `[${fetchedCount}] Fetched: ${event.url} (${event.status}, depth ${event.depth})\n`,
          );
        } else {
          process.stderr.write(`[${fetchedCount}] ${event.url}\n`);
        }
        break;
      case 'fetch:failure':
      case 'extract:failure':
      case 'write:failure':
        process.stderr.write(`  Error: ${event.url} - ${event.error}\n`);
        break;
      case 'write:success':
        if (verbosity === 'verbose') {
          process.stderr.write(`  Wrote: ${event.filePath}\n`);
        }
        break;
      case 'link:skipped':
        if (verbosity === 'verbose') {
          process.stderr.write(`  Skipped: ${event.url} (${event.reason})\n`);
        }
        break;
      case 'extract:success':
      case 'crawl:complete':
        break;
      default: {
        const _exhaustive: never = event;
        throw new Error(`Unknown crawl event: ${JSON.stringify(_exhaustive)}`);
      }
    }
  };
}

/**
 * Print a summary of the crawl to stderr.
 */
export function printSummary(summary: CrawlSummary, verbosity: Verbosity): void {
  if (verbosity === 'quiet') {
    return;
  }

  const durationSec = (summary.durationMs / 1000).toFixed(1);
  const failed =
    summary.fetchFailures + summary.parseFailures + summary.writeFailures;

  process.stderr.write('\n');
  process.stderr.write(
    `${summary.cancelled ? 'Cancelled' : 'Done'}! Fetched ${summary.pagesFetched} pages, wrote ${summary.pagesWritten} in ${durationSec}s\n`,
  );
  process.stderr.write(
    `Skipped: ${summary.duplicatesSkipped} duplicate, ${summary.overDepthSkipped} over depth, ` +
      `${summary.outOfScopeSkipped} out of scope, ${summary.invalidUrls} invalid\n`,
  );
  if (failed > 0) {
    process.stderr.write(
      `Failed: ${summary.fetchFailures} fetch, ${summary.parseFailures} parse, ${summary.writeFailures} write\n`,
    );
  }
  process.stderr.write(`Output: ${summary.outputDir}\n`);
}

/**
 * Print dry-run information showing what would be crawled.
 */
export function printDryRun(config: CrawlConfig): void {
  process.stderr.write('\n--- Dry Run ---\n');
  process.stderr.write(`Start URLs: ${config.startUrls.length > 0 ? config.startUrls.join(', ') : '(none)'}\n`);
  process.stderr.write(`Max depth: ${config.maxDepth}\n`);
  process.stderr.write(`Concurrency: ${config.concurrency}\n`);
  process.stderr.write(`Same host only: ${config.sameHostOnly}\n`);
  if (config.includePatterns && config.includePatterns.length > 0) {
    process.stderr.write(`Include patterns: ${config.includePatterns.join(', ')}\n`);
  }
  if (config.excludePatterns && config.excludePatterns.length > 0) {
    process.stderr.write(`Exclude patterns: ${config.excludePatterns.join(', ')}\n`);
  }
  process.stderr.write(`Extraction: ${config.extraction} (${config.format})\n`);
  process.stderr.write(`Output: ${config.outputDir}${config.clean ? ' (cleaned first)' : ''}\n`);
  process.stderr.write('--- No pages will be fetched ---\n');
}
