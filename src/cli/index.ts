import { Command } from 'commander';

import type { CrawlEvent, CrawlSummary } from '../types.js';
import { CONFIG_DEFAULTS } from '../types.js';
import { crawlSite } from '../sdk/index.js';
import { DEFAULT_CONFIG_FILE, validateAndMergeConfig } from '../config.js';
import { buildConfig } from './options.js';
import type { CLIOptions } from './options.js';
import { createEventLog } from './event-log.js';
import {
  createProgressReporter,
  printSummary,
  printDryRun,
  type Verbosity,
} from './progress.js';

/**
 * Accumulate repeated option values into an array.
 * Used for --header, --include, --exclude which can be specified multiple times.
 */
function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Create and configure the commander program with all CLI options.
 *
 * Options that a config file may also set carry no commander default,
 * so an absent flag never overrides the file.
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name('depth-crawler')
    .description('Crawl websites to a fixed depth and save the main text of every page')
    .version('0.1.0')
    .argument('[urls...]', 'Start URLs (added to those of the config file)')
    .option('-c, --config <path>', `JSON config file (default: ./${DEFAULT_CONFIG_FILE} if present)`)

    // Scope
    .option('--depth <n>', `Max crawl depth (default: ${CONFIG_DEFAULTS.maxDepth})`)
    .option('--all-hosts', 'Also follow links to other hosts')
    .option('--include <pattern>', 'URL path patterns to include (repeatable)', collect, [])
    .option('--exclude <pattern>', 'URL path patterns to exclude (repeatable)', collect, [])

    // Fetching
    .option('--concurrency <n>', `Parallel requests (default: ${CONFIG_DEFAULTS.concurrency})`)
    .option('--timeout <ms>', `Request timeout in ms (default: ${CONFIG_DEFAULTS.timeoutMs})`)
    .option('--header <key:value>', 'Custom header (repeatable)', collect, [])

    // Extraction
    .option('--strategy <name>', `Main text selection: main or readability (default: ${CONFIG_DEFAULTS.extraction})`)
    .option('--format <name>', `Saved text format: text or markdown (default: ${CONFIG_DEFAULTS.format})`)

    // Output
    .option('-o, --output <dir>', `Output directory (default: ${CONFIG_DEFAULTS.outputDir})`)
    .option('--segments <n>', `URL segments used in file names (default: ${CONFIG_DEFAULTS.segmentLimit})`)
    .option('--clean', 'Empty the output directory before crawling')

    // General
    .option('--log-file <path>', 'Append crawl events to this file as JSON lines')
    .option('-v, --verbose', 'Verbose logging')
    .option('-q, --quiet', 'Suppress progress output')
    .option('--dry-run', 'Show what would be crawled without fetching');

  return program;
}

/**
 * Determine the verbosity level from CLI flags.
 */
function getVerbosity(options: CLIOptions): Verbosity {
  if (options.quiet) return 'quiet';
  if (options.verbose) return 'verbose';
  return 'normal';
}

/**
 * Validate flag combinations before building the config.
 *
 * @throws Error if validation fails
 */
function validateCLIOptions(options: CLIOptions): void {
  if (options.verbose && options.quiet) {
    throw new Error('Cannot use --verbose and --quiet at the same time.');
  }
}

/**
 * Run a crawl with progress reporting, an optional event log and
 * SIGINT wired to cooperative cancellation.
 */
async function crawlWithReporting(
  urls: string[],
  options: CLIOptions,
  verbosity: Verbosity,
): Promise<CrawlSummary> {
  const config = buildConfig(urls, options);
  const report = createProgressReporter(verbosity);
  const eventLog = options.logFile ? createEventLog(options.logFile) : undefined;

  const controller = new AbortController();
  const onSigint = (): void => {
    process.stderr.write('\nStopping: waiting for pages in flight...\n');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  config.signal = controller.signal;
  config.onEvent = (event: CrawlEvent) => {
    report(event);
    eventLog?.write(event);
  };

  try {
    return await crawlSite(config);
  } finally {
    process.off('SIGINT', onSigint);
    await eventLog?.close();
  }
}

/**
 * Main CLI entry point. Parses command-line arguments, builds
 * configuration, and invokes the SDK's crawlSite() function.
 *
 * @param argv - The process.argv array to parse
 */
export async function run(argv: string[]): Promise<void> {
  const program = createProgram();

  program.action(async (urls: string[], options: CLIOptions) => {
    try {
      validateCLIOptions(options);
      const verbosity = getVerbosity(options);

      if (options.dryRun) {
        printDryRun(validateAndMergeConfig(buildConfig(urls, options)));
        process.exit(0);
        return;
      }

      const summary = await crawlWithReporting(urls, options, verbosity);
      printSummary(summary, verbosity);
      process.exit(0);
    } catch (error) {
      process.stderr.write(
        `Error: ${error instanceof Error ? error.message : String(error)}\n`,
      );
      process.exit(1);
    }
  });

  await program.parseAsync(argv);
}
