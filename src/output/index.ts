import { mkdir, rm } from 'node:fs/promises';

import type { CrawlConfig, NormalizedUrl } from '../types.js';
import { TextFileWriter } from './text-file.js';

export { TextFileWriter } from './text-file.js';
export { OutputWriteError } from './errors.js';
export {
  RECORD_RULE,
  OUTPUT_EXTENSION,
  sanitizeSegment,
  urlToSegments,
  pathFromUrl,
  truncateUtf8,
  formatRecord,
} from './utils.js';

/**
 * Common interface for output writers.
 */
export interface OutputWriter {
  /** Append the text extracted from `url`; resolves with the file path. */
  write(url: NormalizedUrl, text: string): Promise<string>;
}

/**
 * Create the output writer for a crawl configuration.
 */
export function createOutputWriter(
  config: Pick<CrawlConfig, 'outputDir' | 'segmentLimit'>,
): OutputWriter {
  return new TextFileWriter(config.outputDir, config.segmentLimit);
}

/**
 * Remove everything under the output directory and recreate it empty.
 */
export async function cleanOutputDir(outputDir: string): Promise<void> {
  await rm(outputDir, { recursive: true, force: true });
  await mkdir(outputDir, { recursive: true });
}
