import { appendFile, mkdir } from 'node:fs/promises';
import PQueue from 'p-queue';

import type { NormalizedUrl } from '../types.js';
import type { OutputWriter } from './index.js';
import { OutputWriteError } from './errors.js';
import { formatRecord, pathFromUrl } from './utils.js';

/**
 * Append-only text file writer.
 *
 * Each URL maps to a file under the output directory (see `pathFromUrl`);
 * every write appends one record. Appends to the same file go through a
 * single-slot queue so records never interleave, while different files
 * are written in parallel.
 */
export class TextFileWriter implements OutputWriter {
  private readonly queues = new Map<string, PQueue>();

  constructor(
    private readonly outputDir: string,
    private readonly segmentLimit: number,
  ) {}

  /**
   * Append a record for `url` to its output file.
   *
   * @returns The path of the file that was appended to
   * @throws OutputWriteError when the directory or file cannot be written
   */
  async write(url: NormalizedUrl, text: string): Promise<string> {
    const filePath = this.urlToFilePath(url);
    const record = formatRecord(url, text);

    try {
      await mkdir(this.outputDir, { recursive: true });
      await this.queueFor(filePath).add(() => appendFile(filePath, record, 'utf-8'));
    } catch (error) {
      throw new OutputWriteError(
        `Failed to write ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        url,
        filePath,
        error,
      );
    }

    return filePath;
  }

  private urlToFilePath(url: string): string {
    return pathFromUrl(url, this.outputDir, this.segmentLimit);
  }

  /**
   * Get the append queue of a file, creating it on first use. The queue is
   * dropped again as soon as it runs idle.
   */
  private queueFor(filePath: string): PQueue {
    let queue = this.queues.get(filePath);
    if (!queue) {
      const created = new PQueue({ concurrency: 1 });
      created.on('idle', () => {
        if (this.queues.get(filePath) === created) {
          this.queues.delete(filePath);
        }
      });
      this.queues.set(filePath, created);
      queue = created;
    }
    return queue;
  }
}
