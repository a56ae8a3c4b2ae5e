import { createWriteStream } from 'node:fs';

import type { CrawlEvent } from '../types.js';

/**
 * Appends crawl events to a file, one JSON object per line.
 */
export interface EventLog {
  write(event: CrawlEvent): void;
  /** Flush and close the file. */
  close(): Promise<void>;
}

/**
 * Open an event log in append mode. Each line carries an ISO timestamp
 * under `time` next to the event's own fields.
 */
export function createEventLog(filePath: string): EventLog {
  const stream = createWriteStream(filePath, { flags: 'a', encoding: 'utf-8' });
  let failed = false;

  stream.on('error', (error) => {
    if (!failed) {
      failed = true;
      process.stderr.write(`Event log ${filePath} unavailable: ${error.message}\n`);
    }
  });

  return {
    write(event: CrawlEvent): void {
      if (failed) {
        return;
      }
      stream.write(JSON.stringify({ time: new Date().toISOString(), ...event }) + '\n');
    },

    close(): Promise<void> {
      return new Promise((resolve) => {
        if (failed) {
          resolve();
          return;
        }
        stream.end(() => resolve());
      });
    },
  };
}
