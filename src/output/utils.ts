import { join } from 'node:path';

/** Horizontal rule framing each record's header. */
export const RECORD_RULE = '='.repeat(40);

/** Extension of every output file. */
export const OUTPUT_EXTENSION = '.txt';

/**
 * Maximum UTF-8 length of a generated filename, before the extension.
 * Filesystems limit names to 255 bytes, not characters.
 */
const MAX_FILENAME_BYTES = 200;

/**
 * Sanitize text for use inside a filename.
 *
 * Letters, digits and `.` are kept; everything else becomes `_`.
 * Runs of dots collapse to one so no part can ever read as `..`.
 */
export function sanitizeSegment(segment: string): string {
  return segment
    .replace(/[^\p{L}\p{N}.]/gu, '_')
    .replace(/\.{2,}/g, '.');
}

/**
 * Split a URL into the segments its output file is named after.
 *
 * Host (with port) and decoded path are sanitized, then split on `_`, so
 * slashes, hyphens and any other separator all delimit segments. Query and
 * fragment do not take part.
 */
export function urlToSegments(url: string): string[] {
  const parsed = new URL(url);

  let pathname = parsed.pathname;
  try {
    pathname = decodeURIComponent(pathname);
  } catch {
    // Keep malformed percent-escapes as they are
  }

  return sanitizeSegment(parsed.host + pathname)
    .split('_')
    .filter((segment) => segment.length > 0);
}

/**
 * Map a URL to its output file under `outputDir`.
 *
 * The first `segmentLimit` segments are joined with `_`:
 * - `https://example.com/` -> `<outputDir>/example.com.txt`
 * - `https://example.com/docs/api` -> `<outputDir>/example.com_docs_api.txt`
 * - `https://example.com/docs/api/auth` -> `<outputDir>/example.com_docs_api.txt`
 *
 * Pages deeper than the limit share their ancestor's file, and distinct
 * URLs such as `/a-b` and `/a/b` can map to the same name. Writers append,
 * so such collisions concatenate records rather than overwrite them.
 */
export function pathFromUrl(
  url: string,
  outputDir: string,
  segmentLimit: number,
): string {
  const name = truncateUtf8(
    urlToSegments(url).slice(0, segmentLimit).join('_'),
    MAX_FILENAME_BYTES,
  );
  return join(outputDir, name + OUTPUT_EXTENSION);
}

/**
 * Cut `text` to at most `maxBytes` of UTF-8 without splitting a code point.
 */
export function truncateUtf8(text: string, maxBytes: number): string {
  if (Buffer.byteLength(text, 'utf-8') <= maxBytes) {
    return text;
  }
  let bytes = 0;
  let result = '';
  for (const char of text) {
    bytes += Buffer.byteLength(char, 'utf-8');
    if (bytes > maxBytes) {
      break;
    }
    result += char;
  }
  return result;
}

/**
 * Format one appended record: a header naming the source URL, the text,
 * and a blank line closing the record.
 */
export function formatRecord(url: string, text: string): string {
  return `${RECORD_RULE}\nURL: ${url}\n${RECORD_RULE}\n${text}\n\n`;
}
