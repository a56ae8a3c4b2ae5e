import TurndownService from 'turndown';

/**
 * Create a TurndownService for the markdown output format.
 *
 * - ATX-style headings (`#`, `##`, etc.)
 * - `-` bullet list markers
 * - Fenced code blocks (triple backticks)
 */
export function createTurndownService(): TurndownService {
  const turndown = new TurndownService({
    headingStyle: 'atx',
    bulletListMarker: '-',
    codeBlockStyle: 'fenced',
    fence: '```',
    strongDelimiter: '**',
    emDelimiter: '_',
  });

  // Remove script and style elements from output
  turndown.remove(['script', 'style']);

  return turndown;
}
