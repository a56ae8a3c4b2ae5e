/** Elements removed from the main region before its text is read. */
export const NON_CONTENT_SELECTOR = [
  'script',
  'style',
  'noscript',
  'template',
  'nav',
  'header',
  'footer',
  'aside',
  'form',
  'iframe',
  'svg',
].join(', ');

/** Block-level elements whose text makes up the main text. */
export const BLOCK_SELECTOR = [
  'p',
  'h1',
  'h2',
  'h3',
  'h4',
  'h5',
  'h6',
  'li',
  'pre',
  'blockquote',
  'td',
  'th',
  'dt',
  'dd',
  'figcaption',
  'caption',
].join(', ');

function collapse(text: string | null): string {
  return (text ?? '').replace(/\s+/g, ' ').trim();
}

/**
 * Remove navigation, scripts and other non-content elements from a region.
 */
export function pruneRegion(region: Element): void {
  for (const element of Array.from(region.querySelectorAll(NON_CONTENT_SELECTOR))) {
    element.remove();
  }
}

/**
 * Read the text of a region as one line per block-level element.
 *
 * Blocks nested inside another block are covered by their outermost
 * block. Whitespace is collapsed except inside `<pre>`. A region without
 * any block yields its whole collapsed text.
 */
export function blockText(region: Element): string {
  const lines: string[] = [];

  for (const block of Array.from(region.querySelectorAll(BLOCK_SELECTOR))) {
    const outer = block.parentElement?.closest(BLOCK_SELECTOR);
    if (outer && region.contains(outer)) {
      continue;
    }

    const text =
      block.tagName === 'PRE'
        ? (block.textContent ?? '').replace(/^\n+|\s+$/g, '')
        : collapse(block.textContent);
    if (text !== '') {
      lines.push(text);
    }
  }

  if (lines.length === 0) {
    return collapse(region.textContent);
  }
  return lines.join('\n');
}
