import type { RegionStrategy } from './index.js';

/** Candidates for the main region, most specific first. */
const MAIN_REGION_SELECTORS = ['main', 'article', '[role="main"]'];

/**
 * Main-element region strategy.
 *
 * Picks the first `<main>`, else the first `<article>`, else the first
 * element with `role="main"`, else `<body>`.
 */
export class MainContentStrategy implements RegionStrategy {
  selectRegion(_html: string, _url: string, document: Document): Element | null {
    for (const selector of MAIN_REGION_SELECTORS) {
      const region = document.querySelector(selector);
      if (region) {
        return region;
      }
    }
    return document.body;
  }
}
