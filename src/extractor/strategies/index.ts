import type { ExtractionStrategy } from '../../types.js';
import { MainContentStrategy } from './main-content.js';
import { ReadabilityStrategy } from './readability.js';

/**
 * Selects the element holding a page's main content.
 *
 * All strategies implement this interface, allowing them to be used
 * interchangeably by the HTML parser.
 */
export interface RegionStrategy {
  selectRegion(html: string, url: string, document: Document): Element | null;
}

export { MainContentStrategy } from './main-content.js';
export { ReadabilityStrategy } from './readability.js';

/**
 * Resolve a RegionStrategy instance based on the strategy name.
 */
export function getStrategy(strategy: ExtractionStrategy): RegionStrategy {
  switch (strategy) {
    case 'main':
      return new MainContentStrategy();
    case 'readability':
      return new ReadabilityStrategy();
    default: {
      const _exhaustive: never = strategy;
      throw new Error(`Unknown extraction strategy: ${_exhaustive}`);
    }
  }
}
