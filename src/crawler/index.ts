export { Crawler } from './scheduler.js';
export type { CrawlerOptions } from './scheduler.js';
export { Frontier } from './frontier.js';
export type { FrontierState } from './frontier.js';
export { CrawlScope, globToRegex } from './scope.js';
export type { ScopeOptions } from './scope.js';
export {
  normalizeUrl,
  tryNormalizeUrl,
  InvalidUrlError,
  VisitedSet,
  createSummary,
} from './base.js';
