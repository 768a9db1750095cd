/**
 * campus-crawler - resumable, polite site crawler producing a corpus of
 * cleaned text documents.
 *
 * @module campus-crawler
 */
export { crawl } from './crawl/crawler.js';
export { UrlFrontier } from './crawl/url-frontier.js';
export { createUrlValidator, canonicalizeUrl } from './crawl/url-normalizer.js';
export { extractLinks } from './crawl/link-extractor.js';
export { RateLimiter } from './crawl/rate-limiter.js';
export { extractContent, filterLines } from './extract/content-extractor.js';
export {
  DEFAULT_EXTRACTION_RULES,
  emptyLine,
  duplicateLine,
  shortLine,
  uiChromeLine,
  symbolOnlyLine,
} from './extract/noise-rules.js';
export { fetchPage } from './fetch/page-fetcher.js';
export { httpRequest, createHttpLoader } from './fetch/http-client.js';
export { FileStateStore } from './storage/state-store.js';
export { DocumentWriter, documentFilename, formatDocument } from './storage/document-writer.js';
export {
  CrawlerConfigSchema,
  DEFAULT_CONFIG,
  loadConfig,
  resolveConfig,
} from './config/crawler-config.js';
export type { CrawlerConfig, CrawlerConfigInput } from './config/crawler-config.js';
export type { FrontierState } from './crawl/url-frontier.js';
export type { UrlRules, UrlValidator } from './crawl/url-normalizer.js';
export type {
  CrawlOptions,
  CrawlDependencies,
  CrawlEvent,
  CrawlSummary,
  PageEvent,
  PageOutcome,
} from './crawl/types.js';
export type { ExtractedContent, ExtractionRules, LineFilter } from './extract/types.js';
export type { HttpResponse, PageLoader, PageFetchResult } from './fetch/types.js';
export type { StateStore } from './storage/state-store.js';
export type { DocumentSink, WriteResult } from './storage/document-writer.js';
