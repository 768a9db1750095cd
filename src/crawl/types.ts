/**
 * Types for the crawl module
 */
import type { Sleep } from './rate-limiter.js';
import type { PageLoader } from '../fetch/types.js';
import type { StateStore } from '../storage/state-store.js';
import type { DocumentSink } from '../storage/document-writer.js';
import type { ExtractionRules } from '../extract/types.js';

export interface CrawlOptions {
  /** Budget of successful fetches; defaults to the config's maxPages */
  maxPages?: number;
  /** Restore the frontier from the checkpoint before seeding */
  resume?: boolean;
  /** Stops the loop between pages; the final checkpoint is still written */
  signal?: AbortSignal;
}

/** Collaborators the driver builds from config unless supplied. */
export interface CrawlDependencies {
  loader?: PageLoader;
  sleep?: Sleep;
  stateStore?: StateStore;
  documentSink?: DocumentSink;
  extractionRules?: ExtractionRules;
}

export type PageOutcome =
  | 'saved'
  | 'skipped_short'
  | 'write_failed'
  | 'fetch_failed'
  | 'already_visited';

export interface PageEvent {
  type: 'page';
  url: string;
  outcome: PageOutcome;
  /** Fetch attempts made (0 for already_visited) */
  attempts: number;
  /** Successful fetches so far, this page included */
  pagesSuccess: number;
  title?: string;
  contentLength?: number;
  filename?: string;
  linksFound?: number;
  linksAdded?: number;
  error?: string;
}

export type StopReason = 'budget' | 'queue_empty' | 'aborted';

export interface CrawlSummary {
  type: 'summary';
  pagesSuccess: number;
  pagesSaved: number;
  pagesSkipped: number;
  pagesFailed: number;
  /** Fetched and extracted, but the document could not be written */
  pagesWriteFailed: number;
  visitedCount: number;
  queueRemaining: number;
  resumed: boolean;
  stopReason: StopReason;
  durationMs: number;
}

export type CrawlEvent = PageEvent | CrawlSummary;
