/**
 * Crawl driver: AsyncGenerator that yields a PageEvent per processed URL
 * and a final CrawlSummary.
 */
import { fetchPage } from '../fetch/page-fetcher.js';
import { createHttpLoader } from '../fetch/http-client.js';
import { extractContent } from '../extract/content-extractor.js';
import { DEFAULT_EXTRACTION_RULES } from '../extract/noise-rules.js';
import { charLength } from '../extract/utils.js';
import { FileStateStore } from '../storage/state-store.js';
import {
  DocumentWriter,
  type DocumentSink,
  type WriteResult,
} from '../storage/document-writer.js';
import type { CrawlerConfig } from '../config/crawler-config.js';
import { extractLinks } from './link-extractor.js';
import { UrlFrontier } from './url-frontier.js';
import { createUrlValidator } from './url-normalizer.js';
import { RateLimiter, sleep } from './rate-limiter.js';
import type {
  CrawlDependencies,
  CrawlOptions,
  CrawlSummary,
  PageEvent,
  PageOutcome,
  StopReason,
} from './types.js';
import { logger } from '../logger.js';

type WriteAttempt = { ok: true; result: WriteResult } | { ok: false; error: string };

/** A failed write (permissions, full disk) costs one document, not the crawl. */
async function writeDocument(
  sink: DocumentSink,
  url: string,
  title: string,
  cleanedText: string
): Promise<WriteAttempt> {
  try {
    return { ok: true, result: await sink.write(url, title, cleanedText) };
  } catch (error) {
    return { ok: false, error: String(error) };
  }
}

/**
 * Crawl the configured site one URL at a time.
 *
 * Per URL: dequeue, fetch with retries, mark visited (whatever the outcome),
 * then on success extract, write, and enqueue discovered links. A politeness
 * wait follows every fetch. Only successful fetches count toward the page
 * budget. The frontier is checkpointed after every `checkpointEvery`
 * successes and once more when the loop ends, however it ends.
 */
export async function* crawl(
  config: CrawlerConfig,
  options: CrawlOptions = {},
  deps: CrawlDependencies = {}
): AsyncGenerator<PageEvent | CrawlSummary> {
  const maxPages = options.maxPages ?? config.maxPages;
  const resumed = options.resume ?? false;
  const crawlStartTime = Date.now();

  const validate = createUrlValidator(config);
  const stateStore = deps.stateStore ?? new FileStateStore(config.stateFile);
  const documentSink =
    deps.documentSink ?? new DocumentWriter(config.outputDir, config.minContentLength);
  const loader = deps.loader ?? createHttpLoader(config.userAgent);
  const sleepFn = deps.sleep ?? sleep;
  const rules = deps.extractionRules ?? DEFAULT_EXTRACTION_RULES;
  const rateLimiter = new RateLimiter(config.politenessDelayMs, sleepFn);

  let frontier: UrlFrontier;
  if (resumed) {
    frontier = UrlFrontier.restore(await stateStore.load(), validate);
    logger.info(
      { visited: frontier.visitedCount, queued: frontier.queueLength },
      'Resuming from checkpoint'
    );
  } else {
    frontier = new UrlFrontier(validate);
  }

  const seeded = frontier.seed(config.rootUrl, config.seedPaths);
  if (!frontier.hasMore()) {
    logger.info('Nothing to crawl, queue is empty');
  }
  logger.info(
    { rootUrl: config.rootUrl, maxPages, seeded, queued: frontier.queueLength, resumed },
    'Starting crawl'
  );

  let pagesSuccess = 0;
  let pagesSaved = 0;
  let pagesSkipped = 0;
  let pagesFailed = 0;
  let pagesWriteFailed = 0;
  let stopReason: StopReason = 'queue_empty';

  try {
    while (true) {
      if (options.signal?.aborted) {
        stopReason = 'aborted';
        break;
      }
      if (pagesSuccess >= maxPages) {
        stopReason = 'budget';
        break;
      }

      const url = frontier.dequeue();
      if (url === null) {
        stopReason = 'queue_empty';
        break;
      }

      // Unreachable while the frontier keeps visited and queue disjoint
      if (frontier.isVisited(url)) {
        yield { type: 'page', url, outcome: 'already_visited', attempts: 0, pagesSuccess };
        continue;
      }

      logger.info({ page: pagesSuccess + 1, maxPages, url }, 'Fetching page');

      const result = await fetchPage(url, {
        loader,
        timeoutMs: config.fetchTimeoutMs,
        maxAttempts: config.maxAttempts,
        backoffUnitMs: config.backoffUnitMs,
        sleep: sleepFn,
      });

      // Visited before links are enqueued so a page linking to itself is not requeued
      frontier.markVisited(url);

      if (result.success && result.rawMarkup !== undefined) {
        pagesSuccess++;
        const { title, cleanedText } = extractContent(result.rawMarkup, rules);
        const contentLength = charLength(cleanedText);
        const written = await writeDocument(documentSink, url, title, cleanedText);

        let outcome: PageOutcome;
        if (!written.ok) {
          pagesWriteFailed++;
          outcome = 'write_failed';
          logger.warn({ url, contentLength, error: written.error }, 'Could not write document');
        } else if (written.result.written) {
          pagesSaved++;
          outcome = 'saved';
          logger.info(
            { url, contentLength, title, filename: written.result.filename },
            'Saved page'
          );
        } else {
          pagesSkipped++;
          outcome = 'skipped_short';
          logger.info({ url, contentLength }, 'Too little content after cleaning, skipped');
        }

        // Relative links resolve against where redirects ended, e.g. /dept -> /dept/
        const linkBase = result.finalUrl ?? url;
        const links = extractLinks(result.rawMarkup, linkBase, validate);
        const linksAdded = frontier.enqueueAll(links);
        if (linksAdded > 0) {
          logger.debug({ url, linksFound: links.length, linksAdded }, 'Discovered new links');
        }

        yield {
          type: 'page',
          url,
          outcome,
          attempts: result.attempts,
          pagesSuccess,
          title,
          contentLength,
          filename: written.ok ? written.result.filename : undefined,
          linksFound: links.length,
          linksAdded,
          error: written.ok ? undefined : written.error,
        };

        if (pagesSuccess % config.checkpointEvery === 0) {
          await stateStore.save(frontier.snapshot());
        }
      } else {
        pagesFailed++;
        logger.warn({ url, attempts: result.attempts, error: result.error }, 'Giving up on page');
        yield {
          type: 'page',
          url,
          outcome: 'fetch_failed',
          attempts: result.attempts,
          pagesSuccess,
          error: result.error,
        };
      }

      await rateLimiter.wait();
    }
  } finally {
    await stateStore.save(frontier.snapshot());
  }

  logger.info(
    { pagesSuccess, pagesSaved, pagesSkipped, pagesFailed, pagesWriteFailed, stopReason },
    'Crawl complete'
  );

  yield {
    type: 'summary',
    pagesSuccess,
    pagesSaved,
    pagesSkipped,
    pagesFailed,
    pagesWriteFailed,
    visitedCount: frontier.visitedCount,
    queueRemaining: frontier.queueLength,
    resumed,
    stopReason,
    durationMs: Date.now() - crawlStartTime,
  };
}
