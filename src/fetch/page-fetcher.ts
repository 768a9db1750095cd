/**
 * Retrying page fetch with linear backoff
 */
import { logger } from '../logger.js';
import { sleep as defaultSleep, type Sleep } from '../crawl/rate-limiter.js';
import type { PageFetchResult, PageLoader } from './types.js';

export interface FetchPageOptions {
  loader: PageLoader;
  timeoutMs: number;
  maxAttempts: number;
  /** Backoff after failed attempt n is n × backoffUnitMs */
  backoffUnitMs: number;
  sleep?: Sleep;
}

/**
 * Try to load a page up to maxAttempts times. A load that reports failure
 * or throws counts as a failed attempt; between failed attempts the fetcher
 * waits attempt × backoffUnitMs. After the last failed attempt it returns
 * success=false with no markup, without waiting.
 */
export async function fetchPage(url: string, options: FetchPageOptions): Promise<PageFetchResult> {
  const { loader, timeoutMs, maxAttempts, backoffUnitMs } = options;
  const sleepFn = options.sleep ?? defaultSleep;
  let lastError: string | undefined;
  let lastStatus: number | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const response = await loader(url, timeoutMs);
      if (response.success && response.html !== undefined) {
        return {
          url,
          success: true,
          rawMarkup: response.html,
          finalUrl: response.finalUrl,
          attempts: attempt,
          statusCode: response.statusCode,
        };
      }

      lastStatus = response.statusCode;
      lastError = response.errorMessage ?? response.error ?? 'page load failed';
      logger.warn(
        { url, attempt, maxAttempts, statusCode: response.statusCode, error: lastError },
        'Page load failed'
      );
    } catch (error) {
      lastError = String(error);
      logger.warn({ url, attempt, maxAttempts, error: lastError }, 'Page load threw');
    }

    if (attempt < maxAttempts) {
      await sleepFn(attempt * backoffUnitMs);
    }
  }

  return { url, success: false, attempts: maxAttempts, statusCode: lastStatus, error: lastError };
}
