/**
 * Shared types for the fetch module
 */

export type ValidationError = 'http_status_error' | 'wrong_content_type' | 'empty_body';

export type FetchError = ValidationError | 'network_error' | 'timeout' | 'response_too_large';

export interface ValidationResult {
  valid: boolean;
  error?: ValidationError;
  errorDetails?: {
    statusCode?: number;
    contentType?: string;
  };
}

export interface HttpResponse {
  success: boolean;
  statusCode: number;
  html?: string;
  /** Where redirects ended, when that differs from the requested URL */
  finalUrl?: string;
  error?: FetchError;
  /** Human-readable cause, for logs */
  errorMessage?: string;
}

/** Loads one page once; the retrying fetcher sits on top of it. */
export type PageLoader = (url: string, timeoutMs: number) => Promise<HttpResponse>;

/** Outcome of fetching a URL, after retries. Never persisted. */
export interface PageFetchResult {
  url: string;
  success: boolean;
  rawMarkup?: string;
  /** Base for resolving the page's relative links */
  finalUrl?: string;
  attempts: number;
  statusCode?: number;
  error?: string;
}
