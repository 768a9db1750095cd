/**
 * Single-shot HTTP GET for crawl pages, built on the runtime fetch.
 * Never throws: every transport fault is folded into an HttpResponse.
 */
import { logger } from '../logger.js';
import { validatePageResponse, validateResponseHead } from './content-validator.js';
import type { HttpResponse, PageLoader } from './types.js';

const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
const MAX_RESPONSE_SIZE = 10 * 1024 * 1024; // 10MB

export interface RequestOptions {
  timeoutMs?: number;
  userAgent?: string;
  headers?: Record<string, string>;
}

function failure(
  statusCode: number,
  error: HttpResponse['error'],
  errorMessage?: string
): HttpResponse {
  return { success: false, statusCode, error, errorMessage };
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

/**
 * Read the body chunk by chunk, giving up once it passes limit bytes.
 * Null means the body was too large; the stream is cancelled.
 */
async function readBodyCapped(response: Response, limit: number): Promise<Uint8Array | null> {
  if (!response.body) return new Uint8Array(0);

  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;

  while (true) {
    const { done, value } = await reader.read();
    if (done) break;
    total += value.byteLength;
    if (total > limit) {
      await reader.cancel();
      return null;
    }
    chunks.push(value);
  }

  return Buffer.concat(chunks);
}

/**
 * Fetch a page once, honoring the timeout for the whole exchange
 * (connect, headers and body).
 */
export async function httpRequest(url: string, options: RequestOptions = {}): Promise<HttpResponse> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  // Cache-Control: no-cache keeps CDNs from answering 304 with an empty body
  const headers: Record<string, string> = {
    Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8',
    'Cache-Control': 'no-cache',
    ...(options.userAgent ? { 'User-Agent': options.userAgent } : {}),
    ...options.headers,
  };

  try {
    logger.debug({ url, timeoutMs }, 'Making HTTP request');
    const response = await fetch(url, {
      method: 'GET',
      headers,
      redirect: 'follow',
      signal: controller.signal,
    });

    // Reject on headers alone so a non-HTML or error body is never downloaded
    const contentType = response.headers.get('content-type');
    const head = validateResponseHead(response.status, contentType);
    if (!head.valid) {
      await response.body?.cancel();
      const message =
        head.error === 'wrong_content_type'
          ? `Unexpected content type ${contentType ?? ''}`
          : `HTTP ${response.status}`;
      return failure(response.status, head.error, message);
    }

    const contentLength = parseInt(response.headers.get('content-length') ?? '', 10);
    if (!isNaN(contentLength) && contentLength > MAX_RESPONSE_SIZE) {
      logger.warn(
        { url, contentLength, limit: MAX_RESPONSE_SIZE },
        'Content-Length exceeds size limit'
      );
      await response.body?.cancel();
      return failure(response.status, 'response_too_large');
    }

    const body = await readBodyCapped(response, MAX_RESPONSE_SIZE);
    if (body === null) {
      logger.warn({ url, limit: MAX_RESPONSE_SIZE }, 'Response exceeds size limit');
      return failure(response.status, 'response_too_large');
    }

    const html = new TextDecoder().decode(body);
    const validation = validatePageResponse(html, response.status, contentType);

    logger.debug(
      { url, statusCode: response.status, bodyBytes: body.byteLength, valid: validation.valid },
      'HTTP request complete'
    );

    if (!validation.valid) {
      return failure(response.status, validation.error, 'Empty response body');
    }

    const finalUrl = response.url && response.url !== url ? response.url : undefined;
    return { success: true, statusCode: response.status, html, finalUrl };
  } catch (error) {
    if (isAbortError(error)) {
      return failure(0, 'timeout', `Request timeout after ${timeoutMs}ms for ${url}`);
    }
    return failure(0, 'network_error', String(error));
  } finally {
    clearTimeout(timeoutId);
  }
}

/** Page loader bound to a crawler identity (User-Agent). */
export function createHttpLoader(userAgent?: string): PageLoader {
  return (url, timeoutMs) => httpRequest(url, { timeoutMs, userAgent });
}
