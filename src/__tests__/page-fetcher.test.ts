import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { fetchPage } from '../fetch/page-fetcher.js';
import type { HttpResponse } from '../fetch/types.js';
import { logger } from '../logger.js';

const URL_A = 'https://www.example.edu/admissions';
const HTML = '<html><body><p>Admissions</p></body></html>';

const ok: HttpResponse = { success: true, statusCode: 200, html: HTML };
const unavailable: HttpResponse = {
  success: false,
  statusCode: 503,
  error: 'http_status_error',
  errorMessage: 'HTTP 503',
};

function makeSleep() {
  return vi.fn(async (_ms: number) => {});
}

describe('fetchPage', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('returns markup from the first successful attempt without backing off', async () => {
    const loader = vi.fn(async (_url: string, _timeoutMs: number) => ok);
    const sleep = makeSleep();

    const result = await fetchPage(URL_A, {
      loader,
      timeoutMs: 5000,
      maxAttempts: 2,
      backoffUnitMs: 2000,
      sleep,
    });

    expect(result).toEqual({
      url: URL_A,
      success: true,
      rawMarkup: HTML,
      attempts: 1,
      statusCode: 200,
    });
    expect(loader).toHaveBeenCalledTimes(1);
    expect(loader).toHaveBeenCalledWith(URL_A, 5000);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('passes on the URL a redirect ended at', async () => {
    const loader = vi.fn(
      async (_url: string, _timeoutMs: number): Promise<HttpResponse> => ({
        ...ok,
        finalUrl: `${URL_A}/`,
      })
    );

    const result = await fetchPage(URL_A, {
      loader,
      timeoutMs: 5000,
      maxAttempts: 2,
      backoffUnitMs: 2000,
      sleep: makeSleep(),
    });

    expect(result.finalUrl).toBe(`${URL_A}/`);
  });

  it('retries after a failed load with attempt-scaled backoff', async () => {
    const loader = vi
      .fn(async (_url: string, _timeoutMs: number) => ok)
      .mockResolvedValueOnce(unavailable);
    const sleep = makeSleep();

    const result = await fetchPage(URL_A, {
      loader,
      timeoutMs: 5000,
      maxAttempts: 2,
      backoffUnitMs: 2000,
      sleep,
    });

    expect(result.success).toBe(true);
    expect(result.attempts).toBe(2);
    expect(sleep.mock.calls).toEqual([[2000]]);
  });

  it('counts a thrown error as a failed attempt', async () => {
    const loader = vi
      .fn(async (_url: string, _timeoutMs: number) => ok)
      .mockRejectedValueOnce(new Error('socket hang up'));
    const sleep = makeSleep();

    const result = await fetchPage(URL_A, {
      loader,
      timeoutMs: 5000,
      maxAttempts: 2,
      backoffUnitMs: 2000,
      sleep,
    });

    expect(result.success).toBe(true);
    expect(loader).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledWith(
      { url: URL_A, attempt: 1, maxAttempts: 2, error: 'Error: socket hang up' },
      'Page load threw'
    );
  });

  it('gives up after exactly maxAttempts failures', async () => {
    const loader = vi.fn(async (_url: string, _timeoutMs: number) => unavailable);
    const sleep = makeSleep();

    const result = await fetchPage(URL_A, {
      loader,
      timeoutMs: 5000,
      maxAttempts: 3,
      backoffUnitMs: 2000,
      sleep,
    });

    expect(result).toEqual({
      url: URL_A,
      success: false,
      attempts: 3,
      statusCode: 503,
      error: 'HTTP 503',
    });
    expect(loader).toHaveBeenCalledTimes(3);
    // no backoff after the final attempt
    expect(sleep.mock.calls).toEqual([[2000], [4000]]);
  });

  it('treats a successful response without a body as a failure', async () => {
    const loader = vi.fn(
      async (_url: string, _timeoutMs: number): Promise<HttpResponse> => ({
        success: true,
        statusCode: 200,
      })
    );

    const result = await fetchPage(URL_A, {
      loader,
      timeoutMs: 5000,
      maxAttempts: 1,
      backoffUnitMs: 2000,
      sleep: makeSleep(),
    });

    expect(result.success).toBe(false);
    expect(result.rawMarkup).toBeUndefined();
    expect(result.error).toBe('page load failed');
  });
});
