/**
 * Response validation: is this a page we can extract text from?
 */
import type { ValidationResult } from './types.js';

const HTML_CONTENT_TYPES = ['text/html', 'application/xhtml+xml'];

/**
 * Check what the response headers already tell: status and content type.
 * A missing Content-Type header is accepted.
 */
export function validateResponseHead(
  statusCode: number,
  contentType?: string | null
): ValidationResult {
  if (statusCode < 200 || statusCode >= 300) {
    return { valid: false, error: 'http_status_error', errorDetails: { statusCode } };
  }

  if (contentType) {
    const lowered = contentType.toLowerCase();
    if (!HTML_CONTENT_TYPES.some((type) => lowered.includes(type))) {
      return { valid: false, error: 'wrong_content_type', errorDetails: { contentType } };
    }
  }

  return { valid: true };
}

/** Validate status, content type and body of a fetched page. */
export function validatePageResponse(
  body: string,
  statusCode: number,
  contentType?: string | null
): ValidationResult {
  const head = validateResponseHead(statusCode, contentType);
  if (!head.valid) return head;

  if (!body.trim()) {
    return { valid: false, error: 'empty_body' };
  }

  return { valid: true };
}
