/**
 * URL canonicalization and crawl-scope validation
 */
import picomatch from 'picomatch';

export interface UrlRules {
  /** Hosts (with port, if any) the crawl may visit */
  allowedDomains: readonly string[];
  /** Lowercase path extensions that never carry page text, e.g. ".pdf" */
  skipExtensions: readonly string[];
  /** Glob patterns matched against the URL path; matches are rejected */
  excludePaths?: readonly string[];
}

/** Resolve and validate a candidate URL; null means rejected. */
export type UrlValidator = (rawUrl: string, baseUrl?: string) => string | null;

const PSEUDO_SCHEME_MARKERS = ['javascript:', 'mailto:', 'tel:'];

/**
 * Canonical form of an absolute http(s) URL: fragment and credentials
 * dropped, trailing slashes removed from the path (including the root "/").
 * Returns null for anything that does not parse or is not http(s).
 */
export function canonicalizeUrl(rawUrl: string, baseUrl?: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(rawUrl.trim(), baseUrl);
  } catch {
    return null;
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') return null;

  const path = parsed.pathname.replace(/\/+$/, '');
  return `${parsed.origin}${path}${parsed.search}`;
}

/**
 * Build a validator for the given rules. The returned function is pure:
 * it resolves rawUrl against baseUrl, canonicalizes it, and rejects links
 * that are pseudo-scheme, in-page anchors, off-domain, binary assets, or
 * excluded by path pattern.
 */
export function createUrlValidator(rules: UrlRules): UrlValidator {
  const allowedHosts = new Set(rules.allowedDomains.map((d) => d.toLowerCase()));
  const extensions = rules.skipExtensions.map((ext) => ext.toLowerCase());
  const excludeMatcher =
    rules.excludePaths && rules.excludePaths.length > 0
      ? picomatch([...rules.excludePaths], { dot: true })
      : null;

  return (rawUrl: string, baseUrl?: string): string | null => {
    const candidate = rawUrl.trim();
    const lowered = candidate.toLowerCase();

    if (PSEUDO_SCHEME_MARKERS.some((marker) => lowered.includes(marker))) return null;
    // "#section" points back into the page that links it
    if (candidate.startsWith('#')) return null;

    const normalized = canonicalizeUrl(candidate, baseUrl);
    if (!normalized) return null;

    const parsed = new URL(normalized);
    if (!allowedHosts.has(parsed.host)) return null;

    const path = parsed.pathname.toLowerCase();
    if (extensions.some((ext) => path.endsWith(ext))) return null;
    if (excludeMatcher && excludeMatcher(parsed.pathname)) return null;

    return normalized;
  };
}
