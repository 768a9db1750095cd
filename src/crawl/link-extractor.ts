/**
 * Extract in-scope links from HTML
 */
import { parseHTML } from 'linkedom';
import type { UrlValidator } from './url-normalizer.js';

/**
 * Resolve every <a href> against the current page, keep the ones the
 * validator accepts, and deduplicate in order of first appearance.
 * Does not consult frontier state; the frontier filters visited/queued URLs.
 */
export function extractLinks(html: string, currentUrl: string, validate: UrlValidator): string[] {
  if (!html) return [];

  const { document } = parseHTML(html);
  const links: string[] = [];
  const seen = new Set<string>();

  for (const anchor of document.querySelectorAll('a[href]')) {
    const href = anchor.getAttribute('href');
    if (href === null) continue;

    const url = validate(href, currentUrl);
    if (url && !seen.has(url)) {
      seen.add(url);
      links.push(url);
    }
  }

  return links;
}
