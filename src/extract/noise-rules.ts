/**
 * Boilerplate-removal rule set for university pages
 */
import type { ExtractionRules, LineFilter } from './types.js';
import { charLength } from './utils.js';

/** Elements whose whole subtree is never page text. */
export const STRUCTURAL_NOISE_TAGS = [
  'script',
  'style',
  'nav',
  'footer',
  'header',
  'aside',
  'form',
  'iframe',
  'noscript',
  'svg',
  'button',
  'select',
  'option',
];

/** Container elements checked against the class/id noise pattern. */
export const NOISE_CONTAINER_TAGS = ['div', 'section', 'ul', 'aside'];

export const NOISE_CLASS_PATTERN =
  /(menu|nav|sidebar|breadcrumb|search|social|footer|widget|cookie|popup|modal|banner|advertisement|ad-|slick|carousel)/i;

/** UI labels dropped when a whole line matches one (case-insensitive). */
export const UI_CHROME_PHRASES = [
  'Apply Now',
  'Read More',
  'Learn More',
  'Click Here',
  'Skip to main',
  'Search form',
  'Toggle navigation',
  'Back to top',
  'Follow us',
  'Share this',
];

export const MIN_LINE_LENGTH = 10;

// --- Line filters ---

export const emptyLine: LineFilter = {
  name: 'empty',
  rejects: (line) => line.length === 0,
};

/** First occurrence wins; this also drops menu text echoed further down. */
export const duplicateLine: LineFilter = {
  name: 'duplicate',
  rejects: (line, kept) => kept.has(line),
};

export function shortLine(minLength: number = MIN_LINE_LENGTH): LineFilter {
  return {
    name: 'short',
    rejects: (line) => charLength(line) < minLength,
  };
}

export function uiChromeLine(phrases: readonly string[] = UI_CHROME_PHRASES): LineFilter {
  const lowered = new Set(phrases.map((p) => p.toLowerCase()));
  return {
    name: 'ui-chrome',
    rejects: (line) => lowered.has(line.toLowerCase()),
  };
}

/** Lines with no letter or digit in any script: separators, bullets, arrows. */
export const symbolOnlyLine: LineFilter = {
  name: 'symbol-only',
  rejects: (line) => /^[^\p{L}\p{N}]+$/u.test(line),
};

export const DEFAULT_EXTRACTION_RULES: ExtractionRules = {
  structuralTags: STRUCTURAL_NOISE_TAGS,
  noiseContainerTags: NOISE_CONTAINER_TAGS,
  noisePattern: NOISE_CLASS_PATTERN,
  lineFilters: [emptyLine, duplicateLine, shortLine(), uiChromeLine(), symbolOnlyLine],
};
