/**
 * Page text extraction: strip boilerplate subtrees, flatten to lines,
 * and filter the lines through the rule set.
 */
import { parseHTML } from 'linkedom';
import { DEFAULT_EXTRACTION_RULES } from './noise-rules.js';
import type { ExtractedContent, ExtractionRules } from './types.js';
import { splitLines } from './utils.js';

// DOM nodeType values; Node.* constants are not globals under Node.js
const ELEMENT_NODE = 1;
const TEXT_NODE = 3;

function removeStructuralNoise(document: Document, tags: readonly string[]): void {
  if (tags.length === 0) return;
  for (const el of document.querySelectorAll(tags.join(', '))) {
    el.remove();
  }
}

function matchesNoise(el: Element, pattern: RegExp): boolean {
  const className = el.getAttribute('class');
  const id = el.getAttribute('id');
  return (className !== null && pattern.test(className)) || (id !== null && pattern.test(id));
}

function removeNoiseContainers(
  document: Document,
  tags: readonly string[],
  pattern: RegExp
): void {
  if (tags.length === 0) return;
  for (const el of document.querySelectorAll(tags.join(', '))) {
    if (matchesNoise(el, pattern)) el.remove();
  }
}

/** Every text node in document order, one entry per node. */
function collectText(node: Node, out: string[]): void {
  for (const child of node.childNodes) {
    if (child.nodeType === TEXT_NODE) {
      out.push(child.textContent ?? '');
    } else if (child.nodeType === ELEMENT_NODE) {
      collectText(child, out);
    }
  }
}

/** Run trimmed lines through the filters in order; survivors keep document order. */
export function filterLines(lines: Iterable<string>, rules: ExtractionRules): string[] {
  const kept = new Set<string>();
  const result: string[] = [];

  for (const rawLine of lines) {
    const line = rawLine.trim();
    if (rules.lineFilters.some((filter) => filter.rejects(line, kept))) continue;
    kept.add(line);
    result.push(line);
  }

  return result;
}

export function extractTitle(document: Document): string {
  return document.querySelector('title')?.textContent?.trim() ?? '';
}

/**
 * Convert raw markup into a title and boilerplate-free text.
 * Heuristic by nature: lines near the length threshold or containers
 * with ambiguous class names can go either way.
 */
export function extractContent(
  html: string,
  rules: ExtractionRules = DEFAULT_EXTRACTION_RULES
): ExtractedContent {
  if (!html) return { title: '', cleanedText: '' };

  const { document } = parseHTML(html);
  const title = extractTitle(document);

  removeStructuralNoise(document, rules.structuralTags);
  removeNoiseContainers(document, rules.noiseContainerTags, rules.noisePattern);

  const chunks: string[] = [];
  collectText(document, chunks);
  const lines = splitLines(chunks.join('\n'));

  return { title, cleanedText: filterLines(lines, rules).join('\n') };
}
