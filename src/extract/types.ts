/**
 * Shared types for the extract module
 */

export interface ExtractedContent {
  /** Text of the <title> element, trimmed; empty when absent */
  title: string;
  /** Surviving lines joined with "\n" */
  cleanedText: string;
}

/**
 * A line-level filter. Lines arrive trimmed; `kept` holds the lines already
 * accepted earlier in the same document.
 */
export interface LineFilter {
  name: string;
  rejects(line: string, kept: ReadonlySet<string>): boolean;
}

/**
 * Ordered boilerplate-removal rules: structural tags are dropped first,
 * then containers whose class or id matches the noise pattern, then the
 * flattened text runs through the line filters in order.
 */
export interface ExtractionRules {
  structuralTags: readonly string[];
  noiseContainerTags: readonly string[];
  noisePattern: RegExp;
  lineFilters: readonly LineFilter[];
}
