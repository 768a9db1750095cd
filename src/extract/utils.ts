/**
 * Utility functions for the extract module
 */

/** Line breaks recognized when splitting flattened page text. */
const LINE_BREAK = /\r\n|[\n\r\v\f\x1c-\x1e\x85\u2028\u2029]/;

export function splitLines(text: string): string[] {
  return text.split(LINE_BREAK);
}

/**
 * Length in characters (code points), so astral characters count once
 * rather than as two UTF-16 units.
 */
export function charLength(text: string): number {
  return Array.from(text).length;
}
