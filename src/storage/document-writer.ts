/**
 * Writes extracted pages into the output corpus.
 *
 * File format, read by the downstream ingestion step:
 *
 *   Source URL: <url>
 *   Page Title: <title>
 *
 *   <cleaned text>
 */
import { promises as fs } from 'fs';
import { join } from 'path';
import { charLength } from '../extract/utils.js';

const MAX_FILENAME_STEM = 80;

export interface WriteResult {
  written: boolean;
  filename?: string;
  path?: string;
}

export interface DocumentSink {
  write(sourceUrl: string, title: string, cleanedText: string): Promise<WriteResult>;
}

/**
 * Derive a filesystem-safe file name from a URL: scheme prefixes removed,
 * "/" mapped to "_", everything but letters, digits, "_" and "-" dropped,
 * stem truncated to 80 characters, ".txt" appended.
 */
export function documentFilename(url: string): string {
  const flattened = url.replaceAll('https://', '').replaceAll('http://', '').replaceAll('/', '_');
  const stem = Array.from(flattened)
    .filter((char) => /^[\p{L}\p{N}_-]$/u.test(char))
    .slice(0, MAX_FILENAME_STEM)
    .join('');
  return `${stem}.txt`;
}

export function formatDocument(sourceUrl: string, title: string, cleanedText: string): string {
  return `Source URL: ${sourceUrl}\nPage Title: ${title}\n\n${cleanedText}`;
}

/**
 * Writes a document only when its cleaned text is longer than
 * minContentLength characters. Existing files at the derived name are
 * replaced.
 */
export class DocumentWriter implements DocumentSink {
  constructor(
    private readonly outputDir: string,
    private readonly minContentLength: number
  ) {}

  async write(sourceUrl: string, title: string, cleanedText: string): Promise<WriteResult> {
    if (charLength(cleanedText) <= this.minContentLength) {
      return { written: false };
    }

    const filename = documentFilename(sourceUrl);
    const path = join(this.outputDir, filename);

    await fs.mkdir(this.outputDir, { recursive: true });
    await fs.writeFile(path, formatDocument(sourceUrl, title, cleanedText), 'utf-8');
    return { written: true, filename, path };
  }
}
