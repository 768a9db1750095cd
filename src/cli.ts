#!/usr/bin/env node
/**
 * CLI entry point for campus-crawler
 */
import { fileURLToPath } from 'url';
import { realpathSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { crawl } from './crawl/crawler.js';
import type { CrawlEvent } from './crawl/types.js';
import { loadConfig } from './config/crawler-config.js';
import {
  DEFAULT_MAX_PAGES,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_POLITENESS_DELAY_MS,
  DEFAULT_STATE_FILE,
} from './config/constants.js';
import { logger } from './logger.js';

/** Read version from package.json */
function getVersion(): string {
  const srcDir = dirname(fileURLToPath(import.meta.url));
  const pkgPath = join(srcDir, '..', 'package.json');
  try {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg) {
      return String(pkg.version);
    }
    return 'unknown';
  } catch (error) {
    console.debug('Failed to read version from package.json:', error);
    return 'unknown';
  }
}

export interface CrawlCliOptions {
  maxPages?: number;
  resume: boolean;
  configPath?: string;
  outputDir?: string;
  stateFile?: string;
  delayMs?: number;
  json: boolean;
  quiet: boolean;
}

type CrawlParseResult =
  | { kind: 'ok'; opts: CrawlCliOptions; warnings: string[] }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'error'; message: string };

export function parseCrawlArgs(args: string[]): CrawlParseResult {
  const warnings: string[] = [];
  const opts: CrawlCliOptions = { resume: false, json: false, quiet: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-v':
      case '--version':
        return { kind: 'version' };
      case '--resume':
        opts.resume = true;
        break;
      case '--json':
        opts.json = true;
        break;
      case '-q':
      case '--quiet':
        opts.quiet = true;
        break;
      case '--max-pages': {
        if (i + 1 >= args.length) return { kind: 'error', message: '--max-pages requires a value' };
        const v = parseInt(args[++i], 10);
        if (isNaN(v) || v <= 0)
          return { kind: 'error', message: '--max-pages must be a positive integer' };
        opts.maxPages = v;
        break;
      }
      case '--delay': {
        if (i + 1 >= args.length) return { kind: 'error', message: '--delay requires a value' };
        const v = parseInt(args[++i], 10);
        if (isNaN(v) || v < 0)
          return { kind: 'error', message: '--delay must be a non-negative integer' };
        opts.delayMs = v;
        break;
      }
      case '--config':
        if (i + 1 >= args.length) return { kind: 'error', message: '--config requires a value' };
        opts.configPath = args[++i];
        break;
      case '--output-dir':
        if (i + 1 >= args.length)
          return { kind: 'error', message: '--output-dir requires a value' };
        opts.outputDir = args[++i];
        break;
      case '--state-file':
        if (i + 1 >= args.length)
          return { kind: 'error', message: '--state-file requires a value' };
        opts.stateFile = args[++i];
        break;
      default:
        if (arg.startsWith('-')) {
          warnings.push(`Unknown option: ${arg}`);
        } else {
          warnings.push(`Unexpected argument: ${arg}`);
        }
    }
  }

  return { kind: 'ok', opts, warnings };
}

function printUsage(): void {
  console.log(`Usage: campus-crawler [options]

Crawls the configured university site into a directory of cleaned text files.
One file per page, named after its URL, starting with "Source URL:" and
"Page Title:" lines.

Options:
  --max-pages <n>       Successful fetches to make before stopping (default: ${DEFAULT_MAX_PAGES})
  --resume              Continue from the saved crawl state
  --config <path>       JSON file overriding crawler configuration
  --output-dir <dir>    Where documents are written (default: ${DEFAULT_OUTPUT_DIR})
  --state-file <path>   Checkpoint file (default: ${DEFAULT_STATE_FILE})
  --delay <ms>          Politeness delay between fetches (default: ${DEFAULT_POLITENESS_DELAY_MS})
  --json                One JSON line per crawl event on stdout
  -q, --quiet           Print only the paths of written documents
  -v, --version         Show version number
  -h, --help            Show this help message`);
}

/** Render one crawl event for the terminal; null means print nothing. */
export function renderEvent(
  item: CrawlEvent,
  opts: Pick<CrawlCliOptions, 'json' | 'quiet'>,
  outputDir: string,
  maxPages: number
): string | null {
  if (opts.json) return JSON.stringify(item);

  if (item.type === 'summary') {
    if (opts.quiet) return null;
    return (
      `\nCrawl complete: ${item.pagesSuccess} pages fetched, ${item.pagesSaved} saved, ` +
      `${item.pagesSkipped} skipped, ${item.pagesFailed} failed` +
      (item.pagesWriteFailed > 0 ? `, ${item.pagesWriteFailed} not written` : '') +
      ` (${item.stopReason}), ` +
      `${item.durationMs}ms. Files in ${outputDir}/`
    );
  }

  if (opts.quiet) {
    return item.outcome === 'saved' && item.filename ? join(outputDir, item.filename) : null;
  }

  switch (item.outcome) {
    case 'saved':
      return `[${item.pagesSuccess}/${maxPages}] ${item.url}  saved (${(item.contentLength ?? 0).toLocaleString('en-US')} chars) "${item.title ?? ''}"`;
    case 'skipped_short':
      return `[${item.pagesSuccess}/${maxPages}] ${item.url}  skipped, too little content`;
    case 'write_failed':
      return `[${item.pagesSuccess}/${maxPages}] ${item.url}  not written: ${item.error ?? 'unknown error'}`;
    case 'fetch_failed':
      return `[failed] ${item.url}  after ${item.attempts} attempts: ${item.error ?? 'unknown error'}`;
    case 'already_visited':
      return null;
  }
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  const result = parseCrawlArgs(argv);

  switch (result.kind) {
    case 'version':
      console.log(`campus-crawler ${getVersion()}`);
      return;
    case 'help':
      printUsage();
      return;
    case 'error':
      console.error(`Error: ${result.message}`);
      printUsage();
      process.exitCode = 1;
      return;
  }

  const { opts, warnings } = result;
  for (const warning of warnings) {
    console.error(`Warning: ${warning}`);
  }

  const config = loadConfig(opts.configPath, {
    maxPages: opts.maxPages,
    outputDir: opts.outputDir,
    stateFile: opts.stateFile,
    politenessDelayMs: opts.delayMs,
  });

  // First signal stops after the page in flight; the checkpoint is still written
  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    logger.warn({ signal }, 'Stop requested, finishing current page');
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  try {
    for await (const item of crawl(config, {
      maxPages: config.maxPages,
      resume: opts.resume,
      signal: controller.signal,
    })) {
      const line = renderEvent(item, opts, config.outputDir, config.maxPages);
      if (line === null) continue;
      if (item.type === 'summary' && !opts.json) {
        console.error(line);
      } else {
        console.log(line);
      }
    }
  } finally {
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
  }
}

const isDirectRun =
  process.argv[1] && fileURLToPath(import.meta.url) === realpathSync(process.argv[1]);
if (isDirectRun) {
  main()
    .then(() => {
      // Keep-alive sockets from the last fetch would otherwise hold the event loop open
      process.exit(process.exitCode ?? 0);
    })
    .catch((err) => {
      console.error(`Fatal: ${err}`);
      process.exit(1);
    });
}
