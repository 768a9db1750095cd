import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { join } from 'path';

vi.mock('../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

vi.mock('../crawl/crawler.js', () => ({
  crawl: vi.fn(),
}));

import { parseCrawlArgs, renderEvent, main } from '../cli.js';
import { crawl } from '../crawl/crawler.js';
import type { CrawlEvent, CrawlSummary, PageEvent } from '../crawl/types.js';

const summary: CrawlSummary = {
  type: 'summary',
  pagesSuccess: 3,
  pagesSaved: 2,
  pagesSkipped: 1,
  pagesFailed: 1,
  pagesWriteFailed: 0,
  visitedCount: 4,
  queueRemaining: 7,
  resumed: false,
  stopReason: 'budget',
  durationMs: 1234,
};

const saved: PageEvent = {
  type: 'page',
  url: 'https://www.example.edu/about',
  outcome: 'saved',
  attempts: 1,
  pagesSuccess: 2,
  title: 'About Us',
  contentLength: 12345,
  filename: 'wwwexampleedu_about.txt',
  linksFound: 4,
  linksAdded: 2,
};

async function* events(...items: CrawlEvent[]): AsyncGenerator<CrawlEvent> {
  yield* items;
}

describe('cli', () => {
  describe('parseCrawlArgs', () => {
    it('returns defaults for no args', () => {
      expect(parseCrawlArgs([])).toEqual({
        kind: 'ok',
        opts: { resume: false, json: false, quiet: false },
        warnings: [],
      });
    });

    it('parses every option', () => {
      const result = parseCrawlArgs([
        '--max-pages',
        '25',
        '--resume',
        '--config',
        'crawler.json',
        '--output-dir',
        'out',
        '--state-file',
        'state.json',
        '--delay',
        '0',
        '--json',
        '-q',
      ]);
      expect(result).toEqual({
        kind: 'ok',
        opts: {
          maxPages: 25,
          resume: true,
          configPath: 'crawler.json',
          outputDir: 'out',
          stateFile: 'state.json',
          delayMs: 0,
          json: true,
          quiet: true,
        },
        warnings: [],
      });
    });

    it('returns help for -h and --help', () => {
      expect(parseCrawlArgs(['-h'])).toEqual({ kind: 'help' });
      expect(parseCrawlArgs(['--resume', '--help'])).toEqual({ kind: 'help' });
    });

    it('returns version for -v and --version', () => {
      expect(parseCrawlArgs(['-v'])).toEqual({ kind: 'version' });
      expect(parseCrawlArgs(['--version'])).toEqual({ kind: 'version' });
    });

    it('requires a value after --max-pages', () => {
      expect(parseCrawlArgs(['--max-pages'])).toEqual({
        kind: 'error',
        message: '--max-pages requires a value',
      });
    });

    it('rejects a non-positive page budget', () => {
      for (const value of ['0', '-3', 'many']) {
        expect(parseCrawlArgs(['--max-pages', value])).toEqual({
          kind: 'error',
          message: '--max-pages must be a positive integer',
        });
      }
    });

    it('rejects a negative delay', () => {
      expect(parseCrawlArgs(['--delay', '-1'])).toEqual({
        kind: 'error',
        message: '--delay must be a non-negative integer',
      });
    });

    it('requires a value after path options', () => {
      for (const flag of ['--config', '--output-dir', '--state-file']) {
        expect(parseCrawlArgs([flag])).toEqual({
          kind: 'error',
          message: `${flag} requires a value`,
        });
      }
    });

    it('warns about unknown flags and stray arguments', () => {
      const result = parseCrawlArgs(['--fast', 'https://www.example.edu']);
      expect(result).toEqual({
        kind: 'ok',
        opts: { resume: false, json: false, quiet: false },
        warnings: ['Unknown option: --fast', 'Unexpected argument: https://www.example.edu'],
      });
    });
  });

  describe('renderEvent', () => {
    const plain = { json: false, quiet: false };

    it('renders a saved page with its progress and size', () => {
      expect(renderEvent(saved, plain, 'docs', 300)).toBe(
        '[2/300] https://www.example.edu/about  saved (12,345 chars) "About Us"'
      );
    });

    it('renders a skipped page', () => {
      const skipped: PageEvent = { ...saved, outcome: 'skipped_short', filename: undefined };
      expect(renderEvent(skipped, plain, 'docs', 300)).toBe(
        '[2/300] https://www.example.edu/about  skipped, too little content'
      );
    });

    it('renders a failed page with its error', () => {
      const failed: PageEvent = {
        type: 'page',
        url: 'https://www.example.edu/gone',
        outcome: 'fetch_failed',
        attempts: 2,
        pagesSuccess: 0,
        error: 'HTTP 404',
      };
      expect(renderEvent(failed, plain, 'docs', 300)).toBe(
        '[failed] https://www.example.edu/gone  after 2 attempts: HTTP 404'
      );
    });

    it('renders a page whose document could not be written', () => {
      const unwritten: PageEvent = {
        ...saved,
        outcome: 'write_failed',
        filename: undefined,
        error: 'Error: EACCES: permission denied',
      };
      expect(renderEvent(unwritten, plain, 'docs', 300)).toBe(
        '[2/300] https://www.example.edu/about  not written: Error: EACCES: permission denied'
      );
    });

    it('mentions unwritten documents in the summary only when there are some', () => {
      expect(renderEvent({ ...summary, pagesWriteFailed: 2 }, plain, 'docs', 300)).toBe(
        '\nCrawl complete: 3 pages fetched, 2 saved, 1 skipped, 1 failed, 2 not written (budget), 1234ms. Files in docs/'
      );
    });

    it('renders nothing for an already visited URL', () => {
      const visited: PageEvent = { ...saved, outcome: 'already_visited', attempts: 0 };
      expect(renderEvent(visited, plain, 'docs', 300)).toBeNull();
    });

    it('renders the summary', () => {
      expect(renderEvent(summary, plain, 'docs', 300)).toBe(
        '\nCrawl complete: 3 pages fetched, 2 saved, 1 skipped, 1 failed (budget), 1234ms. Files in docs/'
      );
    });

    it('prints only written paths in quiet mode', () => {
      const quiet = { json: false, quiet: true };
      expect(renderEvent(saved, quiet, 'docs', 300)).toBe(join('docs', 'wwwexampleedu_about.txt'));
      expect(renderEvent({ ...saved, outcome: 'skipped_short' }, quiet, 'docs', 300)).toBeNull();
      expect(renderEvent(summary, quiet, 'docs', 300)).toBeNull();
    });

    it('serializes every event in json mode', () => {
      const json = { json: true, quiet: true };
      expect(renderEvent(summary, json, 'docs', 300)).toBe(JSON.stringify(summary));
      expect(renderEvent(saved, json, 'docs', 300)).toBe(JSON.stringify(saved));
    });
  });

  describe('main', () => {
    let consoleLogSpy: ReturnType<typeof vi.spyOn>;
    let consoleErrorSpy: ReturnType<typeof vi.spyOn>;

    beforeEach(() => {
      vi.clearAllMocks();
      process.exitCode = undefined;
      consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
      consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
      process.exitCode = undefined;
      consoleLogSpy.mockRestore();
      consoleErrorSpy.mockRestore();
    });

    it('prints usage for --help without crawling', async () => {
      await main(['--help']);
      expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('Usage: campus-crawler'));
      expect(crawl).not.toHaveBeenCalled();
    });

    it('prints the version', async () => {
      await main(['--version']);
      expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringMatching(/^campus-crawler \S+$/));
    });

    it('sets a failing exit code on a bad argument', async () => {
      await main(['--max-pages', 'zero']);
      expect(consoleErrorSpy).toHaveBeenCalledWith(
        'Error: --max-pages must be a positive integer'
      );
      expect(process.exitCode).toBe(1);
      expect(crawl).not.toHaveBeenCalled();
    });

    it('passes flags through to the crawl and prints each event', async () => {
      vi.mocked(crawl).mockReturnValue(events(saved, summary));

      await main(['--max-pages', '5', '--resume', '--output-dir', 'out', '--delay', '0', '--bogus']);

      expect(crawl).toHaveBeenCalledTimes(1);
      const [config, options] = vi.mocked(crawl).mock.calls[0];
      expect(config.maxPages).toBe(5);
      expect(config.outputDir).toBe('out');
      expect(config.politenessDelayMs).toBe(0);
      expect(options).toMatchObject({ maxPages: 5, resume: true });
      expect(options?.signal).toBeInstanceOf(AbortSignal);

      expect(consoleErrorSpy).toHaveBeenCalledWith('Warning: Unknown option: --bogus');
      expect(consoleLogSpy).toHaveBeenCalledWith(
        '[2/5] https://www.example.edu/about  saved (12,345 chars) "About Us"'
      );
      // the summary goes to stderr so stdout stays a list of pages
      expect(consoleErrorSpy).toHaveBeenCalledWith(
        '\nCrawl complete: 3 pages fetched, 2 saved, 1 skipped, 1 failed (budget), 1234ms. Files in out/'
      );
    });

    it('writes JSON lines to stdout in --json mode', async () => {
      vi.mocked(crawl).mockReturnValue(events(saved, summary));

      await main(['--json']);

      expect(consoleLogSpy.mock.calls).toEqual([[JSON.stringify(saved)], [JSON.stringify(summary)]]);
    });

    it('removes its signal handlers when the crawl ends', async () => {
      const before = process.listenerCount('SIGINT');
      vi.mocked(crawl).mockReturnValue(events(summary));

      await main([]);

      expect(process.listenerCount('SIGINT')).toBe(before);
    });
  });
});
