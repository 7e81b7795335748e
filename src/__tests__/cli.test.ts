import { afterEach, describe, expect, it, vi } from 'vitest';
import { EXIT_CONFIG, EXIT_OK, formatReport, runCLI } from '../cli.js';
import { USAGE } from '../config.js';
import type { CrawlReport } from '../types.js';

const report: CrawlReport = {
  root: 'http://ex.com/',
  outDir: '/tmp/mirror',
  phase: 'done',
  cancelled: false,
  counts: { fetched: 3, failed: 1, skipped: 2, skippedOutOfScope: 1 },
  pages: [],
  failed: [{ url: 'http://ex.com/gone', kind: 'HTTPError', message: 'HTTP 404', statusCode: 404 }],
  skipped: [
    { url: 'http://other.com/', reason: 'out-of-scope' },
    { url: 'http://ex.com/deep', reason: 'max-depth' },
  ],
  durationMs: 12,
};

describe('formatReport', () => {
  it('summarises counts and lists failures', () => {
    expect(formatReport(report)).toEqual([
      'Finished mirroring http://ex.com/ into /tmp/mirror',
      '  fetched: 3',
      '  failed: 1',
      '  skipped: 2 (out of scope: 1)',
      'Failed URLs:',
      '  [HTTPError] http://ex.com/gone - HTTP 404',
    ]);
  });

  it('says when the crawl was stopped early', () => {
    const stopped = { ...report, cancelled: true, failed: [] };
    expect(formatReport(stopped)).toEqual([
      'Stopped mirroring http://ex.com/ into /tmp/mirror',
      '  fetched: 3',
      '  failed: 1',
      '  skipped: 2 (out of scope: 1)',
    ]);
  });
});

describe('runCLI', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints usage for --help', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    expect(await runCLI(['--help'])).toBe(EXIT_OK);
    expect(log).toHaveBeenCalledWith(USAGE);
  });

  it('exits with a configuration error before crawling', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    expect(await runCLI(['not-a-url'])).toBe(EXIT_CONFIG);
    expect(error).toHaveBeenCalledWith(USAGE);
  });
});
