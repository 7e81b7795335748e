/**
 * Command-line entry: configure, crawl, report
 */

import fs from "node:fs/promises";
import { USAGE, parseArgs, resolveConfig } from "./config.js";
import { CrawlCoordinator } from "./crawler.js";
import { ConfigError, errorMessage } from "./errors.js";
import type { CrawlReport } from "./types.js";
import { assertWritableDir } from "./utils/filesystem.js";
import { createConsoleLogger } from "./utils/logger.js";

export const EXIT_OK = 0;
export const EXIT_CONFIG = 1;
export const EXIT_INTERRUPTED = 130;

/**
 * Summary lines for a finished crawl, failed URLs enumerated
 */
export function formatReport(report: CrawlReport): string[] {
  const { counts } = report;
  const lines = [
    `${report.cancelled ? "Stopped" : "Finished"} mirroring ${report.root} into ${report.outDir}`,
    `  fetched: ${counts.fetched}`,
    `  failed: ${counts.failed}`,
    `  skipped: ${counts.skipped} (out of scope: ${counts.skippedOutOfScope})`,
  ];
  if (report.failed.length) {
    lines.push("Failed URLs:");
    for (const f of report.failed) {
      lines.push(`  [${f.kind}] ${f.url} - ${f.message}`);
    }
  }
  return lines;
}

async function prepareOutputDir(outDir: string, clean: boolean): Promise<void> {
  if (clean) await fs.rm(outDir, { recursive: true, force: true });
  try {
    await assertWritableDir(outDir);
  } catch (err) {
    throw new ConfigError(`Output directory ${outDir} is not writable: ${errorMessage(err)}`);
  }
}

/**
 * Parse CLI arguments and run the crawler. Resolves to the process exit code.
 */
export async function runCLI(args: string[] = process.argv.slice(2)): Promise<number> {
  const argv = parseArgs(args);
  if (argv.help) {
    console.log(USAGE);
    return EXIT_OK;
  }

  let coordinator: CrawlCoordinator;
  const logger = createConsoleLogger({ verbose: Boolean(argv.verbose), quiet: Boolean(argv.quiet) });
  try {
    const config = resolveConfig(argv);
    await prepareOutputDir(config.outDir, config.clean);
    coordinator = new CrawlCoordinator(config.startUrl, config.outDir, { ...config.crawl, logger });
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    logger.error(err.message);
    console.error(USAGE);
    return EXIT_CONFIG;
  }

  let interrupted = false;
  const onSigint = () => {
    interrupted = true;
    coordinator.stop("interrupted");
  };
  process.once("SIGINT", onSigint);

  let report: CrawlReport;
  try {
    report = await coordinator.run();
  } finally {
    process.off("SIGINT", onSigint);
  }

  const [headline, ...rest] = formatReport(report);
  logger.info(headline);
  for (const line of rest) {
    if (line.startsWith("  [")) logger.warn(line);
    else logger.info(line);
  }
  return interrupted ? EXIT_INTERRUPTED : EXIT_OK;
}
