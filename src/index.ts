import "dotenv/config";
import { logger } from "./utils/logger.ts";
import { ConfigError, loadConfig, loadPreferences, parseCliArgs } from "./utils/config.ts";
import { readIdentifiers, resolveInputFile } from "./input.ts";
import { createOracle } from "./oracle.ts";
import { createPageFetcher } from "./fetch-page.ts";
import { runPipeline } from "./pipeline.ts";
import { jobsSheetRows, reviewSheetRows, writeReport } from "./report.ts";
import type { PipelineResult } from "./pipeline.ts";

const options = parseCliArgs(process.argv.slice(2));

if (options.dryRun) logger.info("DRY RUN MODE — no report file will be written");
if (options.limit) logger.info(`Limiting to ${options.limit} URLs`);
if (options.ignoredLimit !== undefined) logger.warn(`Invalid --limit value, ignoring: ${options.ignoredLimit}`);

// ── Main pipeline ────────────────────────────────────────────────────

async function run(): Promise<void> {
  logger.info("=== Job report ===");

  const config = loadConfig();
  const preferences = loadPreferences(config.preferencesFile);
  logger.info(`Oracle: ${config.provider} (${config.model})`);

  // ── Step 1: Read input ─────────────────────────────────────────────
  const inputFile = options.input ?? resolveInputFile(process.env);
  const { identifiers, diagnostic } = await readIdentifiers(inputFile);
  if (identifiers.length === 0) {
    logger.warn(diagnostic ?? `No URLs found in ${inputFile}. Create 'job_links.txt' or 'job_links.xlsx'`);
    return;
  }

  const urls = options.limit ? identifiers.slice(0, options.limit) : identifiers;
  logger.info(`=== Step 1: Processing ${urls.length} job URLs ===`);

  // ── Step 2: Fetch, extract, review ─────────────────────────────────
  const result = await runPipeline(urls, {
    oracle: createOracle(config),
    fetchPage: createPageFetcher({ timeoutMs: config.fetchTimeoutMs }),
    preferences,
  });

  // ── Step 3: Report ─────────────────────────────────────────────────
  logger.info("=== Step 3: Building report ===");
  if (options.dryRun) {
    logDryRun(result);
  } else {
    const report = await writeReport(result.postings, result.bundles, {
      outputPath: options.output ?? config.outputFile,
    });
    if (report.status === "empty") {
      logger.warn("No data to export");
    } else {
      logger.info(`Excel file created: ${report.path}`);
    }
  }

  logSummary(result);
}

function logDryRun(result: PipelineResult): void {
  logger.info("=== DRY RUN: Jobs Summary rows ===");
  for (const row of jobsSheetRows(result.postings)) {
    logger.info(`  ${row.join(" | ")}`);
  }
  logger.info("=== DRY RUN: Company Reviews rows ===");
  for (const row of reviewSheetRows(result.bundles)) {
    logger.info(`  ${row.map((cell) => cell ?? "").join(" | ")}`);
  }
}

function logSummary({ summary, skipped }: PipelineResult): void {
  logger.info("=== Run Summary ===");
  logger.info(`  URLs:            ${summary.total}`);
  logger.info(`  Jobs processed:  ${summary.postings}`);
  logger.info(`  Companies:       ${summary.bundles}`);
  logger.info(`  Review misses:   ${summary.reviewFailures}`);
  logger.info(`  Skipped:         ${summary.skipped}`);
  logger.info(`  Duration:        ${(summary.durationMs / 1000).toFixed(1)}s`);
  for (const item of skipped) {
    logger.info(`    ${item.identifier} (${item.stage}): ${item.reason}`);
  }
}

run().catch((err) => {
  if (err instanceof ConfigError) {
    logger.error(err.message);
  } else {
    logger.error("Fatal error", err);
  }
  process.exitCode = 1;
});
