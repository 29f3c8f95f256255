import "dotenv/config";
import { writeFile } from "fs/promises";
import { logger } from "./utils/logger.ts";
import { ConfigError, loadConfig } from "./utils/config.ts";
import { createOracle } from "./oracle.ts";
import {
  COMPANY_LIST_CANDIDATES,
  DEFAULT_CAREER_OUTPUT,
  findCareerPages,
  readCompanyList,
  renderCareerReport,
  resolveCompanyListFile,
  summarizeCareerResults,
} from "./career-pages.ts";

async function run(): Promise<void> {
  logger.info("=== Career page finder ===");

  const config = loadConfig();
  logger.info(`Oracle: ${config.provider} (${config.model}), search grounding enabled`);

  const inputFile = resolveCompanyListFile(process.env);
  if (!inputFile) {
    logger.warn(`No input file found. Create one of: ${COMPANY_LIST_CANDIDATES.join(", ")} (one company per line)`);
    return;
  }

  const { identifiers: companies, diagnostic } = await readCompanyList(inputFile);
  if (companies.length === 0) {
    logger.warn(diagnostic ?? `No companies found in ${inputFile}`);
    return;
  }
  logger.info(`Found ${companies.length} companies to process`);

  const lookups = await findCareerPages(companies, createOracle(config));

  const outputFile = process.env.CAREER_PAGES_OUTPUT?.trim() || DEFAULT_CAREER_OUTPUT;
  await writeFile(outputFile, renderCareerReport(lookups), "utf-8");

  const summary = summarizeCareerResults(lookups);
  logger.info(`Results saved to: ${outputFile}`);
  logger.info(`  Companies:  ${summary.total}`);
  logger.info(`  Found:      ${summary.found}`);
  logger.info(`  Not found:  ${summary.notFound}`);
  logger.info(`  Unexpected: ${summary.unexpected}`);
  logger.info(`  Errors:     ${summary.errors}`);
}

run().catch((err) => {
  if (err instanceof ConfigError) {
    logger.error(err.message);
  } else {
    logger.error("Fatal error", err);
  }
  process.exitCode = 1;
});
