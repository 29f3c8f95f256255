import { readFile } from "fs/promises";
import { existsSync } from "fs";
import { findCareerPage, NOT_FOUND } from "./queries.ts";
import { errorMessage } from "./utils/fetch-with-timeout.ts";
import { logger, preview } from "./utils/logger.ts";
import { describeFailure } from "./utils/types.ts";
import type { CareerPageLookup, CareerPageResult } from "./utils/types.ts";
import type { SourceReadResult } from "./input.ts";
import type { Oracle } from "./oracle.ts";

export const DEFAULT_CAREER_OUTPUT = "career_pages.txt";
export const COMPANY_LIST_CANDIDATES = ["company_list.txt", "job_name_list.txt"];
export const REPORT_HEADER = "Company | Career Page URL";

/** One company name per line; blank lines dropped. */
export async function readCompanyList(path: string): Promise<SourceReadResult> {
  if (!existsSync(path)) {
    return { identifiers: [], diagnostic: `Input file not found: ${path}` };
  }
  try {
    const text = await readFile(path, "utf-8");
    const identifiers = text
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line !== "");
    return identifiers.length > 0
      ? { identifiers }
      : { identifiers, diagnostic: `No companies found in ${path}` };
  } catch (err) {
    return { identifiers: [], diagnostic: `Could not read ${path}: ${errorMessage(err)}` };
  }
}

/** COMPANY_LIST_FILE when it exists, else the first default list that does. */
export function resolveCompanyListFile(
  env: Record<string, string | undefined>,
  exists: (path: string) => boolean = existsSync
): string | null {
  const configured = env.COMPANY_LIST_FILE?.trim();
  const candidates = configured ? [configured, ...COMPANY_LIST_CANDIDATES] : COMPANY_LIST_CANDIDATES;
  return candidates.find((path) => exists(path)) ?? null;
}

export async function findCareerPages(companies: string[], oracle: Oracle): Promise<CareerPageLookup[]> {
  const lookups: CareerPageLookup[] = [];

  for (const [idx, company] of companies.entries()) {
    logger.info(`[${idx + 1}/${companies.length}] Searching: ${company}`);
    const result = await findCareerPage(oracle, company);

    switch (result.status) {
      case "found":
        logger.info(`  [+] Found: ${result.url}`);
        break;
      case "not-found":
        logger.info("  [!] No career page found");
        break;
      case "error":
        logger.warn(`  [!] ${describeFailure(result.failure)}`);
        break;
      case "unexpected":
        logger.warn(`  [?] Unexpected response: ${preview(result.text, 100)}`);
        break;
    }

    lookups.push({ company, result });
  }

  return lookups;
}

function resultText(result: CareerPageResult): string {
  switch (result.status) {
    case "found":
      return result.url;
    case "not-found":
      return NOT_FOUND;
    case "error":
      return "ERROR";
    case "unexpected":
      return result.text;
  }
}

export function formatCareerLine(company: string, result: CareerPageResult): string {
  return `${company} | ${resultText(result)}`;
}

export function renderCareerReport(lookups: readonly CareerPageLookup[]): string {
  const lines = [REPORT_HEADER, "=".repeat(60)];
  for (const { company, result } of lookups) {
    lines.push(formatCareerLine(company, result));
  }
  return lines.join("\n") + "\n";
}

export interface CareerSummary {
  total: number;
  found: number;
  notFound: number;
  errors: number;
  unexpected: number;
}

export function summarizeCareerResults(lookups: readonly CareerPageLookup[]): CareerSummary {
  const count = (status: CareerPageResult["status"]) =>
    lookups.filter((l) => l.result.status === status).length;

  return {
    total: lookups.length,
    found: count("found"),
    notFound: count("not-found"),
    errors: count("error"),
    unexpected: count("unexpected"),
  };
}
