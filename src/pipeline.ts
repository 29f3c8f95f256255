import { extractJson, isEmptyRecord } from "./extract-json.ts";
import { toJobPosting, toReviewBundle, resolvedCompany, UNKNOWN_COMPANY } from "./records.ts";
import { extractJobFields, fetchCompanyReviews } from "./queries.ts";
import { logger } from "./utils/logger.ts";
import { describeFailure } from "./utils/types.ts";
import type { Oracle } from "./oracle.ts";
import type { PageFetcher } from "./fetch-page.ts";
import type {
  JobPosting,
  ReviewBundle,
  RunSummary,
  SearchPreferences,
  SkippedItem,
} from "./utils/types.ts";

export interface PipelineDeps {
  oracle: Oracle;
  fetchPage: PageFetcher;
  preferences: SearchPreferences;
}

export interface PipelineResult {
  postings: JobPosting[];
  bundles: ReviewBundle[];
  skipped: SkippedItem[];
  summary: RunSummary;
}

type ItemOutcome =
  | { status: "accumulated"; posting: JobPosting; bundle: ReviewBundle | null; reviewFailed: boolean }
  | { status: "skipped"; item: SkippedItem };

async function lookupReviews(
  oracle: Oracle,
  company: string
): Promise<ReviewBundle | null> {
  logger.info("  -> Fetching company reviews...");
  const response = await fetchCompanyReviews(oracle, company);
  if (!response.ok) {
    logger.warn(`  [!] Reviews for ${company}: ${describeFailure(response.failure)}`);
    return null;
  }

  const raw = extractJson(response.value);
  if (isEmptyRecord(raw)) {
    logger.warn(`  [!] No review data recovered for ${company}`);
    return null;
  }

  const bundle = toReviewBundle(raw);
  logger.info(`  [+] Reviews: Score ${bundle.aggregatedReviewScore}/10`);
  return bundle;
}

/** fetching → extracting → reviewing (optional) → accumulated, or skipped. */
async function processIdentifier(identifier: string, deps: PipelineDeps): Promise<ItemOutcome> {
  const skip = (stage: SkippedItem["stage"], reason: string): ItemOutcome => {
    logger.warn(`  [!] Skipped at ${stage}: ${reason}`);
    return { status: "skipped", item: { identifier, stage, reason } };
  };

  logger.info("  -> Fetching HTML...");
  const page = await deps.fetchPage(identifier);
  if (!page.ok) return skip("fetching", describeFailure(page.failure));
  logger.info(`  -> HTML fetched (${page.value.length} chars)`);

  logger.info(`  -> Extracting job data with ${deps.oracle.model}...`);
  const extraction = await extractJobFields(deps.oracle, page.value, deps.preferences);
  if (!extraction.ok) return skip("extracting", describeFailure(extraction.failure));

  const raw = extractJson(extraction.value);
  if (isEmptyRecord(raw)) return skip("extracting", "Failed to extract job data");

  const posting = toJobPosting(raw);
  const company = resolvedCompany(posting);
  const role = String(posting.roleName) || "Unknown";
  logger.info(`  [+] Job: ${role} at ${company} (Match: ${posting.matchScore}/10)`);

  if (company === UNKNOWN_COMPANY) {
    return { status: "accumulated", posting, bundle: null, reviewFailed: false };
  }

  const bundle = await lookupReviews(deps.oracle, company);
  return { status: "accumulated", posting, bundle, reviewFailed: bundle === null };
}

/**
 * Processes identifiers one at a time. A failure at any stage drops only
 * that identifier; a failed review keeps the posting without a bundle.
 */
export async function runPipeline(identifiers: string[], deps: PipelineDeps): Promise<PipelineResult> {
  const startTime = Date.now();
  const postings: JobPosting[] = [];
  const bundles: ReviewBundle[] = [];
  const skipped: SkippedItem[] = [];
  let reviewFailures = 0;

  for (const [idx, identifier] of identifiers.entries()) {
    logger.info(`[${idx + 1}/${identifiers.length}] Processing: ${identifier}`);

    const outcome = await processIdentifier(identifier, deps);
    if (outcome.status === "skipped") {
      skipped.push(outcome.item);
      continue;
    }

    postings.push(outcome.posting);
    if (outcome.bundle) bundles.push(outcome.bundle);
    if (outcome.reviewFailed) reviewFailures++;
  }

  return {
    postings,
    bundles,
    skipped,
    summary: {
      total: identifiers.length,
      postings: postings.length,
      bundles: bundles.length,
      skipped: skipped.length,
      reviewFailures,
      durationMs: Date.now() - startTime,
    },
  };
}
