/**
 * Quick smoke test: runs the pipeline against canned pages and model replies.
 * Run: npx tsx scripts/test-pipeline.ts
 */
import { runPipeline } from "../src/pipeline.ts";
import { jobsSheetRows, reviewSheetRows, summaryRows } from "../src/report.ts";
import { DEFAULT_PREFERENCES } from "../src/utils/config.ts";
import { fail, succeed } from "../src/utils/types.ts";
import type { Oracle, OracleRequest } from "../src/oracle.ts";
import type { Outcome } from "../src/utils/types.ts";

const pages: Record<string, string> = {
  "https://example.com/jobs/1": "<html><h1>Backend Engineer</h1><p>Acme, Bangalore</p></html>",
  "https://example.com/jobs/2": "<html><h1>Data Analyst</h1><p>Globex, Remote</p></html>",
  "https://example.com/jobs/3": "<html><h1>Untitled</h1></html>",
};

const jobReplies: Record<string, string> = {
  Acme:
    '```json\n{"company_name":"Acme","role_name":"Backend Engineer","experience_required":"2-4 years",' +
    '"experience_type":"Mid","location":{"exact":"MG Road, Bangalore","city":"Bangalore"},' +
    '"remote":"No","hybrid_or_flexible":"Yes","match_score":9}\n```',
  Globex:
    'Here is the data: {"company_name":"Globex","role_name":"Data Analyst","location":{"city":"Remote"},' +
    '"remote":"Yes","match_score":"6"}',
};

const mockOracle: Oracle = {
  model: "mock",
  async send(request: OracleRequest): Promise<Outcome<string>> {
    if (request.useSearch) {
      const company = request.prompt.split("\n")[0].replace("Company: ", "");
      return succeed(
        JSON.stringify({
          company_name: company,
          reviews: [{ source: "Glassdoor", rating: "4.1", comment: "Good team", url: "https://example.com/r" }],
          aggregated_review_score: 8,
          summary: "Positive overall",
        })
      );
    }
    const key = Object.keys(jobReplies).find((name) => request.prompt.includes(name));
    return key ? succeed(jobReplies[key]) : succeed("Sorry, I could not find a job posting.");
  },
};

const result = await runPipeline([...Object.keys(pages), "https://example.com/missing"], {
  oracle: mockOracle,
  fetchPage: async (url) => (url in pages ? succeed(pages[url]) : fail("transport", "HTTP 404 Not Found")),
  preferences: DEFAULT_PREFERENCES,
});

console.log("=== Jobs Summary ===");
for (const row of jobsSheetRows(result.postings)) console.log(`  ${row.join(" | ")}`);

console.log("\n=== Company Reviews ===");
for (const row of reviewSheetRows(result.bundles)) console.log(`  ${row.map((c) => c ?? "").join(" | ")}`);

console.log("\n=== Summary ===");
for (const row of summaryRows(result.postings, result.bundles, new Date())) console.log(`  ${row.join(" | ")}`);

console.log("\n=== Skipped ===");
for (const item of result.skipped) console.log(`  ${item.identifier} (${item.stage}): ${item.reason}`);

console.log("\n✓ Pipeline simulation complete");
