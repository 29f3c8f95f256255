import type { CareerPageResult, Outcome, SearchPreferences } from "./utils/types.ts";
import type { Oracle } from "./oracle.ts";

export const NOT_FOUND = "NOT_FOUND";

// ── Job field extraction ─────────────────────────────────────────────

const JOB_SYSTEM_PROMPT = `You are a JSON data extractor for job postings.

Extract these fields from HTML:
- company_name, role_name, experience_required, experience_type, location (with exact and city), remote, hybrid_or_flexible, match_score (1-10 based on config)

CRITICAL: Return ONLY valid JSON. No markdown, no code blocks, no extra text.

Format:
{"company_name":"","role_name":"","experience_required":"","experience_type":"","location":{"exact":"","city":""},"remote":"","hybrid_or_flexible":"","match_score":0}`;

export function jobExtractionPrompt(html: string, preferences: SearchPreferences): string {
  return `HTML:\n${html}\n\nConfig:\n${JSON.stringify(preferences)}\n\nReturn JSON only:`;
}

export function extractJobFields(
  oracle: Oracle,
  html: string,
  preferences: SearchPreferences
): Promise<Outcome<string>> {
  return oracle.send({ system: JOB_SYSTEM_PROMPT, prompt: jobExtractionPrompt(html, preferences) });
}

// ── Company reviews ──────────────────────────────────────────────────

const REVIEWS_SYSTEM_PROMPT = `You search and aggregate company reviews from Glassdoor, AmbitionBox, Reddit, etc.

Return ONLY valid JSON. No markdown, no extra text.

Format:
{"company_name":"","reviews":[{"source":"","rating":"","comment":"","url":""}],"aggregated_review_score":7,"summary":""}`;

export function fetchCompanyReviews(oracle: Oracle, company: string): Promise<Outcome<string>> {
  return oracle.send({
    system: REVIEWS_SYSTEM_PROMPT,
    prompt: `Company: ${company}\n\nSearch reviews and return JSON only:`,
    useSearch: true,
  });
}

// ── Career page lookup ───────────────────────────────────────────────

const CAREER_SYSTEM_PROMPT = `You are a career page URL finder. Your ONLY task is to find the official careers/jobs page URL for companies.

CRITICAL RULES:
- Return ONLY the direct career page URL (e.g., https://company.com/careers)
- Do NOT return the company homepage
- Do NOT return LinkedIn, Indeed, or job board URLs
- Do NOT return any explanation or additional text
- If no career page exists, return "${NOT_FOUND}"
- Return only ONE URL per company

Valid examples:
- https://google.com/careers
- https://stripe.com/jobs
- https://netflix.jobs

Invalid examples (DO NOT RETURN):
- https://company.com (homepage)
- https://linkedin.com/company/xyz
- https://indeed.com/company/xyz`;

export function classifyCareerPage(outcome: Outcome<string>): CareerPageResult {
  if (!outcome.ok) return { status: "error", failure: outcome.failure };

  const text = outcome.value.trim();
  if (text === NOT_FOUND) return { status: "not-found" };
  if (text.startsWith("http")) return { status: "found", url: text };
  return { status: "unexpected", text };
}

export async function findCareerPage(oracle: Oracle, company: string): Promise<CareerPageResult> {
  const outcome = await oracle.send({
    system: CAREER_SYSTEM_PROMPT,
    prompt: `Find the official career page URL for: ${company}`,
    useSearch: true,
  });
  return classifyCareerPage(outcome);
}
