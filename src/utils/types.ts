// ── Outcomes of external calls ──────────────────────────────────────

export type FailureKind = "transport" | "response-shape";

export interface Failure {
  kind: FailureKind;
  message: string;
}

export type Outcome<T> = { ok: true; value: T } | { ok: false; failure: Failure };

export function succeed<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function fail<T = never>(kind: FailureKind, message: string): Outcome<T> {
  return { ok: false, failure: { kind, message } };
}

/** Log/report form of a failure: "ERROR: <message>". */
export function describeFailure(failure: Failure): string {
  return `ERROR: ${failure.message}`;
}

// ── Raw JSON from the model ──────────────────────────────────────────

export type JsonRecord = Record<string, unknown>;

export function isJsonRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Scalars are kept as the model sent them; the report coerces for sorting
export type FieldValue = string | number | boolean;

// ── Job posting ──────────────────────────────────────────────────────

export interface JobLocation {
  exact: FieldValue;
  city: FieldValue;
}

export interface JobPosting {
  companyName: FieldValue;
  roleName: FieldValue;
  experienceRequired: FieldValue; // free text, e.g. "2-5 years"
  experienceType: FieldValue; // e.g. "Senior"
  location: JobLocation;
  remote: FieldValue; // "Yes" / "No" / "Hybrid"
  hybridOrFlexible: FieldValue;
  matchScore: FieldValue; // 1-10 by convention, 0 when absent
}

// ── Company reviews ──────────────────────────────────────────────────

export interface ReviewEntry {
  source: FieldValue;
  rating: FieldValue;
  comment: FieldValue;
  url: FieldValue;
}

export interface ReviewBundle {
  companyName: FieldValue;
  reviews: readonly ReviewEntry[];
  aggregatedReviewScore: FieldValue;
  summary: FieldValue;
}

// ── Search preferences sent along with each extraction ──────────────

export interface SearchPreferences {
  preferred_locations: string[];
  preferred_experience: string;
  preferred_skills: string[];
  job_type: string;
}

// ── Pipeline run ─────────────────────────────────────────────────────

export type PipelineStage = "fetching" | "extracting" | "reviewing";

export interface SkippedItem {
  identifier: string;
  stage: PipelineStage;
  reason: string;
}

export interface RunSummary {
  total: number;
  postings: number;
  bundles: number;
  skipped: number;
  reviewFailures: number;
  durationMs: number;
}

// ── Career page lookup ───────────────────────────────────────────────

export type CareerPageResult =
  | { status: "found"; url: string }
  | { status: "not-found" }
  | { status: "error"; failure: Failure }
  | { status: "unexpected"; text: string };

export interface CareerPageLookup {
  company: string;
  result: CareerPageResult;
}
