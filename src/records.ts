import { isJsonRecord } from "./utils/types.ts";
import type {
  FieldValue,
  JobLocation,
  JobPosting,
  JsonRecord,
  ReviewBundle,
  ReviewEntry,
} from "./utils/types.ts";

export const UNKNOWN_COMPANY = "Unknown";

function asRecord(value: unknown): JsonRecord {
  return isJsonRecord(value) ? value : {};
}

/**
 * Picks a scalar as-is. Nested structures in a scalar slot are kept as JSON
 * text; null or a missing key gives the fallback.
 */
function field(raw: JsonRecord, key: string, fallback: FieldValue): FieldValue {
  const value = raw[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  return JSON.stringify(value);
}

function toLocation(value: unknown): JobLocation {
  if (typeof value === "string") {
    return { exact: value, city: value };
  }
  const loc = asRecord(value);
  return {
    exact: field(loc, "exact", ""),
    city: field(loc, "city", ""),
  };
}

export function toJobPosting(raw: JsonRecord): JobPosting {
  return Object.freeze({
    companyName: field(raw, "company_name", ""),
    roleName: field(raw, "role_name", ""),
    experienceRequired: field(raw, "experience_required", ""),
    experienceType: field(raw, "experience_type", ""),
    location: Object.freeze(toLocation(raw.location)),
    remote: field(raw, "remote", ""),
    hybridOrFlexible: field(raw, "hybrid_or_flexible", ""),
    matchScore: field(raw, "match_score", 0),
  });
}

function toReviewEntry(value: unknown): ReviewEntry {
  const raw = asRecord(value);
  return Object.freeze({
    source: field(raw, "source", ""),
    rating: field(raw, "rating", ""),
    comment: field(raw, "comment", ""),
    url: field(raw, "url", ""),
  });
}

export function toReviewBundle(raw: JsonRecord): ReviewBundle {
  const reviews: ReviewEntry[] = Array.isArray(raw.reviews) ? raw.reviews.map(toReviewEntry) : [];
  return Object.freeze({
    companyName: field(raw, "company_name", ""),
    reviews: Object.freeze(reviews),
    aggregatedReviewScore: field(raw, "aggregated_review_score", 0),
    summary: field(raw, "summary", ""),
  });
}

/** Company name to look reviews up by, or "Unknown" when the model gave none. */
export function resolvedCompany(posting: JobPosting): string {
  const name = String(posting.companyName).trim();
  return name === "" ? UNKNOWN_COMPANY : name;
}
