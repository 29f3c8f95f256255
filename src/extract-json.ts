import { logger, preview } from "./utils/logger.ts";
import { isJsonRecord } from "./utils/types.ts";
import type { JsonRecord } from "./utils/types.ts";

const FENCED_BLOCK = /```(?:json)?\s*\n([\s\S]*?)\n```/g;
const BRACE_SPAN = /\{[\s\S]*\}/;

function parseRecord(candidate: string): JsonRecord | null {
  try {
    const value: unknown = JSON.parse(candidate);
    return isJsonRecord(value) ? value : null;
  } catch {
    return null;
  }
}

function fencedBlocks(text: string): string[] {
  return [...text.matchAll(FENCED_BLOCK)].map((m) => m[1]);
}

function braceSpan(text: string): string[] {
  const match = text.match(BRACE_SPAN);
  return match ? [match[0]] : [];
}

// Tried in order, first object that parses wins
const strategies: Array<(text: string) => string[]> = [
  (text) => [text],
  fencedBlocks,
  braceSpan,
];

/**
 * Recovers a JSON object from model output that may be wrapped in prose or
 * markdown fences. Returns `{}` when nothing parses; never throws.
 */
export function extractJson(text: string): JsonRecord {
  for (const candidates of strategies) {
    for (const candidate of candidates(text)) {
      const record = parseRecord(candidate);
      if (record) return record;
    }
  }

  logger.warn(`JSON parse failed: ${preview(text)}`);
  return {};
}

export function isEmptyRecord(record: JsonRecord): boolean {
  return Object.keys(record).length === 0;
}
