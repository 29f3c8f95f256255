import { parse } from "node-html-parser";
import {
  DEFAULT_FETCH_TIMEOUT_MS,
  HttpStatusError,
  errorMessage,
  fetchWithTimeout,
} from "./utils/fetch-with-timeout.ts";
import { fail, succeed } from "./utils/types.ts";
import type { Outcome } from "./utils/types.ts";

const USER_AGENT = "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36";

export interface FetchPageOptions {
  timeoutMs?: number;
}

export type PageFetcher = (url: string) => Promise<Outcome<string>>;

/**
 * Downloads a job page and returns its parsed markup. Scripts and styles
 * are left in place.
 */
export async function fetchPage(url: string, options: FetchPageOptions = {}): Promise<Outcome<string>> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;

  try {
    const html = await fetchWithTimeout(url, { headers: { "User-Agent": USER_AGENT } }, timeoutMs, async (response) => {
      if (!response.ok) throw new HttpStatusError(response.status, response.statusText);
      return response.text();
    });
    return succeed(parse(html).toString());
  } catch (err) {
    return fail("transport", errorMessage(err));
  }
}

export function createPageFetcher(options: FetchPageOptions = {}): PageFetcher {
  return (url) => fetchPage(url, options);
}
