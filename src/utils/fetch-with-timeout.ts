/**
 * Single-attempt fetch with a fixed timeout that covers both the request and
 * reading the body. There is no retry: a failed call is reported to the
 * caller, which skips that one item.
 */
export const DEFAULT_FETCH_TIMEOUT_MS = 15_000;

export class FetchTimeoutError extends Error {
  constructor(url: string, timeoutMs: number) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = "FetchTimeoutError";
  }
}

export class HttpStatusError extends Error {
  readonly status: number;

  constructor(status: number, statusText: string) {
    super(statusText ? `HTTP ${status} ${statusText}` : `HTTP ${status}`);
    this.name = "HttpStatusError";
    this.status = status;
  }
}

export async function fetchWithTimeout<T>(
  url: string | URL,
  options: RequestInit,
  timeoutMs: number,
  read: (response: Response) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, { ...options, signal: controller.signal });
    return await read(response);
  } catch (err) {
    if (controller.signal.aborted) {
      throw new FetchTimeoutError(String(url), timeoutMs);
    }
    throw err;
  } finally {
    clearTimeout(timeoutId);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
