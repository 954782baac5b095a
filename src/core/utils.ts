import axios, { AxiosError, type AxiosInstance } from "axios";

export interface HttpClientOptions {
  timeout: number;
  userAgent: string;
}

/**
 * Create a configured axios instance identifying the crawler.
 * @param options - Request timeout in milliseconds and User-Agent string
 */
export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  return axios.create({
    timeout: options.timeout,
    headers: {
      "User-Agent": options.userAgent,
      Accept:
        "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      "Accept-Language": "en-US,en;q=0.9",
    },
    maxRedirects: 10,
  });
}

/**
 * Sleep for the given number of milliseconds.
 * @param ms - Milliseconds to wait
 */
export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run every item through `processor` on at most `concurrency` workers.
 * Workers pull from a shared queue, so `onItemDone` fires in completion
 * order, not input order. The first error thrown by `processor` or
 * `onItemDone` rejects the run.
 * @param items - Items to process
 * @param concurrency - Pool width
 * @param processor - Async function to run on each item
 * @param onItemDone - Awaited after each item completes
 * @returns Results in input order
 */
export async function runPool<T, R>(
  items: T[],
  concurrency: number,
  processor: (item: T) => Promise<R>,
  onItemDone?: (completed: number, total: number, item: T, result: R) => void | Promise<void>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  let completed = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      const result = await processor(item);
      results[index] = result;
      completed++;
      if (onItemDone) await onItemDone(completed, items.length, item, result);
    }
  };

  const width = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: width }, () => worker()));
  return results;
}

/**
 * Extract a human-readable error message from an unknown error.
 * @param err - The caught error
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof AxiosError) {
    if (err.code === "ECONNABORTED" || err.code === "ETIMEDOUT")
      return "Request timed out";
    if (err.code === "ENOTFOUND")
      return `DNS lookup failed: ${err.config?.url ?? "unknown host"}`;
    if (err.code === "ERR_TLS_CERT_ALTNAME_INVALID" || err.code === "CERT_HAS_EXPIRED")
      return "SSL certificate error";
    if (err.code === "ECONNRESET") return "Connection reset by server";
    if (err.code === "ECONNREFUSED") return "Connection refused";
    if (err.code === "ERR_FR_TOO_MANY_REDIRECTS") return "Too many redirects";
    if (err.response)
      return `HTTP ${err.response.status}: ${err.response.statusText}`;
    return err.message;
  }
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Format a duration in milliseconds to a human-readable string like "2m 30s".
 * @param ms - Duration in milliseconds
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes === 0) return `${seconds}s`;
  return `${minutes}m ${seconds}s`;
}
