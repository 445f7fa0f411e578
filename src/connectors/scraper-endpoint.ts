import { logger } from "../logger";
import type { ScraperSource, SearchRequest } from "../sources";
import type { RetryPolicy } from "../utils/retry";
import { fetchWithRetry } from "./base";

export interface ScraperEndpointOptions {
  endpoint: string;
  timeoutMs: number;
  retry: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
}

function extractRecords(payload: unknown): unknown[] | null {
  if (Array.isArray(payload)) return payload;
  if (typeof payload === "object" && payload !== null && "jobs" in payload) {
    const jobs: unknown = payload.jobs;
    if (Array.isArray(jobs)) return jobs;
  }
  return null;
}

/**
 * HTTP adapter for an external scraper service:
 * GET {endpoint}?q=&location=&limit= → JSON array or { jobs: [] }.
 */
export class ScraperEndpointSource implements ScraperSource {
  readonly name = "scraper-endpoint";

  constructor(private readonly options: ScraperEndpointOptions) {}

  async search(request: SearchRequest, signal?: AbortSignal): Promise<unknown[]> {
    if (!this.options.endpoint) {
      logger.warn(
        `[${this.name}] No endpoint configured, skipping "${request.query}" (${request.country})`,
      );
      return [];
    }

    const url = new URL(this.options.endpoint);
    url.searchParams.set("q", request.query);
    url.searchParams.set("location", request.location);
    url.searchParams.set("limit", String(request.maxCount));

    const result = await fetchWithRetry({
      url: url.toString(),
      timeoutMs: this.options.timeoutMs,
      retry: this.options.retry,
      signal,
      sleep: this.options.sleep,
    });

    if (!result.success) {
      throw new Error(
        `Scraper request failed for "${request.query}" (${request.country}): ${result.error ?? "unknown error"}`,
      );
    }

    const records = extractRecords(result.data);
    if (!records) {
      throw new Error(
        `Scraper returned an unexpected payload for "${request.query}" (${request.country})`,
      );
    }

    logger.debug(
      `[${this.name}] "${request.query}" (${request.country}): ${records.length} records in ${result.responseTimeMs}ms`,
    );

    // The source may over-deliver; the request bound is ours to enforce
    return records.slice(0, request.maxCount);
  }
}
