import { logger } from "../logger";
import { sleep as defaultSleep } from "../utils/concurrency";
import { backoffDelay } from "../utils/retry";
import type { RetryPolicy } from "../utils/retry";

export const USER_AGENT = "JobIngestionPipeline/1.0";

export interface FetchWithRetryOptions {
  url: string;
  timeoutMs: number;
  retry: RetryPolicy;
  signal?: AbortSignal;
  sleep?: (ms: number) => Promise<void>;
}

export interface FetchResult<T> {
  data: T | null;
  success: boolean;
  error?: string;
  rateLimited: boolean;
  responseTimeMs: number;
  statusCode?: number;
}

/** GET a JSON document; 429, 5xx, network errors and timeouts are retried. */
export async function fetchWithRetry(
  options: FetchWithRetryOptions,
): Promise<FetchResult<unknown>> {
  const { url, timeoutMs, retry, signal } = options;
  const sleep = options.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, retry.maxAttempts);
  let lastError = "";
  let lastStatus: number | undefined;
  let rateLimited = false;
  const startTime = Date.now();

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    if (signal?.aborted) {
      lastError = "Aborted";
      break;
    }

    const isLastAttempt = attempt === maxAttempts - 1;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const response = await fetch(url, {
        signal: controller.signal,
        headers: {
          Accept: "application/json",
          "User-Agent": USER_AGENT,
        },
      });

      if (response.status === 429) {
        rateLimited = true;
        lastStatus = 429;
        lastError = `Rate limited after ${attempt + 1} attempts`;
        const retryAfter = Number.parseInt(
          response.headers.get("Retry-After") ?? "",
          10,
        );
        const waitMs = Number.isNaN(retryAfter)
          ? backoffDelay(retry, attempt)
          : Math.min(retryAfter * 1000, retry.backoffMaxMs);

        logger.warn(
          `Rate limited (429) on ${url} — waiting ${waitMs}ms (attempt ${attempt + 1}/${maxAttempts})`,
        );

        if (!isLastAttempt) await sleep(waitMs);
        continue;
      }

      if (response.status >= 500) {
        lastStatus = response.status;
        lastError = `Server error: ${response.status} ${response.statusText}`;
        logger.warn(`${lastError} on ${url} (attempt ${attempt + 1}/${maxAttempts})`);

        if (!isLastAttempt) await sleep(backoffDelay(retry, attempt));
        continue;
      }

      if (!response.ok) {
        return {
          data: null,
          success: false,
          error: `HTTP ${response.status}: ${response.statusText}`,
          rateLimited: false,
          responseTimeMs: Date.now() - startTime,
          statusCode: response.status,
        };
      }

      // Body read stays under the timeout
      const data: unknown = await response.json();

      return {
        data,
        success: true,
        rateLimited: false,
        responseTimeMs: Date.now() - startTime,
        statusCode: response.status,
      };
    } catch (error) {
      const isAbort = error instanceof Error && error.name === "AbortError";
      lastStatus = undefined;
      lastError = isAbort
        ? signal?.aborted
          ? "Aborted"
          : `Timeout after ${timeoutMs}ms`
        : String(error);

      logger.warn(
        `Fetch error on ${url}: ${lastError} (attempt ${attempt + 1}/${maxAttempts})`,
      );

      if (signal?.aborted) break;
      if (!isLastAttempt) await sleep(backoffDelay(retry, attempt));
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  return {
    data: null,
    success: false,
    error: lastError,
    rateLimited,
    responseTimeMs: Date.now() - startTime,
    statusCode: lastStatus,
  };
}
