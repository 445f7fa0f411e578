import { logger } from "../logger";
import { randomBetween, sleep as defaultSleep } from "../utils/concurrency";
import { withRetry } from "../utils/retry";
import type { RetryPolicy } from "../utils/retry";

export interface ProbeResult {
  /** null when no response arrived (network error, timeout, abort). */
  statusCode: number | null;
  error: string | null;
  attempts: number;
  /** The caller's signal fired; nothing was learned about the URL. */
  aborted?: boolean;
}

export interface LivenessProbe {
  probe(url: string, signal?: AbortSignal): Promise<ProbeResult>;
}

export interface HttpProbeOptions {
  timeoutMs: number;
  retry: RetryPolicy;
  jitterMinMs: number;
  jitterMaxMs: number;
  fetchFn?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

// Rotated per request
export const PROBE_USER_AGENTS = [
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.1 Safari/605.1.15",
  "Mozilla/5.0 (X11; Linux x86_64; rv:121.0) Gecko/20100101 Firefox/121.0",
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:121.0) Gecko/20100101 Firefox/121.0",
] as const;

export function abortedResult(attempts: number): ProbeResult {
  return { statusCode: null, error: "Aborted", attempts, aborted: true };
}

export function isTransient(result: ProbeResult): boolean {
  if (result.aborted) return false;
  return (
    result.statusCode === null ||
    result.statusCode === 429 ||
    result.statusCode >= 500
  );
}

/**
 * HEAD request, redirects not followed so a 3xx stays visible. Jitter is
 * slept before every attempt, retries included.
 */
export class HttpLivenessProbe implements LivenessProbe {
  private readonly fetchFn: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private requestCount = 0;

  constructor(private readonly options: HttpProbeOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  async probe(url: string, signal?: AbortSignal): Promise<ProbeResult> {
    return withRetry((attempt) => this.attempt(url, attempt, signal), {
      policy: this.options.retry,
      shouldRetry: isTransient,
      sleep: this.sleep,
      signal,
      onRetry: (result, attempt, delayMs) =>
        logger.debug(
          `Probe ${url} attempt ${attempt} → ${result.statusCode ?? result.error}; retrying in ${delayMs}ms`,
        ),
    });
  }

  private async attempt(
    url: string,
    attempt: number,
    signal?: AbortSignal,
  ): Promise<ProbeResult> {
    if (signal?.aborted) return abortedResult(attempt - 1);

    await this.sleep(
      randomBetween(
        this.options.jitterMinMs,
        this.options.jitterMaxMs,
        this.random,
      ),
    );

    if (signal?.aborted) return abortedResult(attempt - 1);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });
    const userAgent =
      PROBE_USER_AGENTS[this.requestCount++ % PROBE_USER_AGENTS.length];

    try {
      const response = await this.fetchFn(url, {
        method: "HEAD",
        redirect: "manual",
        headers: { "User-Agent": userAgent },
        signal: controller.signal,
      });
      return { statusCode: response.status, error: null, attempts: attempt };
    } catch (error) {
      if (signal?.aborted) return abortedResult(attempt);

      const isTimeout = error instanceof Error && error.name === "AbortError";
      return {
        statusCode: null,
        error: isTimeout
          ? `Timeout after ${this.options.timeoutMs}ms`
          : error instanceof Error
            ? error.message
            : String(error),
        attempts: attempt,
      };
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}
