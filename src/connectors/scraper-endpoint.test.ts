import { afterEach, describe, expect, it, vi } from "vitest";
import { ScraperEndpointSource } from "./scraper-endpoint";
import { fetchWithRetry } from "./base";

const retry = { maxAttempts: 3, backoffStartMs: 100, backoffMaxMs: 1000 };
const request = {
  query: "Data Engineer",
  location: "United States",
  country: "US",
  maxCount: 2,
};

function json(body: unknown, status = 200, headers: Record<string, string> = {}) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

function stubFetch(...responses: Response[]) {
  const queue = [...responses];
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => {
    const next = queue.shift();
    if (!next) throw new Error("no more responses");
    return next;
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function source(endpoint = "https://scraper.example.com/search") {
  const sleep = vi.fn(async (_ms: number) => {});
  return {
    sleep,
    source: new ScraperEndpointSource({ endpoint, timeoutMs: 5000, retry, sleep }),
  };
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("ScraperEndpointSource", () => {
  it("queries the endpoint and caps the records", async () => {
    const fetchMock = stubFetch(json([{ title: "a" }, { title: "b" }, { title: "c" }]));

    const records = await source().source.search(request);

    expect(records).toEqual([{ title: "a" }, { title: "b" }]);
    expect(fetchMock.mock.calls[0][0]).toBe(
      "https://scraper.example.com/search?q=Data+Engineer&location=United+States&limit=2",
    );
  });

  it("accepts a wrapped payload", async () => {
    stubFetch(json({ jobs: [{ title: "a" }] }));
    expect(await source().source.search(request)).toEqual([{ title: "a" }]);
  });

  it("rejects an unexpected payload", async () => {
    stubFetch(json({ results: [] }));
    await expect(source().source.search(request)).rejects.toThrow(
      'Scraper returned an unexpected payload for "Data Engineer" (US)',
    );
  });

  it("retries server errors before failing", async () => {
    const fetchMock = stubFetch(json({}, 502), json({}, 502), json({}, 502));
    const { source: scraper, sleep } = source();

    await expect(scraper.search(request)).rejects.toThrow(
      'Scraper request failed for "Data Engineer" (US): Server error: 502',
    );
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
  });

  it("finds nothing without an endpoint", async () => {
    const fetchMock = stubFetch();
    expect(await source("").source.search(request)).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe("fetchWithRetry", () => {
  it("honors Retry-After on 429", async () => {
    stubFetch(json({}, 429, { "Retry-After": "3" }), json([1, 2]));
    const sleep = vi.fn(async (_ms: number) => {});

    const result = await fetchWithRetry({
      url: "https://scraper.example.com/search",
      timeoutMs: 5000,
      retry: { ...retry, backoffMaxMs: 10_000 },
      sleep,
    });

    expect(result).toMatchObject({
      data: [1, 2],
      success: true,
      statusCode: 200,
    });
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([3000]);
  });

  it("returns client errors without retrying", async () => {
    const fetchMock = stubFetch(json({}, 404));

    const result = await fetchWithRetry({
      url: "https://scraper.example.com/search",
      timeoutMs: 5000,
      retry,
      sleep: async () => {},
    });

    expect(result).toMatchObject({ success: false, data: null, statusCode: 404 });
    expect(result.error).toMatch(/^HTTP 404/);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("does not start when already aborted", async () => {
    const fetchMock = stubFetch(json([]));
    const controller = new AbortController();
    controller.abort();

    const result = await fetchWithRetry({
      url: "https://scraper.example.com/search",
      timeoutMs: 5000,
      retry,
      signal: controller.signal,
    });

    expect(result).toMatchObject({ success: false, error: "Aborted" });
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
