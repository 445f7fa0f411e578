import { describe, expect, it, vi } from "vitest";
import { HttpLivenessProbe, PROBE_USER_AGENTS, isTransient } from "./probe";

const URL_UNDER_TEST = "https://jobs.example.com/123";

function setup(responses: Array<number | Error>) {
  const queue = [...responses];
  const fetchFn = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => {
    const next = queue.shift();
    if (next === undefined) throw new Error("no more responses");
    if (next instanceof Error) throw next;
    return new Response(null, { status: next });
  });
  const sleep = vi.fn(async (_ms: number) => {});

  const probe = new HttpLivenessProbe({
    timeoutMs: 5000,
    retry: { maxAttempts: 3, backoffStartMs: 2000, backoffMaxMs: 10_000 },
    jitterMinMs: 1000,
    jitterMaxMs: 3000,
    fetchFn,
    sleep,
    random: () => 0,
  });

  return { probe, fetchFn, sleep };
}

describe("isTransient", () => {
  it.each([
    [null, true],
    [429, true],
    [500, true],
    [503, true],
    [200, false],
    [301, false],
    [404, false],
  ])("%s → %s", (statusCode, expected) => {
    expect(isTransient({ statusCode, error: null, attempts: 1 })).toBe(expected);
  });
});

describe("HttpLivenessProbe", () => {
  it("sends a HEAD request without following redirects", async () => {
    const { probe, fetchFn } = setup([301]);

    expect(await probe.probe(URL_UNDER_TEST)).toEqual({
      statusCode: 301,
      error: null,
      attempts: 1,
    });
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(fetchFn.mock.calls[0][0]).toBe(URL_UNDER_TEST);
    expect(fetchFn.mock.calls[0][1]).toMatchObject({
      method: "HEAD",
      redirect: "manual",
    });
  });

  it("does not retry a definitive answer", async () => {
    const { probe, fetchFn, sleep } = setup([404]);

    expect(await probe.probe(URL_UNDER_TEST)).toEqual({
      statusCode: 404,
      error: null,
      attempts: 1,
    });
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000]);
  });

  it("retries server errors with jitter and backoff", async () => {
    const { probe, sleep } = setup([503, 429, 200]);

    expect(await probe.probe(URL_UNDER_TEST)).toEqual({
      statusCode: 200,
      error: null,
      attempts: 3,
    });
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000, 1000, 4000, 1000]);
  });

  it("gives up after the attempt cap", async () => {
    const failure = new Error("getaddrinfo ENOTFOUND jobs.example.com");
    const { probe, fetchFn } = setup([failure, failure, failure]);

    expect(await probe.probe(URL_UNDER_TEST)).toEqual({
      statusCode: null,
      error: "getaddrinfo ENOTFOUND jobs.example.com",
      attempts: 3,
    });
    expect(fetchFn).toHaveBeenCalledTimes(3);
  });

  it("reports an aborted request as a timeout", async () => {
    const abort = new Error("This operation was aborted");
    abort.name = "AbortError";
    const { probe } = setup([abort, abort, abort]);

    expect(await probe.probe(URL_UNDER_TEST)).toEqual({
      statusCode: null,
      error: "Timeout after 5000ms",
      attempts: 3,
    });
  });

  it("does not send anything once the caller has aborted", async () => {
    const { probe, fetchFn, sleep } = setup([200]);
    const controller = new AbortController();
    controller.abort();

    expect(await probe.probe(URL_UNDER_TEST, controller.signal)).toEqual({
      statusCode: null,
      error: "Aborted",
      attempts: 0,
      aborted: true,
    });
    expect(fetchFn).not.toHaveBeenCalled();
    expect(sleep).not.toHaveBeenCalled();
  });

  it("tells a caller abort apart from a timeout", async () => {
    const controller = new AbortController();
    const fetchFn = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => {
      controller.abort();
      const error = new Error("This operation was aborted");
      error.name = "AbortError";
      throw error;
    });
    const probe = new HttpLivenessProbe({
      timeoutMs: 5000,
      retry: { maxAttempts: 3, backoffStartMs: 2000, backoffMaxMs: 10_000 },
      jitterMinMs: 0,
      jitterMaxMs: 0,
      fetchFn,
      sleep: async () => {},
    });

    expect(await probe.probe(URL_UNDER_TEST, controller.signal)).toEqual({
      statusCode: null,
      error: "Aborted",
      attempts: 1,
      aborted: true,
    });
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it("rotates the user agent between requests", async () => {
    const { probe, fetchFn } = setup([503, 200]);

    await probe.probe(URL_UNDER_TEST);

    const agents = fetchFn.mock.calls.map(([, init]) =>
      new Headers(init?.headers).get("User-Agent"),
    );
    expect(agents).toEqual([PROBE_USER_AGENTS[0], PROBE_USER_AGENTS[1]]);
  });
});
