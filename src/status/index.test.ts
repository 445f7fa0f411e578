import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { openDatabase } from "../db";
import type { DB } from "../db";
import { JobStore } from "../db/operations";
import { FIXED_NOW, RecordingNotifier, makeJob } from "../testing/fixtures";
import { StatusChecker, resolveTransition } from "./index";
import { HttpLivenessProbe } from "./probe";
import type { LivenessProbe, ProbeResult } from "./probe";

class MapProbe implements LivenessProbe {
  readonly probed: string[] = [];
  active = 0;
  maxActive = 0;

  constructor(private readonly results: Record<string, ProbeResult>) {}

  async probe(url: string): Promise<ProbeResult> {
    this.probed.push(url);
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    await new Promise((resolve) => setImmediate(resolve));
    this.active--;
    return this.results[url] ?? { statusCode: 200, error: null, attempts: 1 };
  }
}

function code(statusCode: number | null, error: string | null = null): ProbeResult {
  return { statusCode, error, attempts: 1 };
}

describe("resolveTransition", () => {
  it.each([
    [200, "Active", null, "active"],
    [301, "Active", null, "active"],
    [404, "Removed", null, "removed"],
    [410, "Removed", null, "removed"],
    [503, "Active", "Server error: HTTP 503", "error"],
    [403, "Active", "Unexpected status: HTTP 403", "error"],
  ])("HTTP %s → %s", (statusCode, status, error, outcome) => {
    expect(resolveTransition(code(statusCode))).toEqual({ status, error, outcome });
  });

  it("keeps a job active when no response arrived", () => {
    expect(resolveTransition(code(null, "Timeout after 10000ms"))).toEqual({
      status: "Active",
      error: "Timeout after 10000ms",
      outcome: "error",
    });
  });
});

describe("StatusChecker", () => {
  let db: DB;
  let store: JobStore;
  let notifier: RecordingNotifier;

  function checker(probe: LivenessProbe, maxConcurrent = 5): StatusChecker {
    return new StatusChecker(store, probe, notifier, {
      intervalDays: 7,
      batchSize: 50,
      maxConcurrent,
      now: () => FIXED_NOW,
    });
  }

  function insertWithUrl(sourceURL: string, expiresAt = "2026-02-01T00:00:00.000Z") {
    return store.insertJob(makeJob({ sourceURL, title: `Job at ${sourceURL}` }), {
      now: "2026-01-01T00:00:00.000Z",
      expiresAt,
    });
  }

  beforeEach(() => {
    db = openDatabase(":memory:");
    store = new JobStore(db);
    notifier = new RecordingNotifier();
  });

  afterEach(() => {
    db.close();
  });

  it("applies each probe result and tallies the sweep", async () => {
    const ok = insertWithUrl("https://jobs.example.com/ok");
    const gone = insertWithUrl("https://jobs.example.com/gone");
    const flaky = insertWithUrl("https://jobs.example.com/flaky");
    const moved = insertWithUrl("https://jobs.example.com/moved");
    const down = insertWithUrl("https://jobs.example.com/down");

    const probe = new MapProbe({
      "https://jobs.example.com/ok": code(200),
      "https://jobs.example.com/gone": code(404),
      "https://jobs.example.com/flaky": code(503),
      "https://jobs.example.com/moved": code(301),
      "https://jobs.example.com/down": code(null, "getaddrinfo ENOTFOUND"),
    });

    const stats = await checker(probe).checkJobs();

    expect(stats).toEqual({ totalChecked: 5, stillActive: 2, markedRemoved: 1, errors: 2 });
    expect(store.getJobById(ok.id)).toMatchObject({
      status: "Active",
      statusCheckCode: 200,
      statusCheckError: null,
      statusLastChecked: FIXED_NOW.toISOString(),
    });
    expect(store.getJobById(gone.id)).toMatchObject({ status: "Removed", statusCheckCode: 404 });
    expect(store.getJobById(flaky.id)).toMatchObject({
      status: "Active",
      statusCheckCode: 503,
      statusCheckError: "Server error: HTTP 503",
    });
    expect(store.getJobById(moved.id)).toMatchObject({ status: "Active", statusCheckCode: 301 });
    expect(store.getJobById(down.id)).toMatchObject({
      status: "Active",
      statusCheckCode: null,
      statusCheckError: "getaddrinfo ENOTFOUND",
    });
  });

  it("announces removed jobs", async () => {
    const gone = insertWithUrl("https://jobs.example.com/gone");
    await checker(new MapProbe({ "https://jobs.example.com/gone": code(410) })).checkJobs();

    expect(notifier.ofType("job_removed")).toEqual([
      {
        errorType: "job_removed",
        message: "Job removed: Job at https://jobs.example.com/gone at Acme",
        details: {
          id: gone.id,
          jobID: "job-1",
          sourceURL: "https://jobs.example.com/gone",
          statusCode: 410,
        },
        severity: "info",
      },
    ]);
  });

  it("skips jobs checked within the interval", async () => {
    insertWithUrl("https://jobs.example.com/ok");
    const probe = new MapProbe({});
    const statusChecker = checker(probe);

    await statusChecker.checkJobs();
    const second = await statusChecker.checkJobs();

    expect(second.totalChecked).toBe(0);
    expect(probe.probed).toEqual(["https://jobs.example.com/ok"]);
  });

  it("bounds concurrent probes", async () => {
    for (let i = 0; i < 6; i++) insertWithUrl(`https://jobs.example.com/${i}`);
    const probe = new MapProbe({});

    const stats = await checker(probe, 2).checkJobs();

    expect(stats.totalChecked).toBe(6);
    expect(probe.maxActive).toBe(2);
  });

  it("recovers jobs stuck in Checking before a sweep", async () => {
    const stuck = insertWithUrl("https://jobs.example.com/stuck");
    store.claimForStatusCheck([stuck.id], "2026-01-15T09:00:00.000Z");
    const probe = new MapProbe({});

    const stats = await checker(probe).checkJobs();

    expect(stats.totalChecked).toBe(1);
    expect(store.getJobById(stuck.id)?.status).toBe("Active");
  });

  it("leaves recent claims alone", () => {
    const claimed = insertWithUrl("https://jobs.example.com/claimed");
    store.claimForStatusCheck([claimed.id], "2026-01-15T11:30:00.000Z");

    expect(checker(new MapProbe({})).recoverStaleChecks()).toBe(0);
    expect(store.getJobById(claimed.id)?.status).toBe("Checking");
  });

  it("checks a single job on demand", async () => {
    const job = insertWithUrl("https://jobs.example.com/gone");
    const statusChecker = checker(
      new MapProbe({ "https://jobs.example.com/gone": code(404) }),
    );

    expect(await statusChecker.checkJob(job.id)).toEqual({
      jobId: job.id,
      status: "Removed",
      statusCode: 404,
      error: null,
      outcome: "removed",
    });
    expect(await statusChecker.checkJob(job.id)).toBeNull();
    expect(await statusChecker.checkJob(999)).toBeNull();
  });

  it("expires jobs past their expiry date", () => {
    const stale = insertWithUrl("https://jobs.example.com/stale", "2026-01-10T00:00:00.000Z");
    const fresh = insertWithUrl("https://jobs.example.com/fresh");

    expect(checker(new MapProbe({})).expireStaleJobs()).toBe(1);
    expect(store.getJobById(stale.id)?.status).toBe("Expired");
    expect(store.getJobById(fresh.id)?.status).toBe("Active");
  });

  it("keeps sweeping when one result cannot be stored", async () => {
    const first = insertWithUrl("https://jobs.example.com/1");
    const second = insertWithUrl("https://jobs.example.com/2");
    const third = insertWithUrl("https://jobs.example.com/3");
    const record = store.recordStatusCheck.bind(store);
    vi.spyOn(store, "recordStatusCheck").mockImplementation((id, check) => {
      if (id === first.id) throw new Error("SQLITE_BUSY: database is locked");
      record(id, check);
    });
    const probe = new MapProbe({});

    const stats = await checker(probe, 1).checkJobs();

    expect(stats).toEqual({ totalChecked: 3, stillActive: 2, markedRemoved: 0, errors: 1 });
    expect(probe.probed).toHaveLength(3);
    expect(store.getJobById(first.id)).toMatchObject({
      status: "Active",
      statusLastChecked: null,
    });
    for (const job of [second, third]) {
      expect(store.getJobById(job.id)).toMatchObject({
        status: "Active",
        statusCheckCode: 200,
        statusLastChecked: FIXED_NOW.toISOString(),
      });
    }
    expect(notifier.ofType("database_error")).toEqual([
      {
        errorType: "database_error",
        message: "Failed to record status check: SQLITE_BUSY: database is locked",
        details: {
          id: first.id,
          jobID: "job-1",
          sourceURL: "https://jobs.example.com/1",
          statusCode: 200,
        },
        severity: "critical",
      },
    ]);
  });

  it("releases claimed jobs unchecked when the sweep is aborted", async () => {
    const checkedBefore = insertWithUrl("https://jobs.example.com/old");
    store.recordStatusCheck(checkedBefore.id, {
      status: "Active",
      code: 200,
      error: null,
      checkedAt: "2026-01-01T00:00:00.000Z",
    });
    const inFlight = insertWithUrl("https://jobs.example.com/in-flight");
    const queued = insertWithUrl("https://jobs.example.com/queued");

    const controller = new AbortController();
    const fetchFn = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => {
      controller.abort();
      const error = new Error("This operation was aborted");
      error.name = "AbortError";
      throw error;
    });
    const probe = new HttpLivenessProbe({
      timeoutMs: 10_000,
      retry: { maxAttempts: 3, backoffStartMs: 2000, backoffMaxMs: 10_000 },
      jitterMinMs: 0,
      jitterMaxMs: 0,
      fetchFn,
      sleep: async () => {},
    });

    const stats = await checker(probe, 1).checkJobs(controller.signal);

    expect(stats).toEqual({ totalChecked: 0, stillActive: 0, markedRemoved: 0, errors: 0 });
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(fetchFn.mock.calls[0][0]).toBe("https://jobs.example.com/in-flight");
    for (const job of [inFlight, queued]) {
      expect(store.getJobById(job.id)).toMatchObject({
        status: "Active",
        statusLastChecked: null,
        statusCheckError: null,
      });
    }
    expect(store.getJobById(checkedBefore.id)).toMatchObject({
      status: "Active",
      statusLastChecked: "2026-01-01T00:00:00.000Z",
      statusCheckCode: 200,
    });
  });

  it("reports and rethrows a failed sweep", async () => {
    vi.spyOn(store, "getJobsNeedingStatusCheck").mockImplementation(() => {
      throw new Error("database is locked");
    });

    await expect(checker(new MapProbe({})).checkJobs()).rejects.toThrow(
      "database is locked",
    );
    expect(notifier.ofType("status_check_failure")).toEqual([
      {
        errorType: "status_check_failure",
        message: "Status check sweep failed: database is locked",
        details: { checkedSoFar: 0 },
        severity: "critical",
      },
    ]);
  });
});
