import { AsyncJobClient } from "../../src/application/async-job/AsyncJobClient";
import { JobExecutionFailedError, JobPollTimeoutError } from "../../src/core/jobs/job.errors";
import { InMemoryLockStore } from "../../src/infrastructure/lock/InMemoryLockStore";
import { captureError, createScriptedJobService } from "./support/scriptedJobService";

const contact = "test@example.org";

describe("AsyncJobClient submitAndAwait", () => {
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
    warnSpy.mockRestore();
  });

  it("polls through RUNNING, sleeps between polls, removes the lock and returns the single result", async () => {
    const { jobs, calls } = createScriptedJobService({
      jobId: "job-1",
      statuses: ["RUNNING", "RUNNING", "FINISHED"],
      results: { out: "ok" }
    });
    const locks = new InMemoryLockStore();
    const acquireSpy = jest.spyOn(locks, "acquire");
    const releaseSpy = jest.spyOn(locks, "release");
    const sleep = jest.fn(async (_ms: number) => undefined);
    const client = new AsyncJobClient({ service: "demo", jobs, locks, sleep, config: { contact } });

    const result = await client.submitAndAwait({ query: "abc" }, "out");

    expect(result).toBe("ok");
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenNthCalledWith(1, 2000);
    expect(sleep).toHaveBeenNthCalledWith(2, 2000);
    expect(acquireSpy).toHaveBeenCalledWith("demo.lock", "job-1");
    expect(releaseSpy).toHaveBeenCalledWith("demo.lock");
    expect(locks.snapshot()).toEqual({});
    expect(calls.status).toEqual(["job-1", "job-1", "job-1"]);
    expect(calls.result).toEqual(["out"]);
  });

  it("attaches the contact to a copy of the parameters", async () => {
    const { jobs, calls } = createScriptedJobService({ results: { out: "ok" } });
    const client = new AsyncJobClient({
      service: "demo",
      jobs,
      locks: new InMemoryLockStore(),
      sleep: async () => undefined,
      config: { contact }
    });
    const params = { query: "abc" };

    await client.submitAndAwait(params, "out");

    expect(calls.run[0].body).toBe("query=abc&email=test%40example.org");
    expect(params).toEqual({ query: "abc" });
  });

  it("returns results in request order when several types are requested", async () => {
    const { jobs, calls } = createScriptedJobService({
      results: { out: "alignment", sequence: ">q\nMKV", aln: "clustal" }
    });
    const client = new AsyncJobClient({ service: "clustalo", jobs, locks: new InMemoryLockStore(), config: { contact } });

    const results = await client.submitAndAwait({ sequence: ">a\nMK" }, ["sequence", "out", "aln"]);

    expect(results).toEqual([">q\nMKV", "alignment", "clustal"]);
    expect(calls.result).toEqual(["sequence", "out", "aln"]);
  });

  it("unwraps a one-element list of result types", async () => {
    const { jobs } = createScriptedJobService({ results: { out: "ok" } });
    const client = new AsyncJobClient({ service: "demo", jobs, locks: new InMemoryLockStore(), config: { contact } });

    await expect(client.submitAndAwait({ query: "abc" }, ["out"])).resolves.toBe("ok");
  });

  it("fails with JobExecutionFailedError on ERROR and leaves the lock in place", async () => {
    const { jobs, calls } = createScriptedJobService({ statuses: ["RUNNING", "ERROR"], results: { out: "ok" } });
    const locks = new InMemoryLockStore();
    const client = new AsyncJobClient({
      service: "demo",
      jobs,
      locks,
      sleep: async () => undefined,
      config: { contact }
    });

    const error = await captureError(client.submitAndAwait({ query: "abc" }, "out"));

    expect(error).toBeInstanceOf(JobExecutionFailedError);
    expect(error).toMatchObject({
      code: "job_execution_failed",
      message: "An error occurred and the job could not be completed",
      context: { service: "demo", jobId: "job-1", status: "ERROR" }
    });
    expect(calls.result).toEqual([]);
    expect(locks.snapshot()).toEqual({ "demo.lock": "job-1" });
  });

  it("stops after maxPolls status checks with JobPollTimeoutError", async () => {
    const { jobs, calls } = createScriptedJobService({ statuses: ["RUNNING"] });
    const locks = new InMemoryLockStore();
    const sleep = jest.fn(async (_ms: number) => undefined);
    const client = new AsyncJobClient({
      service: "demo",
      jobs,
      locks,
      sleep,
      config: { contact, pollIntervalMs: 10, maxPolls: 3 }
    });

    const error = await captureError(client.submitAndAwait({ query: "abc" }, "out"));

    expect(error).toBeInstanceOf(JobPollTimeoutError);
    expect(error).toMatchObject({ code: "job_poll_timeout", context: { jobId: "job-1", polls: 3, status: "RUNNING" } });
    expect(calls.status).toHaveLength(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(locks.snapshot()).toEqual({ "demo.lock": "job-1" });
  });

  it("stops before a sleep would pass the deadline", async () => {
    const { jobs, calls } = createScriptedJobService({ statuses: ["RUNNING"] });
    let clock = 0;
    const sleep = jest.fn(async (ms: number) => {
      clock += ms;
    });
    const client = new AsyncJobClient({
      service: "demo",
      jobs,
      locks: new InMemoryLockStore(),
      sleep,
      now: () => clock,
      config: { contact, pollIntervalMs: 2000, deadlineMs: 5000 }
    });

    const error = await captureError(client.submitAndAwait({ query: "abc" }, "out"));

    expect(error).toBeInstanceOf(JobPollTimeoutError);
    expect(calls.status).toHaveLength(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(clock).toBe(4000);
  });

  it("keeps polling without a bound when neither maxPolls nor deadline is set", async () => {
    const { jobs } = createScriptedJobService({
      statuses: ["RUNNING", "RUNNING", "RUNNING", "RUNNING", "RUNNING", "FINISHED"],
      results: { out: "done" }
    });
    const sleep = jest.fn(async (_ms: number) => undefined);
    const client = new AsyncJobClient({ service: "demo", jobs, locks: new InMemoryLockStore(), sleep, config: { contact } });

    await expect(client.submitAndAwait({ query: "abc" }, "out")).resolves.toBe("done");
    expect(sleep).toHaveBeenCalledTimes(5);
  });
});
