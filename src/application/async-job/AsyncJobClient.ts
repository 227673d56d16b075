import { encodeSubmissionBody } from "../../core/jobs/encodeSubmission";
import {
  JobAlreadyRunningError,
  JobExecutionFailedError,
  JobExecutionUnknownFailureError,
  JobNotSubmittedError,
  JobPollTimeoutError,
  ServiceNotConfiguredError,
  type JobClientError
} from "../../core/jobs/job.errors";
import {
  ERROR_RESULT_TYPE,
  FINISHED,
  isRunning,
  lockKeyForService,
  type JobStatus,
  type SubmissionParams
} from "../../core/jobs/JobSession";
import { parseResultTypeIdentifiers } from "../../core/jobs/resultTypes";
import type { JobServiceClient } from "../../ports/JobServiceClient";
import type { LockStore } from "../../ports/LockStore";
import { isRemoteCallError } from "../../ports/RemoteCallError";
import { sleep as defaultSleep } from "../../shared/retry/retry";
import { type JobClientConfig, type JobClientConfigInput, resolveJobClientConfig } from "./job.config";

export type AsyncJobClientDeps = {
  service?: string;
  jobs: JobServiceClient;
  locks: LockStore;
  config?: JobClientConfigInput;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
};

// in-flight submissions per lock store and key, so clients sharing a store in one
// process check and write the lock one at a time
const pendingSubmissions = new WeakMap<LockStore, Map<string, Promise<unknown>>>();

/**
 * Drives one remote job per service: submit, hold the per-service lock while the job is
 * RUNNING, poll to a terminal status, then fetch typed results.
 *
 * The lock lives in the LockStore, not in this object, so a second process (or a second
 * client instance) sees the same job and refuses to submit another one.
 */
export class AsyncJobClient {
  private jobId?: string;
  private readonly service?: string;
  private readonly jobs: JobServiceClient;
  private readonly locks: LockStore;
  private readonly config: JobClientConfig;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(deps: AsyncJobClientDeps) {
    this.service = deps.service?.trim() || undefined;
    this.jobs = deps.jobs;
    this.locks = deps.locks;
    this.config = resolveJobClientConfig(deps.config);
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? Date.now;
  }

  get currentJobId(): string | undefined {
    return this.jobId;
  }

  private requireService(): string {
    if (this.service == null) throw new ServiceNotConfiguredError();
    return this.service;
  }

  private requireJobId(service: string, jobId = this.jobId): string {
    if (jobId == null) throw new JobNotSubmittedError(service);
    return jobId;
  }

  /**
   * true while a RUNNING job owns the service lock. A lock whose job has left RUNNING is
   * removed on the way, so a crashed run never blocks the next submission for good.
   */
  async acquireOrInspectLock(): Promise<boolean> {
    const service = this.requireService();
    const key = lockKeyForService(service);
    const lockedJobId = await this.locks.read(key);
    if (lockedJobId == null) return false;

    const status = await this.jobs.status(service, lockedJobId);
    if (isRunning(status)) {
      this.jobId = lockedJobId;
      return true;
    }

    await this.locks.release(key);
    console.warn(JSON.stringify({ event: "job.lock_cleared", service, jobId: lockedJobId, status }));
    return false;
  }

  async submitJob(params: SubmissionParams): Promise<string> {
    const service = this.requireService();
    return this.oneSubmissionAtATime(lockKeyForService(service), () => this.submitUnlocked(service, params));
  }

  private async oneSubmissionAtATime<T>(key: string, submit: () => Promise<T>): Promise<T> {
    let byKey = pendingSubmissions.get(this.locks);
    if (!byKey) {
      byKey = new Map();
      pendingSubmissions.set(this.locks, byKey);
    }

    // run after the previous submission settles, whichever way it went
    const previous = byKey.get(key) ?? Promise.resolve();
    const current = previous.then(submit, submit);
    byKey.set(key, current);
    try {
      return await current;
    } finally {
      if (byKey.get(key) === current) byKey.delete(key);
    }
  }

  private async submitUnlocked(service: string, params: SubmissionParams): Promise<string> {
    if (await this.acquireOrInspectLock()) {
      const jobId = this.requireJobId(service);
      throw new JobAlreadyRunningError({ service, jobId, statusUrl: this.jobs.statusUrl(service, jobId) });
    }

    const jobId = await this.jobs.run(service, encodeSubmissionBody(params));
    this.jobId = jobId;
    await this.locks.acquire(lockKeyForService(service), jobId);

    console.log(JSON.stringify({ event: "job.submitted", service, jobId }));
    return jobId;
  }

  async pollStatus(jobId?: string): Promise<JobStatus> {
    const service = this.requireService();
    return this.jobs.status(service, this.requireJobId(service, jobId));
  }

  async listResultTypes(): Promise<string[]> {
    const service = this.requireService();
    const body = await this.jobs.resultTypes(service, this.requireJobId(service));
    return parseResultTypeIdentifiers(body);
  }

  async fetchResult(resultType: string): Promise<string> {
    const service = this.requireService();
    const jobId = this.requireJobId(service);
    const context = { service, jobId, resultType };

    let content: string;
    try {
      content = await this.jobs.result(service, jobId, resultType);
    } catch (err) {
      if (!isRemoteCallError(err)) throw err;
      if (resultType === ERROR_RESULT_TYPE) throw new JobExecutionUnknownFailureError(context, err);
      throw await this.diagnoseFailedResult(service, jobId, resultType, err);
    }

    if (resultType === ERROR_RESULT_TYPE) {
      throw new JobExecutionFailedError({ context, diagnostic: content });
    }
    return content;
  }

  // One request for the "error" result type; its failure is terminal.
  private async diagnoseFailedResult(
    service: string,
    jobId: string,
    resultType: string,
    cause: unknown
  ): Promise<JobClientError> {
    try {
      const diagnostic = await this.jobs.result(service, jobId, ERROR_RESULT_TYPE);
      return new JobExecutionFailedError({ context: { service, jobId, resultType }, diagnostic, cause });
    } catch (err) {
      if (!isRemoteCallError(err)) throw err;
      return new JobExecutionUnknownFailureError({ service, jobId, resultType: ERROR_RESULT_TYPE }, err);
    }
  }

  private async awaitTerminalStatus(service: string, jobId: string): Promise<JobStatus> {
    const { pollIntervalMs, maxPolls, deadlineMs } = this.config;
    const startedAt = this.now();

    for (let polls = 1; ; polls += 1) {
      const status = await this.pollStatus(jobId);
      console.log(JSON.stringify({ event: "job.polled", service, jobId, status, poll: polls }));
      if (!isRunning(status)) return status;

      const outOfPolls = maxPolls != null && polls >= maxPolls;
      const pastDeadline = deadlineMs != null && this.now() - startedAt + pollIntervalMs > deadlineMs;
      if (outOfPolls || pastDeadline) {
        throw new JobPollTimeoutError({ service, jobId, status, polls });
      }
      await this.sleep(pollIntervalMs);
    }
  }

  submitAndAwait(params: SubmissionParams, resultType: string): Promise<string>;
  submitAndAwait(params: SubmissionParams, resultTypes: readonly string[]): Promise<string | string[]>;
  async submitAndAwait(
    params: SubmissionParams,
    resultTypes: string | readonly string[]
  ): Promise<string | string[]> {
    const service = this.requireService();
    const jobId = await this.submitJob({ ...params, email: this.config.contact });

    const status = await this.awaitTerminalStatus(service, jobId);
    if (status !== FINISHED) {
      throw new JobExecutionFailedError({ context: { service, jobId, status } });
    }

    await this.locks.release(lockKeyForService(service));
    console.log(JSON.stringify({ event: "job.completed", service, jobId }));

    const requested = typeof resultTypes === "string" ? [resultTypes] : [...resultTypes];
    const results: string[] = [];
    for (const type of requested) {
      results.push(await this.fetchResult(type));
    }
    return results.length === 1 ? results[0] : results;
  }
}
