import type { JobStatus } from "../../core/jobs/JobSession";
import type { JobServiceClient } from "../../ports/JobServiceClient";
import {
  defaultRetryPolicy,
  joinPath,
  noRetry,
  requestText,
  type RetryPolicy
} from "../http/requestText";

/**
 * EBI Job Dispatcher REST client (`{base}/{service}/run|status|resulttypes|result`).
 * Reads are retried on timeouts, 429 and 5xx; a run request is sent exactly once.
 */
export class EbiJobHttpClient implements JobServiceClient {
  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs = 30000,
    private readonly retryPolicy: RetryPolicy = defaultRetryPolicy
  ) {}

  statusUrl(service: string, jobId: string): string {
    return joinPath(this.baseUrl, service, "status", jobId).toString();
  }

  async run(service: string, formBody: string): Promise<string> {
    // trailing slash is part of the dispatcher's run route
    const url = joinPath(this.baseUrl, service, "run", "");
    const jobId = await requestText({
      url,
      method: "POST",
      body: formBody,
      headers: { "content-type": "application/x-www-form-urlencoded" },
      timeoutMs: this.timeoutMs,
      retryPolicy: noRetry
    });
    return jobId.trim();
  }

  async status(service: string, jobId: string): Promise<JobStatus> {
    const status = await this.get(joinPath(this.baseUrl, service, "status", jobId));
    return status.trim();
  }

  resultTypes(service: string, jobId: string): Promise<string> {
    return this.get(joinPath(this.baseUrl, service, "resulttypes", jobId), "application/xml");
  }

  result(service: string, jobId: string, resultType: string): Promise<string> {
    return this.get(joinPath(this.baseUrl, service, "result", jobId, resultType), "*/*");
  }

  private get(url: URL, accept = "text/plain"): Promise<string> {
    return requestText({ url, accept, timeoutMs: this.timeoutMs, retryPolicy: this.retryPolicy });
  }
}
