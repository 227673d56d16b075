import type { JobStatus } from "./JobSession";

export type JobErrorCode =
  | "service_not_configured"
  | "job_already_running"
  | "job_not_submitted"
  | "job_execution_failed"
  | "job_execution_unknown_failure"
  | "job_poll_timeout";

export type JobErrorContext = {
  service?: string;
  jobId?: string;
  status?: JobStatus;
  resultType?: string;
  polls?: number;
};

export abstract class JobClientError extends Error {
  abstract readonly code: JobErrorCode;
  readonly context: JobErrorContext;
  readonly cause?: unknown;

  constructor(message: string, context: JobErrorContext = {}, cause?: unknown) {
    super(message);
    this.name = new.target.name;
    this.context = context;
    this.cause = cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ServiceNotConfiguredError extends JobClientError {
  readonly code = "service_not_configured";

  constructor() {
    super("No service specified");
  }
}

export class JobAlreadyRunningError extends JobClientError {
  readonly code = "job_already_running";
  readonly jobId: string;
  readonly statusUrl: string;

  constructor(args: { service: string; jobId: string; statusUrl: string }) {
    super(
      `You currently have a ${args.service} job running. Wait until it is complete before submitting another job. ` +
        `Check its status at ${args.statusUrl}`,
      { service: args.service, jobId: args.jobId }
    );
    this.jobId = args.jobId;
    this.statusUrl = args.statusUrl;
  }
}

export class JobNotSubmittedError extends JobClientError {
  readonly code = "job_not_submitted";

  constructor(service: string) {
    super(`No ${service} job has been submitted by this client`, { service });
  }
}

export class JobExecutionFailedError extends JobClientError {
  readonly code = "job_execution_failed";
  readonly diagnostic?: string;

  constructor(args: { context: JobErrorContext; diagnostic?: string; cause?: unknown }) {
    super(
      args.diagnostic != null
        ? `An error occurred: ${args.diagnostic}`
        : "An error occurred and the job could not be completed",
      args.context,
      args.cause
    );
    this.diagnostic = args.diagnostic;
  }
}

export class JobExecutionUnknownFailureError extends JobClientError {
  readonly code = "job_execution_unknown_failure";

  constructor(context: JobErrorContext, cause?: unknown) {
    super("An unknown error occurred while processing the job (check your input)", context, cause);
  }
}

export class JobPollTimeoutError extends JobClientError {
  readonly code = "job_poll_timeout";

  constructor(context: JobErrorContext & { polls: number }) {
    super(`Job ${context.jobId ?? "?"} still RUNNING after ${context.polls} status checks`, context);
  }
}
