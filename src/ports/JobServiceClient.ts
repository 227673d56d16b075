import type { JobStatus } from "../core/jobs/JobSession";

/**
 * The four calls of the job dispatcher protocol. Transport failures are thrown as
 * RemoteCallError so callers can tell them apart from protocol outcomes.
 */
export interface JobServiceClient {
  run(service: string, formBody: string): Promise<string>;
  status(service: string, jobId: string): Promise<JobStatus>;
  resultTypes(service: string, jobId: string): Promise<string>;
  result(service: string, jobId: string, resultType: string): Promise<string>;
  statusUrl(service: string, jobId: string): string;
}
