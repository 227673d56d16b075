/**
 * Raw status string from the job dispatcher ("RUNNING", "FINISHED", "ERROR", "FAILURE",
 * "NOT_FOUND", ...). Only RUNNING keeps a job in flight.
 */
export type JobStatus = string;

export const RUNNING: JobStatus = "RUNNING";
export const FINISHED: JobStatus = "FINISHED";
export const ERROR_RESULT_TYPE = "error";

export const isRunning = (status: JobStatus): boolean => status === RUNNING;

export type ParamValue = string | number | boolean | readonly string[];

/**
 * Form parameters for a submission. `database` may repeat on the wire, so it is the
 * one field where a list becomes several key/value pairs.
 */
export type SubmissionParams = Record<string, ParamValue>;

export type JobSession = {
  service: string;
  jobId?: string;
  lockKey: string;
};

export const lockKeyForService = (service: string): string => `${service}.lock`;
