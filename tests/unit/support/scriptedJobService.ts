import type { JobServiceClient } from "../../../src/ports/JobServiceClient";
import { RemoteCallError } from "../../../src/ports/RemoteCallError";

export type ScriptedJobServiceOptions = {
  jobId?: string;
  statuses?: string[];
  results?: Record<string, string | Error>;
  resultTypesBody?: string;
};

/**
 * In-process stand-in for the job dispatcher. Statuses are served in order and the last
 * one repeats; a result that is missing, or scripted as an Error, fails the call.
 */
export const createScriptedJobService = (opts: ScriptedJobServiceOptions = {}) => {
  const statuses = opts.statuses ?? ["FINISHED"];
  let statusIndex = 0;
  const calls = {
    run: [] as Array<{ service: string; body: string }>,
    status: [] as string[],
    result: [] as string[]
  };

  const jobs: JobServiceClient = {
    run: async (service, body) => {
      calls.run.push({ service, body });
      return opts.jobId ?? "job-1";
    },
    status: async (_service, jobId) => {
      calls.status.push(jobId);
      const status = statuses[Math.min(statusIndex, statuses.length - 1)];
      statusIndex += 1;
      return status;
    },
    resultTypes: async () => opts.resultTypesBody ?? "",
    result: async (_service, _jobId, resultType) => {
      calls.result.push(resultType);
      const scripted = opts.results?.[resultType];
      if (scripted instanceof Error) throw scripted;
      if (scripted == null) {
        throw new RemoteCallError({ message: `GET result/${resultType} failed: 400`, status: 400 });
      }
      return scripted;
    },
    statusUrl: (service, jobId) => `https://ebi.test/rest/${service}/status/${jobId}`
  };

  return { jobs, calls };
};

export const captureError = async (promise: Promise<unknown>): Promise<unknown> => {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error("expected promise to reject");
};
