import { AsyncJobClient } from "../application/async-job/AsyncJobClient";
import { collectGoAnnotations, type GoAnnotationMode } from "../application/go-annotations/collectGoAnnotations.usecase";
import type { SubmissionParams } from "../core/jobs/JobSession";
import { DbFetchHttpClient } from "../infrastructure/dbfetch/DbFetchHttpClient";
import { EbiJobHttpClient } from "../infrastructure/ebi/EbiJobHttpClient";
import { FileLockStore } from "../infrastructure/lock/FileLockStore";
import { MongoLockStore } from "../infrastructure/lock/MongoLockStore";
import { QuickGoHttpClient } from "../infrastructure/quickgo/QuickGoHttpClient";
import { UniProtHttpClient } from "../infrastructure/uniprot/UniProtHttpClient";
import type { LockStore } from "../ports/LockStore";
import { type Env, loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv, type RuntimeConfig } from "../shared/config/runtime.config";

export type RunJobRequest = {
  service: string;
  params: SubmissionParams;
  resultTypes: string[];
};

export const createLockStore = (env: Env): LockStore =>
  env.LOCK_STORE === "mongo" ? new MongoLockStore(env.MONGO_URI) : new FileLockStore(env.LOCK_DIR);

export const runJob = async (request: RunJobRequest): Promise<string | string[]> => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv();

  const jobs = new EbiJobHttpClient(env.EBI_SERVICE_URL, runtime.timeoutMs);
  const locks = createLockStore(env);
  const client = new AsyncJobClient({
    service: request.service,
    jobs,
    locks,
    config: runtime.jobClientConfig
  });

  try {
    return await client.submitAndAwait(request.params, request.resultTypes);
  } finally {
    await locks.close();
  }
};

export type LookupClients = {
  dbfetch: DbFetchHttpClient;
  uniprot: UniProtHttpClient;
  quickgo: QuickGoHttpClient;
};

export const createLookupClients = (env: Env, runtime: RuntimeConfig): LookupClients => ({
  dbfetch: new DbFetchHttpClient(env.EBI_DBFETCH_URL, runtime.timeoutMs),
  uniprot: new UniProtHttpClient(env.UNIPROT_URL, runtime.timeoutMs),
  quickgo: new QuickGoHttpClient(env.QUICKGO_URL, runtime.timeoutMs)
});

export const runGoAnnotations = async (
  mode: GoAnnotationMode,
  ids: readonly string[],
  taxonId?: number
): Promise<Map<string, Set<string>>> => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv();
  const { quickgo } = createLookupClients(env, runtime);
  return collectGoAnnotations({ client: quickgo }, mode, ids, { taxonId, concurrency: runtime.goConcurrency });
};
