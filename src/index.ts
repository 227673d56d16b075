export { AsyncJobClient, type AsyncJobClientDeps } from "./application/async-job/AsyncJobClient";
export {
  defaultJobClientConfig,
  resolveJobClientConfig,
  type JobClientConfig,
  type JobClientConfigInput
} from "./application/async-job/job.config";
export {
  collectGoAnnotations,
  type CollectGoAnnotationsOptions,
  type GoAnnotationMode
} from "./application/go-annotations/collectGoAnnotations.usecase";
export { encodeSubmissionBody } from "./core/jobs/encodeSubmission";
export * from "./core/jobs/job.errors";
export { FINISHED, RUNNING, lockKeyForService, type JobStatus, type SubmissionParams } from "./core/jobs/JobSession";
export { DbFetchHttpClient, type DbFetchOptions } from "./infrastructure/dbfetch/DbFetchHttpClient";
export { EbiJobHttpClient } from "./infrastructure/ebi/EbiJobHttpClient";
export { FileLockStore } from "./infrastructure/lock/FileLockStore";
export { InMemoryLockStore } from "./infrastructure/lock/InMemoryLockStore";
export { MongoLockStore } from "./infrastructure/lock/MongoLockStore";
export { QuickGoHttpClient } from "./infrastructure/quickgo/QuickGoHttpClient";
export {
  UNIPROT_MAX_PAGE_SIZE,
  UniProtHttpClient,
  parseUniProtTable,
  type UniProtEntriesOptions,
  type UniProtEntry,
  type UniProtFormat,
  type UniProtSearchOptions
} from "./infrastructure/uniprot/UniProtHttpClient";
export type { GoAnnotationClient, GoTermDefinition } from "./ports/GoAnnotationClient";
export type { JobServiceClient } from "./ports/JobServiceClient";
export type { LockStore } from "./ports/LockStore";
export { RemoteCallError, isRemoteCallError } from "./ports/RemoteCallError";
export {
  createLookupClients,
  runGoAnnotations,
  runJob,
  type LookupClients,
  type RunJobRequest
} from "./composition/root";
