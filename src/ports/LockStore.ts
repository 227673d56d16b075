/**
 * Advisory single-flight lock keyed by service. The record holds the job id that owns it.
 *
 * Read and acquire are separate calls, so two processes that read "no lock" at the same
 * moment can both submit; the next inspection reconciles. Within one process,
 * AsyncJobClient serializes submissions that share a store.
 */
export interface LockStore {
  acquire(key: string, jobId: string): Promise<void>;
  read(key: string): Promise<string | null>;
  release(key: string): Promise<void>;
  close(): Promise<void>;
}
