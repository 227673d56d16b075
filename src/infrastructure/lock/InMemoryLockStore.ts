import type { LockStore } from "../../ports/LockStore";

export class InMemoryLockStore implements LockStore {
  private readonly records = new Map<string, string>();

  async acquire(key: string, jobId: string): Promise<void> {
    this.records.set(key, jobId);
  }

  async read(key: string): Promise<string | null> {
    return this.records.get(key) ?? null;
  }

  async release(key: string): Promise<void> {
    this.records.delete(key);
  }

  async close(): Promise<void> {}

  snapshot(): Record<string, string> {
    return Object.fromEntries(this.records);
  }
}
