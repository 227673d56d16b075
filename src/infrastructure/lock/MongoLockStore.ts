import { MongoClient, type Collection } from "mongodb";
import type { LockStore } from "../../ports/LockStore";

export type JobLockDoc = {
  _id: string;       // lock key, e.g. "ncbiblast.lock"
  jobId: string;
  lockedAt: Date;
};

/**
 * Lock records shared through Mongo, for clients on several machines submitting under
 * one contact. One document per key; acquire overwrites, release deletes.
 */
export class MongoLockStore implements LockStore {
  private client?: MongoClient;
  private collection?: Collection<JobLockDoc>;

  constructor(
    private readonly mongoUri: string,
    private readonly dbName = "ebi_jobs",
    private readonly collectionName = "job_locks"
  ) {}

  private async getCollection(): Promise<Collection<JobLockDoc>> {
    if (this.collection) return this.collection;

    this.client = new MongoClient(this.mongoUri);
    await this.client.connect();

    this.collection = this.client.db(this.dbName).collection<JobLockDoc>(this.collectionName);
    return this.collection;
  }

  async acquire(key: string, jobId: string): Promise<void> {
    const col = await this.getCollection();
    await col.updateOne(
      { _id: key },
      { $set: { jobId, lockedAt: new Date() } },
      { upsert: true }
    );
  }

  async read(key: string): Promise<string | null> {
    const col = await this.getCollection();
    const doc = await col.findOne({ _id: key });
    return doc?.jobId ?? null;
  }

  async release(key: string): Promise<void> {
    const col = await this.getCollection();
    await col.deleteOne({ _id: key });
  }

  async close(): Promise<void> {
    await this.client?.close();
    this.client = undefined;
    this.collection = undefined;
  }
}
