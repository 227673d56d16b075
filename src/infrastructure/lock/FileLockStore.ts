import { mkdir, readFile, unlink, writeFile } from "fs/promises";
import { join } from "path";
import type { LockStore } from "../../ports/LockStore";

const isMissingFile = (err: unknown): boolean =>
  typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";

/**
 * Lock records as plain files: `<dir>/<key>` containing the owning job id.
 * Advisory only; it protects against other clients of this library, not arbitrary writers.
 */
export class FileLockStore implements LockStore {
  constructor(private readonly dir = ".") {}

  private path(key: string): string {
    return join(this.dir, key);
  }

  async acquire(key: string, jobId: string): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    await writeFile(this.path(key), jobId, "utf-8");
  }

  async read(key: string): Promise<string | null> {
    try {
      const jobId = (await readFile(this.path(key), "utf-8")).trim();
      return jobId === "" ? null : jobId;
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
  }

  async release(key: string): Promise<void> {
    try {
      await unlink(this.path(key));
    } catch (err) {
      if (!isMissingFile(err)) throw err;
    }
  }

  async close(): Promise<void> {}
}
