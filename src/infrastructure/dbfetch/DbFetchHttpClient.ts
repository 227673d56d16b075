import { RemoteCallError } from "../../ports/RemoteCallError";
import { defaultRetryPolicy, requestText, type RetryPolicy } from "../http/requestText";

export type DbFetchOptions = {
  db?: string;       // "uniprotkb", "pdb", "refseqn", ...
  format?: string;   // "fasta", "uniprot", ...
};

/**
 * Single-entry retrieval from EBI dbfetch. dbfetch answers 200 with an "ERROR ..." body
 * for unknown ids or databases; that body becomes a RemoteCallError.
 */
export class DbFetchHttpClient {
  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs = 30000,
    private readonly retryPolicy: RetryPolicy = defaultRetryPolicy
  ) {}

  async fetchEntry(entryId: string, options: DbFetchOptions = {}): Promise<string> {
    const url = new URL(this.baseUrl);
    url.searchParams.set("style", "raw");
    url.searchParams.set("Retrieve", "Retrieve");
    url.searchParams.set("db", options.db ?? "uniprotkb");
    url.searchParams.set("format", options.format ?? "fasta");
    url.searchParams.set("id", entryId);

    const data = await requestText({ url, timeoutMs: this.timeoutMs, retryPolicy: this.retryPolicy });
    if (data.startsWith("ERROR")) {
      throw new RemoteCallError({
        message: data.split("\n")[0].trim(),
        requestUrl: `${url.origin}${url.pathname}`
      });
    }
    return data;
  }
}
