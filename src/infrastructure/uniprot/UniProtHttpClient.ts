import { RemoteCallError } from "../../ports/RemoteCallError";
import { defaultRetryPolicy, joinPath, requestTextPage, type RetryPolicy } from "../http/requestText";

export type UniProtFormat = "list" | "fasta" | "tsv" | "txt" | "json";

export type UniProtSearchOptions = {
  database?: string;                   // "uniprotkb", "uniref", "uniparc"
  format?: UniProtFormat;
  limit?: number | null;               // null: every result, page by page
  fields?: readonly string[];
};

export type UniProtEntriesOptions = {
  database?: "uniprotkb" | "uniref";
  // uniref only: one threshold for all ids, or one per id
  identities?: number | readonly number[];
};

// column name -> cell, null for an empty cell
export type UniProtEntry = Record<string, string | null>;

// largest `size` the search endpoint accepts
export const UNIPROT_MAX_PAGE_SIZE = 500;

const uniRefIdentities: readonly number[] = [1.0, 0.9, 0.5];

const nonEmptyLines = (body: string) =>
  body
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "");

type PageCollector = {
  // returns the number of records the page held
  add: (body: string, requestUrl: URL) => number;
  result: () => string[] | string;
};

const collectorFor = (format: UniProtFormat): PageCollector => {
  if (format === "list") {
    const ids: string[] = [];
    return {
      add: (body) => {
        const lines = nonEmptyLines(body);
        ids.push(...lines);
        return lines.length;
      },
      result: () => ids
    };
  }

  if (format === "tsv") {
    let header: string | undefined;
    const rows: string[] = [];
    return {
      add: (body) => {
        const [pageHeader, ...pageRows] = body.split(/\r?\n/).filter((line) => line !== "");
        if (header == null) header = pageHeader;
        rows.push(...pageRows);
        return pageRows.length;
      },
      result: () => (header == null ? "" : `${[header, ...rows].join("\n")}\n`)
    };
  }

  if (format === "json") {
    const results: unknown[] = [];
    return {
      add: (body, requestUrl) => {
        let parsed: unknown;
        try {
          parsed = JSON.parse(body);
        } catch (err) {
          throw new RemoteCallError({ message: "UniProt response is not valid JSON", requestUrl: requestUrl.pathname, cause: err });
        }
        const page = typeof parsed === "object" && parsed !== null && "results" in parsed ? parsed.results : undefined;
        if (!Array.isArray(page)) {
          throw new RemoteCallError({ message: "UniProt response has no results array", requestUrl: requestUrl.pathname });
        }
        results.push(...page);
        return page.length;
      },
      result: () => JSON.stringify({ results })
    };
  }

  // fasta entries start with ">", flat-file entries end with "//"
  const countRecords = (body: string) =>
    body.split(/\r?\n/).filter((line) => (format === "fasta" ? line.startsWith(">") : line === "//")).length;
  const chunks: string[] = [];
  return {
    add: (body) => {
      chunks.push(body);
      return countRecords(body);
    },
    result: () => chunks.join("")
  };
};

const resolveIdentities = (ids: readonly string[], identities: number | readonly number[] | undefined): number[] => {
  const perId: Array<number | undefined> = typeof identities === "object" ? [...identities] : ids.map(() => identities);
  if (perId.length !== ids.length) {
    throw new Error(
      `Supply one UniRef identity threshold, or one per identifier (${ids.length}). Received: ${perId.length}`
    );
  }
  return perId.map((identity) => {
    if (identity == null || !uniRefIdentities.includes(identity)) {
      throw new Error(`UniRef identity threshold must be one of 1.0, 0.9, 0.5. Received: ${String(identity)}`);
    }
    return identity;
  });
};

/**
 * Rows of a tsv body keyed by their first cell; the remaining cells are named by
 * `fields` in request order. The header line is skipped.
 */
export const parseUniProtTable = (body: string, fields: readonly string[]): Map<string, UniProtEntry> => {
  const entries = new Map<string, UniProtEntry>();
  const [, ...rows] = body.split(/\r?\n/).filter((line) => line !== "");
  for (const row of rows) {
    const [id, ...cells] = row.split("\t");
    const entry: UniProtEntry = {};
    fields.forEach((field, i) => {
      const cell = cells[i];
      entry[field] = cell == null || cell === "" ? null : cell;
    });
    entries.set(id, entry);
  }
  return entries;
};

export class UniProtHttpClient {
  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs = 30000,
    private readonly retryPolicy: RetryPolicy = defaultRetryPolicy
  ) {}

  /**
   * Runs a search and follows the `Link: rel="next"` pages until `limit` records are in
   * (every page when `limit` is null). A page never asks for more than the service maximum.
   */
  search(query: string, options?: UniProtSearchOptions & { format?: "list" }): Promise<string[]>;
  search(query: string, options: UniProtSearchOptions & { format: Exclude<UniProtFormat, "list"> }): Promise<string>;
  search(query: string, options: UniProtSearchOptions): Promise<string[] | string>;
  async search(query: string, options: UniProtSearchOptions = {}): Promise<string[] | string> {
    const format = options.format ?? "list";
    const limit = options.limit === undefined ? 100 : options.limit;
    const pageSize = (remaining: number) => String(Math.max(0, Math.min(remaining, UNIPROT_MAX_PAGE_SIZE)));

    let url: URL | undefined = joinPath(this.baseUrl, options.database ?? "uniprotkb", "search");
    url.searchParams.set("query", query);
    url.searchParams.set("format", format);
    url.searchParams.set("size", limit == null ? String(UNIPROT_MAX_PAGE_SIZE) : pageSize(limit));
    if (options.fields && options.fields.length > 0) url.searchParams.set("fields", options.fields.join(","));

    const collector = collectorFor(format);
    let remaining = limit ?? Number.POSITIVE_INFINITY;
    while (url) {
      const page = await requestTextPage({ url, timeoutMs: this.timeoutMs, retryPolicy: this.retryPolicy });
      remaining -= collector.add(page.text, url);
      if (remaining <= 0 || page.nextUrl == null) break;

      url = page.nextUrl;
      if (limit != null) url.searchParams.set("size", pageSize(remaining));
    }
    return collector.result();
  }

  /**
   * Tabular lookup of the given ids: id -> { field -> value | null }. In uniref mode the
   * keys are cluster ids and each member id is matched at its identity threshold.
   */
  async fetchEntries(
    ids: readonly string[],
    fields: readonly string[],
    options: UniProtEntriesOptions = {}
  ): Promise<Map<string, UniProtEntry>> {
    if (ids.length === 0) return new Map();

    const database = options.database ?? "uniprotkb";
    let query: string;
    let keyField: string;
    if (database === "uniref") {
      const identities = resolveIdentities(ids, options.identities);
      query = ids.map((id, i) => `(uniprot_id:${id} AND identity:${identities[i].toFixed(1)})`).join(" OR ");
      keyField = "id";
    } else {
      query = ids.map((id) => `accession:${id}`).join(" OR ");
      keyField = "accession";
    }
    const body = await this.search(query, {
      database,
      format: "tsv",
      limit: null,
      fields: [keyField, ...fields]
    });
    return parseUniProtTable(body, fields);
  }
}
