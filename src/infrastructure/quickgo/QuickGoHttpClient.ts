import type {
  GoAnnotationClient,
  GoAnnotationPage,
  GoAnnotationQuery,
  GoAnnotationRow,
  GoTermDefinition
} from "../../ports/GoAnnotationClient";
import { RemoteCallError } from "../../ports/RemoteCallError";
import { defaultRetryPolicy, joinPath, requestText, type RetryPolicy } from "../http/requestText";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const optionalString = (value: unknown): string | undefined => (typeof value === "string" ? value : undefined);

const toAnnotationRow = (value: unknown): GoAnnotationRow | undefined => {
  if (!isRecord(value)) return undefined;
  const { geneProductId, goId } = value;
  return typeof geneProductId === "string" && typeof goId === "string" ? { geneProductId, goId } : undefined;
};

export class QuickGoHttpClient implements GoAnnotationClient {
  readonly pageSize = 100;

  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs = 30000,
    private readonly retryPolicy: RetryPolicy = defaultRetryPolicy
  ) {}

  private async getJson(url: URL): Promise<Record<string, unknown>> {
    const body = await requestText({
      url,
      accept: "application/json",
      timeoutMs: this.timeoutMs,
      retryPolicy: this.retryPolicy
    });

    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (err) {
      throw new RemoteCallError({ message: "QuickGO response is not valid JSON", requestUrl: url.pathname, cause: err });
    }
    if (!isRecord(parsed) || !Array.isArray(parsed.results)) {
      throw new RemoteCallError({ message: "QuickGO response has no results array", requestUrl: url.pathname });
    }
    return parsed;
  }

  async fetchAnnotationPage(query: GoAnnotationQuery, page: number): Promise<GoAnnotationPage> {
    const url = joinPath(this.baseUrl, "annotation", "search");
    url.searchParams.set("limit", String(this.pageSize));
    url.searchParams.set("page", String(page));
    if (query.by === "geneProduct") {
      url.searchParams.set("geneProductId", query.ids.join(","));
    } else {
      if (query.taxonId != null) url.searchParams.set("taxonId", String(query.taxonId));
      url.searchParams.set("goId", query.ids.join(","));
    }

    const json = await this.getJson(url);
    const rows = Array.isArray(json.results) ? json.results : [];
    return {
      numberOfHits: Number(json.numberOfHits ?? 0),
      results: rows.flatMap((row: unknown) => {
        const parsed = toAnnotationRow(row);
        return parsed ? [parsed] : [];
      }),
      rawCount: rows.length
    };
  }

  async fetchTermDefinition(goId: string): Promise<GoTermDefinition | undefined> {
    const url = joinPath(this.baseUrl, "ontology", "go", "search");
    url.searchParams.set("query", goId);

    const json = await this.getJson(url);
    const rows: unknown[] = Array.isArray(json.results) ? json.results : [];
    const row = rows.find((candidate) => isRecord(candidate) && candidate.id === goId);
    if (!isRecord(row)) return undefined;

    const definition = isRecord(row.definition) ? optionalString(row.definition.text) : undefined;
    return {
      id: goId,
      name: optionalString(row.name),
      aspect: optionalString(row.aspect),
      definition
    };
  }
}
