import type { GoAnnotationClient, GoAnnotationQuery, GoAnnotationRow } from "../../ports/GoAnnotationClient";
import { createLimiter } from "../../shared/concurrency/limiter";

export type GoAnnotationMode = "termsByGene" | "genesByTerm";

export type CollectGoAnnotationsOptions = {
  taxonId?: number;
  concurrency?: number;
};

export const goBatchSizes: Record<GoAnnotationMode, number> = {
  termsByGene: 100,
  genesByTerm: 10
};

// pages the first response promises before we warn that the query will be slow
export const LARGE_QUERY_PAGES = 100;

const chunk = <T>(items: readonly T[], size: number): T[][] => {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) batches.push(items.slice(i, i + size));
  return batches;
};

const addToIndex = (index: Map<string, Set<string>>, key: string, value: string) => {
  const existing = index.get(key);
  if (existing) {
    existing.add(value);
  } else {
    index.set(key, new Set([value]));
  }
};

/**
 * Collects GO annotations for gene products (gene -> terms) or for GO terms
 * (term -> gene products, including genes annotated with more specific terms).
 * Ids are queried in batches; every batch is paged until a short page.
 */
export const collectGoAnnotations = async (
  deps: { client: GoAnnotationClient },
  mode: GoAnnotationMode,
  ids: string | readonly string[],
  options: CollectGoAnnotationsOptions = {}
): Promise<Map<string, Set<string>>> => {
  const { client } = deps;
  const uniqueIds = Array.from(new Set(typeof ids === "string" ? [ids] : ids));
  const limit = createLimiter(options.concurrency ?? 2);

  const fetchBatch = async (batch: string[]): Promise<GoAnnotationRow[]> => {
    const query: GoAnnotationQuery =
      mode === "termsByGene" ? { by: "geneProduct", ids: batch } : { by: "goTerm", ids: batch, taxonId: options.taxonId };
    const rows: GoAnnotationRow[] = [];

    for (let page = 1; ; page += 1) {
      const result = await client.fetchAnnotationPage(query, page);
      if (page === 1 && result.numberOfHits > client.pageSize * LARGE_QUERY_PAGES) {
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify({ event: "go.large_query", mode, numberOfHits: result.numberOfHits }));
      }
      rows.push(...result.results);
      if (result.rawCount < client.pageSize) break;
    }
    return rows;
  };

  const batches = await Promise.all(
    chunk(uniqueIds, goBatchSizes[mode]).map((batch) => limit(() => fetchBatch(batch)))
  );

  const index = new Map<string, Set<string>>();
  for (const row of batches.flat()) {
    if (mode === "termsByGene") {
      addToIndex(index, row.geneProductId, row.goId);
    } else {
      addToIndex(index, row.goId, row.geneProductId);
    }
  }
  return index;
};
