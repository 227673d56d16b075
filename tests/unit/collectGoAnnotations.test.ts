import { collectGoAnnotations } from "../../src/application/go-annotations/collectGoAnnotations.usecase";
import type {
  GoAnnotationClient,
  GoAnnotationPage,
  GoAnnotationQuery,
  GoAnnotationRow
} from "../../src/ports/GoAnnotationClient";

/**
 * Serves `rowsFor(id)` for every id of a query, split into pages of `pageSize`.
 */
const createFakeGoClient = (rowsFor: (query: GoAnnotationQuery, id: string) => GoAnnotationRow[], pageSize = 3) => {
  const calls: Array<{ query: GoAnnotationQuery; page: number }> = [];
  const client: GoAnnotationClient = {
    pageSize,
    fetchAnnotationPage: async (query, page): Promise<GoAnnotationPage> => {
      calls.push({ query, page });
      const all = query.ids.flatMap((id) => rowsFor(query, id));
      const results = all.slice((page - 1) * pageSize, page * pageSize);
      return { numberOfHits: all.length, results, rawCount: results.length };
    },
    fetchTermDefinition: async () => undefined
  };
  return { client, calls };
};

describe("collectGoAnnotations", () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  it("maps gene products to their unique GO terms across pages", async () => {
    const { client, calls } = createFakeGoClient((_query, id) =>
      id === "UniProtKB:P63166"
        ? [
            { geneProductId: id, goId: "GO:0005634" },
            { geneProductId: id, goId: "GO:0016925" },
            { geneProductId: id, goId: "GO:0005634" },
            { geneProductId: id, goId: "GO:0031386" }
          ]
        : [{ geneProductId: id, goId: "GO:0005737" }]
    );

    const index = await collectGoAnnotations({ client }, "termsByGene", ["UniProtKB:P63166", "UniProtKB:Q9LIR4"]);

    expect(calls.map((call) => call.page)).toEqual([1, 2]);
    expect(index).toEqual(
      new Map([
        ["UniProtKB:P63166", new Set(["GO:0005634", "GO:0016925", "GO:0031386"])],
        ["UniProtKB:Q9LIR4", new Set(["GO:0005737"])]
      ])
    );
  });

  it("maps GO terms to gene products, ten terms per request with the taxon filter", async () => {
    const terms = Array.from({ length: 12 }, (_, i) => `GO:${String(i + 1).padStart(7, "0")}`);
    const { client, calls } = createFakeGoClient((_query, id) => [{ geneProductId: `UniProtKB:G${id.slice(-2)}`, goId: id }], 100);

    const index = await collectGoAnnotations({ client }, "genesByTerm", terms, { taxonId: 9606 });

    expect(calls.map((call) => call.query)).toEqual([
      { by: "goTerm", ids: terms.slice(0, 10), taxonId: 9606 },
      { by: "goTerm", ids: terms.slice(10), taxonId: 9606 }
    ]);
    expect(index.size).toBe(12);
    expect(index.get("GO:0000012")).toEqual(new Set(["UniProtKB:G12"]));
  });

  it("keeps paging after a full page that held malformed rows", async () => {
    const pages: GoAnnotationPage[] = [
      {
        numberOfHits: 4,
        results: [
          { geneProductId: "UniProtKB:P1", goId: "GO:0000001" },
          { geneProductId: "UniProtKB:P1", goId: "GO:0000002" }
        ],
        rawCount: 3
      },
      { numberOfHits: 4, results: [{ geneProductId: "UniProtKB:P1", goId: "GO:0000003" }], rawCount: 1 }
    ];
    const client: GoAnnotationClient = {
      pageSize: 3,
      fetchAnnotationPage: async (_query, page) => pages[page - 1],
      fetchTermDefinition: async () => undefined
    };

    const index = await collectGoAnnotations({ client }, "termsByGene", ["UniProtKB:P1"]);

    expect(index.get("UniProtKB:P1")).toEqual(new Set(["GO:0000001", "GO:0000002", "GO:0000003"]));
  });

  it("accepts a single id and drops duplicates", async () => {
    const { client, calls } = createFakeGoClient((_query, id) => [{ geneProductId: id, goId: "GO:0008150" }]);

    await collectGoAnnotations({ client }, "termsByGene", "UniProtKB:P05791");
    await collectGoAnnotations({ client }, "termsByGene", ["UniProtKB:P05791", "UniProtKB:P05791"]);

    expect(calls.map((call) => call.query.ids)).toEqual([["UniProtKB:P05791"], ["UniProtKB:P05791"]]);
  });

  it("warns once when the first page reports a very large query", async () => {
    const client: GoAnnotationClient = {
      pageSize: 100,
      fetchAnnotationPage: async (_query, page) => ({
        numberOfHits: 25000,
        results: page === 1 ? [{ geneProductId: "UniProtKB:P1", goId: "GO:0008150" }] : [],
        rawCount: page === 1 ? 1 : 0
      }),
      fetchTermDefinition: async () => undefined
    };

    await collectGoAnnotations({ client }, "genesByTerm", ["GO:0008150"]);

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(warnSpy.mock.calls[0][0]))).toEqual({
      event: "go.large_query",
      mode: "genesByTerm",
      numberOfHits: 25000
    });
  });
});
