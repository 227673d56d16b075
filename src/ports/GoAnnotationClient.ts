export type GoAnnotationQuery =
  | { by: "geneProduct"; ids: string[] }
  | { by: "goTerm"; ids: string[]; taxonId?: number };

export type GoAnnotationRow = {
  geneProductId: string;   // e.g. "UniProtKB:A0A140VJQ9"
  goId: string;            // e.g. "GO:0002080"
};

export type GoAnnotationPage = {
  numberOfHits: number;
  results: GoAnnotationRow[];
  rawCount: number;        // rows the page held, malformed ones included; a short page is the last
};

export type GoTermDefinition = {
  id: string;
  name?: string;
  aspect?: string;
  definition?: string;
};

export interface GoAnnotationClient {
  readonly pageSize: number;
  fetchAnnotationPage(query: GoAnnotationQuery, page: number): Promise<GoAnnotationPage>;
  fetchTermDefinition(goId: string): Promise<GoTermDefinition | undefined>;
}
