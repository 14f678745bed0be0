import { Embedder } from "../embeddings/embedding.service";
import { ConfigurationError, errorMessage, RetrievalError } from "../errors/errors";
import { VectorHit, VectorIndex } from "../vector-db/vector.index";
import { RetrievalOptions, RetrievedContext } from "./types";

export function compareContexts(a: RetrievedContext, b: RetrievedContext): number {
  if (b.similarityScore !== a.similarityScore) return b.similarityScore - a.similarityScore;
  if (a.chunkId === b.chunkId) return 0;
  return a.chunkId < b.chunkId ? -1 : 1;
}

function toContext(hit: VectorHit): RetrievedContext {
  return {
    chunkId: hit.chunkId,
    documentId: hit.documentId,
    text: hit.text,
    similarityScore: hit.score,
    metadata: hit.metadata,
  };
}

/**
 * Embeds a query and fetches the nearest chunks. Read-only.
 */
export class Retriever {
  constructor(
    private readonly embedder: Embedder,
    private readonly index: VectorIndex
  ) {}

  async retrieve(
    query: string,
    k: number,
    options: RetrievalOptions = {}
  ): Promise<RetrievedContext[]> {
    if (!Number.isInteger(k) || k < 1) {
      throw new ConfigurationError(`Retrieval depth k must be an integer >= 1, got ${k}`);
    }
    if (!query || query.trim().length === 0) {
      throw new ConfigurationError("Query cannot be empty");
    }

    let indexSize: number;
    try {
      indexSize = await this.index.count();
    } catch (error) {
      throw new RetrievalError(`Vector index unreachable: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    if (indexSize === 0) return [];

    const effectiveK = Math.min(k, indexSize);

    let embedding: number[];
    try {
      embedding = await this.embedder.embed(query);
    } catch (error) {
      if (error instanceof ConfigurationError) throw error;
      throw new RetrievalError(`Query embedding failed: ${errorMessage(error)}`, { cause: error });
    }

    let hits: VectorHit[];
    try {
      hits = await this.index.query(embedding, effectiveK, options);
    } catch (error) {
      if (error instanceof ConfigurationError) throw error;
      throw new RetrievalError(`Vector index query failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (hits.length === 0 && !options.documentId) {
      throw new RetrievalError(
        `Vector index holds ${indexSize} chunk(s) but returned no results; the index may be corrupt`
      );
    }

    return hits.map(toContext).sort(compareContexts).slice(0, effectiveK);
  }
}
