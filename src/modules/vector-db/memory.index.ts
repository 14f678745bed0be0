import { SimilarityMetric } from "../config/app.config";
import { assertDimensions } from "../embeddings/embedding.service";
import { Chunk } from "../ingest/types";
import { similarity, VectorHit, VectorIndex, VectorQueryOptions } from "./vector.index";

/**
 * Exact (flat) in-process index. Used for local runs with VECTOR_INDEX=memory
 * and as the index stand-in in tests.
 */
export class MemoryVectorIndex implements VectorIndex {
  readonly metric: SimilarityMetric;
  private readonly dimensions: number;
  private readonly chunks = new Map<string, Chunk>();

  constructor(options: { dimensions: number; metric?: SimilarityMetric }) {
    this.dimensions = options.dimensions;
    this.metric = options.metric ?? "cosine";
  }

  async upsert(chunks: Chunk[]): Promise<void> {
    for (const chunk of chunks) {
      assertDimensions(chunk.embedding, this.dimensions, `Chunk "${chunk.id}"`);
    }
    for (const chunk of chunks) {
      this.chunks.set(chunk.id, chunk);
    }
  }

  async deleteByDocument(documentId: string): Promise<void> {
    for (const [id, chunk] of this.chunks) {
      if (chunk.documentId === documentId) this.chunks.delete(id);
    }
  }

  async query(
    embedding: number[],
    k: number,
    options: VectorQueryOptions = {}
  ): Promise<VectorHit[]> {
    assertDimensions(embedding, this.dimensions, "Query embedding");

    const hits: VectorHit[] = [];
    for (const chunk of this.chunks.values()) {
      if (options.documentId && chunk.documentId !== options.documentId) continue;
      hits.push({
        chunkId: chunk.id,
        documentId: chunk.documentId,
        text: chunk.text,
        score: similarity(this.metric, embedding, chunk.embedding),
        metadata: chunk.metadata,
      });
    }

    return hits
      .sort((a, b) => b.score - a.score || (a.chunkId < b.chunkId ? -1 : 1))
      .slice(0, k);
  }

  async count(): Promise<number> {
    return this.chunks.size;
  }
}
