import { SimilarityMetric } from "../config/app.config";
import { Chunk, MetadataValue } from "../ingest/types";

export interface VectorHit {
  chunkId: string;
  documentId: string;
  text: string;
  /** Higher means more similar, whatever the underlying metric. */
  score: number;
  metadata?: Record<string, MetadataValue>;
}

export interface VectorQueryOptions {
  documentId?: string;
}

/**
 * Nearest-neighbour store for chunk embeddings. Implementations are
 * treated as external shared services: stateless calls, no locking.
 */
export interface VectorIndex {
  readonly metric: SimilarityMetric;
  upsert(chunks: Chunk[]): Promise<void>;
  deleteByDocument(documentId: string): Promise<void>;
  query(embedding: number[], k: number, options?: VectorQueryOptions): Promise<VectorHit[]>;
  count(): Promise<number>;
}

export function dotProduct(a: number[], b: number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += a[i] * b[i];
  return sum;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  const normA = Math.sqrt(dotProduct(a, a));
  const normB = Math.sqrt(dotProduct(b, b));
  if (normA === 0 || normB === 0) return 0;
  return dotProduct(a, b) / (normA * normB);
}

export function similarity(metric: SimilarityMetric, a: number[], b: number[]): number {
  return metric === "cosine" ? cosineSimilarity(a, b) : dotProduct(a, b);
}
