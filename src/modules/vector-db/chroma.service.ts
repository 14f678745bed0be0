import fetch from "node-fetch";
import { SimilarityMetric } from "../config/app.config";
import { Chunk, MetadataValue } from "../ingest/types";
import { VectorHit, VectorIndex, VectorQueryOptions } from "./vector.index";

// Chroma v2 multi-tenant configuration
const TENANT = "default";
const DATABASE = "default";

interface CollectionInfo {
  id: string;
  name: string;
}

type ChromaMetadata = Record<string, MetadataValue>;

interface ChromaQueryResponse {
  ids?: string[][];
  documents?: (string | null)[][];
  distances?: (number | null)[][];
  metadatas?: (ChromaMetadata | null)[][];
}

export interface ChromaVectorIndexOptions {
  baseUrl: string;
  collection: string;
  metric: SimilarityMetric;
}

/**
 * VectorIndex backed by a Chroma v2 server.
 * Chroma returns distances; with the "cosine" and "ip" spaces similarity is 1 - distance.
 */
export class ChromaVectorIndex implements VectorIndex {
  readonly metric: SimilarityMetric;
  private readonly apiBase: string;
  private readonly collectionName: string;
  private collectionId?: string;

  constructor(options: ChromaVectorIndexOptions) {
    this.apiBase = `${options.baseUrl}/api/v2/tenants/${TENANT}/databases/${DATABASE}`;
    this.collectionName = options.collection;
    this.metric = options.metric;
  }

  private async post<T>(path: string, body: unknown): Promise<T> {
    const response = await fetch(`${this.apiBase}${path}`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify(body),
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`Chroma request ${path} failed: ${errorText}`);
    }

    return (await response.json()) as T;
  }

  private async resolveCollection(): Promise<string> {
    if (this.collectionId) return this.collectionId;

    const listResponse = await fetch(`${this.apiBase}/collections`);
    if (!listResponse.ok) {
      const errorText = await listResponse.text();
      throw new Error(`Failed to list collections: ${errorText}`);
    }

    const json = (await listResponse.json()) as
      | CollectionInfo[]
      | { collections?: CollectionInfo[] };
    // Handle both array and object response formats
    const collections = Array.isArray(json) ? json : json.collections ?? [];

    const existing = collections.find((c) => c.name === this.collectionName);
    if (existing) {
      this.collectionId = existing.id;
      return existing.id;
    }

    const created = await this.post<CollectionInfo>("/collections", {
      name: this.collectionName,
      metadata: { "hnsw:space": this.metric === "cosine" ? "cosine" : "ip" },
    });
    console.log(`Collection "${this.collectionName}" created (id: ${created.id})`);
    this.collectionId = created.id;
    return created.id;
  }

  async upsert(chunks: Chunk[]): Promise<void> {
    if (chunks.length === 0) return;
    const collectionId = await this.resolveCollection();

    await this.post(`/collections/${collectionId}/upsert`, {
      ids: chunks.map((chunk) => chunk.id),
      embeddings: chunks.map((chunk) => chunk.embedding),
      documents: chunks.map((chunk) => chunk.text),
      metadatas: chunks.map((chunk) => ({
        ...chunk.metadata,
        documentId: chunk.documentId,
        positionIndex: chunk.positionIndex,
      })),
    });
  }

  async deleteByDocument(documentId: string): Promise<void> {
    const collectionId = await this.resolveCollection();
    await this.post(`/collections/${collectionId}/delete`, {
      where: { documentId },
    });
  }

  async query(
    embedding: number[],
    k: number,
    options: VectorQueryOptions = {}
  ): Promise<VectorHit[]> {
    const collectionId = await this.resolveCollection();
    const data = await this.post<ChromaQueryResponse>(`/collections/${collectionId}/query`, {
      query_embeddings: [embedding],
      n_results: k,
      include: ["documents", "distances", "metadatas"],
      ...(options.documentId ? { where: { documentId: options.documentId } } : {}),
    });

    const ids = data.ids?.[0] ?? [];
    return ids.map((id, index) => {
      const metadata = data.metadatas?.[0]?.[index] ?? {};
      const documentId = metadata.documentId;
      return {
        chunkId: id,
        documentId: typeof documentId === "string" ? documentId : id.split("#")[0],
        text: data.documents?.[0]?.[index] ?? "",
        score: 1 - (data.distances?.[0]?.[index] ?? 1),
        metadata,
      };
    });
  }

  async count(): Promise<number> {
    const collectionId = await this.resolveCollection();
    const response = await fetch(`${this.apiBase}/collections/${collectionId}/count`);

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`Failed to get collection count: ${errorText}`);
    }

    return (await response.json()) as number;
  }
}
