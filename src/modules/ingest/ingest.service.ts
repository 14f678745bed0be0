import { assertDimensions, Embedder } from "../embeddings/embedding.service";
import { ConfigurationError } from "../errors/errors";
import { VectorIndex } from "../vector-db/vector.index";
import { chunkDocument, ChunkingConfig, validateChunkingConfig } from "./chunker";
import { Chunk, Document, IngestReport } from "./types";

export interface IngestServiceOptions {
  embedder: Embedder;
  index: VectorIndex;
  chunking: ChunkingConfig;
}

/**
 * Document → chunks → embeddings → index. Re-ingesting a document replaces
 * its previous chunks.
 */
export class IngestService {
  constructor(private readonly options: IngestServiceOptions) {
    validateChunkingConfig(options.chunking);
  }

  async ingestDocument(document: Document): Promise<IngestReport> {
    const { embedder, index, chunking } = this.options;
    const drafts = chunkDocument(document, chunking);

    await index.deleteByDocument(document.id);
    if (drafts.length === 0) {
      console.warn(`Document ${document.id} has no text to index`);
      return { documentId: document.id, chunkCount: 0 };
    }

    const embeddings = await embedder.embedBatch(drafts.map((draft) => draft.text));
    if (embeddings.length !== drafts.length) {
      throw new ConfigurationError(
        `Embedder returned ${embeddings.length} vectors for ${drafts.length} chunks`
      );
    }

    const chunks: Chunk[] = drafts.map((draft, i) => {
      assertDimensions(embeddings[i], embedder.dimensions, `Embedding model "${embedder.model}"`);
      return {
        ...draft,
        embedding: embeddings[i],
        metadata: { ...document.metadata, sourceUri: document.sourceUri },
      };
    });

    await index.upsert(chunks);
    console.log(`Indexed ${document.id}: ${chunks.length} chunk(s)`);
    return { documentId: document.id, chunkCount: chunks.length };
  }

  async ingest(documents: Document[]): Promise<IngestReport[]> {
    const reports: IngestReport[] = [];
    for (const document of documents) {
      reports.push(await this.ingestDocument(document));
    }
    return reports;
  }
}
