export type MetadataValue = string | number | boolean;

export interface Document {
  id: string;
  sourceUri: string;
  rawText: string;
  metadata: Record<string, MetadataValue>;
}

export interface Chunk {
  id: string;
  documentId: string;
  text: string;
  positionIndex: number;
  embedding: number[];
  metadata?: Record<string, MetadataValue>;
}

export interface IngestReport {
  documentId: string;
  chunkCount: number;
}
