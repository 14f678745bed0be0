import { MetadataValue } from "../ingest/types";
import { TokenUsage } from "../llm/llm.types";

export interface RetrievedContext {
  chunkId: string;
  documentId: string;
  text: string;
  /** Higher = more relevant. */
  similarityScore: number;
  metadata?: Record<string, MetadataValue>;
}

export interface RetrievalOptions {
  /** Restrict the search to chunks of a single document. */
  documentId?: string;
}

export interface AnswerResult {
  query: string;
  answerText: string;
  /** Ranked by similarityScore descending. */
  contexts: RetrievedContext[];
  generationLatencyMs: number;
  tokenUsage: TokenUsage;
  model: string;
}

export interface ModelConfig {
  model: string;
  temperature?: number;
  maxTokens?: number;
  /** Per-call overrides of the generator's call policy. */
  timeoutMs?: number;
  maxRetries?: number;
}

export interface PromptTemplate {
  text: string;
  instructions?: string;
  separator?: string;
  /** 0 or absent: no cap. */
  maxContextChars?: number;
}
