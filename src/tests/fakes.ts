import { CallPolicyConfig } from "../modules/config/app.config";
import { Embedder } from "../modules/embeddings/embedding.service";
import { Chunk } from "../modules/ingest/types";
import { CompletionRequest, CompletionResponse, LlmBackend, TokenUsage } from "../modules/llm/llm.types";
import { VectorHit, VectorIndex, VectorQueryOptions } from "../modules/vector-db/vector.index";

export const NO_RETRY_POLICY: CallPolicyConfig = {
  timeoutMs: 1_000,
  maxRetries: 0,
  baseDelayMs: 0,
  maxDelayMs: 0,
};

export const noSleep = async (_ms: number): Promise<void> => {};

/**
 * Returns the vector registered for a text, or `fallback`. Texts are matched
 * on the first registered key they contain, so a chunk and a question can
 * share a vector.
 */
export class KeywordEmbedder implements Embedder {
  readonly model = "fake-embedder";
  calls = 0;
  failure?: Error;

  constructor(
    readonly dimensions: number,
    private readonly vectors: Record<string, number[]>,
    private readonly fallback: number[] = new Array<number>(dimensions).fill(0)
  ) {}

  async embed(text: string): Promise<number[]> {
    this.calls++;
    if (this.failure) throw this.failure;
    const key = Object.keys(this.vectors).find((keyword) => text.includes(keyword));
    return key ? this.vectors[key] : this.fallback;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (const text of texts) vectors.push(await this.embed(text));
    return vectors;
  }
}

export type Reply = string | Error | ((request: CompletionRequest) => string | Promise<string>);

/**
 * Scripted LLM backend. `replies` is consumed in order; once exhausted,
 * `fallback` answers every further call.
 */
export class ScriptedBackend implements LlmBackend {
  readonly name = "fake";
  readonly requests: CompletionRequest[] = [];
  private readonly replies: Reply[];

  constructor(
    replies: Reply[] = [],
    private readonly fallback: Reply = "",
    private readonly usage: TokenUsage = { promptTokens: 10, completionTokens: 5 }
  ) {
    this.replies = [...replies];
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    this.requests.push(request);
    const reply = this.replies.length > 0 ? this.replies.shift() : this.fallback;
    if (reply instanceof Error) throw reply;
    const text = typeof reply === "function" ? await reply(request) : reply ?? "";
    return { text, usage: this.usage, model: request.model };
  }
}

/** Index whose every call fails, as if the server were down. */
export class UnreachableIndex implements VectorIndex {
  readonly metric = "cosine";
  calls = 0;

  private fail(): never {
    this.calls++;
    throw new Error("connect ECONNREFUSED 127.0.0.1:8000");
  }

  async upsert(_chunks: Chunk[]): Promise<void> {
    return this.fail();
  }

  async deleteByDocument(_documentId: string): Promise<void> {
    return this.fail();
  }

  async query(_embedding: number[], _k: number, _options?: VectorQueryOptions): Promise<VectorHit[]> {
    return this.fail();
  }

  async count(): Promise<number> {
    return this.fail();
  }
}

export function judgeJson(correctness: number, faithfulness: number, contextRelevance: number): string {
  return JSON.stringify({
    correctness,
    faithfulness,
    context_relevance: contextRelevance,
    rationale: "test rationale",
  });
}

export function approxEqual(actual: number | null | undefined, expected: number, epsilon = 1e-9) {
  if (actual === null || actual === undefined || Math.abs(actual - expected) > epsilon) {
    throw new Error(`Expected ${expected}, received ${actual}`);
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}
