import fetch from "node-fetch";
import { ConfigurationError } from "../errors/errors";

export interface Embedder {
  readonly model: string;
  readonly dimensions: number;
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
}

export function assertDimensions(vector: number[], expected: number, source: string): void {
  if (vector.length !== expected) {
    throw new ConfigurationError(
      `${source} produced a ${vector.length}-dimensional vector, expected ${expected}`
    );
  }
}

export interface OllamaEmbedderOptions {
  baseUrl: string;
  model: string;
  dimensions: number;
}

/**
 * Embeddings through Ollama's /api/embeddings endpoint.
 */
export class OllamaEmbedder implements Embedder {
  readonly model: string;
  readonly dimensions: number;
  private readonly baseUrl: string;

  constructor(options: OllamaEmbedderOptions) {
    this.baseUrl = options.baseUrl;
    this.model = options.model;
    this.dimensions = options.dimensions;
  }

  async embed(text: string): Promise<number[]> {
    if (!text || text.trim().length === 0) {
      throw new Error("Text cannot be empty");
    }

    const response = await fetch(`${this.baseUrl}/api/embeddings`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.model,
        prompt: text,
      }),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Ollama embedding error: ${body}`);
    }

    const data = (await response.json()) as { embedding?: number[] };

    if (!data.embedding || data.embedding.length === 0) {
      throw new Error("Ollama returned an empty embedding.");
    }

    assertDimensions(data.embedding, this.dimensions, `Embedding model "${this.model}"`);
    return data.embedding;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const embeddings: number[][] = [];
    for (const text of texts) {
      embeddings.push(await this.embed(text));
    }
    return embeddings;
  }
}
