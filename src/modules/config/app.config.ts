import fs from "fs";
import { z } from "zod";
import { ConfigurationError } from "../errors/errors";
import { ChunkingStrategy } from "../ingest/chunker";

export type LlmProvider = "ollama" | "openai";
export type SimilarityMetric = "cosine" | "dot";

export interface CallPolicyConfig {
  timeoutMs: number;
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface LlmRoleConfig {
  provider: LlmProvider;
  model: string;
  requestsPerMinute: number;
  policy: CallPolicyConfig;
}

export interface AppConfig {
  server: { port: number };
  ollama: { baseUrl: string };
  openai: { baseUrl: string; apiKey?: string };
  embedding: { model: string; dimensions: number };
  vectorIndex: {
    kind: "chroma" | "memory";
    chromaBaseUrl: string;
    collection: string;
    metric: SimilarityMetric;
  };
  chunking: { chunkSize: number; chunkOverlap: number; strategy: ChunkingStrategy };
  prompt: {
    template?: string;
    instructions?: string;
    separator: string;
    maxContextChars: number;
  };
  generation: LlmRoleConfig;
  judge: LlmRoleConfig;
  eval: {
    k: number;
    concurrency: number;
    passThreshold: number;
    retrievalAttempts: number;
    weights: { correctness: number; faithfulness: number; contextRelevance: number };
    pricing: { promptTokenPrice: number; completionTokenPrice: number };
    datasetDir: string;
    resultsDir: string;
  };
}

const int = (fallback: number) => z.coerce.number().int().default(fallback);
const num = (fallback: number) => z.coerce.number().finite().default(fallback);
const optionalText = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value : undefined));

const envSchema = z.object({
  PORT: int(4000).pipe(z.number().min(1).max(65535)),
  OLLAMA_BASE_URL: z.string().url().default("http://localhost:11434"),
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com"),
  OPENAI_API_KEY: optionalText,

  EMBEDDING_MODEL: z.string().min(1).default("nomic-embed-text"),
  EMBEDDING_DIMENSIONS: int(768).pipe(z.number().positive()),

  VECTOR_INDEX: z.enum(["chroma", "memory"]).default("chroma"),
  CHROMA_BASE_URL: z.string().url().default("http://localhost:8000"),
  CHROMA_COLLECTION: z.string().min(1).default("ragjudge_chunks"),
  SIMILARITY_METRIC: z.enum(["cosine", "dot"]).default("cosine"),

  CHUNK_SIZE: int(800),
  CHUNK_OVERLAP: int(100),
  CHUNK_STRATEGY: z.enum(["fixed-length", "sentence-aware"]).default("sentence-aware"),

  PROMPT_TEMPLATE_FILE: optionalText,
  PROMPT_INSTRUCTIONS: optionalText,
  PROMPT_CONTEXT_SEPARATOR: z.string().default("\n\n---\n\n"),
  PROMPT_MAX_CONTEXT_CHARS: int(4000).pipe(z.number().min(0)),

  GENERATION_PROVIDER: z.enum(["ollama", "openai"]).default("ollama"),
  GENERATION_MODEL: z.string().min(1).default("llama3.2"),
  GENERATION_RPM: int(0).pipe(z.number().min(0)),
  JUDGE_PROVIDER: z.enum(["ollama", "openai"]).default("ollama"),
  JUDGE_MODEL: z.string().min(1).default("mistral"),
  JUDGE_RPM: int(30).pipe(z.number().min(0)),

  LLM_TIMEOUT_MS: int(60_000).pipe(z.number().positive()),
  LLM_MAX_RETRIES: int(2).pipe(z.number().min(0)),
  LLM_BASE_DELAY_MS: int(500).pipe(z.number().min(0)),
  LLM_MAX_DELAY_MS: int(8_000).pipe(z.number().min(0)),

  EVAL_TOP_K: int(5).pipe(z.number().min(1)),
  EVAL_CONCURRENCY: int(2).pipe(z.number().min(1)),
  EVAL_PASS_THRESHOLD: num(0.7).pipe(z.number().min(0).max(1)),
  EVAL_RETRIEVAL_ATTEMPTS: int(2).pipe(z.number().min(1)),
  EVAL_WEIGHT_CORRECTNESS: num(0.5).pipe(z.number().min(0)),
  EVAL_WEIGHT_FAITHFULNESS: num(0.3).pipe(z.number().min(0)),
  EVAL_WEIGHT_CONTEXT_RELEVANCE: num(0.2).pipe(z.number().min(0)),
  PROMPT_TOKEN_PRICE: num(0).pipe(z.number().min(0)),
  COMPLETION_TOKEN_PRICE: num(0).pipe(z.number().min(0)),

  DATASET_DIR: z.string().min(1).default("data/datasets"),
  RESULTS_DIR: z.string().min(1).default("data/runs"),
});

type Env = Record<string, string | undefined>;

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

function readTemplateFile(filePath: string): string {
  try {
    return fs.readFileSync(filePath, "utf8");
  } catch (error) {
    throw new ConfigurationError(`Cannot read PROMPT_TEMPLATE_FILE "${filePath}"`, {
      cause: error,
    });
  }
}

/**
 * Builds the process-wide configuration from environment variables.
 * Call once at startup; the result is frozen and passed down explicitly.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  // Empty strings in .env files mean "unset".
  const cleaned: Env = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== "") cleaned[key] = value;
  }

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;

  if (e.CHUNK_SIZE <= 0 || e.CHUNK_OVERLAP < 0 || e.CHUNK_OVERLAP >= e.CHUNK_SIZE) {
    throw new ConfigurationError(
      `CHUNK_OVERLAP (${e.CHUNK_OVERLAP}) must be >= 0 and smaller than CHUNK_SIZE (${e.CHUNK_SIZE})`
    );
  }

  if ((e.GENERATION_PROVIDER === "openai" || e.JUDGE_PROVIDER === "openai") && !e.OPENAI_API_KEY) {
    throw new ConfigurationError("OPENAI_API_KEY is required when a provider is set to openai");
  }

  const policy: CallPolicyConfig = {
    timeoutMs: e.LLM_TIMEOUT_MS,
    maxRetries: e.LLM_MAX_RETRIES,
    baseDelayMs: e.LLM_BASE_DELAY_MS,
    maxDelayMs: e.LLM_MAX_DELAY_MS,
  };

  const config: AppConfig = {
    server: { port: e.PORT },
    ollama: { baseUrl: e.OLLAMA_BASE_URL },
    openai: { baseUrl: e.OPENAI_BASE_URL, apiKey: e.OPENAI_API_KEY },
    embedding: { model: e.EMBEDDING_MODEL, dimensions: e.EMBEDDING_DIMENSIONS },
    vectorIndex: {
      kind: e.VECTOR_INDEX,
      chromaBaseUrl: e.CHROMA_BASE_URL,
      collection: e.CHROMA_COLLECTION,
      metric: e.SIMILARITY_METRIC,
    },
    chunking: {
      chunkSize: e.CHUNK_SIZE,
      chunkOverlap: e.CHUNK_OVERLAP,
      strategy: e.CHUNK_STRATEGY,
    },
    prompt: {
      template: e.PROMPT_TEMPLATE_FILE ? readTemplateFile(e.PROMPT_TEMPLATE_FILE) : undefined,
      instructions: e.PROMPT_INSTRUCTIONS,
      separator: e.PROMPT_CONTEXT_SEPARATOR,
      maxContextChars: e.PROMPT_MAX_CONTEXT_CHARS,
    },
    generation: {
      provider: e.GENERATION_PROVIDER,
      model: e.GENERATION_MODEL,
      requestsPerMinute: e.GENERATION_RPM,
      policy,
    },
    judge: {
      provider: e.JUDGE_PROVIDER,
      model: e.JUDGE_MODEL,
      requestsPerMinute: e.JUDGE_RPM,
      policy: { ...policy },
    },
    eval: {
      k: e.EVAL_TOP_K,
      concurrency: e.EVAL_CONCURRENCY,
      passThreshold: e.EVAL_PASS_THRESHOLD,
      retrievalAttempts: e.EVAL_RETRIEVAL_ATTEMPTS,
      weights: {
        correctness: e.EVAL_WEIGHT_CORRECTNESS,
        faithfulness: e.EVAL_WEIGHT_FAITHFULNESS,
        contextRelevance: e.EVAL_WEIGHT_CONTEXT_RELEVANCE,
      },
      pricing: {
        promptTokenPrice: e.PROMPT_TOKEN_PRICE,
        completionTokenPrice: e.COMPLETION_TOKEN_PRICE,
      },
      datasetDir: e.DATASET_DIR,
      resultsDir: e.RESULTS_DIR,
    },
  };

  return deepFreeze(config);
}
