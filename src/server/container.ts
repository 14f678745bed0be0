import { AppConfig, LlmRoleConfig } from "../modules/config/app.config";
import { Embedder, OllamaEmbedder } from "../modules/embeddings/embedding.service";
import { DatasetGenerator } from "../modules/evaluation/dataset.generator";
import { DatasetRepository, DatasetSource } from "../modules/evaluation/dataset.loader";
import { EvalRunner } from "../modules/evaluation/eval.runner";
import { EvalService } from "../modules/evaluation/eval.service";
import { Judge } from "../modules/evaluation/judge.service";
import { FileResultStore, ResultStore } from "../modules/evaluation/result.store";
import { EvalConfig } from "../modules/evaluation/types";
import { IngestService } from "../modules/ingest/ingest.service";
import { LlmBackend } from "../modules/llm/llm.types";
import { OllamaBackend } from "../modules/llm/ollama.service";
import { OpenAiCompatibleBackend } from "../modules/llm/openai.backend";
import { RateLimiter } from "../modules/llm/rate.limiter";
import { Generator } from "../modules/rag/generator";
import { assertTemplateSlots, DEFAULT_PROMPT_TEMPLATE } from "../modules/rag/prompt.builder";
import { RagPipeline } from "../modules/rag/rag.pipeline";
import { Retriever } from "../modules/rag/retriever";
import { ChromaVectorIndex } from "../modules/vector-db/chroma.service";
import { MemoryVectorIndex } from "../modules/vector-db/memory.index";
import { VectorIndex } from "../modules/vector-db/vector.index";

export interface Container {
  config: AppConfig;
  index: VectorIndex;
  ingest: IngestService;
  pipeline: RagPipeline;
  evals: EvalService;
  datasetGenerator: DatasetGenerator;
}

/** Swappable parts; anything omitted is built from the config. */
export interface ContainerOverrides {
  embedder?: Embedder;
  index?: VectorIndex;
  generationBackend?: LlmBackend;
  judgeBackend?: LlmBackend;
  store?: ResultStore;
  datasets?: DatasetSource;
  generateRunId?: () => string;
}

function createBackend(config: AppConfig, role: LlmRoleConfig): LlmBackend {
  return role.provider === "openai"
    ? new OpenAiCompatibleBackend(config.openai.baseUrl, config.openai.apiKey)
    : new OllamaBackend(config.ollama.baseUrl);
}

function createIndex(config: AppConfig): VectorIndex {
  const { vectorIndex, embedding } = config;
  if (vectorIndex.kind === "memory") {
    return new MemoryVectorIndex({ dimensions: embedding.dimensions, metric: vectorIndex.metric });
  }
  return new ChromaVectorIndex({
    baseUrl: vectorIndex.chromaBaseUrl,
    collection: vectorIndex.collection,
    metric: vectorIndex.metric,
  });
}

export function defaultEvalConfig(config: AppConfig): EvalConfig {
  return {
    k: config.eval.k,
    concurrency: config.eval.concurrency,
    passThreshold: config.eval.passThreshold,
    judgeModel: config.judge.model,
    generationModel: config.generation.model,
    maxRetries: config.generation.policy.maxRetries,
    timeoutMs: config.generation.policy.timeoutMs,
  };
}

/**
 * Wires every service from one config. The only place that picks concrete
 * implementations.
 */
export function createContainer(config: AppConfig, overrides: ContainerOverrides = {}): Container {
  const templateText = config.prompt.template ?? DEFAULT_PROMPT_TEMPLATE;
  assertTemplateSlots(templateText);

  const embedder =
    overrides.embedder ??
    new OllamaEmbedder({
      baseUrl: config.ollama.baseUrl,
      model: config.embedding.model,
      dimensions: config.embedding.dimensions,
    });
  const index = overrides.index ?? createIndex(config);

  const generationBackend = overrides.generationBackend ?? createBackend(config, config.generation);
  const generationLimiter = new RateLimiter(config.generation.requestsPerMinute);
  const generator = new Generator({
    backend: generationBackend,
    policy: config.generation.policy,
    rateLimiter: generationLimiter,
  });

  const pipeline = new RagPipeline({
    retriever: new Retriever(embedder, index),
    generator,
    template: {
      text: templateText,
      instructions: config.prompt.instructions,
      separator: config.prompt.separator,
      maxContextChars: config.prompt.maxContextChars,
    },
    model: { model: config.generation.model },
  });

  const judge = new Judge({
    backend: overrides.judgeBackend ?? createBackend(config, config.judge),
    model: config.judge.model,
    policy: config.judge.policy,
    rateLimiter: new RateLimiter(config.judge.requestsPerMinute),
  });

  const store = overrides.store ?? new FileResultStore(config.eval.resultsDir);
  const runner = new EvalRunner({
    pipeline,
    judge,
    store,
    retrievalAttempts: config.eval.retrievalAttempts,
  });

  const evals = new EvalService({
    runner,
    datasets: overrides.datasets ?? new DatasetRepository(config.eval.datasetDir),
    store,
    defaults: defaultEvalConfig(config),
    aggregation: { weights: config.eval.weights, pricing: config.eval.pricing },
    generateRunId: overrides.generateRunId,
  });

  return {
    config,
    index,
    ingest: new IngestService({ embedder, index, chunking: config.chunking }),
    pipeline,
    evals,
    datasetGenerator: new DatasetGenerator({
      backend: generationBackend,
      model: config.generation.model,
      policy: config.generation.policy,
      chunking: config.chunking,
      rateLimiter: generationLimiter,
    }),
  };
}
