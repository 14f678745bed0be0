import { Generator } from "./generator";
import { buildPrompt } from "./prompt.builder";
import { Retriever } from "./retriever";
import { AnswerResult, ModelConfig, PromptTemplate, RetrievalOptions, RetrievedContext } from "./types";

export interface RagPipelineOptions {
  retriever: Retriever;
  generator: Generator;
  template: PromptTemplate;
  model: ModelConfig;
}

/**
 * retrieve → build prompt → generate. The evaluation runner calls the two
 * halves separately so it can report item state, but runs exactly this code.
 */
export class RagPipeline {
  constructor(private readonly options: RagPipelineOptions) {}

  get defaultModel(): ModelConfig {
    return this.options.model;
  }

  retrieve(query: string, k: number, options?: RetrievalOptions): Promise<RetrievedContext[]> {
    return this.options.retriever.retrieve(query, k, options);
  }

  async answer(
    query: string,
    contexts: RetrievedContext[],
    model: ModelConfig = this.options.model
  ): Promise<AnswerResult> {
    const prompt = buildPrompt(query, contexts, this.options.template);
    const generation = await this.options.generator.generate(prompt, model);

    return {
      query,
      answerText: generation.text,
      contexts,
      generationLatencyMs: generation.latencyMs,
      tokenUsage: generation.usage,
      model: generation.model,
    };
  }

  async ask(
    query: string,
    k: number,
    options: RetrievalOptions & { model?: ModelConfig } = {}
  ): Promise<AnswerResult> {
    const contexts = await this.retrieve(query, k, { documentId: options.documentId });
    return this.answer(query, contexts, options.model);
  }
}
