import { CallPolicyConfig } from "../config/app.config";
import { GenerationError } from "../errors/errors";
import { callWithPolicy, RetriesExhaustedError, Sleep } from "../llm/call.policy";
import { LlmBackend, TokenUsage } from "../llm/llm.types";
import { RateLimiter } from "../llm/rate.limiter";
import { ModelConfig } from "./types";

export interface GenerationResult {
  text: string;
  usage: TokenUsage;
  latencyMs: number;
  model: string;
}

export interface GeneratorOptions {
  backend: LlmBackend;
  policy: CallPolicyConfig;
  rateLimiter?: RateLimiter;
  sleep?: Sleep;
}

export class Generator {
  constructor(private readonly options: GeneratorOptions) {}

  async generate(prompt: string, modelConfig: ModelConfig): Promise<GenerationResult> {
    const { backend, rateLimiter } = this.options;
    const policy: CallPolicyConfig = {
      ...this.options.policy,
      ...(modelConfig.timeoutMs !== undefined ? { timeoutMs: modelConfig.timeoutMs } : {}),
      ...(modelConfig.maxRetries !== undefined ? { maxRetries: modelConfig.maxRetries } : {}),
    };
    const start = Date.now();

    try {
      const response = await callWithPolicy(
        () =>
          backend.complete({
            prompt,
            model: modelConfig.model,
            temperature: modelConfig.temperature,
            maxTokens: modelConfig.maxTokens,
          }),
        policy,
        {
          provider: `${backend.name}:${modelConfig.model}`,
          beforeAttempt: rateLimiter ? () => rateLimiter.acquire() : undefined,
          onRetry: (attempt, error, delayMs) =>
            console.warn(
              `Generation attempt ${attempt} failed (${
                error instanceof Error ? error.message : String(error)
              }), retrying in ${delayMs}ms`
            ),
          sleep: this.options.sleep,
        }
      );

      return {
        text: response.text,
        usage: response.usage,
        latencyMs: Date.now() - start,
        model: response.model,
      };
    } catch (error) {
      if (error instanceof RetriesExhaustedError) {
        throw new GenerationError(
          `Generation with ${modelConfig.model} failed: ${error.message}`,
          error.attempts,
          { cause: error.lastError }
        );
      }
      throw error;
    }
  }
}
