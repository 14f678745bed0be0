import { CallPolicyConfig } from "../config/app.config";
import { JudgeError } from "../errors/errors";
import { callWithPolicy, RetriesExhaustedError, Sleep } from "../llm/call.policy";
import { LlmBackend, TokenUsage } from "../llm/llm.types";
import { RateLimiter } from "../llm/rate.limiter";
import { RetrievedContext } from "../rag/types";
import { parseJudgeResponse } from "./judge.parser";
import { JudgeVerdict } from "./types";

export function buildJudgePrompt(
  question: string,
  answer: string,
  contexts: RetrievedContext[],
  expectedAnswer: string
): string {
  const contextBlock =
    contexts.length > 0
      ? contexts.map((c, i) => `[${i + 1}] ${c.text.trim()}`).join("\n\n")
      : "(no context was retrieved)";

  return `You are an impartial evaluator of a retrieval-augmented question answering system.

Question:
${question}

Expected answer (ground truth):
${expectedAnswer}

Retrieved context:
${contextBlock}

Generated answer:
${answer}

Score the generated answer on three independent axes, each between 0 and 1:
- correctness: how well the generated answer matches the expected answer. 1 = same facts, 0 = wrong or missing.
- faithfulness: whether every claim in the generated answer is supported by the retrieved context. Each unsupported claim lowers the score; an answer that invents facts scores near 0.
- context_relevance: whether the retrieved context contains the information needed to answer the question, regardless of what the generated answer says.

Respond ONLY in valid JSON with NO additional text:
{
  "correctness": number between 0 and 1,
  "faithfulness": number between 0 and 1,
  "context_relevance": number between 0 and 1,
  "rationale": "short justification covering each score"
}`;
}

export interface JudgeOutcome {
  verdict: JudgeVerdict;
  usage: TokenUsage;
  rawResponse: string;
}

export interface JudgeCallOverrides {
  model?: string;
  timeoutMs?: number;
  maxRetries?: number;
}

export interface JudgeOptions {
  backend: LlmBackend;
  model: string;
  policy: CallPolicyConfig;
  /** Independent of the generator's limiter. */
  rateLimiter?: RateLimiter;
  sleep?: Sleep;
}

/**
 * LLM-as-judge. A response that cannot be parsed yields an invalid verdict
 * (never a default score); a backend that keeps failing raises JudgeError.
 */
export class Judge {
  constructor(private readonly options: JudgeOptions) {}

  async judge(
    question: string,
    answer: string,
    contexts: RetrievedContext[],
    expectedAnswer: string,
    overrides: JudgeCallOverrides = {}
  ): Promise<JudgeOutcome> {
    const { backend, rateLimiter } = this.options;
    const model = overrides.model ?? this.options.model;
    const policy: CallPolicyConfig = {
      ...this.options.policy,
      ...(overrides.timeoutMs !== undefined ? { timeoutMs: overrides.timeoutMs } : {}),
      ...(overrides.maxRetries !== undefined ? { maxRetries: overrides.maxRetries } : {}),
    };
    const prompt = buildJudgePrompt(question, answer, contexts, expectedAnswer);

    try {
      const response = await callWithPolicy(
        () => backend.complete({ prompt, model, temperature: 0 }),
        policy,
        {
          provider: `${backend.name}:${model}`,
          beforeAttempt: rateLimiter ? () => rateLimiter.acquire() : undefined,
          sleep: this.options.sleep,
        }
      );

      const verdict = parseJudgeResponse(response.text);
      if (!verdict.valid) {
        console.warn(`Judge output rejected: ${verdict.rationale}`);
      }

      return { verdict, usage: response.usage, rawResponse: response.text };
    } catch (error) {
      if (error instanceof RetriesExhaustedError) {
        throw new JudgeError(`Judge model ${model} failed: ${error.message}`, {
          cause: error.lastError,
        });
      }
      throw error;
    }
  }
}
