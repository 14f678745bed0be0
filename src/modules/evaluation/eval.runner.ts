import {
  describeError,
  ErrorRecord,
  JudgeError,
  RetrievalError,
  SystemicRunError,
} from "../errors/errors";
import { RagPipeline } from "../rag/rag.pipeline";
import { AnswerResult, RetrievedContext } from "../rag/types";
import { Judge, JudgeOutcome } from "./judge.service";
import { ResultStore } from "./result.store";
import { calculateRetrievalMetrics } from "./retrieval.metrics";
import { EvalConfig, EvalDatasetItem, EvalItemResult, ItemState } from "./types";
import { WorkerPool } from "./worker.pool";

export type TransitionListener = (itemId: string, state: ItemState) => void;

export interface EvalRunnerOptions {
  pipeline: RagPipeline;
  judge: Judge;
  store: ResultStore;
  /** Attempts per item before a retrieval failure marks it FAILED. */
  retrievalAttempts: number;
  onTransition?: TransitionListener;
}

export interface RunRequest {
  runId: string;
  items: EvalDatasetItem[];
  config: EvalConfig;
  signal?: AbortSignal;
}

export interface RunOutcome {
  /** Terminal results of dispatched items, in dataset order. */
  results: EvalItemResult[];
  dispatched: number;
  cancelled: boolean;
  /** Set when every dispatched item failed on retrieval. */
  systemicError?: SystemicRunError;
}

/**
 * Drives each dataset item through
 * PENDING → RETRIEVING → GENERATING → JUDGING → SUCCESS | PARTIAL | FAILED.
 * Item failures are recorded on the result; they never abort the run.
 */
export class EvalRunner {
  constructor(private readonly options: EvalRunnerOptions) {}

  private transition(itemId: string, state: ItemState): void {
    this.options.onTransition?.(itemId, state);
  }

  private async retrieveWithRetry(
    item: EvalDatasetItem,
    k: number
  ): Promise<{ contexts: RetrievedContext[] } | { error: unknown }> {
    const attempts = Math.max(1, this.options.retrievalAttempts);
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        return { contexts: await this.options.pipeline.retrieve(item.question, k) };
      } catch (error) {
        lastError = error;
        if (!(error instanceof RetrievalError)) break;
        if (attempt < attempts) {
          console.warn(`[${item.id}] retrieval attempt ${attempt} failed: ${error.message}`);
        }
      }
    }

    return { error: lastError };
  }

  async evaluateItem(
    runId: string,
    item: EvalDatasetItem,
    position: number,
    config: EvalConfig
  ): Promise<EvalItemResult> {
    const base = { runId, itemId: item.id, position, item };
    const failed = (error: unknown): EvalItemResult => ({
      ...base,
      status: "FAILED",
      error: describeError(error),
    });

    this.transition(item.id, "PENDING");

    this.transition(item.id, "RETRIEVING");
    const retrieval = await this.retrieveWithRetry(item, config.k);
    if ("error" in retrieval) return failed(retrieval.error);
    const { contexts } = retrieval;

    this.transition(item.id, "GENERATING");
    let answer: AnswerResult;
    try {
      answer = await this.options.pipeline.answer(item.question, contexts, {
        ...this.options.pipeline.defaultModel,
        model: config.generationModel,
        timeoutMs: config.timeoutMs,
        maxRetries: config.maxRetries,
      });
    } catch (error) {
      return failed(error);
    }

    const retrievalMetrics = calculateRetrievalMetrics(contexts, item.expectedContexts);
    const answered = {
      ...base,
      answer,
      ...(retrievalMetrics ? { retrieval: retrievalMetrics } : {}),
    };

    this.transition(item.id, "JUDGING");
    let outcome: JudgeOutcome;
    try {
      outcome = await this.options.judge.judge(
        item.question,
        answer.answerText,
        contexts,
        item.expectedAnswer,
        { model: config.judgeModel, timeoutMs: config.timeoutMs, maxRetries: config.maxRetries }
      );
    } catch (error) {
      return { ...answered, status: "PARTIAL", error: describeError(error) };
    }

    if (!outcome.verdict.valid) {
      const error: ErrorRecord = describeError(new JudgeError(outcome.verdict.rationale));
      return {
        ...answered,
        status: "PARTIAL",
        verdict: outcome.verdict,
        judgeTokenUsage: outcome.usage,
        error,
      };
    }

    return {
      ...answered,
      status: "SUCCESS",
      verdict: outcome.verdict,
      judgeTokenUsage: outcome.usage,
    };
  }

  async run(request: RunRequest): Promise<RunOutcome> {
    const { runId, items, config, signal } = request;
    const pool = new WorkerPool(config.concurrency);
    let finished = 0;

    const pooled = await pool.run(
      items,
      async (item, position) => {
        const start = Date.now();
        const result = await this.evaluateItem(runId, item, position, config);
        this.transition(item.id, result.status);
        try {
          await this.options.store.saveItemResult(result);
        } catch (error) {
          console.error(
            `[${item.id}] could not persist result: ${error instanceof Error ? error.message : error}`
          );
        }
        finished++;
        console.log(
          `[${finished}/${items.length}] ${item.id}: ${result.status} (${Date.now() - start}ms)`
        );
        return result;
      },
      signal
    );

    const results = pooled.results.flatMap((r) => (r ? [r] : []));
    const outcome: RunOutcome = {
      results,
      dispatched: pooled.dispatched,
      cancelled: pooled.cancelled,
    };

    const allRetrievalFailures =
      results.length > 0 &&
      results.every((r) => r.status === "FAILED" && r.error?.code === "RETRIEVAL_ERROR");
    if (allRetrievalFailures) {
      const first = results[0].error?.message ?? "retrieval failed";
      outcome.systemicError = new SystemicRunError(
        `All ${results.length} evaluated item(s) failed on retrieval: ${first}`
      );
    }

    return outcome;
  }
}
