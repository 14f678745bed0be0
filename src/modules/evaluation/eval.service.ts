import { randomUUID } from "crypto";
import { z } from "zod";
import {
  ConfigurationError,
  describeError,
  restoreError,
  RunInProgressError,
  RunNotFoundError,
} from "../errors/errors";
import { DatasetSource } from "./dataset.loader";
import { EvalRunner } from "./eval.runner";
import { aggregateResults, AggregationOptions } from "./metrics.aggregator";
import { ResultStore } from "./result.store";
import { EvalConfig, EvalItemResult, EvalRunRecord, EvalRunSummary, RunStatus } from "./types";

export const evalConfigSchema = z
  .object({
    k: z.number().int().min(1),
    concurrency: z.number().int().min(1),
    passThreshold: z.number().min(0).max(1),
    judgeModel: z.string().trim().min(1),
    generationModel: z.string().trim().min(1),
    maxRetries: z.number().int().min(0),
    timeoutMs: z.number().int().positive(),
  })
  .strict();

export function resolveEvalConfig(defaults: EvalConfig, overrides: unknown = {}): EvalConfig {
  const partial = evalConfigSchema.partial().safeParse(overrides ?? {});
  if (!partial.success) {
    throw new ConfigurationError(
      `Invalid eval config: ${partial.error.issues
        .map((issue) => `${issue.path.join(".") || "(config)"} ${issue.message}`)
        .join("; ")}`
    );
  }

  const merged = evalConfigSchema.safeParse({ ...defaults, ...partial.data });
  if (!merged.success) {
    throw new ConfigurationError(
      `Invalid eval config: ${merged.error.issues
        .map((issue) => `${issue.path.join(".")} ${issue.message}`)
        .join("; ")}`
    );
  }
  return merged.data;
}

export interface EvalServiceOptions {
  runner: EvalRunner;
  datasets: DatasetSource;
  store: ResultStore;
  defaults: EvalConfig;
  aggregation: Pick<AggregationOptions, "weights" | "pricing">;
  generateRunId?: () => string;
}

interface ActiveRun {
  controller: AbortController;
  done: Promise<void>;
}

/**
 * Starts evaluation runs in the background and answers questions about them.
 * Every run ends in COMPLETED, CANCELLED or FAILED; the stored record is the
 * source of truth once it has.
 */
export class EvalService {
  private readonly active = new Map<string, ActiveRun>();

  constructor(private readonly options: EvalServiceOptions) {}

  /** Throws ConfigurationError before anything starts if `overrides` is invalid. */
  async runEval(datasetId: string, overrides?: unknown): Promise<string> {
    const config = resolveEvalConfig(this.options.defaults, overrides);
    const runId = (this.options.generateRunId ?? randomUUID)();

    const record: EvalRunRecord = {
      runId,
      datasetId,
      status: "RUNNING",
      config,
      startedAt: new Date().toISOString(),
    };
    await this.options.store.saveRun(record);

    const controller = new AbortController();
    const done = this.execute(record, controller.signal).finally(() => {
      this.active.delete(runId);
    });
    this.active.set(runId, { controller, done });

    console.log(`Run ${runId} started on dataset "${datasetId}"`);
    return runId;
  }

  private async finish(
    record: EvalRunRecord,
    status: RunStatus,
    error?: unknown
  ): Promise<void> {
    await this.options.store.saveRun({
      ...record,
      status,
      finishedAt: new Date().toISOString(),
      ...(error !== undefined ? { error: describeError(error) } : {}),
    });
    console.log(`Run ${record.runId} finished: ${status}`);
  }

  private async execute(record: EvalRunRecord, signal: AbortSignal): Promise<void> {
    try {
      const items = await this.options.datasets.load(record.datasetId);
      const outcome = await this.options.runner.run({
        runId: record.runId,
        items,
        config: record.config,
        signal,
      });

      if (outcome.systemicError) {
        console.error(`Run ${record.runId}: ${outcome.systemicError.message}`);
        await this.finish(record, "FAILED", outcome.systemicError);
        return;
      }

      const summary = aggregateResults(outcome.results, {
        runId: record.runId,
        datasetId: record.datasetId,
        passThreshold: record.config.passThreshold,
        ...this.options.aggregation,
        cancelled: outcome.cancelled,
        skippedCount: items.length - outcome.dispatched,
      });
      await this.options.store.saveSummary(summary);
      await this.finish(record, outcome.cancelled ? "CANCELLED" : "COMPLETED");
    } catch (error) {
      console.error(`Run ${record.runId} failed:`, error);
      await this.finish(record, "FAILED", error).catch((storeError: unknown) => {
        console.error(`Could not record failure of run ${record.runId}:`, storeError);
      });
    }
  }

  async getRun(runId: string): Promise<EvalRunRecord> {
    const run = await this.options.store.getRun(runId);
    if (!run) throw new RunNotFoundError(runId);
    return run;
  }

  async getRunSummary(runId: string): Promise<EvalRunSummary> {
    const run = await this.getRun(runId);
    if (run.status === "RUNNING") throw new RunInProgressError(runId);
    if (run.status === "FAILED") {
      throw restoreError(run.error ?? { code: "UNKNOWN_ERROR", message: "run failed" });
    }

    const summary = await this.options.store.getSummary(runId);
    if (!summary) throw new RunInProgressError(runId);
    return summary;
  }

  async getRunItems(runId: string): Promise<EvalItemResult[]> {
    await this.getRun(runId);
    return this.options.store.listItemResults(runId);
  }

  /** Stops dispatching new items. Returns false when the run is not in progress here. */
  async cancelRun(runId: string): Promise<boolean> {
    await this.getRun(runId);
    const run = this.active.get(runId);
    if (!run) return false;
    run.controller.abort();
    console.log(`Run ${runId} cancellation requested`);
    return true;
  }

  async waitForRun(runId: string): Promise<EvalRunRecord> {
    await this.active.get(runId)?.done;
    return this.getRun(runId);
  }
}
