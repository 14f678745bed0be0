import { AxisStatistics, EvalItemResult, EvalRunSummary, ScoreAxis, ValidVerdict } from "./types";

export interface AggregationOptions {
  runId: string;
  datasetId: string;
  passThreshold: number;
  weights: Record<ScoreAxis, number>;
  pricing: { promptTokenPrice: number; completionTokenPrice: number };
  cancelled?: boolean;
  skippedCount?: number;
}

const AXES: readonly ScoreAxis[] = ["correctness", "faithfulness", "contextRelevance"];

function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function median(values: number[]): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/** Nearest-rank percentile: the smallest value with at least p of the sample at or below it. */
export function percentile(values: number[], p: number): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const index = Math.ceil(p * sorted.length) - 1;
  return sorted[Math.max(0, Math.min(index, sorted.length - 1))];
}

function rate(count: number, total: number): number {
  return total > 0 ? count / total : 0;
}

function axisStatistics(scores: number[], threshold: number): AxisStatistics {
  return {
    scoredCount: scores.length,
    mean: mean(scores),
    median: median(scores),
    passRate: scores.length > 0 ? scores.filter((s) => s >= threshold).length / scores.length : null,
  };
}

function weightedOverall(
  scores: Record<ScoreAxis, AxisStatistics>,
  weights: Record<ScoreAxis, number>
): number | null {
  let weighted = 0;
  let totalWeight = 0;
  for (const axis of AXES) {
    const axisMean = scores[axis].mean;
    if (axisMean === null) return null;
    weighted += weights[axis] * axisMean;
    totalWeight += weights[axis];
  }
  return totalWeight > 0 ? weighted / totalWeight : null;
}

/**
 * Reduces terminal item results to a run summary. Quality (scores) only
 * comes from SUCCESS items with a valid verdict; reliability (counts and
 * rates) covers every item.
 */
export function aggregateResults(
  results: EvalItemResult[],
  options: AggregationOptions
): EvalRunSummary {
  const itemCount = results.length;
  const successCount = results.filter((r) => r.status === "SUCCESS").length;
  const partialCount = results.filter((r) => r.status === "PARTIAL").length;
  const failedCount = results.filter((r) => r.status === "FAILED").length;
  const invalidVerdictCount = results.filter((r) => r.verdict && !r.verdict.valid).length;

  const scoredVerdicts: ValidVerdict[] = [];
  for (const result of results) {
    const verdict = result.verdict;
    if (result.status === "SUCCESS" && verdict && verdict.valid) scoredVerdicts.push(verdict);
  }

  const axisScores = (field: "correctnessScore" | "faithfulnessScore" | "contextRelevanceScore") =>
    axisStatistics(
      scoredVerdicts.map((verdict) => verdict[field]),
      options.passThreshold
    );
  const scores: Record<ScoreAxis, AxisStatistics> = {
    correctness: axisScores("correctnessScore"),
    faithfulness: axisScores("faithfulnessScore"),
    contextRelevance: axisScores("contextRelevanceScore"),
  };

  const answered = results.filter(
    (r) => (r.status === "SUCCESS" || r.status === "PARTIAL") && r.answer
  );
  const latencies = answered.flatMap((r) => (r.answer ? [r.answer.generationLatencyMs] : []));

  const retrievalMetrics = answered.flatMap((r) => (r.retrieval ? [r.retrieval] : []));

  let promptTokens = 0;
  let completionTokens = 0;
  let judgePromptTokens = 0;
  let judgeCompletionTokens = 0;
  for (const result of results) {
    promptTokens += result.answer?.tokenUsage.promptTokens ?? 0;
    completionTokens += result.answer?.tokenUsage.completionTokens ?? 0;
    judgePromptTokens += result.judgeTokenUsage?.promptTokens ?? 0;
    judgeCompletionTokens += result.judgeTokenUsage?.completionTokens ?? 0;
  }
  const allPrompt = promptTokens + judgePromptTokens;
  const allCompletion = completionTokens + judgeCompletionTokens;

  return {
    runId: options.runId,
    datasetId: options.datasetId,
    itemCount,
    successCount,
    partialCount,
    failedCount,
    invalidVerdictCount,
    successRate: rate(successCount, itemCount),
    partialFailureRate: rate(partialCount, itemCount),
    failureRate: rate(failedCount, itemCount),
    passThreshold: options.passThreshold,
    scores,
    overallScore: weightedOverall(scores, options.weights),
    retrieval: {
      evaluatedCount: retrievalMetrics.length,
      contextRecall: mean(retrievalMetrics.map((m) => m.contextRecall)),
      contextPrecision: mean(retrievalMetrics.map((m) => m.contextPrecision)),
    },
    latency: {
      p50Ms: percentile(latencies, 0.5),
      p95Ms: percentile(latencies, 0.95),
      meanMs: mean(latencies),
    },
    tokens: {
      prompt: promptTokens,
      completion: completionTokens,
      judgePrompt: judgePromptTokens,
      judgeCompletion: judgeCompletionTokens,
      total: allPrompt + allCompletion,
      estimatedCost:
        allPrompt * options.pricing.promptTokenPrice +
        allCompletion * options.pricing.completionTokenPrice,
    },
    cancelled: options.cancelled ?? false,
    skippedCount: options.skippedCount ?? 0,
  };
}
