import assert from "assert/strict";
import { test } from "node:test";
import { invalidVerdict } from "../modules/evaluation/judge.parser";
import { aggregateResults, median, percentile } from "../modules/evaluation/metrics.aggregator";
import { calculateRetrievalMetrics } from "../modules/evaluation/retrieval.metrics";
import { EvalItemResult, ItemRetrievalMetrics, ItemStatus, JudgeVerdict } from "../modules/evaluation/types";
import { AnswerResult } from "../modules/rag/types";
import { approxEqual } from "./fakes";

const OPTIONS = {
  runId: "run-1",
  datasetId: "support-faq",
  passThreshold: 0.7,
  weights: { correctness: 0.5, faithfulness: 0.3, contextRelevance: 0.2 },
  pricing: { promptTokenPrice: 0.001, completionTokenPrice: 0.002 },
};

function answer(latencyMs: number): AnswerResult {
  return {
    query: "q",
    answerText: "a",
    contexts: [],
    generationLatencyMs: latencyMs,
    tokenUsage: { promptTokens: 100, completionTokens: 20 },
    model: "llama3.2",
  };
}

function verdict(correctness: number, faithfulness: number, contextRelevance: number): JudgeVerdict {
  return {
    valid: true,
    correctnessScore: correctness,
    faithfulnessScore: faithfulness,
    contextRelevanceScore: contextRelevance,
    rationale: "ok",
  };
}

function result(
  itemId: string,
  status: ItemStatus,
  extra: { answer?: AnswerResult; verdict?: JudgeVerdict; retrieval?: ItemRetrievalMetrics } = {}
): EvalItemResult {
  return {
    runId: "run-1",
    itemId,
    position: Number(itemId.slice(1)),
    item: { id: itemId, question: "q", expectedAnswer: "a" },
    status,
    ...extra,
    ...(extra.verdict ? { judgeTokenUsage: { promptTokens: 50, completionTokens: 10 } } : {}),
  };
}

const MIXED: EvalItemResult[] = [
  result("i0", "SUCCESS", {
    answer: answer(100),
    verdict: verdict(1.0, 0.8, 0.6),
    retrieval: { contextRecall: 1, contextPrecision: 0.5 },
  }),
  result("i1", "SUCCESS", { answer: answer(300), verdict: verdict(0.5, 0.6, 1.0) }),
  result("i2", "PARTIAL", {
    answer: answer(200),
    verdict: invalidVerdict("not JSON"),
    retrieval: { contextRecall: 0, contextPrecision: 0 },
  }),
  result("i3", "FAILED"),
];

test("counts every status and rate separately", () => {
  const summary = aggregateResults(MIXED, OPTIONS);
  assert.equal(summary.itemCount, 4);
  assert.equal(summary.successCount, 2);
  assert.equal(summary.partialCount, 1);
  assert.equal(summary.failedCount, 1);
  assert.equal(summary.invalidVerdictCount, 1);
  approxEqual(summary.successRate, 0.5);
  approxEqual(summary.partialFailureRate, 0.25);
  approxEqual(summary.failureRate, 0.25);
});

test("scores come only from valid verdicts", () => {
  const { scores, overallScore } = aggregateResults(MIXED, OPTIONS);

  assert.equal(scores.correctness.scoredCount, 2);
  approxEqual(scores.correctness.mean, 0.75);
  approxEqual(scores.correctness.median, 0.75);
  approxEqual(scores.correctness.passRate, 0.5);
  approxEqual(scores.faithfulness.mean, 0.7);
  approxEqual(scores.faithfulness.passRate, 0.5);
  approxEqual(scores.contextRelevance.mean, 0.8);
  approxEqual(overallScore, 0.745);
});

test("latency, tokens and cost cover answered items", () => {
  const summary = aggregateResults(MIXED, OPTIONS);

  assert.equal(summary.latency.p50Ms, 200);
  assert.equal(summary.latency.p95Ms, 300);
  approxEqual(summary.latency.meanMs, 200);
  assert.deepEqual(
    { ...summary.tokens, estimatedCost: 0 },
    { prompt: 300, completion: 60, judgePrompt: 150, judgeCompletion: 30, total: 540, estimatedCost: 0 }
  );
  approxEqual(summary.tokens.estimatedCost, 0.63);
  assert.equal(summary.retrieval.evaluatedCount, 2);
  approxEqual(summary.retrieval.contextRecall, 0.5);
  approxEqual(summary.retrieval.contextPrecision, 0.25);
});

test("no valid verdicts means null scores, never zero", () => {
  const summary = aggregateResults([result("i0", "PARTIAL", { answer: answer(50), verdict: invalidVerdict("bad") })], OPTIONS);
  assert.equal(summary.scores.correctness.mean, null);
  assert.equal(summary.scores.correctness.median, null);
  assert.equal(summary.scores.correctness.passRate, null);
  assert.equal(summary.scores.correctness.scoredCount, 0);
  assert.equal(summary.overallScore, null);
  assert.equal(summary.partialCount, 1);
});

test("an empty run aggregates to zero counts", () => {
  const summary = aggregateResults([], { ...OPTIONS, cancelled: true, skippedCount: 3 });
  assert.equal(summary.itemCount, 0);
  assert.equal(summary.successRate, 0);
  assert.equal(summary.latency.p50Ms, null);
  assert.equal(summary.cancelled, true);
  assert.equal(summary.skippedCount, 3);
});

test("aggregation is pure", () => {
  assert.deepEqual(aggregateResults(MIXED, OPTIONS), aggregateResults(MIXED, OPTIONS));
});

test("median and percentile on small samples", () => {
  assert.equal(median([3, 1, 2]), 2);
  assert.equal(median([4, 1, 3, 2]), 2.5);
  assert.equal(median([]), null);
  assert.equal(percentile([10, 20, 30, 40], 0.95), 40);
  assert.equal(percentile([10, 20, 30, 40], 0.5), 20);
  assert.equal(percentile([300, 100], 0.95), 300);
  assert.equal(percentile([7], 0.5), 7);
  assert.equal(percentile([], 0.5), null);
});

test("retrieval metrics match by chunk id or by passage text", () => {
  const contexts = [
    { chunkId: "warranty#0", documentId: "warranty", text: "The warranty  lasts\ntwo years.", similarityScore: 0.9 },
    { chunkId: "returns#0", documentId: "returns", text: "Returns within 30 days.", similarityScore: 0.4 },
  ];

  assert.deepEqual(calculateRetrievalMetrics(contexts, ["the warranty lasts two years"]), {
    contextRecall: 1,
    contextPrecision: 0.5,
  });
  assert.deepEqual(calculateRetrievalMetrics(contexts, ["returns#0", "shipping#0"]), {
    contextRecall: 0.5,
    contextPrecision: 0.5,
  });
  assert.equal(calculateRetrievalMetrics(contexts, undefined), undefined);
});
