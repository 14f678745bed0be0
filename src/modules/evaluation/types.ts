import { ErrorRecord } from "../errors/errors";
import { TokenUsage } from "../llm/llm.types";
import { AnswerResult } from "../rag/types";

export interface EvalDatasetItem {
  id: string;
  question: string;
  expectedAnswer: string;
  expectedContexts?: string[];
}

/** Reserved marker for a score the judge did not produce. Never a number. */
export const UNSCORED = null;
export type Unscored = typeof UNSCORED;

export interface ValidVerdict {
  valid: true;
  correctnessScore: number;
  faithfulnessScore: number;
  contextRelevanceScore: number;
  rationale: string;
}

export interface InvalidVerdict {
  valid: false;
  correctnessScore: Unscored;
  faithfulnessScore: Unscored;
  contextRelevanceScore: Unscored;
  /** Why the judge output was rejected. */
  rationale: string;
}

export type JudgeVerdict = ValidVerdict | InvalidVerdict;

export type ScoreAxis = "correctness" | "faithfulness" | "contextRelevance";

export type ItemState = "PENDING" | "RETRIEVING" | "GENERATING" | "JUDGING" | ItemStatus;
export type ItemStatus = "SUCCESS" | "PARTIAL" | "FAILED";

export interface ItemRetrievalMetrics {
  contextRecall: number;
  contextPrecision: number;
}

export interface EvalItemResult {
  runId: string;
  itemId: string;
  /** Index of the item in the dataset; results are always listed in this order. */
  position: number;
  item: EvalDatasetItem;
  status: ItemStatus;
  answer?: AnswerResult;
  verdict?: JudgeVerdict;
  judgeTokenUsage?: TokenUsage;
  retrieval?: ItemRetrievalMetrics;
  error?: ErrorRecord;
}

export interface EvalConfig {
  k: number;
  concurrency: number;
  passThreshold: number;
  judgeModel: string;
  generationModel: string;
  maxRetries: number;
  timeoutMs: number;
}

export interface AxisStatistics {
  scoredCount: number;
  mean: number | null;
  median: number | null;
  passRate: number | null;
}

export interface EvalRunSummary {
  runId: string;
  datasetId: string;
  itemCount: number;
  successCount: number;
  partialCount: number;
  failedCount: number;
  invalidVerdictCount: number;
  successRate: number;
  partialFailureRate: number;
  failureRate: number;
  passThreshold: number;
  scores: Record<ScoreAxis, AxisStatistics>;
  overallScore: number | null;
  retrieval: {
    evaluatedCount: number;
    contextRecall: number | null;
    contextPrecision: number | null;
  };
  latency: { p50Ms: number | null; p95Ms: number | null; meanMs: number | null };
  tokens: {
    prompt: number;
    completion: number;
    judgePrompt: number;
    judgeCompletion: number;
    total: number;
    estimatedCost: number;
  };
  cancelled: boolean;
  skippedCount: number;
}

export type RunStatus = "RUNNING" | "COMPLETED" | "CANCELLED" | "FAILED";

export interface EvalRunRecord {
  runId: string;
  datasetId: string;
  status: RunStatus;
  config: EvalConfig;
  startedAt: string;
  finishedAt?: string;
  error?: ErrorRecord;
}
