import { RetrievedContext } from "../rag/types";
import { ItemRetrievalMetrics } from "./types";

function normalize(text: string): string {
  return text.replace(/\s+/g, " ").trim().toLowerCase();
}

function matches(expected: string, context: RetrievedContext): boolean {
  if (expected === context.chunkId) return true;
  const needle = normalize(expected);
  return needle.length > 0 && normalize(context.text).includes(needle);
}

/**
 * Compares retrieved contexts with the dataset's expected contexts. An
 * expected entry is either a chunk id or a text passage the chunk must contain.
 * Returns undefined when the item declares no expected contexts.
 */
export function calculateRetrievalMetrics(
  contexts: RetrievedContext[],
  expectedContexts: string[] | undefined
): ItemRetrievalMetrics | undefined {
  if (!expectedContexts || expectedContexts.length === 0) return undefined;

  const found = expectedContexts.filter((expected) =>
    contexts.some((context) => matches(expected, context))
  ).length;
  const relevantRetrieved = contexts.filter((context) =>
    expectedContexts.some((expected) => matches(expected, context))
  ).length;

  return {
    contextRecall: found / expectedContexts.length,
    contextPrecision: contexts.length > 0 ? relevantRetrieved / contexts.length : 0,
  };
}
