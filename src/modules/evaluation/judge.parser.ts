import { z } from "zod";
import { InvalidVerdict, JudgeVerdict, UNSCORED } from "./types";

const score = z.number().finite().min(0).max(1);

export const judgeResponseSchema = z.object({
  correctness: score,
  faithfulness: score,
  context_relevance: score,
  rationale: z.string(),
});

export type JudgeResponse = z.infer<typeof judgeResponseSchema>;

const FENCED_BLOCK = /^```(?:json)?\s*\n([\s\S]*?)\n?```$/i;

export function invalidVerdict(reason: string): InvalidVerdict {
  return {
    valid: false,
    correctnessScore: UNSCORED,
    faithfulnessScore: UNSCORED,
    contextRelevanceScore: UNSCORED,
    rationale: reason,
  };
}

function unwrap(raw: string): string {
  const trimmed = raw.trim();
  const fenced = trimmed.match(FENCED_BLOCK);
  return fenced ? fenced[1].trim() : trimmed;
}

/**
 * Strict parse of the judge output. The whole response (or one fenced block)
 * must be the JSON object; a missing or out-of-range score invalidates the
 * verdict as a whole. No partial credit.
 */
export function parseJudgeResponse(raw: string): JudgeVerdict {
  let json: unknown;
  try {
    json = JSON.parse(unwrap(raw));
  } catch {
    return invalidVerdict(`Judge response is not valid JSON: ${raw.slice(0, 200)}`);
  }

  const parsed = judgeResponseSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    return invalidVerdict(`Judge response failed schema check: ${issues}`);
  }

  return {
    valid: true,
    correctnessScore: parsed.data.correctness,
    faithfulnessScore: parsed.data.faithfulness,
    contextRelevanceScore: parsed.data.context_relevance,
    rationale: parsed.data.rationale,
  };
}
