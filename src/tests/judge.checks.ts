import assert from "assert/strict";
import { test } from "node:test";
import { JudgeError } from "../modules/errors/errors";
import { parseJudgeResponse } from "../modules/evaluation/judge.parser";
import { buildJudgePrompt, Judge } from "../modules/evaluation/judge.service";
import { UNSCORED } from "../modules/evaluation/types";
import { judgeJson, NO_RETRY_POLICY, noSleep, ScriptedBackend } from "./fakes";

test("a well-formed response yields a valid verdict", () => {
  const verdict = parseJudgeResponse(judgeJson(0.9, 0.8, 0.7));
  assert.deepEqual(verdict, {
    valid: true,
    correctnessScore: 0.9,
    faithfulnessScore: 0.8,
    contextRelevanceScore: 0.7,
    rationale: "test rationale",
  });
});

test("a fenced JSON block is accepted", () => {
  const verdict = parseJudgeResponse("```json\n" + judgeJson(1, 1, 0.5) + "\n```");
  assert.equal(verdict.valid, true);
  assert.equal(verdict.contextRelevanceScore, 0.5);
});

test("a missing score invalidates the whole verdict", () => {
  const verdict = parseJudgeResponse(JSON.stringify({ correctness: 0.9, faithfulness: 0.8, rationale: "x" }));
  assert.equal(verdict.valid, false);
  assert.equal(verdict.correctnessScore, UNSCORED);
  assert.equal(verdict.faithfulnessScore, UNSCORED);
  assert.equal(verdict.contextRelevanceScore, UNSCORED);
  assert.equal(verdict.rationale, "Judge response failed schema check: context_relevance: Required");
});

test("an out-of-range score is rejected", () => {
  const verdict = parseJudgeResponse(judgeJson(1.2, 0.5, 0.5));
  assert.equal(verdict.valid, false);
  assert.ok(verdict.rationale.startsWith("Judge response failed schema check: correctness:"));
});

test("prose instead of JSON is rejected", () => {
  const verdict = parseJudgeResponse("The answer looks correct to me.");
  assert.equal(verdict.valid, false);
  assert.equal(verdict.rationale, "Judge response is not valid JSON: The answer looks correct to me.");
});

test("the judge prompt carries question, ground truth, contexts and answer", () => {
  const prompt = buildJudgePrompt(
    "How long is the warranty?",
    "Two years.",
    [{ chunkId: "w#0", documentId: "w", text: "The warranty lasts two years.", similarityScore: 0.9 }],
    "24 months"
  );
  assert.ok(prompt.includes("Question:\nHow long is the warranty?\n"));
  assert.ok(prompt.includes("Expected answer (ground truth):\n24 months\n"));
  assert.ok(prompt.includes("Retrieved context:\n[1] The warranty lasts two years.\n"));
  assert.ok(prompt.includes("Generated answer:\nTwo years.\n"));
});

test("the judge runs at temperature 0 with the requested model", async () => {
  const backend = new ScriptedBackend([judgeJson(1, 1, 1)]);
  const judge = new Judge({ backend, model: "mistral", policy: NO_RETRY_POLICY, sleep: noSleep });

  const outcome = await judge.judge("q", "a", [], "a", { model: "judge-large" });

  assert.equal(outcome.verdict.valid, true);
  assert.deepEqual(outcome.usage, { promptTokens: 10, completionTokens: 5 });
  assert.equal(backend.requests[0].temperature, 0);
  assert.equal(backend.requests[0].model, "judge-large");
});

test("an unparseable judge answer is an invalid verdict, not an error", async () => {
  const backend = new ScriptedBackend(["I would rate this highly."]);
  const judge = new Judge({ backend, model: "mistral", policy: NO_RETRY_POLICY, sleep: noSleep });

  const outcome = await judge.judge("q", "a", [], "a");
  assert.equal(outcome.verdict.valid, false);
  assert.equal(outcome.rawResponse, "I would rate this highly.");
});

test("a judge backend that keeps failing raises JudgeError", async () => {
  const backend = new ScriptedBackend([], new Error("judge down"));
  const judge = new Judge({ backend, model: "mistral", policy: NO_RETRY_POLICY, sleep: noSleep });

  await assert.rejects(judge.judge("q", "a", [], "a"), (error: unknown) => {
    assert.ok(error instanceof JudgeError);
    assert.equal(error.message, "Judge model mistral failed: Gave up after 1 attempt(s): judge down");
    return true;
  });
});
