import fs from "fs";
import path from "path";
import { CallPolicyConfig } from "../config/app.config";
import { ConfigurationError, errorMessage } from "../errors/errors";
import { ChunkDraft, chunkDocument, ChunkingConfig } from "../ingest/chunker";
import { Document } from "../ingest/types";
import { callWithPolicy, Sleep } from "../llm/call.policy";
import { LlmBackend, TokenUsage } from "../llm/llm.types";
import { RateLimiter } from "../llm/rate.limiter";

export const MAX_ANSWER_CHARS = 300;

const QUESTION_MARKER = "Factoid question:";
const ANSWER_MARKER = "Answer:";

export function buildQaGenerationPrompt(context: string): string {
  return `Write one factoid question and its answer based on the context below.
The question must be answerable with a short, specific fact taken from the context.
Phrase it the way a user would type it into a search engine; never refer to "the context" or "the passage".

Reply in exactly this format:

Output:::
${QUESTION_MARKER} (your factoid question)
${ANSWER_MARKER} (your answer to the factoid question)

Context: ${context}

Output:::`;
}

export type QaParseResult =
  | { ok: true; question: string; answer: string }
  | { ok: false; reason: string };

/**
 * Reads the last "Factoid question:" / "Answer:" pair out of a model reply.
 * Answers of MAX_ANSWER_CHARS or more are rejected.
 */
export function parseQaOutput(raw: string): QaParseResult {
  const questionAt = raw.lastIndexOf(QUESTION_MARKER);
  if (questionAt < 0) return { ok: false, reason: `missing "${QUESTION_MARKER}"` };

  const answerAt = raw.indexOf(ANSWER_MARKER, questionAt + QUESTION_MARKER.length);
  if (answerAt < 0) return { ok: false, reason: `missing "${ANSWER_MARKER}"` };

  const question = raw.slice(questionAt + QUESTION_MARKER.length, answerAt).trim();
  const answer = raw.slice(answerAt + ANSWER_MARKER.length).trim();

  if (!question) return { ok: false, reason: "empty question" };
  if (!answer) return { ok: false, reason: "empty answer" };
  if (answer.length >= MAX_ANSWER_CHARS) {
    return { ok: false, reason: `answer is ${answer.length} characters long` };
  }
  return { ok: true, question, answer };
}

/** Picks `count` distinct items without replacement (partial Fisher-Yates). */
export function sampleWithoutReplacement<T>(
  items: readonly T[],
  count: number,
  random: () => number = Math.random
): T[] {
  const pool = [...items];
  const take = Math.min(count, pool.length);
  for (let i = 0; i < take; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, take);
}

/** One JSONL line, in the field names the dataset loader reads. */
export interface GeneratedRecord {
  id: string;
  question: string;
  expected_answer: string;
  expected_contexts: string[];
  source_document: string;
}

export interface GenerationReport {
  records: GeneratedRecord[];
  sampled: number;
  skipped: number;
  usage: TokenUsage;
}

export interface DatasetGeneratorOptions {
  backend: LlmBackend;
  model: string;
  policy: CallPolicyConfig;
  chunking: ChunkingConfig;
  rateLimiter?: RateLimiter;
  sleep?: Sleep;
  random?: () => number;
}

/**
 * Builds a synthetic evaluation dataset: samples chunks from the corpus and
 * asks a model for a question/answer pair grounded in each one. The source
 * chunk becomes the record's expected context. Replies that cannot be read
 * and calls that keep failing are skipped.
 */
export class DatasetGenerator {
  constructor(private readonly options: DatasetGeneratorOptions) {}

  async generate(documents: Document[], count: number): Promise<GenerationReport> {
    if (!Number.isInteger(count) || count < 1) {
      throw new ConfigurationError(`Question count must be an integer >= 1, got ${count}`);
    }

    const chunks: ChunkDraft[] = documents.flatMap((document) =>
      chunkDocument(document, this.options.chunking)
    );
    const sampled = sampleWithoutReplacement(chunks, count, this.options.random);
    if (sampled.length < count) {
      console.warn(`Corpus has only ${chunks.length} chunk(s); generating ${sampled.length} question(s)`);
    }

    const records: GeneratedRecord[] = [];
    const usage: TokenUsage = { promptTokens: 0, completionTokens: 0 };

    for (const [i, chunk] of sampled.entries()) {
      const label = `[${i + 1}/${sampled.length}] ${chunk.id}`;
      let text: string;
      try {
        const response = await this.complete(buildQaGenerationPrompt(chunk.text));
        usage.promptTokens += response.usage.promptTokens;
        usage.completionTokens += response.usage.completionTokens;
        text = response.text;
      } catch (error) {
        console.warn(`${label}: skipped, generation failed: ${errorMessage(error)}`);
        continue;
      }

      const parsed = parseQaOutput(text);
      if (!parsed.ok) {
        console.warn(`${label}: skipped, ${parsed.reason}`);
        continue;
      }

      records.push({
        id: chunk.id,
        question: parsed.question,
        expected_answer: parsed.answer,
        expected_contexts: [chunk.text],
        source_document: chunk.documentId,
      });
      console.log(`${label}: ${parsed.question}`);
    }

    return { records, sampled: sampled.length, skipped: sampled.length - records.length, usage };
  }

  private complete(prompt: string) {
    const { backend, model, policy, rateLimiter, sleep } = this.options;
    return callWithPolicy(() => backend.complete({ prompt, model, maxTokens: 1000 }), policy, {
      provider: `${backend.name}:${model}`,
      beforeAttempt: rateLimiter ? () => rateLimiter.acquire() : undefined,
      sleep,
    });
  }
}

export function toJsonl(records: GeneratedRecord[]): string {
  return records.map((record) => JSON.stringify(record)).join("\n") + "\n";
}

export async function writeDataset(filePath: string, records: GeneratedRecord[]): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, toJsonl(records), "utf8");
}
