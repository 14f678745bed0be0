import fs from "fs";
import path from "path";
import { z } from "zod";
import { DatasetError } from "../errors/errors";
import { EvalDatasetItem } from "./types";

const datasetRecordSchema = z.object({
  id: z.string().trim().min(1),
  question: z.string().trim().min(1),
  expected_answer: z.string(),
  expected_contexts: z.array(z.string()).optional(),
});

const DATASET_ID_PATTERN = /^[A-Za-z0-9._-]+$/;

/**
 * Parses a JSONL dataset. Blank lines are skipped; the first bad record
 * aborts the load with its 1-based line number.
 */
export function parseDataset(content: string): EvalDatasetItem[] {
  const items: EvalDatasetItem[] = [];
  const seenIds = new Set<string>();
  const lines = content.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const lineNumber = i + 1;
    const line = lines[i].trim();
    if (!line) continue;

    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (error) {
      throw new DatasetError("record is not valid JSON", lineNumber, { cause: error });
    }

    const parsed = datasetRecordSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(record)"} ${issue.message}`)
        .join("; ");
      throw new DatasetError(`invalid record: ${issues}`, lineNumber);
    }

    const record = parsed.data;
    if (seenIds.has(record.id)) {
      throw new DatasetError(`duplicate id "${record.id}"`, lineNumber);
    }
    seenIds.add(record.id);

    items.push({
      id: record.id,
      question: record.question,
      expectedAnswer: record.expected_answer,
      ...(record.expected_contexts ? { expectedContexts: record.expected_contexts } : {}),
    });
  }

  if (items.length === 0) {
    throw new DatasetError("dataset contains no records");
  }

  return items;
}

export interface DatasetSource {
  load(datasetId: string): Promise<EvalDatasetItem[]>;
}

/** `<datasetDir>/<datasetId>.jsonl`; ids that could leave the directory are rejected. */
export function datasetPath(datasetDir: string, datasetId: string): string {
  if (!DATASET_ID_PATTERN.test(datasetId) || datasetId.startsWith(".")) {
    throw new DatasetError(`invalid dataset id "${datasetId}"`);
  }
  return path.join(datasetDir, `${datasetId}.jsonl`);
}

/** Reads `<datasetDir>/<datasetId>.jsonl`. */
export class DatasetRepository implements DatasetSource {
  constructor(private readonly datasetDir: string) {}

  async load(datasetId: string): Promise<EvalDatasetItem[]> {
    const filePath = datasetPath(this.datasetDir, datasetId);
    let content: string;
    try {
      content = await fs.promises.readFile(filePath, "utf8");
    } catch (error) {
      throw new DatasetError(`cannot read dataset file ${filePath}`, undefined, { cause: error });
    }

    return parseDataset(content);
  }
}

/** In-memory datasets, keyed by id. */
export class StaticDatasetSource implements DatasetSource {
  constructor(private readonly datasets: Record<string, EvalDatasetItem[]>) {}

  async load(datasetId: string): Promise<EvalDatasetItem[]> {
    const items = this.datasets[datasetId];
    if (!items) throw new DatasetError(`unknown dataset "${datasetId}"`);
    return items;
  }
}
