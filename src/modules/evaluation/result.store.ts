import fs from "fs";
import path from "path";
import { EvalItemResult, EvalRunRecord, EvalRunSummary } from "./types";

/**
 * Persistence for runs. Item results are keyed by (runId, itemId), summaries
 * by runId. listItemResults always returns dataset order.
 */
export interface ResultStore {
  saveRun(run: EvalRunRecord): Promise<void>;
  getRun(runId: string): Promise<EvalRunRecord | undefined>;
  saveItemResult(result: EvalItemResult): Promise<void>;
  listItemResults(runId: string): Promise<EvalItemResult[]>;
  saveSummary(summary: EvalRunSummary): Promise<void>;
  getSummary(runId: string): Promise<EvalRunSummary | undefined>;
}

const byPosition = (a: EvalItemResult, b: EvalItemResult) => a.position - b.position;

export class MemoryResultStore implements ResultStore {
  private readonly runs = new Map<string, EvalRunRecord>();
  private readonly items = new Map<string, Map<string, EvalItemResult>>();
  private readonly summaries = new Map<string, EvalRunSummary>();

  async saveRun(run: EvalRunRecord): Promise<void> {
    this.runs.set(run.runId, run);
  }

  async getRun(runId: string): Promise<EvalRunRecord | undefined> {
    return this.runs.get(runId);
  }

  async saveItemResult(result: EvalItemResult): Promise<void> {
    let runItems = this.items.get(result.runId);
    if (!runItems) {
      runItems = new Map();
      this.items.set(result.runId, runItems);
    }
    runItems.set(result.itemId, result);
  }

  async listItemResults(runId: string): Promise<EvalItemResult[]> {
    return [...(this.items.get(runId)?.values() ?? [])].sort(byPosition);
  }

  async saveSummary(summary: EvalRunSummary): Promise<void> {
    this.summaries.set(summary.runId, summary);
  }

  async getSummary(runId: string): Promise<EvalRunSummary | undefined> {
    return this.summaries.get(runId);
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * JSON files on disk:
 *   <root>/<runId>/run.json
 *   <root>/<runId>/summary.json
 *   <root>/<runId>/items/<itemId>.json
 */
export class FileResultStore implements ResultStore {
  constructor(private readonly rootDir: string) {}

  private runDir(runId: string): string {
    return path.join(this.rootDir, encodeURIComponent(runId));
  }

  private async writeJson(filePath: string, value: unknown): Promise<void> {
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    // Write-then-rename.
    const tmpPath = `${filePath}.tmp`;
    await fs.promises.writeFile(tmpPath, JSON.stringify(value, null, 2), "utf8");
    await fs.promises.rename(tmpPath, filePath);
  }

  private async readJson<T>(filePath: string): Promise<T | undefined> {
    try {
      const content = await fs.promises.readFile(filePath, "utf8");
      return JSON.parse(content) as T;
    } catch (error) {
      if (isMissingFile(error)) return undefined;
      throw error;
    }
  }

  async saveRun(run: EvalRunRecord): Promise<void> {
    await this.writeJson(path.join(this.runDir(run.runId), "run.json"), run);
  }

  getRun(runId: string): Promise<EvalRunRecord | undefined> {
    return this.readJson<EvalRunRecord>(path.join(this.runDir(runId), "run.json"));
  }

  async saveItemResult(result: EvalItemResult): Promise<void> {
    const fileName = `${encodeURIComponent(result.itemId)}.json`;
    await this.writeJson(path.join(this.runDir(result.runId), "items", fileName), result);
  }

  async listItemResults(runId: string): Promise<EvalItemResult[]> {
    const itemsDir = path.join(this.runDir(runId), "items");
    let files: string[];
    try {
      files = await fs.promises.readdir(itemsDir);
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    const results: EvalItemResult[] = [];
    for (const file of files.filter((f) => f.endsWith(".json"))) {
      const result = await this.readJson<EvalItemResult>(path.join(itemsDir, file));
      if (result) results.push(result);
    }
    return results.sort(byPosition);
  }

  async saveSummary(summary: EvalRunSummary): Promise<void> {
    await this.writeJson(path.join(this.runDir(summary.runId), "summary.json"), summary);
  }

  getSummary(runId: string): Promise<EvalRunSummary | undefined> {
    return this.readJson<EvalRunSummary>(path.join(this.runDir(runId), "summary.json"));
  }
}
