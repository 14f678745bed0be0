import path from "path";
import dotenv from "dotenv";
import { loadConfig } from "../modules/config/app.config";
import { writeDataset } from "../modules/evaluation/dataset.generator";
import { datasetPath } from "../modules/evaluation/dataset.loader";
import { loadDocumentDirectory } from "../modules/ingest/document.loader";
import { createContainer } from "../server/container";

const DEFAULT_CORPUS_DIR = path.join(__dirname, "../../data/corpus");
const DEFAULT_COUNT = 10;

/**
 * Usage: generate_dataset <datasetId> [count] [corpusDir]
 * Writes `<datasetId>.jsonl` into the configured dataset directory.
 */
async function main() {
  dotenv.config();
  const [datasetId, countArg, corpusArg] = process.argv.slice(2);
  if (!datasetId) {
    console.error("Usage: generate_dataset <datasetId> [count] [corpusDir]");
    process.exitCode = 1;
    return;
  }

  const config = loadConfig();
  const outputPath = datasetPath(config.eval.datasetDir, datasetId);
  const count = countArg ? Number(countArg) : DEFAULT_COUNT;
  const documents = await loadDocumentDirectory(path.resolve(corpusArg ?? DEFAULT_CORPUS_DIR));

  const { datasetGenerator } = createContainer(config);
  const report = await datasetGenerator.generate(documents, count);
  if (report.records.length === 0) {
    console.error(`No usable question/answer pairs out of ${report.sampled} sampled chunk(s)`);
    process.exitCode = 1;
    return;
  }

  await writeDataset(outputPath, report.records);
  console.log(
    `Wrote ${report.records.length} record(s) to ${outputPath} (${report.skipped} skipped, ` +
      `${report.usage.promptTokens + report.usage.completionTokens} tokens)`
  );
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error("Dataset generation failed:", error);
    process.exitCode = 1;
  });
}
