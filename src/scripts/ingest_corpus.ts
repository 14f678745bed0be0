import path from "path";
import dotenv from "dotenv";
import { loadConfig } from "../modules/config/app.config";
import { loadDocumentDirectory } from "../modules/ingest/document.loader";
import { createContainer } from "../server/container";

const DEFAULT_CORPUS_DIR = path.join(__dirname, "../../data/corpus");

async function main() {
  dotenv.config();
  const corpusDir = path.resolve(process.argv[2] ?? DEFAULT_CORPUS_DIR);
  const { ingest, index } = createContainer(loadConfig());

  const documents = await loadDocumentDirectory(corpusDir);
  const reports = await ingest.ingest(documents);

  const chunkCount = reports.reduce((sum, report) => sum + report.chunkCount, 0);
  console.log(
    `Ingestion complete: ${reports.length} document(s), ${chunkCount} chunk(s). Index size: ${await index.count()}`
  );
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error("Ingestion failed:", error);
    process.exitCode = 1;
  });
}
