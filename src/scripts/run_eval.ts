import dotenv from "dotenv";
import { loadConfig } from "../modules/config/app.config";
import { createContainer } from "../server/container";

/**
 * Usage: run_eval <datasetId> [configJson]
 * Runs an evaluation to completion and prints its summary as JSON.
 * Ctrl+C cancels: running items finish, the rest are skipped.
 */
async function main() {
  dotenv.config();
  const [datasetId, configJson] = process.argv.slice(2);
  if (!datasetId) {
    console.error("Usage: run_eval <datasetId> [configJson]");
    process.exitCode = 1;
    return;
  }

  const overrides: unknown = configJson ? JSON.parse(configJson) : undefined;
  const { evals } = createContainer(loadConfig());
  const runId = await evals.runEval(datasetId, overrides);

  const onSigint = () => {
    evals.cancelRun(runId).catch((error: unknown) => console.error("Cancel failed:", error));
  };
  process.once("SIGINT", onSigint);

  const run = await evals.waitForRun(runId);
  process.removeListener("SIGINT", onSigint);

  if (run.status === "FAILED") {
    console.error(`Run ${runId} failed: ${run.error?.message ?? "unknown error"}`);
    process.exitCode = 1;
    return;
  }
  console.log(JSON.stringify(await evals.getRunSummary(runId), null, 2));
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error("Evaluation failed:", error);
    process.exitCode = 1;
  });
}
