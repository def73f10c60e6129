import "dotenv/config";
import { loadAppConfig } from "../config/config";
import { EngineSchemaError, EngineStageError } from "../engine/errors";
import { runCompositeEngine } from "../engine/pipeline";
import { getRunId, logger, setLogLevel } from "../infra/logger";
import { readDailyTable } from "../io/table";
import { writeEngineOutputs } from "../io/writers";
import { writeStageSummaries } from "../summary/stageSummary";
import { parseCliArgs } from "./cliArgs";

async function main() {
  const args = parseCliArgs(process.argv.slice(2));
  const config = loadAppConfig(args.configPath);
  setLogLevel(config.logging.level);

  const inputPath = args.inputPath ?? config.paths.merged;
  logger.info("composite alerts start", { runId: getRunId(), config: config.configPath, input: inputPath });

  const table = readDailyTable(inputPath);
  const result = runCompositeEngine(table, config.engine);

  writeEngineOutputs(result, config.outputs);
  // Summaries count the report range only; the CSVs keep the full data range.
  const { stageSummary } = writeStageSummaries(config, result, inputPath);

  logger.info("composite alerts written", {
    outputs: config.outputs,
    reportTotals: stageSummary.payload.totals,
  });
}

main().catch((err) => {
  if (err instanceof EngineStageError) {
    logger.error("composite alerts failed", { stage: err.stage, error: err.message, cause: err.cause });
  } else if (err instanceof EngineSchemaError) {
    logger.error("input table rejected", { error: err.message });
  } else {
    logger.error("composite alerts failed", { error: err instanceof Error ? err.message : String(err) });
  }
  process.exitCode = 1;
});
