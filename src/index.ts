export { runCli, runMain, withFixedDataset, EXIT_FAILURE, EXIT_SUCCESS } from "./app.js";
export { buildRunConfig, parseRunConfig, defaultInputPath, defaultOutputPath } from "./config.js";
export { runPipeline, type RunOptions } from "./pipeline/runCore.js";
export { createTransports, publishReport } from "./pipeline/transports.js";
export { loadCsvRows } from "./load/csv.js";
export { analyzeBudget } from "./budget/analyze.js";
export { formatBudgetReport } from "./budget/format.js";
export { budgetPipeline } from "./budget/pipeline.js";
export { analyzeElection } from "./election/analyze.js";
export { formatElectionReport } from "./election/format.js";
export { electionPipeline } from "./election/pipeline.js";
export { Decimal, parseDecimal } from "./common/decimal.js";
export { PipelineError, type PipelineErrorKind } from "./common/errors.js";
export { ok, err, type Result } from "./common/result.js";
export { Logger, silentLogger } from "./logger.js";
export * from "./types.js";
