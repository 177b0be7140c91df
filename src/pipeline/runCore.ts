import { PipelineError, stringifyError } from "../common/errors.js";
import { err, ok, type Result } from "../common/result.js";
import { loadCsvRows } from "../load/csv.js";
import { silentLogger } from "../logger.js";
import type { LogSink, PipelineDefinition, ReportTransport, RunConfig, RunOutcome } from "../types.js";
import { createTransports, publishReport } from "./transports.js";

export interface RunOptions {
  logger?: LogSink;
  transports?: ReportTransport[];
}

/**
 * Load, analyse, format and publish one dataset. Stages run strictly in
 * order; the first failing stage ends the run with its error.
 */
export async function runPipeline<Row, Summary>(
  definition: PipelineDefinition<Row, Summary>,
  config: RunConfig,
  options: RunOptions = {},
): Promise<Result<RunOutcome, PipelineError>> {
  const logger = options.logger ?? silentLogger;
  try {
    logger.info(`Running ${definition.dataset} analysis: input=${config.inputPath}`);

    const loaded = await loadCsvRows(config.inputPath, { arity: definition.arity, logger });
    if (!loaded.ok) {
      return loaded;
    }
    const rows = loaded.value.map((fields) => definition.toRow(fields));

    const analysed = definition.analyze(rows, logger);
    if (!analysed.ok) {
      return analysed;
    }

    const report = definition.format(analysed.value, { currency: config.currency }).join("\n");
    const transports = options.transports ?? createTransports(config);
    const published = await publishReport(report, transports, logger);
    if (!published.ok) {
      return published;
    }

    logger.info(`Report written to ${config.outputPath}`);
    return ok({
      dataset: definition.dataset,
      rowCount: rows.length,
      report,
      publishedTo: published.value,
    });
  } catch (error) {
    return err(
      new PipelineError("unexpected", `Unexpected failure: ${stringifyError(error)}`, {
        cause: error,
      }),
    );
  }
}
