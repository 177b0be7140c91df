import { budgetPipeline } from "./budget/pipeline.js";
import { parseRunConfig } from "./config.js";
import { electionPipeline } from "./election/pipeline.js";
import { Logger, type LogStream } from "./logger.js";
import { createTransports } from "./pipeline/transports.js";
import { runPipeline } from "./pipeline/runCore.js";
import type { Dataset, RunConfig, RunOutcome } from "./types.js";
import { stringifyError, type PipelineError } from "./common/errors.js";
import type { Result } from "./common/result.js";

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = -1;

export interface CliIo {
  env?: NodeJS.ProcessEnv;
  stdout?: LogStream;
  stderr?: LogStream;
}

/** Runs one analysis from command-line arguments and returns the process exit code. */
export async function runCli(argv: string[], io: CliIo = {}): Promise<number> {
  const stderr = io.stderr ?? process.stderr;
  const parsed = parseRunConfig(argv, io.env ?? process.env);
  if (!parsed.ok) {
    new Logger({ level: "error", stream: stderr }).error(parsed.error.message);
    return EXIT_FAILURE;
  }

  const config = parsed.value;
  const logger = new Logger({ level: config.logLevel, stream: stderr });
  logger.info("Info level logging enabled");
  logger.debug("Debug level logging enabled");

  const result = await runDataset(config, logger, io.stdout);
  if (!result.ok) {
    logger.error(`${config.dataset} analysis failed [${result.error.kind}]`, result.error);
    return EXIT_FAILURE;
  }
  return EXIT_SUCCESS;
}

/** Appends the dataset after the user's arguments; the last `--dataset` wins. */
export function withFixedDataset(argv: string[], dataset: Dataset): string[] {
  return [...argv, "--dataset", dataset];
}

/** Process entry: runs the CLI and sets the exit code. */
export function runMain(argv: string[], dataset?: Dataset): Promise<void> {
  const args = dataset ? withFixedDataset(argv, dataset) : argv;
  return runCli(args).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`Fatal error: ${stringifyError(error)}\n`);
      process.exitCode = EXIT_FAILURE;
    },
  );
}

function runDataset(
  config: RunConfig,
  logger: Logger,
  stdout: LogStream | undefined,
): Promise<Result<RunOutcome, PipelineError>> {
  const transports = createTransports(config, { stdout });
  if (config.dataset === "budget") {
    return runPipeline(budgetPipeline, config, { logger, transports });
  }
  return runPipeline(electionPipeline, config, { logger, transports });
}
