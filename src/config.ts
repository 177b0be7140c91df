import { join } from "node:path";
import { z, ZodError } from "zod";
import { PipelineError } from "./common/errors.js";
import { err, ok, type Result } from "./common/result.js";
import type { Dataset, LogLevel, RunConfig } from "./types.js";

const logLevels = ["debug", "info", "warn", "error", "silent"] as const;

const schema = z.object({
  dataset: z.enum(["budget", "election"]),
  inputPath: z.string().min(1),
  outputPath: z.string().min(1),
  currency: z.string().max(4),
  console: z.boolean(),
  logLevel: z.enum(logLevels),
});

const DEFAULTS = {
  resourcesDir: "Resources",
  analysisDir: "analysis",
  currency: "$",
  console: true,
  logLevel: "warn",
} as const;

type CliRaw = Record<string, string | boolean>;

export function defaultInputPath(dataset: Dataset): string {
  return join(DEFAULTS.resourcesDir, `${dataset}_data.csv`);
}

export function defaultOutputPath(dataset: Dataset): string {
  return join(DEFAULTS.analysisDir, `${dataset}_data_analysis.txt`);
}

export function buildRunConfig(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): RunConfig {
  const args = parseCliArgs(argv);
  const dataset = z.enum(["budget", "election"]).parse(args.dataset);

  return schema.parse({
    dataset,
    inputPath: readString(args, "input", defaultInputPath(dataset)),
    outputPath: readString(args, "output", defaultOutputPath(dataset)),
    currency: readString(args, "currency", DEFAULTS.currency),
    console: readBool(args, "console", DEFAULTS.console),
    logLevel: resolveLogLevel(args, env),
  });
}

export function parseRunConfig(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): Result<RunConfig, PipelineError> {
  try {
    return ok(buildRunConfig(argv, env));
  } catch (error) {
    if (error instanceof ZodError) {
      const details = error.issues
        .map((issue) => `${issue.path.join(".") || "dataset"}: ${issue.message}`)
        .join("; ");
      return err(new PipelineError("config", `Invalid configuration: ${details}`, { cause: error }));
    }
    throw error;
  }
}

function resolveLogLevel(args: CliRaw, env: NodeJS.ProcessEnv): LogLevel {
  if (readBool(args, "quiet", false)) {
    return "silent";
  }
  if (readBool(args, "verbose", false)) {
    return "debug";
  }
  return z.enum(logLevels).catch(DEFAULTS.logLevel).parse(env.ANALYSIS_LOG_LEVEL?.trim().toLowerCase());
}

function parseCliArgs(argv: string[]): CliRaw {
  const out: CliRaw = {};
  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (!token.startsWith("--")) {
      continue;
    }
    const eqIndex = token.indexOf("=");
    if (eqIndex !== -1) {
      out[token.slice(2, eqIndex)] = token.slice(eqIndex + 1);
      continue;
    }
    const key = token.slice(2);
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) {
      out[key] = true;
      continue;
    }
    out[key] = next;
    i += 1;
  }
  return out;
}

function readString(args: CliRaw, key: string, fallback: string): string {
  const value = args[key];
  if (typeof value === "string") {
    return value;
  }
  return fallback;
}

function readBool(args: CliRaw, key: string, fallback: boolean): boolean {
  const value = args[key];
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value !== "string") {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  return fallback;
}
