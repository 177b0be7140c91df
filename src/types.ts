import type { Decimal } from "./common/decimal.js";
import type { PipelineError } from "./common/errors.js";
import type { Result } from "./common/result.js";

export type Dataset = "budget" | "election";
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface LogSink {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

export interface RunConfig {
  dataset: Dataset;
  inputPath: string;
  outputPath: string;
  currency: string;
  console: boolean;
  logLevel: LogLevel;
}

export type BudgetRow = readonly [period: string, amount: string];
export type ElectionRow = readonly [ballotId: string, region: string, candidate: string];

export interface PeriodChange {
  label: string;
  delta: Decimal;
}

export interface BudgetSummary {
  kind: "budget";
  monthCount: number;
  total: Decimal;
  totalChange: Decimal;
  changeCount: number;
  /** `null` when fewer than two months are present. */
  averageChange: Decimal | null;
  greatestIncrease: PeriodChange | null;
  greatestDecrease: PeriodChange | null;
}

export interface CandidateTally {
  name: string;
  votes: number;
  percentage: number;
}

export interface ElectionSummary {
  kind: "election";
  totalVotes: number;
  candidates: CandidateTally[];
  winner: string | null;
}

export interface FormatOptions {
  currency: string;
}

export interface PipelineDefinition<Row, Summary> {
  dataset: Dataset;
  arity: number;
  toRow(fields: readonly string[]): Row;
  analyze(rows: readonly Row[], logger: LogSink): Result<Summary, PipelineError>;
  format(summary: Summary, options: FormatOptions): string[];
}

export interface ReportTransport {
  readonly name: string;
  sendReport(text: string): Promise<void>;
}

export interface RunOutcome {
  dataset: Dataset;
  rowCount: number;
  report: string;
  publishedTo: string[];
}
