import type { BudgetRow, BudgetSummary, PipelineDefinition } from "../types.js";
import { analyzeBudget } from "./analyze.js";
import { formatBudgetReport } from "./format.js";

export const budgetPipeline: PipelineDefinition<BudgetRow, BudgetSummary> = {
  dataset: "budget",
  arity: 2,
  toRow: (fields) => [fields[0], fields[1]],
  analyze: analyzeBudget,
  format: formatBudgetReport,
};
