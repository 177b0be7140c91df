import type { Decimal } from "../common/decimal.js";
import { averageChangeAt } from "./analyze.js";
import type { BudgetSummary, FormatOptions, PeriodChange } from "../types.js";

const TITLE = "Financial Analysis";
const SEPARATOR = "-".repeat(28);
const MISSING = "n/a";

export function formatBudgetReport(summary: BudgetSummary, options: FormatOptions): string[] {
  const money = (value: Decimal, scale: number): string => `${options.currency}${value.toFixed(scale)}`;
  const averageChange = averageChangeAt(summary, 2);
  const average = averageChange ? money(averageChange, 2) : MISSING;

  return [
    TITLE,
    SEPARATOR,
    `Total Months: ${summary.monthCount}`,
    `Total: ${money(summary.total, 0)}`,
    `Average Change: ${average}`,
    `Greatest Increase in Profits: ${formatChange(summary.greatestIncrease, options.currency)}`,
    `Greatest Decrease in Profits: ${formatChange(summary.greatestDecrease, options.currency)}`,
  ];
}

function formatChange(change: PeriodChange | null, currency: string): string {
  if (!change) {
    return MISSING;
  }
  return `${change.label} (${currency}${change.delta.toString()})`;
}
