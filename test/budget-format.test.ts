import test from "node:test";
import assert from "node:assert/strict";
import { analyzeBudget } from "../src/budget/analyze.js";
import { formatBudgetReport } from "../src/budget/format.js";
import type { BudgetRow, BudgetSummary } from "../src/types.js";

function summarise(rows: BudgetRow[]): BudgetSummary {
  const result = analyzeBudget(rows);
  assert.ok(result.ok);
  return result.value;
}

const threeMonths = summarise([
  ["Jan", "1000"],
  ["Feb", "1500"],
  ["Mar", "1200"],
]);

test("formatBudgetReport renders the financial analysis", () => {
  assert.deepEqual(formatBudgetReport(threeMonths, { currency: "$" }), [
    "Financial Analysis",
    "----------------------------",
    "Total Months: 3",
    "Total: $3700",
    "Average Change: $100.00",
    "Greatest Increase in Profits: Feb ($500)",
    "Greatest Decrease in Profits: Mar ($-300)",
  ]);
});

test("formatBudgetReport marks undefined values for a single month", () => {
  const lines = formatBudgetReport(summarise([["Jan", "1001.50"]]), { currency: "$" });
  assert.equal(lines[3], "Total: $1002");
  assert.equal(lines[4], "Average Change: n/a");
  assert.equal(lines[5], "Greatest Increase in Profits: n/a");
  assert.equal(lines[6], "Greatest Decrease in Profits: n/a");
});

test("formatBudgetReport rounds the average to cents", () => {
  const summary = summarise([
    ["Q1", "0"],
    ["Q2", "1"],
    ["Q3", "0"],
    ["Q4", "1"],
  ]);
  assert.equal(formatBudgetReport(summary, { currency: "$" })[4], "Average Change: $0.33");
});

test("formatBudgetReport rounds the average from the exact change total", () => {
  const summary = summarise([
    ["A", "0"],
    ["B", "0.0100000000000001"],
    ["C", "0.0100000000000001"],
  ]);
  assert.equal(formatBudgetReport(summary, { currency: "$" })[4], "Average Change: $0.01");
});

test("formatBudgetReport uses the configured currency symbol", () => {
  const lines = formatBudgetReport(threeMonths, { currency: "€" });
  assert.equal(lines[3], "Total: €3700");
  assert.equal(lines[6], "Greatest Decrease in Profits: Mar (€-300)");
});

test("formatBudgetReport is deterministic", () => {
  const first = formatBudgetReport(threeMonths, { currency: "$" }).join("\n");
  const second = formatBudgetReport(threeMonths, { currency: "$" }).join("\n");
  assert.equal(first, second);
});
