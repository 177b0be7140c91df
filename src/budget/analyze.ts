import { Decimal, parseDecimal } from "../common/decimal.js";
import { PipelineError } from "../common/errors.js";
import { err, ok, type Result } from "../common/result.js";
import type { BudgetRow, BudgetSummary, LogSink, PeriodChange } from "../types.js";
import { silentLogger } from "../logger.js";

export const AVERAGE_CHANGE_SCALE = 12;

/** Average change rounded once from the exact change total. */
export function averageChangeAt(summary: BudgetSummary, scale: number): Decimal | null {
  return averageOf(summary.totalChange, summary.changeCount, scale);
}

function averageOf(totalChange: Decimal, changeCount: number, scale: number): Decimal | null {
  return changeCount > 0 ? totalChange.dividedBy(BigInt(changeCount), scale) : null;
}

export function analyzeBudget(
  rows: readonly BudgetRow[],
  logger: LogSink = silentLogger,
): Result<BudgetSummary, PipelineError> {
  let total = Decimal.ZERO;
  let totalChange = Decimal.ZERO;
  let previous: Decimal | undefined;
  let greatestIncrease: PeriodChange | null = null;
  let greatestDecrease: PeriodChange | null = null;

  for (const [period, rawAmount] of rows) {
    const amount = parseDecimal(rawAmount);
    if (!amount) {
      return err(new PipelineError("parse", `Invalid amount "${rawAmount}" for period "${period}"`));
    }
    total = total.plus(amount);

    if (previous) {
      const delta = amount.minus(previous);
      totalChange = totalChange.plus(delta);
      if (!greatestIncrease || delta.compare(greatestIncrease.delta) > 0) {
        greatestIncrease = { label: period, delta };
      }
      if (!greatestDecrease || delta.compare(greatestDecrease.delta) < 0) {
        greatestDecrease = { label: period, delta };
      }
    }
    previous = amount;
  }

  const monthCount = rows.length;
  const changeCount = Math.max(monthCount - 1, 0);
  const averageChange = averageOf(totalChange, changeCount, AVERAGE_CHANGE_SCALE);
  if (averageChange === null) {
    logger.warn(`Average change undefined for ${monthCount} month(s)`);
  }
  logger.debug(`Budget analysed: months=${monthCount} total=${total.toString()}`);

  return ok({
    kind: "budget",
    monthCount,
    total,
    totalChange,
    changeCount,
    averageChange,
    greatestIncrease,
    greatestDecrease,
  });
}
