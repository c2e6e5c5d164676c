import { Deadline, GoalPlan, GoalRequest } from "../models/GoalPlan";
import { InvalidDeadlineError, InvalidInputError } from "../utils/errors";
import { isNonNegativeFinite } from "../utils/math";
import {
  addMonthsUtc,
  calendarDayOf,
  calendarMonthsUntil,
  isIsoDateOnly,
  parseDate,
  startOfUtcDay,
  toIsoDate,
} from "../utils/time";

/**
 * Options for goal planning.
 *
 * @property now - Reference time for deadline resolution (defaults to the current time)
 */
export interface PlanGoalOptions {
  now?: Date;
}

export interface ResolvedDeadline {
  monthsRemaining: number;
  date: Date;
}

/**
 * Resolves a deadline to the number of months remaining, rounded up so that
 * urgency is never understated.
 *
 * - `{ months }`: any positive duration; 0.3 months counts as 1.
 * - `YYYY-MM-DD`: must fall strictly after today (UTC day).
 * - `Date` or timestamp: must fall strictly after `now`; an hour away counts as 1 month.
 *
 * @throws InvalidDeadlineError when the deadline has passed, is unreadable, or is not positive
 */
export function resolveDeadline(deadline: Deadline, now: Date): ResolvedDeadline {
  const today = startOfUtcDay(now);

  if (typeof deadline === "object" && !(deadline instanceof Date)) {
    const { months } = deadline;
    if (!Number.isFinite(months) || months <= 0) {
      throw new InvalidDeadlineError(`Deadline duration must be a positive number of months (got ${months})`);
    }
    const monthsRemaining = Math.ceil(months);
    return { monthsRemaining, date: addMonthsUtc(today, monthsRemaining) };
  }

  const date = parseDate(deadline);
  if (date === null) {
    throw new InvalidDeadlineError(`Deadline is not a valid date: ${String(deadline)}`);
  }

  if (typeof deadline === "string" && isIsoDateOnly(deadline)) {
    const monthsRemaining = calendarMonthsUntil(today, date);
    if (monthsRemaining < 1) {
      throw new InvalidDeadlineError(
        `Deadline ${toIsoDate(date)} must be after ${toIsoDate(today)}`
      );
    }
    return { monthsRemaining, date };
  }

  if (date.getTime() <= now.getTime()) {
    throw new InvalidDeadlineError(
      `Deadline ${date.toISOString()} must be after ${now.toISOString()}`
    );
  }
  const day = calendarDayOf(deadline, date);
  return { monthsRemaining: Math.max(1, calendarMonthsUntil(today, day)), date: day };
}

function validateGoalRequest(request: GoalRequest): void {
  const { targetAmount, currentMonthlySurplus, currentSavings } = request;
  if (!Number.isFinite(targetAmount) || targetAmount <= 0) {
    throw new InvalidInputError(`Target amount must be a finite, positive amount (got ${targetAmount})`);
  }
  if (!Number.isFinite(currentMonthlySurplus)) {
    throw new InvalidInputError(
      `Current monthly surplus must be a finite amount (got ${currentMonthlySurplus})`
    );
  }
  if (currentSavings !== undefined && !isNonNegativeFinite(currentSavings)) {
    throw new InvalidInputError(
      `Current savings must be a finite, non-negative amount (got ${currentSavings})`
    );
  }
}

/**
 * Plans a savings goal: the monthly saving required to reach the target by
 * the deadline, and whether the current monthly surplus covers it.
 *
 * Pure apart from reading the clock when `options.now` is not given.
 *
 * @throws InvalidInputError for a non-positive target or non-finite amounts
 * @throws InvalidDeadlineError when the deadline leaves less than one month
 *
 * @example
 * ```ts
 * planGoal({ targetAmount: 25000, deadline: { months: 6 }, currentMonthlySurplus: 3000 });
 * // monthsRemaining 6, requiredMonthlySaving ~4166.67, feasible false, shortfall ~1166.67
 * ```
 */
export function planGoal(request: GoalRequest, options: PlanGoalOptions = {}): GoalPlan {
  validateGoalRequest(request);
  const { monthsRemaining, date } = resolveDeadline(request.deadline, options.now ?? new Date());

  const remainingAmount = Math.max(0, request.targetAmount - (request.currentSavings ?? 0));
  const requiredMonthlySaving = remainingAmount / monthsRemaining;
  const feasible = request.currentMonthlySurplus >= requiredMonthlySaving;
  const shortfall = Math.max(0, requiredMonthlySaving - request.currentMonthlySurplus);

  return {
    monthsRemaining,
    requiredMonthlySaving,
    feasible,
    shortfall,
    remainingAmount,
    deadline: toIsoDate(date),
  };
}
