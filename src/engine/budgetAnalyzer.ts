import {
  BudgetReport,
  ExpenseBreakdown,
  ExpenseShare,
  RunwayBasis,
} from "../models/BudgetReport";
import { Metric, definedMetric, undefinedMetric } from "../models/Metric";
import {
  BudgetThresholds,
  DEFAULT_BUDGET_THRESHOLDS,
  TOP_CATEGORY_COUNT,
} from "../utils/constants";
import { InvalidInputError } from "../utils/errors";
import { isNonNegativeFinite, percentOf, sum } from "../utils/math";
import { evaluateRedFlags } from "./redFlags";

/**
 * Options for budget analysis.
 *
 * @property liquidSavings - Liquid savings balance to measure runway against, instead of one month's surplus
 * @property thresholds - Overrides for the red-flag thresholds
 */
export interface AnalyzeBudgetOptions {
  liquidSavings?: number;
  thresholds?: Partial<BudgetThresholds>;
}

/**
 * Rejects negative or non-finite income and expense amounts, and empty category names.
 * Values are never clamped.
 */
export function validateBudgetInputs(income: number, expenses: ExpenseBreakdown): void {
  if (!isNonNegativeFinite(income)) {
    throw new InvalidInputError(`Income must be a finite, non-negative amount (got ${income})`);
  }
  for (const [category, amount] of Object.entries(expenses)) {
    if (category.trim() === "") {
      throw new InvalidInputError("Expense category names must not be empty");
    }
    if (typeof amount !== "number" || !isNonNegativeFinite(amount)) {
      throw new InvalidInputError(
        `Expense "${category}" must be a finite, non-negative amount (got ${amount})`
      );
    }
  }
}

/**
 * Merges threshold overrides onto the defaults, rejecting non-finite or negative values.
 */
export function resolveThresholds(overrides: Partial<BudgetThresholds> = {}): BudgetThresholds {
  const thresholds: BudgetThresholds = { ...DEFAULT_BUDGET_THRESHOLDS, ...overrides };
  for (const [name, value] of Object.entries(thresholds)) {
    if (!isNonNegativeFinite(value)) {
      throw new InvalidInputError(`Threshold ${name} must be a finite, non-negative number (got ${value})`);
    }
  }
  return thresholds;
}

/**
 * Savings rate as a fraction of income; undefined when there is no income.
 */
export function calculateSavingsRate(income: number, surplus: number): Metric {
  return income > 0 ? definedMetric(surplus / income) : undefinedMetric("no_income");
}

/**
 * Months of average monthly expenses the runway basis could cover.
 * A negative basis gives 0 months; no tracked expenses gives an undefined (unbounded) runway.
 *
 * @param basis - Liquid savings balance, or the monthly surplus when no balance is known
 * @param averageMonthlyExpenses - Average monthly spending
 */
export function calculateEmergencyFundMonths(basis: number, averageMonthlyExpenses: number): Metric {
  if (averageMonthlyExpenses === 0) {
    return undefinedMetric("no_expenses");
  }
  return definedMetric(Math.max(0, basis) / averageMonthlyExpenses);
}

function calculateExpenseShares(
  income: number,
  totalExpenses: number,
  expenses: ExpenseBreakdown
): Record<string, ExpenseShare> {
  // Own properties even for a "__proto__" category
  return Object.fromEntries(
    Object.entries(expenses).map(([category, amount]): [string, ExpenseShare] => [
      category,
      {
        amount,
        pctOfIncome: percentOf(amount, income),
        pctOfExpenses: percentOf(amount, totalExpenses),
      },
    ])
  );
}

/**
 * Largest categories first; ties keep input order, zero amounts are left out.
 */
export function getTopCategories(expenses: ExpenseBreakdown, count: number = TOP_CATEGORY_COUNT): string[] {
  return Object.entries(expenses)
    .filter(([, amount]) => amount > 0)
    .sort((a, b) => b[1] - a[1])
    .slice(0, count)
    .map(([category]) => category);
}

/**
 * Analyzes a monthly budget.
 *
 * Pure: the inputs are not mutated and identical inputs give an identical report.
 *
 * @param income - Monthly income
 * @param expenses - Monthly expenses by category
 * @throws InvalidInputError when any amount is negative or non-finite
 *
 * @example
 * ```ts
 * const report = analyzeBudget(50000, { rent: 20000, food: 8000, transport: 5000, other: 2000 });
 * report.surplus // 15000
 * report.redFlags // ["High concentration in rent."]
 * ```
 */
export function analyzeBudget(
  income: number,
  expenses: ExpenseBreakdown,
  options: AnalyzeBudgetOptions = {}
): BudgetReport {
  validateBudgetInputs(income, expenses);
  const { liquidSavings } = options;
  if (liquidSavings !== undefined && !isNonNegativeFinite(liquidSavings)) {
    throw new InvalidInputError(
      `Liquid savings must be a finite, non-negative amount (got ${liquidSavings})`
    );
  }
  const thresholds = resolveThresholds(options.thresholds);

  const totalExpenses = sum(Object.values(expenses));
  const surplus = income - totalExpenses;
  const savingsRate = calculateSavingsRate(income, surplus);

  const runwayBasis: RunwayBasis = liquidSavings !== undefined ? "liquid_savings" : "surplus";
  const emergencyFundMonths = calculateEmergencyFundMonths(
    liquidSavings !== undefined ? liquidSavings : surplus,
    totalExpenses
  );

  const redFlags = evaluateRedFlags(
    { surplus, totalExpenses, expenses, savingsRate, emergencyFundMonths },
    thresholds
  );

  return {
    income,
    totalExpenses,
    surplus,
    savingsRate,
    emergencyFundMonths,
    runwayBasis,
    redFlags,
    expenseShares: calculateExpenseShares(income, totalExpenses, expenses),
    topCategories: getTopCategories(expenses),
  };
}
