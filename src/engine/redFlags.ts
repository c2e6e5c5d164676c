import { BudgetThresholds } from "../utils/constants";
import { ExpenseBreakdown } from "../models/BudgetReport";
import { Metric } from "../models/Metric";

/**
 * Figures of an analyzed budget that red-flag rules are evaluated against.
 */
export interface RedFlagInput {
  surplus: number;
  totalExpenses: number;
  expenses: ExpenseBreakdown;
  savingsRate: Metric;
  emergencyFundMonths: Metric;
}

/**
 * A red-flag rule. Rules are independent: each sees the same input and
 * none can suppress another.
 */
export interface RedFlagRule {
  id: string;
  evaluate(input: RedFlagInput, thresholds: BudgetThresholds): string[];
}

const lowSavingsRate: RedFlagRule = {
  id: "low_savings_rate",
  evaluate: ({ savingsRate }, thresholds) =>
    savingsRate.kind === "defined" && savingsRate.value < thresholds.lowSavingsRate
      ? ["Low savings rate."]
      : [],
};

const spendingExceedsIncome: RedFlagRule = {
  id: "spending_exceeds_income",
  evaluate: ({ surplus }) => (surplus < 0 ? ["Spending exceeds income."] : []),
};

const categoryConcentration: RedFlagRule = {
  id: "category_concentration",
  evaluate: ({ expenses, totalExpenses }, { maxCategoryShare }) => {
    if (totalExpenses <= 0) {
      return [];
    }
    return Object.entries(expenses)
      .filter(([, amount]) => amount / totalExpenses > maxCategoryShare)
      .map(([category]) => `High concentration in ${category}.`);
  },
};

const emergencyFundBelowFloor: RedFlagRule = {
  id: "emergency_fund_below_floor",
  evaluate: ({ emergencyFundMonths }, { minEmergencyFundMonths }) =>
    emergencyFundMonths.kind === "defined" && emergencyFundMonths.value < minEmergencyFundMonths
      ? [`Emergency fund below ${minEmergencyFundMonths} months.`]
      : [],
};

/** Rules in declaration order; warnings are reported in this order. */
export const RED_FLAG_RULES: ReadonlyArray<RedFlagRule> = [
  lowSavingsRate,
  spendingExceedsIncome,
  categoryConcentration,
  emergencyFundBelowFloor,
];

/**
 * Evaluates every rule and concatenates their warnings in rule order.
 */
export function evaluateRedFlags(
  input: RedFlagInput,
  thresholds: BudgetThresholds,
  rules: ReadonlyArray<RedFlagRule> = RED_FLAG_RULES
): string[] {
  return rules.flatMap((rule) => rule.evaluate(input, thresholds));
}
