import { Metric } from "./Metric";

/**
 * Budget data structures
 */

/** Monthly expenses keyed by category name. */
export type ExpenseBreakdown = Record<string, number>;

export interface IncomeExpenseRecord {
  income: number;
  expenses: ExpenseBreakdown;
}

export interface ExpenseShare {
  amount: number;
  pctOfIncome: number;
  pctOfExpenses: number;
}

/** What the emergency-fund runway was computed from. */
export type RunwayBasis = "surplus" | "liquid_savings";

export interface BudgetReport {
  income: number;
  totalExpenses: number;
  surplus: number; // may be negative
  savingsRate: Metric; // fraction of income, undefined when income is 0
  emergencyFundMonths: Metric; // undefined when total expenses are 0
  runwayBasis: RunwayBasis;
  redFlags: string[];
  expenseShares: Record<string, ExpenseShare>;
  topCategories: string[];
}
