import { ExpenseBreakdown } from "../models/BudgetReport";
import { DEFAULT_CATEGORY_CAPS } from "../utils/constants";
import { validateBudgetInputs } from "./budgetAnalyzer";

export interface CategoryCap {
  category: string;
  cap: number; // fraction of income
  tip: string;
}

/**
 * Compares category spending with caps expressed as a share of income and
 * returns an advisory tip for every category over its cap, in cap-table order.
 *
 * Income below 1 is treated as 1 so that any spending in a capped category
 * with no income is reported.
 */
export function checkCategoryBenchmarks(
  income: number,
  expenses: ExpenseBreakdown,
  caps: ReadonlyArray<CategoryCap> = DEFAULT_CATEGORY_CAPS
): string[] {
  validateBudgetInputs(income, expenses);
  const base = Math.max(1, income);

  const byCategory = new Map<string, number>();
  for (const [category, amount] of Object.entries(expenses)) {
    const key = category.trim().toLowerCase();
    byCategory.set(key, (byCategory.get(key) ?? 0) + amount);
  }

  const tips: string[] = [];
  for (const { category, cap, tip } of caps) {
    const amount = byCategory.get(category.toLowerCase()) ?? 0;
    if (amount > cap * base) {
      const label = category.charAt(0).toUpperCase() + category.slice(1);
      tips.push(`${label} >${Math.round(cap * 100)}% of income: ${tip}`);
    }
  }
  return tips;
}
