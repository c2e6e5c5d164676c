/**
 * Shared constants for budget analysis and goal planning.
 * Centralizing these makes behavior consistent and easier to tune.
 */

/** Thresholds used by the budget red-flag rules. */
export interface BudgetThresholds {
  /** Savings rate (fraction of income) strictly below this is flagged as low. */
  lowSavingsRate: number;
  /** A category whose share of total expenses is strictly above this is flagged. */
  maxCategoryShare: number;
  /** Emergency-fund runway (months) strictly below this is flagged. */
  minEmergencyFundMonths: number;
}

export const DEFAULT_BUDGET_THRESHOLDS: Readonly<BudgetThresholds> = Object.freeze({
  lowSavingsRate: 0.1,
  maxCategoryShare: 0.4,
  minEmergencyFundMonths: 3,
});

/** Number of categories reported in `topCategories`. */
export const TOP_CATEGORY_COUNT = 3;

/**
 * Per-category spending caps as a fraction of monthly income.
 * Category names are matched case-insensitively.
 */
export const DEFAULT_CATEGORY_CAPS: ReadonlyArray<{ category: string; cap: number; tip: string }> = [
  { category: "rent", cap: 0.3, tip: "consider renegotiating, sharing, or relocating." },
  { category: "transport", cap: 0.15, tip: "use passes, pooling, or WFH days where possible." },
  { category: "dining", cap: 0.1, tip: "set a weekly cap and meal-prep twice a week." },
  { category: "subscriptions", cap: 0.05, tip: "cancel duplicates or annualize for discounts." },
  { category: "taxes", cap: 0.15, tip: "review regime choice and eligible deductions." },
  { category: "shopping", cap: 0.1, tip: "move impulse buys to a monthly wishlist before purchase." },
  { category: "groceries", cap: 0.15, tip: "a weekly list and bulk staples can cut 5-10%." },
];

/** Default text-generation endpoint (OpenAI-compatible). */
export const DEFAULT_AI_API_BASE = "https://openrouter.ai/api/v1";

/** Default model requested from the text-generation endpoint. */
export const DEFAULT_AI_MODEL = "deepseek/deepseek-chat";
