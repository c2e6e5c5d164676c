import { Metric } from "../models/Metric";

/**
 * Plain-text formatting shared by templates and prompts.
 */

export function formatAmount(amount: number): string {
  return amount.toFixed(2);
}

export function formatSavingsRate(rate: Metric): string {
  return rate.kind === "defined"
    ? `${(rate.value * 100).toFixed(1)}% of income`
    : "not available (no income recorded)";
}

export function formatRunway(months: Metric): string {
  return months.kind === "defined"
    ? `${months.value.toFixed(1)} months of expenses`
    : "not limited by expenses (no expenses recorded)";
}
