import { BudgetReport } from "../models/BudgetReport";
import { GoalPlan } from "../models/GoalPlan";
import { formatAmount, formatRunway, formatSavingsRate } from "./format";

/**
 * Fixed explanations built only from computed figures.
 * Used whenever no text generator is available or it fails.
 */

export function renderBudgetTemplate(report: BudgetReport): string {
  const lines = [
    `Income: ${formatAmount(report.income)}. Total expenses: ${formatAmount(report.totalExpenses)}. Surplus: ${formatAmount(report.surplus)}.`,
    `Savings rate: ${formatSavingsRate(report.savingsRate)}.`,
    `Emergency fund: ${formatRunway(report.emergencyFundMonths)}.`,
  ];
  if (report.topCategories.length > 0) {
    lines.push(`Top categories: ${report.topCategories.join(", ")}.`);
  }
  lines.push(report.redFlags.length > 0 ? `Warnings: ${report.redFlags.join(" ")}` : "No warnings.");
  return lines.join("\n");
}

export function renderGoalTemplate(plan: GoalPlan, currentMonthlySurplus: number): string {
  const lines = [
    `Amount still needed: ${formatAmount(plan.remainingAmount)} by ${plan.deadline} (${plan.monthsRemaining} ${plan.monthsRemaining === 1 ? "month" : "months"}).`,
    `Required monthly saving: ${formatAmount(plan.requiredMonthlySaving)}.`,
  ];
  if (plan.feasible) {
    lines.push(`Feasible with current monthly surplus of ${formatAmount(currentMonthlySurplus)}.`);
  } else {
    lines.push(
      `Not feasible with current monthly surplus of ${formatAmount(currentMonthlySurplus)}: shortfall of ${formatAmount(plan.shortfall)} per month.`,
      "Increase the surplus by cutting the largest categories, or extend the deadline."
    );
  }
  return lines.join("\n");
}
