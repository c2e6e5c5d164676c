import { BudgetReport } from "../models/BudgetReport";
import { GoalPlan } from "../models/GoalPlan";
import { formatAmount, formatRunway, formatSavingsRate } from "./format";

export const SYSTEM_PROMPT =
  "You are a concise personal finance assistant. Use the figures exactly as given; " +
  "never recompute or change them. Keep answers general (not legal or tax advice).";

function withQuestion(body: string, question?: string): string {
  const trimmed = question?.trim();
  return trimmed ? `${body}\n\nUser question: ${trimmed}` : body;
}

export function buildBudgetPrompt(report: BudgetReport, question?: string): string {
  const body = [
    "Monthly budget summary:",
    `- Income: ${formatAmount(report.income)}`,
    `- Total expenses: ${formatAmount(report.totalExpenses)}`,
    `- Surplus: ${formatAmount(report.surplus)}`,
    `- Savings rate: ${formatSavingsRate(report.savingsRate)}`,
    `- Emergency fund: ${formatRunway(report.emergencyFundMonths)}`,
    `- Top categories: ${report.topCategories.join(", ") || "none"}`,
    `- Warnings: ${report.redFlags.join(" ") || "none"}`,
    "",
    "Give 5 short, tailored suggestions to improve savings next month as numbered bullets.",
  ].join("\n");
  return withQuestion(body, question);
}

export function buildGoalPrompt(plan: GoalPlan, currentMonthlySurplus: number, question?: string): string {
  const body = [
    "Savings goal plan:",
    `- Amount still needed: ${formatAmount(plan.remainingAmount)}`,
    `- Deadline: ${plan.deadline} (${plan.monthsRemaining} months)`,
    `- Required monthly saving: ${formatAmount(plan.requiredMonthlySaving)}`,
    `- Current monthly surplus: ${formatAmount(currentMonthlySurplus)}`,
    `- Feasible: ${plan.feasible ? "yes" : "no"}`,
    `- Monthly shortfall: ${formatAmount(plan.shortfall)}`,
    "",
    "Explain the plan in 4 crisp bullets with one practical next step.",
  ].join("\n");
  return withQuestion(body, question);
}
