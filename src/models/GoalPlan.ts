/**
 * Savings goal data structures
 */

/** A deadline as a calendar date or a duration in months from now. */
export type Deadline = string | Date | { months: number };

export interface GoalRequest {
  targetAmount: number;
  deadline: Deadline;
  currentMonthlySurplus: number;
  currentSavings?: number;
}

export interface GoalPlan {
  monthsRemaining: number;
  requiredMonthlySaving: number;
  feasible: boolean;
  shortfall: number; // 0 when feasible
  remainingAmount: number;
  deadline: string; // YYYY-MM-DD
}
