import { healthyBudget, rentHeavyBudget } from './budgets';
import { sixMonthGoal } from './goals';

export const analyzeRequest = {
  income: rentHeavyBudget.income,
  expenses: rentHeavyBudget.expenses,
};

export const healthyAnalyzeRequest = { ...healthyBudget };

export const planRequest = {
  targetAmount: sixMonthGoal.targetAmount,
  deadline: { months: 6 },
  currentMonthlySurplus: sixMonthGoal.currentMonthlySurplus,
};
