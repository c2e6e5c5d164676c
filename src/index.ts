export { analyzeBudget, AnalyzeBudgetOptions } from "./engine/budgetAnalyzer";
export { checkCategoryBenchmarks, CategoryCap } from "./engine/benchmarks";
export { RED_FLAG_RULES, RedFlagRule } from "./engine/redFlags";
export { planGoal, resolveDeadline, PlanGoalOptions } from "./planner/goalPlanner";
export { explainBudget, explainGoal, ExplainOptions } from "./narrative/narrator";
export { createTextGenerator, OpenAITextGenerator, TextGenerator } from "./narrative/textGenerator";
export { createApp } from "./api/server";
export { loadConfig, AppConfig, ConfigError } from "./utils/config";
export { BudgetThresholds, DEFAULT_BUDGET_THRESHOLDS, DEFAULT_CATEGORY_CAPS } from "./utils/constants";
export { FinanceError, InvalidInputError, InvalidDeadlineError } from "./utils/errors";
export * from "./models/BudgetReport";
export * from "./models/GoalPlan";
export * from "./models/Metric";
export * from "./models/Narrative";
