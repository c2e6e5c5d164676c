import { z } from "zod";

/**
 * Zod validation schemas for request bodies.
 * These schemas check shape and types; domain rules (non-negative amounts,
 * future deadlines) are enforced by the analyzer and planner themselves.
 */

/** Names a record cannot hold as own keys once parsed. */
const RESERVED_CATEGORY_NAMES = ["__proto__"];

/**
 * Schema for monthly expenses by category.
 * Maps category names to amounts. Reserved names are rejected before the
 * record is built, since the record would drop them.
 */
export const ExpenseBreakdownSchema = z
  .unknown()
  .superRefine((value, ctx) => {
    if (typeof value !== "object" || value === null) {
      return;
    }
    for (const name of RESERVED_CATEGORY_NAMES) {
      if (Object.hasOwn(value, name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [name],
          message: `Category name "${name}" is reserved`,
        });
      }
    }
  })
  .pipe(z.record(z.string(), z.number()));

/**
 * Schema for a budget analysis request.
 */
export const BudgetRequestSchema = z.object({
  income: z.number(),
  expenses: ExpenseBreakdownSchema,
  liquidSavings: z.number().optional(),
});

/**
 * Schema for a goal deadline: a date string or a duration in months.
 */
export const DeadlineSchema = z.union([
  z.string().min(1),
  z.object({ months: z.number() }),
]);

/**
 * Schema for a savings goal request.
 */
export const GoalRequestSchema = z.object({
  targetAmount: z.number(),
  deadline: DeadlineSchema,
  currentMonthlySurplus: z.number(),
  currentSavings: z.number().optional(),
});

/** Optional free-text question passed to the narrative layer. */
const QuestionSchema = z.string().max(2000).optional();

export const BudgetExplainRequestSchema = BudgetRequestSchema.extend({
  question: QuestionSchema,
});

export const GoalExplainRequestSchema = GoalRequestSchema.extend({
  question: QuestionSchema,
});

/**
 * Schema for the CLI input file: either part may be omitted.
 */
export const RunRequestSchema = z.object({
  budget: BudgetRequestSchema.optional(),
  goal: GoalRequestSchema.optional(),
});

export type BudgetRequestBody = z.infer<typeof BudgetRequestSchema>;
export type GoalRequestBody = z.infer<typeof GoalRequestSchema>;
export type RunRequest = z.infer<typeof RunRequestSchema>;
