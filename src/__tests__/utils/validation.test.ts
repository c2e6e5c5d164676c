import {
  BudgetExplainRequestSchema,
  BudgetRequestSchema,
  DeadlineSchema,
  GoalRequestSchema,
  RunRequestSchema,
} from '../../utils/validation';
import { analyzeRequest, planRequest } from '../fixtures/requests';

describe('BudgetRequestSchema', () => {
  it('should validate a budget request', () => {
    expect(BudgetRequestSchema.safeParse(analyzeRequest).success).toBe(true);
  });

  it('should accept an optional liquid savings balance', () => {
    const result = BudgetRequestSchema.safeParse({ ...analyzeRequest, liquidSavings: 90000 });

    expect(result.success).toBe(true);
  });

  it('should reject missing expenses', () => {
    expect(BudgetRequestSchema.safeParse({ income: 1000 }).success).toBe(false);
  });

  it('should reject non-numeric expense amounts', () => {
    const result = BudgetRequestSchema.safeParse({ income: 1000, expenses: { rent: '500' } });

    expect(result.success).toBe(false);
  });

  it('should reject a reserved category name instead of dropping it', () => {
    const result = BudgetRequestSchema.safeParse(
      JSON.parse('{"income":1000,"expenses":{"__proto__":900,"rent":100}}')
    );

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((issue) => [issue.path.join('.'), issue.message])).toEqual([
        ['expenses.__proto__', 'Category name "__proto__" is reserved'],
      ]);
    }
  });

  it('should leave domain checks such as negative income to the analyzer', () => {
    expect(BudgetRequestSchema.safeParse({ income: -1, expenses: {} }).success).toBe(true);
  });
});

describe('BudgetExplainRequestSchema', () => {
  it('should accept an optional question', () => {
    const result = BudgetExplainRequestSchema.safeParse({ ...analyzeRequest, question: 'Where can I cut?' });

    expect(result.success).toBe(true);
  });
});

describe('DeadlineSchema', () => {
  it('should accept a date string or a duration', () => {
    expect(DeadlineSchema.safeParse('2027-01-01').success).toBe(true);
    expect(DeadlineSchema.safeParse({ months: 3 }).success).toBe(true);
  });

  it('should reject an empty string and other shapes', () => {
    expect(DeadlineSchema.safeParse('').success).toBe(false);
    expect(DeadlineSchema.safeParse({ weeks: 2 }).success).toBe(false);
    expect(DeadlineSchema.safeParse(6).success).toBe(false);
  });
});

describe('GoalRequestSchema', () => {
  it('should validate a goal request', () => {
    expect(GoalRequestSchema.safeParse(planRequest).success).toBe(true);
  });

  it('should reject a missing surplus', () => {
    const { currentMonthlySurplus, ...rest } = planRequest;

    expect(currentMonthlySurplus).toBe(3000);
    expect(GoalRequestSchema.safeParse(rest).success).toBe(false);
  });
});

describe('RunRequestSchema', () => {
  it('should accept a budget, a goal, or both', () => {
    expect(RunRequestSchema.safeParse({ budget: analyzeRequest }).success).toBe(true);
    expect(RunRequestSchema.safeParse({ goal: planRequest }).success).toBe(true);
    expect(RunRequestSchema.safeParse({ budget: analyzeRequest, goal: planRequest }).success).toBe(true);
  });
});
