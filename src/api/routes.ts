import { Router, Request, Response } from "express";
import { ZodError } from "zod";
import { analyzeBudget } from "../engine/budgetAnalyzer";
import { checkCategoryBenchmarks } from "../engine/benchmarks";
import { planGoal } from "../planner/goalPlanner";
import { explainBudget, explainGoal } from "../narrative/narrator";
import { TextGenerator } from "../narrative/textGenerator";
import { BudgetThresholds } from "../utils/constants";
import { isFinanceError } from "../utils/errors";
import {
  BudgetExplainRequestSchema,
  BudgetRequestSchema,
  BudgetRequestBody,
  GoalExplainRequestSchema,
  GoalRequestSchema,
} from "../utils/validation";

/**
 * Collaborators injected into the routes.
 *
 * @property generator - Optional text generator; null means templated narratives only
 * @property thresholds - Red-flag threshold overrides applied to every analysis
 * @property now - Clock used for deadline resolution
 */
export interface RouteDependencies {
  generator: TextGenerator | null;
  thresholds: Partial<BudgetThresholds>;
  now?: () => Date;
}

/**
 * Maps an error to a response: malformed bodies and domain errors are 400s,
 * anything else is logged and returned as 500.
 */
function sendError(res: Response, error: unknown, context: string): void {
  if (error instanceof ZodError) {
    res.status(400).json({
      error: "Invalid request body",
      details: error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
    });
    return;
  }
  if (isFinanceError(error)) {
    res.status(400).json({ error: error.code, message: error.message });
    return;
  }
  console.error(`Error in ${context}:`, error);
  res.status(500).json({
    error: "Internal server error",
    message: error instanceof Error ? error.message : String(error),
  });
}

export function createRouter(deps: RouteDependencies): Router {
  const router = Router();
  const now = (): Date => (deps.now ? deps.now() : new Date());

  const analyze = (body: BudgetRequestBody) => {
    const report = analyzeBudget(body.income, body.expenses, {
      liquidSavings: body.liquidSavings,
      thresholds: deps.thresholds,
    });
    return { report, benchmarkTips: checkCategoryBenchmarks(body.income, body.expenses) };
  };

  /**
   * GET /api/budget/analyze
   * Get information about the budget analysis endpoint
   */
  router.get("/budget/analyze", (req: Request, res: Response) => {
    res.json({
      method: "POST",
      description: "Analyze a monthly budget: totals, savings rate, emergency-fund runway and red flags",
      endpoint: "/api/budget/analyze",
      requiredFields: ["income", "expenses", "liquidSavings (optional)"],
    });
  });

  /**
   * POST /api/budget/analyze
   */
  router.post("/budget/analyze", (req: Request, res: Response) => {
    try {
      res.json(analyze(BudgetRequestSchema.parse(req.body)));
    } catch (error) {
      sendError(res, error, "budget analysis");
    }
  });

  /**
   * POST /api/budget/explain
   * Budget analysis plus a narrative (generated when available, templated otherwise)
   */
  router.post("/budget/explain", async (req: Request, res: Response) => {
    try {
      const body = BudgetExplainRequestSchema.parse(req.body);
      const result = analyze(body);
      const narrative = await explainBudget(result.report, {
        generator: deps.generator,
        question: body.question,
      });
      res.json({ ...result, narrative });
    } catch (error) {
      sendError(res, error, "budget explanation");
    }
  });

  /**
   * GET /api/goals/plan
   * Get information about the goal planning endpoint
   */
  router.get("/goals/plan", (req: Request, res: Response) => {
    res.json({
      method: "POST",
      description: "Required monthly saving and feasibility for a savings goal",
      endpoint: "/api/goals/plan",
      requiredFields: [
        "targetAmount",
        "deadline (YYYY-MM-DD or { months })",
        "currentMonthlySurplus",
        "currentSavings (optional)",
      ],
    });
  });

  /**
   * POST /api/goals/plan
   */
  router.post("/goals/plan", (req: Request, res: Response) => {
    try {
      const body = GoalRequestSchema.parse(req.body);
      res.json(planGoal(body, { now: now() }));
    } catch (error) {
      sendError(res, error, "goal planning");
    }
  });

  /**
   * POST /api/goals/explain
   */
  router.post("/goals/explain", async (req: Request, res: Response) => {
    try {
      const { question, ...request } = GoalExplainRequestSchema.parse(req.body);
      const plan = planGoal(request, { now: now() });
      const narrative = await explainGoal(plan, request.currentMonthlySurplus, {
        generator: deps.generator,
        question,
      });
      res.json({ plan, narrative });
    } catch (error) {
      sendError(res, error, "goal explanation");
    }
  });

  /**
   * GET /api
   * API information endpoint
   */
  router.get("/", (req: Request, res: Response) => {
    res.json({
      message: "Budget and Goal Planning API",
      version: "1.0.0",
      narrativeProvider: deps.generator ? deps.generator.name : "template",
      endpoints: {
        analyze: "POST /api/budget/analyze - Budget totals, savings rate, runway and red flags",
        explainBudget: "POST /api/budget/explain - Budget analysis with a narrative",
        plan: "POST /api/goals/plan - Required monthly saving and feasibility",
        explainGoal: "POST /api/goals/explain - Goal plan with a narrative",
        health: "GET /api/health - Health check",
      },
    });
  });

  /**
   * GET /api/health
   * Health check endpoint
   */
  router.get("/health", (req: Request, res: Response) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  return router;
}
