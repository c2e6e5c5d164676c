import * as fs from "fs";
import * as path from "path";
import { analyzeBudget } from "./src/engine/budgetAnalyzer";
import { checkCategoryBenchmarks } from "./src/engine/benchmarks";
import { planGoal } from "./src/planner/goalPlanner";
import { explainBudget, explainGoal } from "./src/narrative/narrator";
import { createTextGenerator } from "./src/narrative/textGenerator";
import { loadConfig } from "./src/utils/config";
import { RunRequestSchema } from "./src/utils/validation";

/**
 * Analyze a budget and/or plan a goal from a JSON file and write the results
 * to budget-output.json (generated in project root).
 * Usage: npx ts-node run-budget.ts [input-file]
 * Default input: example-request.json
 */
const inputPath = process.argv[2] ?? "example-request.json";
const outputPath = "budget-output.json";

async function main(): Promise<void> {
  let inputData: unknown;
  try {
    const raw = fs.readFileSync(path.resolve(inputPath), "utf-8");
    inputData = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Failed to read or parse input file "${inputPath}": ${message}`);
    process.exit(1);
  }

  const parsed = RunRequestSchema.safeParse(inputData);
  if (!parsed.success || (!parsed.data.budget && !parsed.data.goal)) {
    console.error("Input file must contain a budget { income, expenses } and/or a goal { targetAmount, deadline, currentMonthlySurplus }.");
    process.exit(1);
  }
  const { budget, goal } = parsed.data;

  const config = loadConfig();
  const generator = createTextGenerator(config.ai);
  const output: Record<string, unknown> = {};

  if (budget) {
    console.log("Analyzing budget...");
    const report = analyzeBudget(budget.income, budget.expenses, {
      liquidSavings: budget.liquidSavings,
      thresholds: config.thresholds,
    });
    output.budget = {
      report,
      benchmarkTips: checkCategoryBenchmarks(budget.income, budget.expenses),
      narrative: await explainBudget(report, { generator }),
    };
  }

  if (goal) {
    console.log("Planning goal...");
    const plan = planGoal(goal);
    output.goal = {
      plan,
      narrative: await explainGoal(plan, goal.currentMonthlySurplus, { generator }),
    };
  }

  fs.writeFileSync(outputPath, JSON.stringify(output, null, 2));
  console.log(`Output saved to ${outputPath}`);
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Run failed: ${message}`);
  process.exit(1);
});
