import { BudgetReport } from "../models/BudgetReport";
import { GoalPlan } from "../models/GoalPlan";
import { Narrative } from "../models/Narrative";
import { buildBudgetPrompt, buildGoalPrompt } from "./prompts";
import { renderBudgetTemplate, renderGoalTemplate } from "./templates";
import { TextGenerator } from "./textGenerator";

export interface ExplainOptions {
  generator?: TextGenerator | null;
  question?: string;
}

async function narrate(
  prompt: string,
  fallback: string,
  generator: TextGenerator | null | undefined
): Promise<Narrative> {
  if (generator) {
    try {
      const text = (await generator.generate(prompt)).trim();
      if (text) {
        return { text, source: "ai", provider: generator.name };
      }
      console.error(`[AI] ${generator.name} returned an empty response, using template`);
    } catch (error) {
      console.error(`[AI] ${generator.name} generation failed, using template:`, error);
    }
  }
  return { text: fallback, source: "template", provider: "template" };
}

/**
 * Explains a budget report, with generated text when a generator is available
 * and the fixed template otherwise. Never rejects.
 */
export function explainBudget(report: BudgetReport, options: ExplainOptions = {}): Promise<Narrative> {
  return narrate(
    buildBudgetPrompt(report, options.question),
    renderBudgetTemplate(report),
    options.generator
  );
}

/**
 * Explains a goal plan the same way as {@link explainBudget}.
 */
export function explainGoal(
  plan: GoalPlan,
  currentMonthlySurplus: number,
  options: ExplainOptions = {}
): Promise<Narrative> {
  return narrate(
    buildGoalPrompt(plan, currentMonthlySurplus, options.question),
    renderGoalTemplate(plan, currentMonthlySurplus),
    options.generator
  );
}
