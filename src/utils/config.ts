import { z } from "zod";
import { BudgetThresholds, DEFAULT_AI_API_BASE, DEFAULT_AI_MODEL } from "./constants";

/**
 * Runtime configuration read from environment variables.
 */

export type AiProviderName = "none" | "openai";

export interface AiProviderConfig {
  provider: AiProviderName;
  apiKey?: string;
  apiBase: string;
  model: string;
  timeoutSeconds: number;
  maxTokens: number;
}

export interface AppConfig {
  port: number;
  ai: AiProviderConfig;
  thresholds: Partial<BudgetThresholds>;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const blankToUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());
const optionalNumber = z.preprocess(blankToUndefined, z.coerce.number().finite().min(0).optional());

const EnvSchema = z.object({
  PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).max(65535).default(3000)),
  AI_PROVIDER: z.preprocess(
    (value) => (typeof value === "string" ? value.trim().toLowerCase() || undefined : value),
    z.enum(["none", "openai"]).default("none")
  ),
  AI_API_KEY: optionalString,
  AI_API_BASE: optionalString,
  AI_MODEL: optionalString,
  AI_TIMEOUT_SECONDS: z.preprocess(blankToUndefined, z.coerce.number().positive().default(20)),
  AI_MAX_TOKENS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(400)),
  BUDGET_LOW_SAVINGS_RATE: optionalNumber,
  BUDGET_MAX_CATEGORY_SHARE: optionalNumber,
  BUDGET_MIN_EMERGENCY_MONTHS: optionalNumber,
});

/**
 * Loads configuration from environment variables.
 *
 * @param env - Variables to read (defaults to `process.env`)
 * @throws ConfigError when a variable holds an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  const vars = parsed.data;

  const thresholds: Partial<BudgetThresholds> = {};
  if (vars.BUDGET_LOW_SAVINGS_RATE !== undefined) {
    thresholds.lowSavingsRate = vars.BUDGET_LOW_SAVINGS_RATE;
  }
  if (vars.BUDGET_MAX_CATEGORY_SHARE !== undefined) {
    thresholds.maxCategoryShare = vars.BUDGET_MAX_CATEGORY_SHARE;
  }
  if (vars.BUDGET_MIN_EMERGENCY_MONTHS !== undefined) {
    thresholds.minEmergencyFundMonths = vars.BUDGET_MIN_EMERGENCY_MONTHS;
  }

  return {
    port: vars.PORT,
    ai: {
      provider: vars.AI_PROVIDER,
      apiKey: vars.AI_API_KEY,
      apiBase: vars.AI_API_BASE ?? DEFAULT_AI_API_BASE,
      model: vars.AI_MODEL ?? DEFAULT_AI_MODEL,
      timeoutSeconds: vars.AI_TIMEOUT_SECONDS,
      maxTokens: vars.AI_MAX_TOKENS,
    },
    thresholds,
  };
}
