/**
 * Tagged optional for ratios that are undefined in legitimate states
 * (no income yet, no tracked expenses).
 */

export type UndefinedReason = "no_income" | "no_expenses";

export interface DefinedMetric {
  kind: "defined";
  value: number;
}

export interface UndefinedMetric {
  kind: "undefined";
  reason: UndefinedReason;
}

export type Metric = DefinedMetric | UndefinedMetric;

export function definedMetric(value: number): DefinedMetric {
  return { kind: "defined", value };
}

export function undefinedMetric(reason: UndefinedReason): UndefinedMetric {
  return { kind: "undefined", reason };
}
