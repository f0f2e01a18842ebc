import { getConfig } from "../config.js";
import type { Complexity, ExecutionConfig, ModelClass, ThinkingIntensity } from "../planner/types.js";

export type BudgetView = {
  sessionUsed: number;
  sessionLimit: number;
};

export type SelectorOptions = {
  governorThreshold?: number;
  extendedFraction?: number;
  maxThinkingTokens?: number;
};

const TIER_TABLE: Record<Complexity, { modelClass: ModelClass; thinking: ThinkingIntensity }> = {
  simple: { modelClass: "economy", thinking: "none" },
  medium: { modelClass: "standard", thinking: "standard" },
  complex: { modelClass: "premium", thinking: "extended" },
  critical: { modelClass: "premium", thinking: "max" },
};

/** True once the session has spent more than the governor threshold. */
export function isGoverned(budget: BudgetView, threshold = getConfig().budget.governorThreshold): boolean {
  if (budget.sessionLimit <= 0) return true;
  return budget.sessionUsed / budget.sessionLimit > threshold;
}

/**
 * Map a tier to a model class and reasoning budget. Past the governor
 * threshold every tier, critical included, gets the cheapest class.
 */
export function selectExecutionConfig(
  tier: Complexity,
  budget: BudgetView,
  opts: SelectorOptions = {},
): ExecutionConfig {
  const cfg = getConfig();
  const governorThreshold = opts.governorThreshold ?? cfg.budget.governorThreshold;

  if (isGoverned(budget, governorThreshold)) {
    return { complexity: tier, modelClass: "economy", thinking: "none", thinkingBudget: 0, governed: true };
  }

  const { modelClass, thinking } = TIER_TABLE[tier];
  const remaining = Math.max(0, budget.sessionLimit - budget.sessionUsed);
  let thinkingBudget = 0;
  if (thinking === "extended") {
    thinkingBudget = Math.floor(remaining * (opts.extendedFraction ?? cfg.thinking.extendedFraction));
  } else if (thinking === "max") {
    thinkingBudget = Math.min(opts.maxThinkingTokens ?? cfg.thinking.maxTokens, remaining);
  }

  return { complexity: tier, modelClass, thinking, thinkingBudget, governed: false };
}
