import type { AgentAdapter } from "../agents/adapter.js";
import type { BudgetManager } from "../budget/budget-manager.js";
import type { Complexity } from "../planner/types.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("classifier");

/** Maps a task description to a complexity tier. Implementations are swappable. */
export interface ComplexityClassifier {
  readonly name: string;
  /** Implementations that call an agent charge the call to `budget` when given. */
  classify(description: string, budget?: BudgetManager): Promise<Complexity>;
}

export type KeywordTable = Record<Complexity, readonly string[]>;

/** Checked in this order; the first tier with a hit wins. */
export const TIER_PRIORITY: readonly Complexity[] = ["critical", "complex", "medium", "simple"];

export const DEFAULT_KEYWORDS: KeywordTable = {
  simple: ["format", "list", "lookup", "rename", "move", "copy", "count", "sort", "print", "echo", "display", "show"],
  medium: ["implement", "analyze", "analyse", "build", "add", "update", "fix", "write", "refactor", "test"],
  complex: ["debug", "design", "architect", "research", "investigate", "compare", "benchmark", "profile", "optimize"],
  critical: ["validate", "prove", "paper", "publish", "submit", "security", "audit", "falsify", "verify", "production"],
};

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Matches a keyword at the start of a word, so "implement" also catches "implementation". */
function compile(keywords: readonly string[]): RegExp | null {
  if (keywords.length === 0) return null;
  return new RegExp(`\\b(?:${keywords.map(escapeRegExp).join("|")})`, "i");
}

export class KeywordClassifier implements ComplexityClassifier {
  readonly name = "keyword";
  private patterns: Array<[Complexity, RegExp]> = [];

  constructor(keywords: KeywordTable = DEFAULT_KEYWORDS) {
    for (const tier of TIER_PRIORITY) {
      const pattern = compile(keywords[tier]);
      if (pattern) this.patterns.push([tier, pattern]);
    }
  }

  /** Synchronous form, for callers that cannot await. */
  classifySync(description: string): Complexity {
    for (const [tier, pattern] of this.patterns) {
      if (pattern.test(description)) return tier;
    }
    return "medium";
  }

  async classify(description: string): Promise<Complexity> {
    return this.classifySync(description);
  }
}

const TIERS = new Set<string>(TIER_PRIORITY);

function isComplexity(word: string): word is Complexity {
  return TIERS.has(word);
}

export type AgentClassifierOptions = {
  agent: AgentAdapter;
  fallback?: ComplexityClassifier;
  timeoutMs?: number;
};

/**
 * Asks an agent for a one-word tier. Any failure or unrecognised answer
 * falls back to the local classifier, so callers always get a tier.
 */
export class AgentClassifier implements ComplexityClassifier {
  readonly name = "agent";
  private agent: AgentAdapter;
  private fallback: ComplexityClassifier;
  private timeoutMs: number;

  constructor(opts: AgentClassifierOptions) {
    this.agent = opts.agent;
    this.fallback = opts.fallback ?? new KeywordClassifier();
    this.timeoutMs = opts.timeoutMs ?? 15_000;
  }

  async classify(description: string, budget?: BudgetManager): Promise<Complexity> {
    const prompt =
      "Is this task simple, medium, complex, or critical? Reply with exactly one word.\n\n" +
      `Task: ${description.slice(0, 500)}`;
    try {
      const res = await this.agent.execute(
        {
          taskId: "classify",
          description: prompt,
          role: "orchestrator",
          thinking: "none",
          thinkingBudget: 0,
          modelClass: "economy",
        },
        AbortSignal.timeout(this.timeoutMs),
      );
      if (budget) {
        await budget.record(res.tokensUsed ?? budget.estimate(prompt) + budget.estimate(res.output), "orchestrator");
      }
      const word = res.success ? res.output.trim().toLowerCase().split(/\s+/)[0] ?? "" : "";
      if (isComplexity(word)) return word;
      log.debug("Classifier agent gave no usable tier, using fallback", { answer: res.output.slice(0, 40) });
    } catch (err) {
      log.warn("Classifier agent unavailable, using fallback", { error: String(err) });
      if (budget) await budget.record(budget.estimate(prompt), "orchestrator");
    }
    return this.fallback.classify(description, budget);
  }
}
