import { readFileSync } from "node:fs";
import { ConfigError } from "./errors.js";
import type { ModelClass, WorkerRole } from "./planner/types.js";
import { ConfigFileSchema } from "./schemas.js";

export type OrchestratorConfig = {
  timeouts: {
    /** Per-task bound on the agent call. */
    task: number;
    /** Time between SIGTERM and SIGKILL for process agents. */
    killGrace: number;
    healthCheck: number;
  };
  retry: {
    baseDelayMs: number;
    maxDelayMs: number;
  };
  limits: {
    maxConcurrency: number;
    maxIterations: number;
    /** Identical failing iterations in a row before the run counts as stuck. */
    stallLimit: number;
    outputTruncation: number;
  };
  budget: {
    sessionLimit: number;
    dailyLimit: number;
    warnThreshold: number;
    governorThreshold: number;
    charsPerToken: number;
    roleAllocation: Record<WorkerRole, number>;
  };
  thinking: {
    /** Share of the remaining session budget granted to extended reasoning. */
    extendedFraction: number;
    maxTokens: number;
  };
  models: Record<ModelClass, string>;
};

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const DEFAULTS: OrchestratorConfig = {
  timeouts: {
    task: 10 * 60 * 1000, // 10 minutes
    killGrace: 5_000,
    healthCheck: 5_000,
  },
  retry: {
    baseDelayMs: 500,
    maxDelayMs: 10_000,
  },
  limits: {
    maxConcurrency: 4,
    maxIterations: 5,
    stallLimit: 2,
    outputTruncation: 3_000,
  },
  budget: {
    sessionLimit: 100_000,
    dailyLimit: 500_000,
    warnThreshold: 0.75,
    governorThreshold: 0.8,
    charsPerToken: 4,
    roleAllocation: {
      implementer: 35,
      validator: 20,
      researcher: 15,
      writer: 15,
      reviewer: 10,
      refactorer: 5,
    },
  },
  thinking: {
    extendedFraction: 0.03,
    maxTokens: 128_000,
  },
  models: {
    economy: "haiku",
    standard: "sonnet",
    premium: "opus",
  },
};

let current: OrchestratorConfig = structuredClone(DEFAULTS);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge<T extends object>(base: T, overrides: DeepPartial<T>): T {
  const result = structuredClone(base) as Record<string, unknown>;
  for (const [key, val] of Object.entries(overrides)) {
    if (val === undefined) continue;
    const existing = result[key];
    result[key] = isRecord(val) && isRecord(existing) ? deepMerge(existing, val) : val;
  }
  return result as T;
}

function assertAllocation(allocation: Record<WorkerRole, number>): void {
  const total = Object.values(allocation).reduce((sum, pct) => sum + pct, 0);
  if (Math.abs(total - 100) > 1e-9) {
    throw new ConfigError(`budget.roleAllocation must sum to 100 (got ${total})`, { allocation });
  }
}

/** Override config values. Merges deeply with defaults. */
export function configure(overrides: DeepPartial<OrchestratorConfig>): void {
  const next = deepMerge(DEFAULTS, overrides);
  assertAllocation(next.budget.roleAllocation);
  current = next;
}

/** Read a JSON config file, validate it and apply it over the defaults. */
export function loadConfigFile(path: string): void {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Invalid config file ${path}`, { issues });
  }
  configure(parsed.data);
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<OrchestratorConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<OrchestratorConfig> = Object.freeze(DEFAULTS);
