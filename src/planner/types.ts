export const AGENT_ROLES = [
  "orchestrator",
  "researcher",
  "implementer",
  "reviewer",
  "validator",
  "writer",
  "refactorer",
] as const;

export type AgentRole = (typeof AGENT_ROLES)[number];

/** Roles that execute tasks. The orchestrator only produces and merges them. */
export type WorkerRole = Exclude<AgentRole, "orchestrator">;

export const WORKER_ROLES: readonly WorkerRole[] = [
  "researcher",
  "implementer",
  "reviewer",
  "validator",
  "writer",
  "refactorer",
];

export type Complexity = "simple" | "medium" | "complex" | "critical";

export type ThinkingIntensity = "none" | "standard" | "extended" | "max";

/** Backing model class, cheapest first. */
export type ModelClass = "economy" | "standard" | "premium";

export type ExecutionConfig = {
  complexity: Complexity;
  modelClass: ModelClass;
  thinking: ThinkingIntensity;
  /** Token budget for extended reasoning (0 when none). */
  thinkingBudget: number;
  /** True when the low-budget governor overrode the tier's choice. */
  governed: boolean;
};

export type TaskStatus = "pending" | "running" | "succeeded" | "failed" | "timed_out";

export type TerminalStatus = Exclude<TaskStatus, "pending" | "running">;

export type ErrorKind = "budget_exceeded" | "execution_timeout" | "execution_failure" | "cancelled";

export type TaskResult = {
  taskId: string;
  role: AgentRole;
  status: TerminalStatus;
  output: string;
  errorKind: ErrorKind | null;
  error?: string;
  durationMs: number;
  /** Token-equivalent units debited from the budget for this task. */
  estimatedCost: number;
  startedAt: number;
  finishedAt: number;
  config?: ExecutionConfig;
};

/** A task as a planner describes it, before it joins a graph. */
export type TaskSpec = {
  id?: string;
  description: string;
  role?: AgentRole;
  dependsOn?: string[];
  allowParallel?: boolean;
  retries?: number;
};

export type TaskNode = {
  id: string;
  description: string;
  role: AgentRole;
  dependsOn: string[];
  /** Hint for batch construction; the executor does not enforce it. */
  allowParallel: boolean;
  status: TaskStatus;
  retries?: number;
  /** Set when a dependency failed terminally; the node can never become ready. */
  blockedBy?: string[];
  result?: TaskResult;
};

export type TaskGraph = {
  id: string;
  goal: string;
  nodes: TaskNode[];
};

export type BlockedTask = {
  taskId: string;
  role: AgentRole;
  reason: "dependency_failed" | "cancelled";
  blockedBy: string[];
};
