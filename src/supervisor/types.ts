import type { BudgetManager, BudgetSnapshot } from "../budget/budget-manager.js";
import type { ExecutionResult } from "../executor/types.js";
import type { AgentRole, BlockedTask, ErrorKind, TaskGraph, TaskResult, TaskSpec, TerminalStatus } from "../planner/types.js";

export type Verdict = "success" | "needs_correction" | "stuck";

export type SupervisorPhase = "planning" | "executing" | "evaluating" | "done" | "escalated";

export type IterationRecord = {
  iteration: number;
  tasks: Array<{ id: string; description: string; role: AgentRole; dependsOn: string[] }>;
  results: TaskResult[];
  blocked: BlockedTask[];
  verdict: Verdict;
  corrections: string[];
  /** Set when the batch never ran: planner error, empty or rejected batch. */
  error?: string;
};

export type EscalationReason = "stuck" | "max_iterations" | "planner_failed";

export type FailureSummary = {
  taskId: string;
  role: AgentRole;
  status: TerminalStatus;
  errorKind: ErrorKind | null;
  message: string;
};

export type EscalationReport = {
  runId: string;
  goal: string;
  reason: EscalationReason;
  iteration: number;
  detail: string;
  failures: FailureSummary[];
  blocked: BlockedTask[];
  budget: {
    sessionUsed: number;
    sessionLimit: number;
    dailyUsed: number;
    dailyLimit: number;
    sessionPctUsed: number;
  };
};

export type SupervisorState = {
  runId: string;
  goal: string;
  /** Iterations started so far. */
  iteration: number;
  maxIterations: number;
  phase: SupervisorPhase;
  verdict: Verdict | null;
  history: IterationRecord[];
  /** Every correction handed back to the planner, oldest first. */
  corrections: string[];
  startedAt: number;
  finishedAt?: number;
  escalation?: EscalationReport;
};

export type RunSnapshot = {
  version: 1;
  state: SupervisorState;
  graph: TaskGraph | null;
  budget: BudgetSnapshot;
};

export type PlanContext = {
  goal: string;
  iteration: number;
  history: IterationRecord[];
  corrections: string[];
};

export interface Planner {
  readonly name: string;
  /** Planners that call an agent charge the call to `budget` when given. */
  plan(ctx: PlanContext, budget?: BudgetManager): Promise<TaskSpec[]>;
}

export type Evaluation = {
  verdict: Verdict;
  corrections: string[];
  reason?: string;
};

export type EvaluationContext = {
  iteration: number;
  graph: TaskGraph;
  execution: ExecutionResult;
  /** Earlier iterations only; the one being judged is not in here yet. */
  history: IterationRecord[];
};

/** Decides what an executed batch means for the run. */
export interface EvaluationPolicy {
  evaluate(ctx: EvaluationContext): Evaluation | Promise<Evaluation>;
}

export type EscalationHandler = (report: EscalationReport) => void | Promise<void>;

export type RunCallbacks = {
  onPhase?: (phase: SupervisorPhase, iteration: number) => void;
  onIterationStart?: (iteration: number, graph: TaskGraph) => void;
  onTaskStart?: (iteration: number, taskId: string) => void;
  onTaskEnd?: (iteration: number, taskId: string, result: TaskResult) => void;
  onTaskBlocked?: (iteration: number, blocked: BlockedTask) => void;
  onIterationEnd?: (record: IterationRecord) => void;
};
