import type { AgentRole, BlockedTask, TaskGraph, TaskResult, TerminalStatus } from "../planner/types.js";

export type ExecutionOptions = {
  maxConcurrency?: number;
  /** Per-task bound on the agent call. */
  timeoutMs?: number;
  onNodeStart?: (nodeId: string) => void;
  onNodeEnd?: (nodeId: string, result: TaskResult) => void;
  onNodeBlocked?: (blocked: BlockedTask) => void;
  abortSignal?: AbortSignal;
};

export type ExecutionResult = {
  graph: TaskGraph;
  /** One entry per task that ran, failures included, in completion order. */
  results: TaskResult[];
  /** Tasks that never ran because a dependency failed or the run was cancelled. */
  blocked: BlockedTask[];
  success: boolean;
  durationMs: number;
};

export type KnowledgeEntry = {
  taskId: string;
  role: AgentRole;
  status: TerminalStatus;
  summary: string;
  timestamp: number;
};

/** Append-only outcome log. Writes are fire-and-forget for the caller. */
export interface KnowledgeSink {
  append(entry: KnowledgeEntry): void | Promise<void>;
}
