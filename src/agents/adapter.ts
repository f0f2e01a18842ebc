import type { AgentRole, ModelClass, ThinkingIntensity } from "../planner/types.js";

/** What the scheduler hands the agent execution service for one task. */
export type AgentRequest = {
  taskId: string;
  description: string;
  role: AgentRole;
  thinking: ThinkingIntensity;
  thinkingBudget: number;
  modelClass: ModelClass;
};

export type AgentResponse = {
  success: boolean;
  output: string;
  error?: string | null;
  /** Actual usage when the service reports it; otherwise the runner estimates. */
  tokensUsed?: number;
};

/**
 * The agent execution service. Calls are not assumed idempotent: a retry
 * re-issues the request. Implementations must stop work when `signal`
 * aborts.
 */
export interface AgentAdapter {
  name: string;
  type: "function" | "http" | "process" | string;
  description?: string;
  /** Roles this agent serves. Agents without roles serve any role. */
  roles?: AgentRole[];

  execute(request: AgentRequest, signal: AbortSignal): Promise<AgentResponse>;
  healthCheck?(): Promise<boolean>;
}
