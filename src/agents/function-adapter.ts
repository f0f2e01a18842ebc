import type { AgentRole } from "../planner/types.js";
import { createLogger } from "../utils/logger.js";
import type { AgentAdapter, AgentRequest, AgentResponse } from "./adapter.js";

const log = createLogger("function-agent");

/**
 * In-process agent body. Returning a string means success with that output;
 * throwing means failure.
 */
export type AgentFunction = (request: AgentRequest, signal: AbortSignal) => Promise<string | AgentResponse>;

export type FunctionAdapterOptions = {
  name: string;
  fn: AgentFunction;
  description?: string;
  roles?: AgentRole[];
};

export class FunctionAdapter implements AgentAdapter {
  readonly name: string;
  readonly type = "function" as const;
  readonly description?: string;
  readonly roles?: AgentRole[];

  private fn: AgentFunction;

  constructor(opts: FunctionAdapterOptions) {
    this.name = opts.name;
    this.fn = opts.fn;
    this.description = opts.description;
    this.roles = opts.roles;
  }

  async execute(request: AgentRequest, signal: AbortSignal): Promise<AgentResponse> {
    log.debug(`[${this.name}] Running function for task "${request.taskId}"`, { role: request.role });
    const result = await this.fn(request, signal);
    return typeof result === "string" ? { success: true, output: result } : result;
  }
}
