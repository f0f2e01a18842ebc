import type { AgentAdapter, AgentResponse } from "../agents/adapter.js";
import type { BudgetManager } from "../budget/budget-manager.js";
import { getConfig } from "../config.js";
import { AgentError, ParseError } from "../errors.js";
import { parseOrThrow, PlannerResponseSchema } from "../schemas.js";
import type { PlanContext, Planner } from "../supervisor/types.js";
import { createLogger } from "../utils/logger.js";
import type { TaskSpec } from "./types.js";

const log = createLogger("planner");

const PLANNER_SYSTEM_PROMPT = `You are a task planner. Given a goal, decompose it into a directed acyclic graph (DAG) of subtasks for specialist agents.

Output ONLY valid JSON matching this schema:
{
  "tasks": [
    {
      "id": "unique-id",
      "description": "description of the subtask",
      "role": "researcher | implementer | reviewer | validator | writer | refactorer (optional)",
      "dependsOn": ["id-of-dependency"]
    }
  ]
}

Rules:
- Each task must have a unique "id" (short, descriptive, kebab-case)
- "dependsOn" is an array of task IDs that must complete before this task starts
- Independent tasks should have empty "dependsOn": [] so they run in parallel
- End with a "validator" task that checks the work and answers PASSED or FAILED with a list of issues
- Keep tasks atomic and focused
- Output raw JSON only, no markdown fences`;

/**
 * One task for the whole goal on the first iteration; afterwards one
 * corrective task carrying the previous iteration's corrections.
 */
export class GoalPlanner implements Planner {
  readonly name = "goal";

  async plan(ctx: PlanContext): Promise<TaskSpec[]> {
    const last = ctx.history.at(-1);
    if (!last || last.corrections.length === 0) {
      return [{ description: ctx.goal }];
    }
    const issues = last.corrections.map((c) => `- ${c}`).join("\n");
    return [{ description: `${ctx.goal}\n\nFix the problems found in the previous attempt:\n${issues}` }];
  }
}

export type AgentPlannerOptions = {
  agent: AgentAdapter;
  timeoutMs?: number;
};

/** Asks an orchestrator-role agent for a JSON task batch. */
export class AgentPlanner implements Planner {
  readonly name = "agent";
  private agent: AgentAdapter;
  private timeoutMs: number;

  constructor(opts: AgentPlannerOptions) {
    this.agent = opts.agent;
    this.timeoutMs = opts.timeoutMs ?? getConfig().timeouts.task;
  }

  async plan(ctx: PlanContext, budget?: BudgetManager): Promise<TaskSpec[]> {
    const prompt = `${PLANNER_SYSTEM_PROMPT}\n\n${this.buildContext(ctx)}`;
    let res: AgentResponse;
    try {
      res = await this.agent.execute(
        {
          taskId: `plan-${ctx.iteration}`,
          description: prompt,
          role: "orchestrator",
          thinking: "standard",
          thinkingBudget: 0,
          modelClass: "premium",
        },
        AbortSignal.timeout(this.timeoutMs),
      );
    } catch (err) {
      if (budget) await budget.record(budget.estimate(prompt), "orchestrator");
      throw err;
    }
    if (budget) {
      await budget.record(res.tokensUsed ?? budget.estimate(prompt) + budget.estimate(res.output), "orchestrator");
    }
    if (!res.success) {
      throw new AgentError(`Planner agent failed: ${res.error ?? res.output}`, { agent: this.agent.name });
    }
    return parseResponse(res.output);
  }

  private buildContext(ctx: PlanContext): string {
    let prompt = `Goal: ${ctx.goal}\nIteration: ${ctx.iteration}`;
    if (ctx.history.length === 0) {
      return `${prompt}\n\nNothing has run yet. Plan the first batch.`;
    }

    const maxLen = getConfig().limits.outputTruncation;
    prompt += "\n\n## Previous iterations:\n";
    for (const record of ctx.history) {
      prompt += `\n### Iteration ${record.iteration} (${record.verdict})\n`;
      if (record.error) prompt += `Batch rejected: ${record.error}\n`;
      for (const result of record.results) {
        const output =
          result.output.length > maxLen ? result.output.slice(0, maxLen) + "...(truncated)" : result.output;
        prompt += `- **${result.taskId}** [${result.role}, ${result.status}]`;
        prompt += result.error ? `: ${result.error}\n` : "\n";
        if (output) prompt += `  Output: ${output}\n`;
      }
    }
    if (ctx.corrections.length > 0) {
      prompt += `\n## Corrections to address:\n${ctx.corrections.map((c) => `- ${c}`).join("\n")}\n`;
    }
    return `${prompt}\nPlan the next batch.`;
  }
}

/** Parse a planner reply, tolerating markdown fences and prose around the JSON. */
export function parseResponse(raw: string): TaskSpec[] {
  const cleaned = raw.replace(/^```(?:json)?\s*\n?/m, "").replace(/\n?```\s*$/m, "").trim();

  let parsed: unknown;
  try {
    parsed = JSON.parse(cleaned);
  } catch {
    const match = raw.match(/\{[\s\S]*\}/);
    if (!match) {
      log.error("Failed to parse planner response", { raw: raw.slice(0, 500) });
      throw new ParseError("Planner returned no JSON object");
    }
    try {
      parsed = JSON.parse(match[0]);
    } catch (err) {
      log.error("Failed to parse planner response", { raw: raw.slice(0, 500) });
      throw new ParseError(`Planner returned invalid JSON: ${String(err)}`);
    }
  }

  return parseOrThrow(PlannerResponseSchema, parsed, "planner response").tasks;
}
