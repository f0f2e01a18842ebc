import { describe, expect, it } from "vitest";
import type { AgentRequest } from "../src/agents/adapter.js";
import { FunctionAdapter } from "../src/agents/function-adapter.js";
import { BudgetManager } from "../src/budget/budget-manager.js";
import { AgentError, ParseError } from "../src/errors.js";
import { AgentPlanner, GoalPlanner, parseResponse } from "../src/planner/planner.js";
import type { IterationRecord } from "../src/supervisor/types.js";

const failedRecord: IterationRecord = {
  iteration: 1,
  tasks: [{ id: "a", description: "build", role: "implementer", dependsOn: [] }],
  results: [
    {
      taskId: "a",
      role: "implementer",
      status: "failed",
      output: "",
      error: "boom",
      errorKind: "execution_failure",
      durationMs: 1,
      estimatedCost: 2,
      startedAt: 0,
      finishedAt: 1,
    },
  ],
  blocked: [],
  verdict: "needs_correction",
  corrections: ['Task "a" (implementer) failed: boom'],
};

describe("parseResponse", () => {
  const expected = [{ id: "a", description: "A", dependsOn: [] }];

  it("parses a bare JSON batch", () => {
    expect(parseResponse('{"tasks":[{"id":"a","description":"A"}]}')).toEqual(expected);
  });

  it("strips markdown fences", () => {
    expect(parseResponse('```json\n{"tasks":[{"id":"a","description":"A"}]}\n```')).toEqual(expected);
  });

  it("finds the object inside surrounding prose", () => {
    expect(parseResponse('Here is the plan:\n{"tasks":[{"id":"a","description":"A"}]}\nGood luck')).toEqual(expected);
  });

  it("rejects a reply without JSON", () => {
    expect(() => parseResponse("no plan today")).toThrow(new ParseError("Planner returned no JSON object"));
  });

  it("rejects tasks that fail the schema", () => {
    expect(() => parseResponse('{"tasks":[{"id":"a"}]}')).toThrow("Invalid planner response: tasks.0.description: Required");
  });
});

describe("GoalPlanner", () => {
  const planner = new GoalPlanner();

  it("plans the goal itself on the first iteration", async () => {
    await expect(planner.plan({ goal: "ship it", iteration: 1, history: [], corrections: [] })).resolves.toEqual([
      { description: "ship it" },
    ]);
  });

  it("folds the last corrections into one corrective task", async () => {
    const specs = await planner.plan({ goal: "ship it", iteration: 2, history: [failedRecord], corrections: failedRecord.corrections });
    expect(specs).toEqual([
      {
        description: 'ship it\n\nFix the problems found in the previous attempt:\n- Task "a" (implementer) failed: boom',
      },
    ]);
  });
});

describe("AgentPlanner", () => {
  it("asks an orchestrator-role agent and parses its batch", async () => {
    const requests: AgentRequest[] = [];
    const agent = new FunctionAdapter({
      name: "planner",
      fn: async (req) => {
        requests.push(req);
        return '{"tasks":[{"id":"impl","description":"Implement it"},{"id":"check","description":"Validate it","role":"validator","dependsOn":["impl"]}]}';
      },
    });

    const specs = await new AgentPlanner({ agent }).plan({ goal: "ship it", iteration: 1, history: [], corrections: [] });

    expect(specs).toEqual([
      { id: "impl", description: "Implement it", dependsOn: [] },
      { id: "check", description: "Validate it", role: "validator", dependsOn: ["impl"] },
    ]);
    expect(requests[0]).toMatchObject({ taskId: "plan-1", role: "orchestrator", modelClass: "premium", thinking: "standard" });
    expect(requests[0].description.endsWith("Goal: ship it\nIteration: 1\n\nNothing has run yet. Plan the first batch.")).toBe(true);
  });

  it("shows the agent what happened in earlier iterations", async () => {
    let prompt = "";
    const agent = new FunctionAdapter({
      name: "planner",
      fn: async (req) => {
        prompt = req.description;
        return '{"tasks":[{"description":"Fix it"}]}';
      },
    });

    await new AgentPlanner({ agent }).plan({
      goal: "ship it",
      iteration: 2,
      history: [failedRecord],
      corrections: failedRecord.corrections,
    });

    expect(prompt).toContain("### Iteration 1 (needs_correction)\n- **a** [implementer, failed]: boom\n");
    expect(prompt).toContain('## Corrections to address:\n- Task "a" (implementer) failed: boom\n');
    expect(prompt.endsWith("Plan the next batch.")).toBe(true);
  });

  it("raises an AgentError when the agent fails", async () => {
    const agent = new FunctionAdapter({ name: "planner", fn: async () => ({ success: false, output: "", error: "overloaded" }) });
    const pending = new AgentPlanner({ agent }).plan({ goal: "ship it", iteration: 1, history: [], corrections: [] });
    await expect(pending).rejects.toThrow(AgentError);
    await expect(pending).rejects.toThrow("Planner agent failed: overloaded");
  });

  it("charges planning calls to the run's budget", async () => {
    const budget = new BudgetManager({ sessionLimit: 10_000 });
    const metered = new FunctionAdapter({
      name: "planner",
      fn: async () => ({ success: true, output: '{"tasks":[{"description":"Fix it"}]}', tokensUsed: 25 }),
    });

    await new AgentPlanner({ agent: metered }).plan({ goal: "ship it", iteration: 1, history: [], corrections: [] }, budget);

    expect(budget.snapshot().sessionUsed).toBe(25);
  });

  it("charges the prompt estimate when the planning call throws", async () => {
    const budget = new BudgetManager({ sessionLimit: 10_000 });
    let prompt = "";
    const broken = new FunctionAdapter({
      name: "planner",
      fn: async (req) => {
        prompt = req.description;
        throw new Error("connection reset");
      },
    });

    const pending = new AgentPlanner({ agent: broken }).plan({ goal: "ship it", iteration: 1, history: [], corrections: [] }, budget);

    await expect(pending).rejects.toThrow("connection reset");
    expect(budget.snapshot().sessionUsed).toBe(Math.ceil(prompt.length / 4));
  });
});
