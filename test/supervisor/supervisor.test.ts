import { afterEach, describe, expect, it, vi } from "vitest";
import { type AgentFunction, FunctionAdapter } from "../../src/agents/function-adapter.js";
import { AgentRegistry } from "../../src/agents/registry.js";
import { BudgetManager } from "../../src/budget/budget-manager.js";
import { StoreError } from "../../src/errors.js";
import { RunStore } from "../../src/persistence/store.js";
import type { TaskSpec } from "../../src/planner/types.js";
import { ValidatorGateEvaluator } from "../../src/supervisor/evaluator.js";
import { Supervisor } from "../../src/supervisor/supervisor.js";
import type { EscalationReport, PlanContext, Planner, SupervisorPhase } from "../../src/supervisor/types.js";

function registryWith(fn: AgentFunction): AgentRegistry {
  const agents = new AgentRegistry();
  agents.add(new FunctionAdapter({ name: "default", fn }));
  return agents;
}

/** Hands out the given batches in order, repeating the last one. */
class ScriptedPlanner implements Planner {
  readonly name = "scripted";
  contexts: PlanContext[] = [];
  private batches: TaskSpec[][];

  constructor(...batches: TaskSpec[][]) {
    this.batches = batches;
  }

  async plan(ctx: PlanContext): Promise<TaskSpec[]> {
    this.contexts.push(structuredClone(ctx));
    return this.batches[Math.min(this.contexts.length, this.batches.length) - 1];
  }
}

const stores: RunStore[] = [];

function memoryStore(): RunStore {
  const store = new RunStore(":memory:");
  stores.push(store);
  return store;
}

afterEach(() => {
  for (const store of stores.splice(0)) store.close();
});

describe("Supervisor", () => {
  it("finishes after one iteration when the batch succeeds", async () => {
    const phases: SupervisorPhase[] = [];
    const supervisor = new Supervisor({ agents: registryWith(async () => "shipped") });

    const state = await supervisor.run("ship it", { onPhase: (phase) => phases.push(phase) });

    expect(state.phase).toBe("done");
    expect(state.verdict).toBe("success");
    expect(state.iteration).toBe(1);
    expect(state.history).toHaveLength(1);
    expect(state.history[0].tasks).toEqual([{ id: "task-1", description: "ship it", role: "implementer", dependsOn: [] }]);
    expect(state.history[0].results[0].output).toBe("shipped");
    expect(state.finishedAt).toBeDefined();
    expect(phases).toEqual(["planning", "executing", "evaluating", "done"]);
  });

  it("feeds a validator's rejection back to the planner and iterates", async () => {
    let validations = 0;
    const planner = new ScriptedPlanner([
      { id: "impl", description: "build", role: "implementer" },
      { id: "check", description: "check", role: "validator", dependsOn: ["impl"] },
    ]);
    const supervisor = new Supervisor({
      agents: registryWith(async (req) => {
        if (req.role !== "validator") return "built";
        validations++;
        return validations === 1 ? "FAILED\n- issue: missing tests" : "PASSED";
      }),
      planner,
    });

    const state = await supervisor.run("ship it");

    expect(state.phase).toBe("done");
    expect(state.iteration).toBe(2);
    expect(state.history.map((r) => r.verdict)).toEqual(["needs_correction", "success"]);
    expect(planner.contexts[1].corrections).toEqual(['Validator "check" rejected the work (medium): issue: missing tests']);
    expect(planner.contexts[1].iteration).toBe(2);
  });

  it("escalates as stuck when the same failure repeats", async () => {
    const reports: EscalationReport[] = [];
    const supervisor = new Supervisor({
      agents: registryWith(async () => ({ success: false, output: "", error: "nope" })),
      planner: new ScriptedPlanner([{ description: "build it" }]),
      onEscalate: (report) => {
        reports.push(report);
      },
    });

    const state = await supervisor.run("ship it");

    expect(state.phase).toBe("escalated");
    expect(state.verdict).toBe("stuck");
    expect(state.iteration).toBe(2);
    expect(reports).toHaveLength(1);
    expect(reports[0]).toMatchObject({
      runId: state.runId,
      goal: "ship it",
      reason: "stuck",
      iteration: 2,
      detail: "Same failures in 2 consecutive iterations",
      failures: [{ taskId: "task-1", role: "implementer", status: "failed", errorKind: "execution_failure", message: "nope" }],
      blocked: [],
    });
    expect(state.escalation).toEqual(reports[0]);
  });

  it("stops at the iteration cap", async () => {
    const onEscalate = vi.fn();
    const supervisor = new Supervisor({
      agents: registryWith(async () => ({ success: false, output: "", error: "nope" })),
      evaluator: new ValidatorGateEvaluator(10),
      maxIterations: 3,
      onEscalate,
    });

    const state = await supervisor.run("ship it");

    expect(state.phase).toBe("escalated");
    expect(state.iteration).toBe(3);
    expect(state.history).toHaveLength(3);
    expect(state.escalation?.reason).toBe("max_iterations");
    expect(state.escalation?.detail).toBe("No success after 3 iterations");
    expect(onEscalate).toHaveBeenCalledTimes(1);
  });

  it("reports budget exhaustion in the escalation", async () => {
    const fn = vi.fn<AgentFunction>(async () => "never");
    const supervisor = new Supervisor({
      agents: registryWith(fn),
      planner: new ScriptedPlanner([{ description: "x".repeat(20) }]),
      budget: { sessionLimit: 1 },
    });

    const state = await supervisor.run("ship it");

    expect(fn).not.toHaveBeenCalled();
    expect(state.escalation?.failures[0]).toMatchObject({ errorKind: "budget_exceeded", message: "Estimated cost 5 exceeds remaining budget 1" });
    expect(state.escalation?.budget).toEqual({
      sessionUsed: 0,
      sessionLimit: 1,
      dailyUsed: 0,
      dailyLimit: 500_000,
      sessionPctUsed: 0,
    });
  });

  it("treats an empty batch as stuck", async () => {
    const supervisor = new Supervisor({ agents: registryWith(async () => "ok"), planner: new ScriptedPlanner([]) });

    const state = await supervisor.run("ship it");

    expect(state.escalation?.reason).toBe("stuck");
    expect(state.escalation?.detail).toBe("Planner returned an empty batch");
    expect(state.history[0]).toMatchObject({ verdict: "stuck", error: "Planner returned an empty batch" });
  });

  it("escalates when the planner fails", async () => {
    const planner: Planner = {
      name: "broken",
      plan: async () => {
        throw new Error("planner offline");
      },
    };
    const supervisor = new Supervisor({ agents: registryWith(async () => "ok"), planner });

    const state = await supervisor.run("ship it");

    expect(state.phase).toBe("escalated");
    expect(state.escalation?.reason).toBe("planner_failed");
    expect(state.escalation?.detail).toBe("planner offline");
  });

  it("re-plans after a cyclic batch, counting it as an iteration", async () => {
    const planner = new ScriptedPlanner(
      [
        { id: "a", description: "A", dependsOn: ["b"] },
        { id: "b", description: "B", dependsOn: ["a"] },
      ],
      [{ id: "a", description: "A" }],
    );
    const agent = vi.fn<AgentFunction>(async () => "ok");
    const supervisor = new Supervisor({ agents: registryWith(agent), planner });

    const state = await supervisor.run("ship it");

    expect(state.phase).toBe("done");
    expect(state.iteration).toBe(2);
    expect(state.history[0]).toMatchObject({
      verdict: "needs_correction",
      error: "Dependency cycle detected: a -> b -> a",
      tasks: [],
    });
    expect(planner.contexts[1].corrections).toEqual(["The planned batch was rejected: Dependency cycle detected: a -> b -> a"]);
    expect(agent).toHaveBeenCalledTimes(1);
  });

  it("survives an escalation handler that throws", async () => {
    const supervisor = new Supervisor({
      agents: registryWith(async () => "ok"),
      planner: new ScriptedPlanner([]),
      onEscalate: () => {
        throw new Error("pager down");
      },
    });
    await expect(supervisor.run("ship it")).resolves.toMatchObject({ phase: "escalated" });
  });

  describe("persistence", () => {
    it("saves the finished run with its graph and budget", async () => {
      const store = memoryStore();
      const supervisor = new Supervisor({ agents: registryWith(async () => "ok"), store });

      const state = await supervisor.run("ship it");
      const snapshot = store.get(state.runId);

      expect(snapshot?.state.phase).toBe("done");
      expect(snapshot?.graph?.nodes.map((n) => n.status)).toEqual(["succeeded"]);
      expect(snapshot?.budget.sessionUsed).toBeGreaterThan(0);
      expect(store.list()[0]).toMatchObject({ runId: state.runId, phase: "done", iteration: 1, verdict: "success" });
    });

    it("resumes an interrupted run from its last completed iteration", async () => {
      const store = memoryStore();
      const budget = new BudgetManager({ sessionLimit: 50_000 });
      await budget.record(1_000, "implementer");
      store.save({
        version: 1,
        state: {
          runId: "run-1",
          goal: "ship it",
          iteration: 2,
          maxIterations: 5,
          phase: "executing",
          verdict: "needs_correction",
          history: [
            { iteration: 1, tasks: [], results: [], blocked: [], verdict: "needs_correction", corrections: ["fix the build"] },
          ],
          corrections: ["fix the build"],
          startedAt: 1,
        },
        graph: null,
        budget: budget.snapshot(),
      });
      const planner = new ScriptedPlanner([{ description: "fix the build" }]);
      const supervisor = new Supervisor({ agents: registryWith(async () => "fixed"), planner, store });

      const state = await supervisor.resume("run-1");

      expect(state.phase).toBe("done");
      expect(state.iteration).toBe(2);
      expect(state.history).toHaveLength(2);
      expect(planner.contexts[0]).toMatchObject({ iteration: 2, corrections: ["fix the build"] });
      const saved = store.get("run-1");
      expect(saved?.budget.sessionLimit).toBe(50_000);
      expect(saved?.budget.sessionUsed).toBeGreaterThan(1_000);
    });

    it("returns a finished run unchanged", async () => {
      const store = memoryStore();
      const supervisor = new Supervisor({ agents: registryWith(async () => "ok"), store });
      const done = await supervisor.run("ship it");

      const again = await supervisor.resume(done.runId);

      expect(again).toEqual(store.get(done.runId)?.state);
      expect(again.history).toHaveLength(1);
    });

    it("refuses to resume without a store or an unknown run", async () => {
      const agents = registryWith(async () => "ok");
      await expect(new Supervisor({ agents }).resume("run-1")).rejects.toThrow("Resuming a run needs a run store");
      await expect(new Supervisor({ agents, store: memoryStore() }).resume("nope")).rejects.toThrow(StoreError);
    });
  });
});
