import { describe, expect, it } from "vitest";
import type { ExecutionResult } from "../../src/executor/types.js";
import type { BlockedTask, TaskGraph, TaskNode, TaskResult } from "../../src/planner/types.js";
import { failureSignature, parseValidationReport, ValidatorGateEvaluator } from "../../src/supervisor/evaluator.js";
import type { IterationRecord } from "../../src/supervisor/types.js";

function result(taskId: string, overrides: Partial<TaskResult> = {}): TaskResult {
  return {
    taskId,
    role: "implementer",
    status: "succeeded",
    output: "ok",
    errorKind: null,
    durationMs: 1,
    estimatedCost: 1,
    startedAt: 0,
    finishedAt: 1,
    ...overrides,
  };
}

function node(id: string, description: string, role: TaskNode["role"] = "implementer"): TaskNode {
  return { id, description, role, dependsOn: [], allowParallel: true, status: "pending" };
}

function context(nodes: TaskNode[], results: TaskResult[], blocked: BlockedTask[] = [], history: IterationRecord[] = []) {
  const graph: TaskGraph = { id: "g", goal: "goal", nodes };
  const execution: ExecutionResult = { graph, results, blocked, success: false, durationMs: 1 };
  return { iteration: history.length + 1, graph, execution, history };
}

function recordOf(ctx: ReturnType<typeof context>, verdict: IterationRecord["verdict"]): IterationRecord {
  return {
    iteration: ctx.iteration,
    tasks: ctx.graph.nodes,
    results: ctx.execution.results,
    blocked: ctx.execution.blocked,
    verdict,
    corrections: [],
  };
}

describe("parseValidationReport", () => {
  it("passes a clean report", () => {
    expect(parseValidationReport("PASSED\nAll checks hold.")).toEqual({ passed: true, issues: [], severity: "none" });
  });

  it("fails a report that says FAILED without listing issues", () => {
    expect(parseValidationReport("Result: FAILED")).toEqual({ passed: false, issues: [], severity: "none" });
  });

  it("collects issue lines and picks the highest severity named", () => {
    const report = parseValidationReport(
      ["PASSED with notes", "- Issue: off-by-one in pagination (low)", "* Problem: leaked test data (high)", "Recommendation: fix both"].join("\n"),
    );
    expect(report.passed).toBe(false);
    expect(report.issues).toEqual(["Issue: off-by-one in pagination (low)", "Problem: leaked test data (high)"]);
    expect(report.severity).toBe("high");
  });

  it("defaults to medium when issues name no severity", () => {
    expect(parseValidationReport("warning: flaky assertion").severity).toBe("medium");
  });
});

describe("ValidatorGateEvaluator", () => {
  it("reports success when everything succeeded and validators pass", () => {
    const ctx = context(
      [node("a", "build"), node("v", "check", "validator")],
      [result("a"), result("v", { role: "validator", output: "PASSED" })],
    );
    expect(new ValidatorGateEvaluator(2).evaluate(ctx)).toEqual({ verdict: "success", corrections: [] });
  });

  it("asks for correction when a validator rejects the work", () => {
    const ctx = context(
      [node("a", "build"), node("v", "check", "validator")],
      [result("a"), result("v", { role: "validator", output: "FAILED\n- critical: data leak" })],
    );
    expect(new ValidatorGateEvaluator(2).evaluate(ctx)).toEqual({
      verdict: "needs_correction",
      corrections: ['Validator "v" rejected the work (critical): critical: data leak'],
    });
  });

  it("lists failures and blocked tasks as corrections", () => {
    const ctx = context(
      [node("a", "build"), node("b", "ship")],
      [result("a", { status: "failed", errorKind: "execution_failure", error: "compile error", output: "" })],
      [{ taskId: "b", role: "implementer", reason: "dependency_failed", blockedBy: ["a"] }],
    );
    expect(new ValidatorGateEvaluator(2).evaluate(ctx).corrections).toEqual([
      'Task "a" (implementer) failed: compile error',
      'Task "b" (implementer) never ran: blocked by a',
    ]);
  });

  it("declares the run stuck when the same failure repeats stallLimit times", () => {
    const failing = (taskId: string) =>
      context([node(taskId, "build")], [result(taskId, { status: "timed_out", errorKind: "execution_timeout", output: "" })]);

    const first = failing("task-1");
    const evaluator = new ValidatorGateEvaluator(2);
    expect(evaluator.evaluate(first).verdict).toBe("needs_correction");

    // different id, same description and failure kind
    const second = failing("task-1b");
    const withHistory = { ...second, iteration: 2, history: [recordOf(first, "needs_correction")] };
    const verdict = evaluator.evaluate(withHistory);
    expect(verdict.verdict).toBe("stuck");
    expect(verdict.reason).toBe("Same failures in 2 consecutive iterations");
  });

  it("keeps correcting while the failures change", () => {
    const first = context([node("a", "build")], [result("a", { status: "failed", errorKind: "execution_failure", output: "" })]);
    const second = context([node("a", "build v2")], [result("a", { status: "failed", errorKind: "execution_failure", output: "" })]);
    const evaluation = new ValidatorGateEvaluator(2).evaluate({ ...second, history: [recordOf(first, "needs_correction")] });
    expect(evaluation.verdict).toBe("needs_correction");
  });
});

describe("failureSignature", () => {
  it("ignores task ids and error text", () => {
    const a = failureSignature({
      tasks: [node("x1", "build")],
      results: [result("x1", { status: "failed", errorKind: "execution_failure", error: "one" })],
      blocked: [],
    });
    const b = failureSignature({
      tasks: [node("y7", "build")],
      results: [result("y7", { status: "failed", errorKind: "execution_failure", error: "two" })],
      blocked: [],
    });
    expect(a).toBe("implementer:execution_failure:build");
    expect(b).toBe(a);
  });

  it("uses the rejection reason for batches that never ran", () => {
    expect(failureSignature({ tasks: [], results: [], blocked: [], error: "cycle" })).toBe("error:cycle");
  });
});
