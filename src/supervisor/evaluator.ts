import { getConfig } from "../config.js";
import type { BlockedTask, TaskResult } from "../planner/types.js";
import { createLogger } from "../utils/logger.js";
import type { Evaluation, EvaluationContext, EvaluationPolicy, IterationRecord } from "./types.js";

const log = createLogger("evaluator");

export type Severity = "none" | "low" | "medium" | "high" | "critical";

export type ValidationReport = {
  passed: boolean;
  issues: string[];
  severity: Severity;
};

const ISSUE_MARKERS = ["issue:", "problem:", "error:", "warning:", "critical:"];
const SEVERITY_ORDER: Severity[] = ["critical", "high", "medium", "low"];

/**
 * Read a validator's free-text report. Any mention of FAILED, or any issue
 * line, rejects the work. Severity is the highest one named in the issues,
 * medium when none is named.
 */
export function parseValidationReport(output: string): ValidationReport {
  let passed = !output.toLowerCase().includes("failed");

  const issues: string[] = [];
  for (const line of output.split(/\r?\n/)) {
    const stripped = line.trim().replace(/^[-\s]+/, "").replace(/^[*\s]+/, "");
    const lower = stripped.toLowerCase();
    if (ISSUE_MARKERS.some((marker) => lower.includes(marker))) {
      issues.push(stripped);
    }
  }

  let severity: Severity = "none";
  if (issues.length > 0) {
    const lowered = issues.map((i) => i.toLowerCase());
    severity = SEVERITY_ORDER.find((sev) => lowered.some((i) => i.includes(sev))) ?? "medium";
    passed = false;
  }
  return { passed, issues, severity };
}

type IterationOutcome = Pick<IterationRecord, "tasks" | "results" | "blocked" | "error">;

/**
 * What went wrong in an iteration, independent of task ids and error text,
 * so that two attempts failing the same way compare equal.
 */
export function failureSignature(outcome: IterationOutcome): string {
  if (outcome.error !== undefined) return `error:${outcome.error}`;
  const descriptions = new Map(outcome.tasks.map((t) => [t.id, t.description]));
  const parts: string[] = [];
  for (const result of outcome.results) {
    const description = descriptions.get(result.taskId) ?? result.taskId;
    if (result.status !== "succeeded") {
      parts.push(`${result.role}:${result.errorKind ?? result.status}:${description}`);
    } else if (result.role === "validator" && !parseValidationReport(result.output).passed) {
      parts.push(`validator:rejected:${description}`);
    }
  }
  for (const blocked of outcome.blocked) {
    parts.push(`blocked:${descriptions.get(blocked.taskId) ?? blocked.taskId}`);
  }
  return parts.sort().join("\n");
}

function describeFailure(result: TaskResult): string {
  return `Task "${result.taskId}" (${result.role}) ${result.status}: ${result.error ?? result.errorKind ?? "no output"}`;
}

function describeBlocked(blocked: BlockedTask): string {
  return blocked.reason === "cancelled"
    ? `Task "${blocked.taskId}" (${blocked.role}) was cancelled before it ran`
    : `Task "${blocked.taskId}" (${blocked.role}) never ran: blocked by ${blocked.blockedBy.join(", ")}`;
}

/**
 * Default policy. A batch succeeds only when every task succeeded, nothing
 * was blocked and no validator rejected the work. Otherwise it needs
 * correction, until the same failure has repeated for `stallLimit`
 * consecutive iterations; then the run is stuck.
 */
export class ValidatorGateEvaluator implements EvaluationPolicy {
  private stallLimit: number;

  constructor(stallLimit?: number) {
    this.stallLimit = Math.max(1, stallLimit ?? getConfig().limits.stallLimit);
  }

  evaluate(ctx: EvaluationContext): Evaluation {
    const { execution } = ctx;
    const corrections: string[] = [];

    for (const result of execution.results) {
      if (result.status !== "succeeded") {
        corrections.push(describeFailure(result));
        continue;
      }
      if (result.role !== "validator") continue;
      const report = parseValidationReport(result.output);
      if (!report.passed) {
        log.warn(`Validator "${result.taskId}" rejected the work`, { severity: report.severity, issues: report.issues.length });
        const detail = report.issues.length > 0 ? report.issues.join("; ") : "report marked FAILED";
        corrections.push(`Validator "${result.taskId}" rejected the work (${report.severity}): ${detail}`);
      }
    }
    for (const blocked of execution.blocked) {
      corrections.push(describeBlocked(blocked));
    }

    if (corrections.length === 0) {
      return { verdict: "success", corrections };
    }

    const current = failureSignature({
      tasks: ctx.graph.nodes,
      results: execution.results,
      blocked: execution.blocked,
    });
    let repeats = 1;
    for (let i = ctx.history.length - 1; i >= 0; i--) {
      const record = ctx.history[i];
      if (record.verdict === "success" || failureSignature(record) !== current) break;
      repeats++;
    }

    if (repeats >= this.stallLimit) {
      return {
        verdict: "stuck",
        corrections,
        reason: `Same failures in ${repeats} consecutive iterations`,
      };
    }
    return { verdict: "needs_correction", corrections };
  }
}
