import type { EscalationReport, SupervisorState } from "./types.js";

function pct(value: number): string {
  return `${value.toFixed(1)}%`;
}

/** Human-readable escalation summary, one fact per line. */
export function formatEscalation(report: EscalationReport): string {
  const lines = [
    `Run ${report.runId} escalated (${report.reason}) at iteration ${report.iteration}: ${report.detail}`,
  ];
  if (report.failures.length > 0) {
    lines.push("Failed tasks:");
    for (const f of report.failures) {
      lines.push(`  - ${f.taskId} [${f.role}] ${f.errorKind ?? f.status}: ${f.message}`);
    }
  }
  if (report.blocked.length > 0) {
    lines.push("Blocked tasks:");
    for (const b of report.blocked) {
      const why = b.reason === "cancelled" ? "cancelled" : `blocked by ${b.blockedBy.join(", ")}`;
      lines.push(`  - ${b.taskId} [${b.role}] ${why}`);
    }
  }
  const { budget } = report;
  lines.push(
    `Budget: session ${budget.sessionUsed}/${budget.sessionLimit} (${pct(budget.sessionPctUsed)}), daily ${budget.dailyUsed}/${budget.dailyLimit}`,
  );
  return lines.join("\n");
}

/** Outcome of the final iteration of a finished run. */
export function formatOutcome(state: SupervisorState): string {
  const last = state.history.at(-1);
  const lines = [`Run ${state.runId} ${state.phase} after ${state.iteration} iteration(s)`];
  for (const result of last?.results ?? []) {
    const output = result.output.trim().slice(0, 200) || "(no output)";
    lines.push(`  [${result.status}] ${result.taskId} (${result.role}): ${result.error ?? output}`);
  }
  return lines.join("\n");
}
