import { getConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { blockDownstream, readyNodes, validate } from "../planner/task-graph.js";
import type { AgentRole, BlockedTask, TaskGraph, TaskNode, TaskResult } from "../planner/types.js";
import { createLogger } from "../utils/logger.js";
import type { TaskRunner } from "./task-runner.js";
import type { ExecutionOptions, ExecutionResult } from "./types.js";

const log = createLogger("executor");

type Completion = { node: TaskNode; result: TaskResult };

export class Executor {
  private runner: TaskRunner;

  constructor(runner: TaskRunner) {
    this.runner = runner;
  }

  /**
   * Run a validated batch to completion. Ready tasks go into a pool of at
   * most `maxConcurrency`; each completion frees a slot and may unlock
   * dependents. Task failures are reported in the result, never thrown.
   */
  async execute(graph: TaskGraph, opts: ExecutionOptions = {}): Promise<ExecutionResult> {
    const start = Date.now();
    validate(graph);

    const maxConcurrency = Math.max(1, opts.maxConcurrency ?? getConfig().limits.maxConcurrency);
    const signal = opts.abortSignal;
    const budget = this.runner.budget;

    // Unsettled tasks per role; a role's share is released when this hits zero.
    const outstanding = new Map<AgentRole, number>();
    for (const node of graph.nodes) {
      if (node.status === "pending" && !node.blockedBy) {
        outstanding.set(node.role, (outstanding.get(node.role) ?? 0) + 1);
      }
    }
    await budget.allocate(outstanding.keys());

    const results: TaskResult[] = [];
    const blocked: BlockedTask[] = [];
    const inFlight = new Map<string, Promise<Completion>>();

    const settleRole = async (role: AgentRole): Promise<void> => {
      const left = (outstanding.get(role) ?? 0) - 1;
      outstanding.set(role, left);
      if (left === 0) await budget.reallocate(role);
    };

    const reportBlocked = async (nodes: TaskNode[], reason: BlockedTask["reason"]): Promise<void> => {
      for (const node of nodes) {
        const entry: BlockedTask = { taskId: node.id, role: node.role, reason, blockedBy: [...(node.blockedBy ?? [])] };
        blocked.push(entry);
        log.warn(`Task "${node.id}" blocked`, { reason, blockedBy: entry.blockedBy });
        opts.onNodeBlocked?.(entry);
        await settleRole(node.role);
      }
    };

    for (;;) {
      if (!signal?.aborted) {
        for (const node of readyNodes(graph)) {
          if (inFlight.size >= maxConcurrency) break;
          node.status = "running";
          opts.onNodeStart?.(node.id);
          inFlight.set(node.id, this.dispatch(node, opts));
        }
      }
      if (inFlight.size === 0) break;

      const { node, result } = await Promise.race(inFlight.values());
      inFlight.delete(node.id);
      node.status = result.status;
      node.result = result;
      results.push(result);
      opts.onNodeEnd?.(node.id, result);
      await settleRole(node.role);

      if (result.status !== "succeeded") {
        const reason = result.errorKind === "cancelled" ? "cancelled" : "dependency_failed";
        await reportBlocked(blockDownstream(graph, node.id), reason);
      }
    }

    const leftover = graph.nodes.filter((n) => n.status === "pending" && !n.blockedBy);
    if (leftover.length > 0) {
      if (!signal?.aborted) {
        log.error("Execution stalled with pending tasks", { tasks: leftover.map((n) => n.id) });
      }
      const succeeded = new Set(graph.nodes.filter((n) => n.status === "succeeded").map((n) => n.id));
      for (const node of leftover) {
        node.blockedBy = node.dependsOn.filter((d) => !succeeded.has(d));
      }
      await reportBlocked(leftover, signal?.aborted ? "cancelled" : "dependency_failed");
    }

    const success = graph.nodes.every((n) => n.status === "succeeded");
    log.info(`Batch finished`, { graphId: graph.id, success, ran: results.length, blocked: blocked.length });

    return {
      graph,
      results,
      blocked,
      success,
      durationMs: Date.now() - start,
    };
  }

  private dispatch(node: TaskNode, opts: ExecutionOptions): Promise<Completion> {
    const startedAt = Date.now();
    return this.runner.run(node, { signal: opts.abortSignal, timeoutMs: opts.timeoutMs }).then(
      (result) => ({ node, result }),
      (err: unknown) => {
        const finishedAt = Date.now();
        log.error(`Task "${node.id}" threw`, { error: errorMessage(err) });
        const result: TaskResult = {
          taskId: node.id,
          role: node.role,
          status: "failed",
          output: "",
          errorKind: "execution_failure",
          error: errorMessage(err),
          durationMs: finishedAt - startedAt,
          estimatedCost: 0,
          startedAt,
          finishedAt,
        };
        return { node, result };
      },
    );
  }
}
