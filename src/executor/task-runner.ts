import type { AgentAdapter, AgentRequest, AgentResponse } from "../agents/adapter.js";
import type { AgentRegistry } from "../agents/registry.js";
import type { BudgetManager } from "../budget/budget-manager.js";
import { getConfig } from "../config.js";
import { AgentError, BudgetExceededError, errorMessage } from "../errors.js";
import type { Complexity, ErrorKind, ExecutionConfig, TaskNode, TaskResult, TerminalStatus } from "../planner/types.js";
import { type ComplexityClassifier, KeywordClassifier } from "../routing/classifier.js";
import { type BudgetView, selectExecutionConfig } from "../routing/model-selector.js";
import { createLogger } from "../utils/logger.js";
import { withRetry } from "../utils/retry.js";
import type { KnowledgeSink } from "./types.js";

const log = createLogger("runner");

export type ConfigSelector = (tier: Complexity, budget: BudgetView) => ExecutionConfig;

export type TaskRunnerOptions = {
  agents: AgentRegistry;
  budget: BudgetManager;
  classifier?: ComplexityClassifier;
  selector?: ConfigSelector;
  sink?: KnowledgeSink;
  timeoutMs?: number;
};

export type RunTaskOptions = {
  signal?: AbortSignal;
  timeoutMs?: number;
};

type Attempt =
  | { kind: "refused"; error: string }
  | { kind: "success"; output: string; tokensUsed?: number }
  | { kind: "failure"; output: string; error: string }
  | { kind: "timeout"; error: string }
  | { kind: "cancelled"; error: string };

type Settled = { ok: true; response: AgentResponse } | { ok: false; error: unknown };

/**
 * Runs one task: classify, pick an execution config, check the budget,
 * call the agent under a timeout, debit the budget. Never throws for
 * task-level problems; they come back as a failed or timed-out result.
 */
export class TaskRunner {
  readonly budget: BudgetManager;

  private agents: AgentRegistry;
  private classifier: ComplexityClassifier;
  private selector: ConfigSelector;
  private sink?: KnowledgeSink;
  private timeoutMs?: number;

  constructor(opts: TaskRunnerOptions) {
    this.agents = opts.agents;
    this.budget = opts.budget;
    this.classifier = opts.classifier ?? new KeywordClassifier();
    this.selector = opts.selector ?? selectExecutionConfig;
    this.sink = opts.sink;
    this.timeoutMs = opts.timeoutMs;
  }

  async run(node: TaskNode, opts: RunTaskOptions = {}): Promise<TaskResult> {
    const startedAt = Date.now();
    const tier = await this.classifier.classify(node.description, this.budget);
    const config = this.selector(tier, this.budget.snapshot());
    log.debug(`Config for "${node.id}"`, {
      tier,
      modelClass: config.modelClass,
      thinking: config.thinking,
      governed: config.governed,
    });

    const promptCost = this.budget.estimate(node.description);
    const check = this.budget.check(promptCost);
    if (check.warn) {
      log.warn("Session budget above warning threshold", { sessionPctUsed: Math.round(check.sessionPctUsed) });
    }
    if (!check.canProceed) {
      const message = this.refusal(node, promptCost);
      return this.finish(node, startedAt, config, "failed", "budget_exceeded", "", message, 0);
    }

    const agent = this.agents.forRole(node.role);
    if (!agent) {
      const message = new AgentError(`No agent available for role "${node.role}"`).message;
      return this.finish(node, startedAt, config, "failed", "execution_failure", "", message, 0);
    }

    const request: AgentRequest = {
      taskId: node.id,
      description: node.description,
      role: node.role,
      thinking: config.thinking,
      thinkingBudget: config.thinkingBudget,
      modelClass: config.modelClass,
    };
    const timeoutMs = opts.timeoutMs ?? this.timeoutMs ?? getConfig().timeouts.task;
    log.info(`Dispatching "${node.id}" to agent "${agent.name}"`, { role: node.role, modelClass: config.modelClass });

    let spent = 0;
    const attempt = await withRetry(
      async (): Promise<Attempt> => {
        // Every attempt, retries included, must fit in the budget before the agent is called.
        const hold = await this.budget.reserve(promptCost);
        if (!hold) {
          return { kind: "refused", error: this.refusal(node, promptCost) };
        }
        let outcome: Attempt;
        try {
          outcome = await this.invoke(agent, request, timeoutMs, opts.signal);
        } catch (err) {
          await this.budget.release(hold);
          throw err;
        }
        const cost =
          outcome.kind === "success"
            ? outcome.tokensUsed ?? promptCost + this.budget.estimate(outcome.output)
            : promptCost;
        await this.budget.record(cost, node.role, hold);
        spent += cost;
        return outcome;
      },
      {
        maxAttempts: (node.retries ?? 0) + 1,
        retryIf: (outcome) => outcome.kind === "failure",
        signal: opts.signal,
        onRetry: (n, outcome) => log.warn(`Retrying "${node.id}" (attempt ${n})`, { error: errorText(outcome) }),
      },
    );

    switch (attempt.kind) {
      case "refused":
        return this.finish(node, startedAt, config, "failed", "budget_exceeded", "", attempt.error, spent);
      case "success":
        return this.finish(node, startedAt, config, "succeeded", null, attempt.output, undefined, spent);
      case "failure":
        return this.finish(node, startedAt, config, "failed", "execution_failure", attempt.output, attempt.error, spent);
      case "timeout":
        return this.finish(node, startedAt, config, "timed_out", "execution_timeout", "", attempt.error, spent);
      case "cancelled":
        return this.finish(node, startedAt, config, "failed", "cancelled", "", attempt.error, spent);
    }
  }

  private refusal(node: TaskNode, cost: number): string {
    const err = new BudgetExceededError(cost, this.budget.available());
    log.warn(`Task "${node.id}" refused: ${err.message}`);
    return err.message;
  }

  /** One call to the agent, bounded by the timeout and the caller's signal. */
  private async invoke(agent: AgentAdapter, request: AgentRequest, timeoutMs: number, parent?: AbortSignal): Promise<Attempt> {
    if (parent?.aborted) {
      return { kind: "cancelled", error: "Cancelled before dispatch" };
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort(new AgentError(`Task "${request.taskId}" timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    const onParentAbort = (): void => controller.abort(parent?.reason);
    parent?.addEventListener("abort", onParentAbort, { once: true });

    const aborted = new Promise<"aborted">((resolve) => {
      controller.signal.addEventListener("abort", () => resolve("aborted"), { once: true });
    });
    const call: Promise<Settled> = agent.execute(request, controller.signal).then(
      (response) => ({ ok: true, response }),
      (error: unknown) => ({ ok: false, error }),
    );

    try {
      const settled = await Promise.race([call, aborted]);
      if (settled === "aborted" || controller.signal.aborted) {
        return timedOut
          ? { kind: "timeout", error: `Timed out after ${timeoutMs}ms` }
          : { kind: "cancelled", error: "Cancelled while running" };
      }
      if (!settled.ok) {
        return { kind: "failure", output: "", error: errorMessage(settled.error) };
      }
      const { response } = settled;
      if (response.success) {
        return { kind: "success", output: response.output, tokensUsed: response.tokensUsed };
      }
      return { kind: "failure", output: response.output, error: response.error ?? "Agent reported failure" };
    } finally {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    }
  }

  private finish(
    node: TaskNode,
    startedAt: number,
    config: ExecutionConfig,
    status: TerminalStatus,
    errorKind: ErrorKind | null,
    output: string,
    error: string | undefined,
    estimatedCost: number,
  ): TaskResult {
    const finishedAt = Date.now();
    const result: TaskResult = {
      taskId: node.id,
      role: node.role,
      status,
      output,
      errorKind,
      ...(error !== undefined ? { error } : {}),
      durationMs: finishedAt - startedAt,
      estimatedCost,
      startedAt,
      finishedAt,
      config,
    };
    if (status !== "succeeded") {
      log.warn(`Task "${node.id}" ${status}`, { errorKind, error });
    }
    this.notify(result, node.description);
    return result;
  }

  private notify(result: TaskResult, description: string): void {
    const sink = this.sink;
    if (!sink) return;
    const summary = `${description.slice(0, 60)}${result.errorKind ? ` [${result.errorKind}]` : ""}`;
    void Promise.resolve()
      .then(() =>
        sink.append({
          taskId: result.taskId,
          role: result.role,
          status: result.status,
          summary,
          timestamp: result.finishedAt,
        }),
      )
      .catch((err: unknown) => log.warn("Knowledge sink append failed", { taskId: result.taskId, error: String(err) }));
  }
}

function errorText(outcome: Attempt): string {
  return outcome.kind === "success" ? "" : outcome.error;
}
