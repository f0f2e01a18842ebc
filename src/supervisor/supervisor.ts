import { randomUUID } from "node:crypto";
import type { AgentRegistry } from "../agents/registry.js";
import { BudgetManager, type BudgetManagerOptions } from "../budget/budget-manager.js";
import { getConfig } from "../config.js";
import { errorMessage, StoreError, ValidationError } from "../errors.js";
import { Executor } from "../executor/executor.js";
import { TaskRunner } from "../executor/task-runner.js";
import type { KnowledgeSink } from "../executor/types.js";
import type { RunStore } from "../persistence/store.js";
import { GoalPlanner } from "../planner/planner.js";
import { createTaskGraph } from "../planner/task-graph.js";
import type { TaskGraph, TaskSpec } from "../planner/types.js";
import type { ComplexityClassifier } from "../routing/classifier.js";
import { createLogger } from "../utils/logger.js";
import { ValidatorGateEvaluator } from "./evaluator.js";
import type {
  EscalationHandler,
  EscalationReason,
  EscalationReport,
  EvaluationPolicy,
  IterationRecord,
  Planner,
  RunCallbacks,
  SupervisorPhase,
  SupervisorState,
} from "./types.js";

const log = createLogger("supervisor");

export type SupervisorOptions = {
  agents: AgentRegistry;
  planner?: Planner;
  evaluator?: EvaluationPolicy;
  classifier?: ComplexityClassifier;
  sink?: KnowledgeSink;
  /** Persists a snapshot at start and after every iteration, and backs the daily ledger. */
  store?: RunStore;
  /** Limits for the budget each run creates. */
  budget?: Omit<BudgetManagerOptions, "sessionUsed" | "dailyUsed">;
  onEscalate?: EscalationHandler;
  maxIterations?: number;
  maxConcurrency?: number;
  timeoutMs?: number;
};

/** Run context that lives only as long as one `run` or `resume` call. */
type ActiveRun = {
  state: SupervisorState;
  budget: BudgetManager;
  executor: Executor;
  graph: TaskGraph | null;
  callbacks?: RunCallbacks;
};

/**
 * Plan, execute, validate, repeat. Each run owns its budget; the loop ends
 * on success, on a stuck verdict, or when the iteration cap is reached.
 */
export class Supervisor {
  private agents: AgentRegistry;
  private planner: Planner;
  private evaluator: EvaluationPolicy;
  private classifier?: ComplexityClassifier;
  private sink?: KnowledgeSink;
  private store?: RunStore;
  private budgetOptions: Omit<BudgetManagerOptions, "sessionUsed" | "dailyUsed">;
  private onEscalate?: EscalationHandler;
  private maxIterations: number;
  private maxConcurrency: number;
  private timeoutMs?: number;

  constructor(opts: SupervisorOptions) {
    const limits = getConfig().limits;
    this.agents = opts.agents;
    this.planner = opts.planner ?? new GoalPlanner();
    this.evaluator = opts.evaluator ?? new ValidatorGateEvaluator();
    this.classifier = opts.classifier;
    this.sink = opts.sink;
    this.store = opts.store;
    this.budgetOptions = opts.budget ?? {};
    this.onEscalate = opts.onEscalate;
    this.maxIterations = opts.maxIterations ?? limits.maxIterations;
    this.maxConcurrency = opts.maxConcurrency ?? limits.maxConcurrency;
    this.timeoutMs = opts.timeoutMs;
  }

  async run(goal: string, callbacks?: RunCallbacks): Promise<SupervisorState> {
    const state: SupervisorState = {
      runId: randomUUID(),
      goal,
      iteration: 0,
      maxIterations: this.maxIterations,
      phase: "planning",
      verdict: null,
      history: [],
      corrections: [],
      startedAt: Date.now(),
    };
    const budget = new BudgetManager({ ...this.budgetOptions, ledger: this.budgetOptions.ledger ?? this.store });
    log.info(`Run ${state.runId} started`, { goal: goal.slice(0, 80), maxIterations: state.maxIterations });

    const run = this.activate(state, budget, callbacks);
    this.persist(run);
    return this.loop(run);
  }

  /**
   * Continue a persisted run from its last completed iteration. A batch
   * that was in flight when the snapshot was taken is planned again.
   */
  async resume(runId: string, callbacks?: RunCallbacks): Promise<SupervisorState> {
    if (!this.store) {
      throw new StoreError("Resuming a run needs a run store", { runId });
    }
    const snapshot = this.store.get(runId);
    if (!snapshot) {
      throw new StoreError(`Run "${runId}" not found`, { runId });
    }
    const { state } = snapshot;
    if (state.phase === "done" || state.phase === "escalated") {
      log.info(`Run ${runId} already finished (${state.phase})`);
      return state;
    }

    // Iterations whose record never made it to history are redone.
    state.iteration = state.history.length;
    const budget = BudgetManager.restore(snapshot.budget, {
      ...this.budgetOptions,
      ledger: this.budgetOptions.ledger ?? this.store,
    });
    log.info(`Resuming run ${runId}`, { iteration: state.iteration, sessionUsed: snapshot.budget.sessionUsed });

    return this.loop(this.activate(state, budget, callbacks));
  }

  private activate(state: SupervisorState, budget: BudgetManager, callbacks?: RunCallbacks): ActiveRun {
    const runner = new TaskRunner({
      agents: this.agents,
      budget,
      classifier: this.classifier,
      sink: this.sink,
      timeoutMs: this.timeoutMs,
    });
    return { state, budget, executor: new Executor(runner), graph: null, callbacks };
  }

  private async loop(run: ActiveRun): Promise<SupervisorState> {
    const { state } = run;

    for (;;) {
      if (state.iteration >= state.maxIterations) {
        return this.escalate(run, "max_iterations", `No success after ${state.iteration} iterations`);
      }
      state.iteration += 1;
      this.setPhase(run, "planning");

      // Plan
      let specs: TaskSpec[];
      try {
        specs = await this.planner.plan(
          {
            goal: state.goal,
            iteration: state.iteration,
            history: state.history,
            corrections: state.corrections,
          },
          run.budget,
        );
      } catch (err) {
        const message = errorMessage(err);
        log.error(`Planner "${this.planner.name}" failed`, { iteration: state.iteration, error: message });
        this.record(run, emptyRecord(state.iteration, "stuck", message));
        return this.escalate(run, "planner_failed", message);
      }

      if (specs.length === 0) {
        const message = "Planner returned an empty batch";
        this.record(run, emptyRecord(state.iteration, "stuck", message));
        return this.escalate(run, "stuck", message);
      }

      let graph: TaskGraph;
      try {
        graph = createTaskGraph(state.goal, specs);
      } catch (err) {
        if (!(err instanceof ValidationError)) throw err;
        // A rejected batch costs an iteration; the planner sees why.
        log.warn(`Batch rejected at iteration ${state.iteration}`, { code: err.code, error: err.message });
        const correction = `The planned batch was rejected: ${err.message}`;
        this.record(run, { ...emptyRecord(state.iteration, "needs_correction", err.message), corrections: [correction] });
        state.corrections.push(correction);
        this.persist(run);
        continue;
      }

      const missing = this.agents.uncovered(graph.nodes.map((n) => n.role));
      if (missing.length > 0) {
        log.warn(`No agent serves ${missing.join(", ")}; those tasks will fail`, { iteration: state.iteration });
      }

      // Execute
      run.graph = graph;
      this.setPhase(run, "executing");
      run.callbacks?.onIterationStart?.(state.iteration, graph);
      log.info(`Iteration ${state.iteration}: executing ${graph.nodes.length} tasks`);
      this.persist(run);

      const iteration = state.iteration;
      const execution = await run.executor.execute(graph, {
        maxConcurrency: this.maxConcurrency,
        timeoutMs: this.timeoutMs,
        onNodeStart: (id) => run.callbacks?.onTaskStart?.(iteration, id),
        onNodeEnd: (id, result) => run.callbacks?.onTaskEnd?.(iteration, id, result),
        onNodeBlocked: (blocked) => run.callbacks?.onTaskBlocked?.(iteration, blocked),
      });

      // Validate
      this.setPhase(run, "evaluating");
      const evaluation = await this.evaluator.evaluate({
        iteration,
        graph,
        execution,
        history: state.history,
      });
      this.record(run, {
        iteration,
        tasks: graph.nodes.map(({ id, description, role, dependsOn }) => ({ id, description, role, dependsOn })),
        results: execution.results,
        blocked: execution.blocked,
        verdict: evaluation.verdict,
        corrections: evaluation.corrections,
      });
      log.info(`Iteration ${iteration} verdict: ${evaluation.verdict}`, { corrections: evaluation.corrections.length });

      if (evaluation.verdict === "success") {
        state.finishedAt = Date.now();
        this.setPhase(run, "done");
        this.persist(run);
        log.info(`Run ${state.runId} succeeded`, { iterations: iteration });
        return state;
      }
      if (evaluation.verdict === "stuck") {
        return this.escalate(run, "stuck", evaluation.reason ?? "No progress between iterations");
      }

      state.corrections.push(...evaluation.corrections);
      this.persist(run);
    }
  }

  private record(run: ActiveRun, record: IterationRecord): void {
    run.state.history.push(record);
    run.state.verdict = record.verdict;
    run.callbacks?.onIterationEnd?.(record);
  }

  private async escalate(run: ActiveRun, reason: EscalationReason, detail: string): Promise<SupervisorState> {
    const { state, budget } = run;
    const last = [...state.history].reverse().find((r) => r.results.length > 0 || r.blocked.length > 0);
    const snap = budget.snapshot();

    const report: EscalationReport = {
      runId: state.runId,
      goal: state.goal,
      reason,
      iteration: state.iteration,
      detail,
      failures: (last?.results ?? [])
        .filter((r) => r.status !== "succeeded")
        .map((r) => ({
          taskId: r.taskId,
          role: r.role,
          status: r.status,
          errorKind: r.errorKind,
          message: r.error ?? r.errorKind ?? r.status,
        })),
      blocked: last?.blocked ?? [],
      budget: {
        sessionUsed: snap.sessionUsed,
        sessionLimit: snap.sessionLimit,
        dailyUsed: snap.dailyUsed,
        dailyLimit: snap.dailyLimit,
        sessionPctUsed: snap.sessionLimit > 0 ? (snap.sessionUsed / snap.sessionLimit) * 100 : 100,
      },
    };

    state.escalation = report;
    state.finishedAt = Date.now();
    this.setPhase(run, "escalated");
    this.persist(run);
    log.warn(`Run ${state.runId} escalated: ${reason}`, { detail, failures: report.failures.length });

    if (this.onEscalate) {
      try {
        await this.onEscalate(report);
      } catch (err) {
        log.error("Escalation handler failed", { runId: state.runId, error: errorMessage(err) });
      }
    }
    return state;
  }

  private setPhase(run: ActiveRun, phase: SupervisorPhase): void {
    run.state.phase = phase;
    run.callbacks?.onPhase?.(phase, run.state.iteration);
  }

  private persist(run: ActiveRun): void {
    if (!this.store) return;
    try {
      this.store.save({ version: 1, state: run.state, graph: run.graph, budget: run.budget.snapshot() });
    } catch (err) {
      log.error("Failed to persist run snapshot", { runId: run.state.runId, error: errorMessage(err) });
    }
  }
}

function emptyRecord(iteration: number, verdict: IterationRecord["verdict"], error: string): IterationRecord {
  return { iteration, tasks: [], results: [], blocked: [], verdict, corrections: [], error };
}
