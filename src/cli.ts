#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import type { AgentAdapter } from "./agents/adapter.js";
import { selectBackend } from "./agents/backend.js";
import { HttpAdapter } from "./agents/http-adapter.js";
import { ProcessAdapter } from "./agents/process-adapter.js";
import { AgentRegistry } from "./agents/registry.js";
import { BudgetManager } from "./budget/budget-manager.js";
import { getConfig, loadConfigFile } from "./config.js";
import { errorMessage } from "./errors.js";
import { ProgressLog } from "./persistence/progress-log.js";
import { RunStore } from "./persistence/store.js";
import { AgentPlanner, GoalPlanner } from "./planner/planner.js";
import { createTaskGraph, topologicalSort } from "./planner/task-graph.js";
import { KeywordClassifier } from "./routing/classifier.js";
import { selectExecutionConfig } from "./routing/model-selector.js";
import { formatEscalation, formatOutcome } from "./supervisor/report.js";
import { Supervisor } from "./supervisor/supervisor.js";
import type { Planner, RunCallbacks, SupervisorState } from "./supervisor/types.js";
import { setLogLevel } from "./utils/logger.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", reason instanceof Error ? reason.message : reason);
});

type GlobalOptions = {
  debug?: boolean;
  config?: string;
  db?: string;
};

type AgentOptions = {
  agentCmd: string;
  agentUrl?: string;
  planWithAgent?: boolean;
};

type RunOptions = AgentOptions & {
  maxIterations?: number;
  concurrency?: number;
  timeout?: number;
  sessionLimit?: number;
  dailyLimit?: number;
  progress: string;
};

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return n;
}

const program = new Command();

program
  .name("taskforge")
  .description("Plan, run and validate batches of tasks across role-specialised agents")
  .version("0.1.0")
  .option("--debug", "Enable debug logging")
  .option("--config <path>", "JSON config file applied over the defaults")
  .option("--db <path>", "Run store database file (default: ~/.taskforge/runs.db)");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts = actionCmd.optsWithGlobals<GlobalOptions>();
  if (opts.debug) setLogLevel("debug");
  if (opts.config) loadConfigFile(opts.config);
});

function withAgentOptions(cmd: Command): Command {
  return cmd
    .option("--agent-cmd <command>", "Command-line agent spawned per task", "claude")
    .option("--agent-url <url>", "HTTP agent service, preferred when its health check passes")
    .option("--plan-with-agent", "Ask the agent to plan each batch instead of running the goal as one task");
}

function withRunOptions(cmd: Command): Command {
  return withAgentOptions(cmd)
    .option("-i, --max-iterations <n>", "Max plan/execute/validate iterations", positiveInt)
    .option("-c, --concurrency <n>", "Max parallel tasks", positiveInt)
    .option("-t, --timeout <ms>", "Per-task timeout in milliseconds", positiveInt)
    .option("--session-limit <tokens>", "Session token budget", positiveInt)
    .option("--daily-limit <tokens>", "Daily token budget", positiveInt)
    .option("--progress <path>", "Progress log file", "PROGRESS.md");
}

async function buildBackend(opts: AgentOptions): Promise<AgentAdapter> {
  const local = new ProcessAdapter({ name: "local", command: opts.agentCmd });
  const enhanced = opts.agentUrl ? new HttpAdapter({ name: "remote", url: opts.agentUrl }) : undefined;
  return selectBackend(enhanced, local);
}

function buildPlanner(opts: AgentOptions, backend: AgentAdapter): Planner {
  return opts.planWithAgent ? new AgentPlanner({ agent: backend }) : new GoalPlanner();
}

async function buildSupervisor(opts: RunOptions, store: RunStore): Promise<Supervisor> {
  const backend = await buildBackend(opts);
  const agents = new AgentRegistry();
  agents.add(backend);

  return new Supervisor({
    agents,
    planner: buildPlanner(opts, backend),
    store,
    sink: new ProgressLog(opts.progress),
    budget: {
      ...(opts.sessionLimit !== undefined ? { sessionLimit: opts.sessionLimit } : {}),
      ...(opts.dailyLimit !== undefined ? { dailyLimit: opts.dailyLimit } : {}),
    },
    maxIterations: opts.maxIterations,
    maxConcurrency: opts.concurrency,
    timeoutMs: opts.timeout,
    onEscalate: (report) => {
      console.error(`\n${formatEscalation(report)}`);
    },
  });
}

const progressCallbacks: RunCallbacks = {
  onIterationStart: (iteration, graph) => {
    console.error(`\nIteration ${iteration}: ${graph.nodes.length} task(s)`);
  },
  onTaskStart: (_iteration, taskId) => console.error(`  > ${taskId}`),
  onTaskEnd: (_iteration, taskId, result) => {
    console.error(`  ${result.status === "succeeded" ? "+" : "x"} ${taskId} ${result.status} (${result.durationMs}ms)`);
  },
  onTaskBlocked: (_iteration, blocked) => console.error(`  - ${blocked.taskId} blocked`),
};

function report(state: SupervisorState): void {
  if (state.phase === "done") {
    console.log(`\n${formatOutcome(state)}`);
    return;
  }
  process.exitCode = 1;
}

// --- run ---
withRunOptions(
  program
    .command("run")
    .description("Run the plan/execute/validate loop for a goal")
    .argument("<goal>", "The goal to accomplish"),
).action(async (goal: string, opts: RunOptions, cmd: Command) => {
  const store = new RunStore(cmd.optsWithGlobals<GlobalOptions>().db);
  try {
    const supervisor = await buildSupervisor(opts, store);
    const state = await supervisor.run(goal, progressCallbacks);
    console.error(`Run id: ${state.runId}`);
    report(state);
  } catch (err) {
    console.error("Run failed:", errorMessage(err));
    process.exitCode = 1;
  } finally {
    store.close();
  }
});

// --- resume ---
withRunOptions(
  program
    .command("resume")
    .description("Continue a persisted run from its last completed iteration")
    .argument("<runId>", "Run to resume"),
).action(async (runId: string, opts: RunOptions, cmd: Command) => {
  const store = new RunStore(cmd.optsWithGlobals<GlobalOptions>().db);
  try {
    const supervisor = await buildSupervisor(opts, store);
    report(await supervisor.resume(runId, progressCallbacks));
  } catch (err) {
    console.error("Resume failed:", errorMessage(err));
    process.exitCode = 1;
  } finally {
    store.close();
  }
});

// --- plan ---
withAgentOptions(
  program
    .command("plan")
    .description("Preview the first batch with each task's role, tier and execution config (dry-run)")
    .argument("<goal>", "The goal to decompose"),
).action(async (goal: string, opts: AgentOptions) => {
  try {
    const backend = await buildBackend(opts);
    const specs = await buildPlanner(opts, backend).plan({ goal, iteration: 1, history: [], corrections: [] });
    const graph = createTaskGraph(goal, specs);
    const budget = new BudgetManager();
    const classifier = new KeywordClassifier();

    for (const node of topologicalSort(graph)) {
      const tier = classifier.classifySync(node.description);
      const config = selectExecutionConfig(tier, budget.snapshot());
      const deps = node.dependsOn.length > 0 ? ` after ${node.dependsOn.join(", ")}` : "";
      console.log(`${node.id} [${node.role}] ${tier} -> ${config.modelClass}, thinking ${config.thinking} (${config.thinkingBudget})${deps}`);
      console.log(`    ${node.description.split("\n")[0].slice(0, 120)}`);
    }
  } catch (err) {
    console.error("Error:", errorMessage(err));
    process.exitCode = 1;
  }
});

// --- runs ---
const runs = program.command("runs").description("Inspect persisted runs");

runs
  .command("list")
  .description("List recent runs")
  .option("-n, --limit <n>", "How many runs to show", positiveInt, 20)
  .action((opts: { limit: number }, cmd: Command) => {
    const store = new RunStore(cmd.optsWithGlobals<GlobalOptions>().db);
    try {
      const rows = store.list(opts.limit);
      if (rows.length === 0) {
        console.log("No runs recorded.");
        return;
      }
      for (const r of rows) {
        console.log(`${r.runId}  ${r.phase.padEnd(10)} it=${r.iteration}  ${new Date(r.startedAt).toISOString()}  ${r.goal.slice(0, 60)}`);
      }
    } finally {
      store.close();
    }
  });

runs
  .command("show")
  .description("Print a run snapshot as JSON")
  .argument("<runId>", "Run to show")
  .action((runId: string, _opts: unknown, cmd: Command) => {
    const store = new RunStore(cmd.optsWithGlobals<GlobalOptions>().db);
    try {
      const snapshot = store.get(runId);
      if (!snapshot) {
        console.error(`Run "${runId}" not found`);
        process.exitCode = 1;
        return;
      }
      console.log(JSON.stringify(snapshot, null, 2));
    } catch (err) {
      console.error("Error:", errorMessage(err));
      process.exitCode = 1;
    } finally {
      store.close();
    }
  });

runs
  .command("delete")
  .description("Delete a persisted run")
  .argument("<runId>", "Run to delete")
  .action((runId: string, _opts: unknown, cmd: Command) => {
    const store = new RunStore(cmd.optsWithGlobals<GlobalOptions>().db);
    try {
      if (store.delete(runId)) {
        console.log(`Deleted ${runId}`);
      } else {
        console.error(`Run "${runId}" not found`);
        process.exitCode = 1;
      }
    } finally {
      store.close();
    }
  });

// --- budget ---
program
  .command("budget")
  .description("Show today's recorded token usage")
  .action((_opts: unknown, cmd: Command) => {
    const store = new RunStore(cmd.optsWithGlobals<GlobalOptions>().db);
    try {
      const day = new Date().toISOString().slice(0, 10);
      const used = store.dailyUsage(day);
      const limit = getConfig().budget.dailyLimit;
      console.log(`${day}: ${used}/${limit} tokens (${((used / limit) * 100).toFixed(1)}%)`);
      for (const { role, total } of store.usageByRole(day)) {
        console.log(`  ${(role ?? "unassigned").padEnd(12)} ${total}`);
      }
    } finally {
      store.close();
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exit(1);
});
