import { z } from "zod";
import { ParseError } from "./errors.js";
import { AGENT_ROLES } from "./planner/types.js";

export const AgentRoleSchema = z.enum(AGENT_ROLES);

const WorkerRoleSchema = z.enum(["researcher", "implementer", "reviewer", "validator", "writer", "refactorer"]);

export const TaskSpecSchema = z.object({
  id: z.string().min(1).optional(),
  description: z.string().min(1, "Task description is required"),
  role: AgentRoleSchema.optional(),
  dependsOn: z.array(z.string()).default([]),
  allowParallel: z.boolean().optional(),
  retries: z.number().int().min(0).optional(),
});

/** What an orchestrator-role agent returns when asked for a task batch. */
export const PlannerResponseSchema = z.object({
  tasks: z.array(TaskSpecSchema),
});

export type PlannerResponse = z.infer<typeof PlannerResponseSchema>;

/** Body an HTTP agent service may answer with. Plain text bodies are also accepted. */
export const AgentResponseSchema = z.object({
  success: z.boolean(),
  output: z.string().default(""),
  error: z.string().nullable().optional(),
  tokensUsed: z.number().int().min(0).optional(),
});

const ComplexitySchema = z.enum(["simple", "medium", "complex", "critical"]);
const ModelClassSchema = z.enum(["economy", "standard", "premium"]);

const ExecutionConfigSchema = z.object({
  complexity: ComplexitySchema,
  modelClass: ModelClassSchema,
  thinking: z.enum(["none", "standard", "extended", "max"]),
  thinkingBudget: z.number(),
  governed: z.boolean(),
});

const TerminalStatusSchema = z.enum(["succeeded", "failed", "timed_out"]);

const ErrorKindSchema = z.enum(["budget_exceeded", "execution_timeout", "execution_failure", "cancelled"]);

export const TaskResultSchema = z.object({
  taskId: z.string(),
  role: AgentRoleSchema,
  status: TerminalStatusSchema,
  output: z.string(),
  errorKind: ErrorKindSchema.nullable(),
  error: z.string().optional(),
  durationMs: z.number(),
  estimatedCost: z.number(),
  startedAt: z.number(),
  finishedAt: z.number(),
  config: ExecutionConfigSchema.optional(),
});

const BlockedTaskSchema = z.object({
  taskId: z.string(),
  role: AgentRoleSchema,
  reason: z.enum(["dependency_failed", "cancelled"]),
  blockedBy: z.array(z.string()),
});

const TaskNodeSchema = z.object({
  id: z.string(),
  description: z.string(),
  role: AgentRoleSchema,
  dependsOn: z.array(z.string()),
  allowParallel: z.boolean(),
  status: z.enum(["pending", "running", "succeeded", "failed", "timed_out"]),
  retries: z.number().optional(),
  blockedBy: z.array(z.string()).optional(),
  result: TaskResultSchema.optional(),
});

const TaskGraphSchema = z.object({
  id: z.string(),
  goal: z.string(),
  nodes: z.array(TaskNodeSchema),
});

const VerdictSchema = z.enum(["success", "needs_correction", "stuck"]);

const IterationRecordSchema = z.object({
  iteration: z.number().int(),
  tasks: z.array(
    z.object({ id: z.string(), description: z.string(), role: AgentRoleSchema, dependsOn: z.array(z.string()) }),
  ),
  results: z.array(TaskResultSchema),
  blocked: z.array(BlockedTaskSchema),
  verdict: VerdictSchema,
  corrections: z.array(z.string()),
  error: z.string().optional(),
});

const RoleShareSchema = z.object({
  percent: z.number(),
  allocated: z.number(),
  spent: z.number(),
  active: z.boolean(),
});

export const BudgetSnapshotSchema = z.object({
  sessionLimit: z.number(),
  dailyLimit: z.number(),
  sessionUsed: z.number(),
  dailyUsed: z.number(),
  day: z.string(),
  batchTotal: z.number(),
  shares: z.record(WorkerRoleSchema, RoleShareSchema),
});

const FailureSummarySchema = z.object({
  taskId: z.string(),
  role: AgentRoleSchema,
  status: TerminalStatusSchema,
  errorKind: ErrorKindSchema.nullable(),
  message: z.string(),
});

const EscalationReportSchema = z.object({
  runId: z.string(),
  goal: z.string(),
  reason: z.enum(["stuck", "max_iterations", "planner_failed"]),
  iteration: z.number().int(),
  detail: z.string(),
  failures: z.array(FailureSummarySchema),
  blocked: z.array(BlockedTaskSchema),
  budget: z.object({
    sessionUsed: z.number(),
    sessionLimit: z.number(),
    dailyUsed: z.number(),
    dailyLimit: z.number(),
    sessionPctUsed: z.number(),
  }),
});

export const SupervisorStateSchema = z.object({
  runId: z.string(),
  goal: z.string(),
  iteration: z.number().int().min(0),
  maxIterations: z.number().int().positive(),
  phase: z.enum(["planning", "executing", "evaluating", "done", "escalated"]),
  verdict: VerdictSchema.nullable(),
  history: z.array(IterationRecordSchema),
  corrections: z.array(z.string()),
  startedAt: z.number(),
  finishedAt: z.number().optional(),
  escalation: EscalationReportSchema.optional(),
});

export const RunSnapshotSchema = z.object({
  version: z.literal(1),
  state: SupervisorStateSchema,
  graph: TaskGraphSchema.nullable(),
  budget: BudgetSnapshotSchema,
});

/** Subset of the orchestrator config accepted from a JSON file. */
export const ConfigFileSchema = z
  .object({
    timeouts: z
      .object({
        task: z.number().int().positive(),
        killGrace: z.number().int().min(0),
        healthCheck: z.number().int().positive(),
      })
      .partial(),
    retry: z.object({ baseDelayMs: z.number().min(0), maxDelayMs: z.number().min(0) }).partial(),
    limits: z
      .object({
        maxConcurrency: z.number().int().positive(),
        maxIterations: z.number().int().positive(),
        stallLimit: z.number().int().positive(),
        outputTruncation: z.number().int().positive(),
      })
      .partial(),
    budget: z
      .object({
        sessionLimit: z.number().positive(),
        dailyLimit: z.number().positive(),
        warnThreshold: z.number().min(0).max(1),
        governorThreshold: z.number().min(0).max(1),
        charsPerToken: z.number().positive(),
        roleAllocation: z.object({
          implementer: z.number().min(0),
          validator: z.number().min(0),
          researcher: z.number().min(0),
          writer: z.number().min(0),
          reviewer: z.number().min(0),
          refactorer: z.number().min(0),
        }),
      })
      .partial(),
    thinking: z.object({ extendedFraction: z.number().min(0).max(1), maxTokens: z.number().int().min(0) }).partial(),
    models: z.object({ economy: z.string(), standard: z.string(), premium: z.string() }).partial(),
  })
  .partial()
  .strict();

/** Parse `data` against `schema` or throw a ParseError listing the issues. */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, data: unknown, what: string): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const msg = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ParseError(`Invalid ${what}: ${msg}`);
  }
  return result.data;
}
