// Config
export { getConfig, configure, loadConfigFile, resetConfig, defaults } from "./config.js";
export type { OrchestratorConfig, DeepPartial } from "./config.js";

// Errors
export {
  OrchestratorError,
  ParseError,
  ValidationError,
  CycleDetectedError,
  BudgetExceededError,
  AgentError,
  ConfigError,
  StoreError,
  errorMessage,
} from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Schemas
export {
  parseOrThrow,
  TaskSpecSchema,
  PlannerResponseSchema,
  AgentResponseSchema,
  RunSnapshotSchema,
  ConfigFileSchema,
} from "./schemas.js";

// Persistence
export { RunStore } from "./persistence/store.js";
export type { RunSummary } from "./persistence/store.js";
export { ProgressLog, formatProgressLine } from "./persistence/progress-log.js";

// Supervisor
export { Supervisor } from "./supervisor/supervisor.js";
export type { SupervisorOptions } from "./supervisor/supervisor.js";
export { ValidatorGateEvaluator, parseValidationReport, failureSignature } from "./supervisor/evaluator.js";
export type { Severity, ValidationReport } from "./supervisor/evaluator.js";
export { formatEscalation, formatOutcome } from "./supervisor/report.js";
export type {
  Evaluation,
  EvaluationContext,
  EvaluationPolicy,
  EscalationHandler,
  EscalationReason,
  EscalationReport,
  IterationRecord,
  PlanContext,
  Planner,
  RunCallbacks,
  RunSnapshot,
  SupervisorPhase,
  SupervisorState,
  Verdict,
} from "./supervisor/types.js";

// Planning
export { GoalPlanner, AgentPlanner, parseResponse } from "./planner/planner.js";
export type { AgentPlannerOptions } from "./planner/planner.js";
export {
  createTaskGraph,
  validate,
  topologicalSort,
  readyNodes,
  blockDownstream,
  isSettled,
  graphSummary,
} from "./planner/task-graph.js";

// Execution
export { Executor } from "./executor/executor.js";
export { TaskRunner } from "./executor/task-runner.js";
export type { TaskRunnerOptions, RunTaskOptions, ConfigSelector } from "./executor/task-runner.js";
export type { ExecutionOptions, ExecutionResult, KnowledgeEntry, KnowledgeSink } from "./executor/types.js";

// Budget
export { BudgetManager } from "./budget/budget-manager.js";
export type {
  BudgetCheck,
  BudgetDebit,
  BudgetLedger,
  BudgetManagerOptions,
  BudgetSnapshot,
  RoleShare,
} from "./budget/budget-manager.js";

// Routing
export { KeywordClassifier, AgentClassifier, DEFAULT_KEYWORDS } from "./routing/classifier.js";
export type { ComplexityClassifier, KeywordTable } from "./routing/classifier.js";
export { selectExecutionConfig, isGoverned } from "./routing/model-selector.js";
export type { BudgetView } from "./routing/model-selector.js";
export { routeRole, ROLE_KEYWORDS } from "./routing/role-router.js";

// Agents
export type { AgentAdapter, AgentRequest, AgentResponse } from "./agents/adapter.js";
export { AgentRegistry } from "./agents/registry.js";
export { selectBackend } from "./agents/backend.js";
export { HttpAdapter } from "./agents/http-adapter.js";
export type { HttpAdapterOptions } from "./agents/http-adapter.js";
export { FunctionAdapter } from "./agents/function-adapter.js";
export type { AgentFunction, FunctionAdapterOptions } from "./agents/function-adapter.js";
export { ProcessAdapter, defaultArgs } from "./agents/process-adapter.js";
export type { ProcessAdapterOptions } from "./agents/process-adapter.js";

// Types
export { AGENT_ROLES, WORKER_ROLES } from "./planner/types.js";
export type {
  AgentRole,
  WorkerRole,
  Complexity,
  ModelClass,
  ThinkingIntensity,
  ExecutionConfig,
  TaskSpec,
  TaskNode,
  TaskGraph,
  TaskResult,
  TaskStatus,
  BlockedTask,
  ErrorKind,
} from "./planner/types.js";

// Utils
export { log, createLogger, setLogLevel } from "./utils/logger.js";
export type { Logger, LogLevel } from "./utils/logger.js";
export { withRetry } from "./utils/retry.js";
export { Mutex } from "./utils/mutex.js";
