export type ErrorCode =
  | "PARSE_FAILED"
  | "VALIDATION_FAILED"
  | "DUPLICATE_REGISTRATION"
  | "DUPLICATE_TASK"
  | "UNKNOWN_DEPENDENCY"
  | "INVALID_ROLE"
  | "CYCLE_DETECTED"
  | "BUDGET_EXCEEDED"
  | "AGENT_FAILED"
  | "CONFIG_INVALID"
  | "STORE_FAILED";

/** Base class for every error this package throws. */
export class OrchestratorError extends Error {
  readonly code: ErrorCode;
  readonly context: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = "OrchestratorError";
    this.code = code;
    this.context = context;
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, code: this.code, message: this.message, context: this.context };
  }
}

export class ParseError extends OrchestratorError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super("PARSE_FAILED", message, context);
    this.name = "ParseError";
  }
}

export class ValidationError extends OrchestratorError {
  constructor(code: ErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(code, message, context);
    this.name = "ValidationError";
  }
}

/** A task batch whose dependency relation is not acyclic. Fatal to the batch only. */
export class CycleDetectedError extends ValidationError {
  readonly taskIds: string[];

  constructor(cycle: string[]) {
    super("CYCLE_DETECTED", `Dependency cycle detected: ${cycle.join(" -> ")}`, { cycle });
    this.name = "CycleDetectedError";
    this.taskIds = [...new Set(cycle)];
  }
}

export class BudgetExceededError extends OrchestratorError {
  constructor(cost: number, remaining: number) {
    super("BUDGET_EXCEEDED", `Estimated cost ${cost} exceeds remaining budget ${remaining}`, { cost, remaining });
    this.name = "BudgetExceededError";
  }
}

export class AgentError extends OrchestratorError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super("AGENT_FAILED", message, context);
    this.name = "AgentError";
  }
}

export class ConfigError extends OrchestratorError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super("CONFIG_INVALID", message, context);
    this.name = "ConfigError";
  }
}

export class StoreError extends OrchestratorError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super("STORE_FAILED", message, context);
    this.name = "StoreError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
