import type { LifecycleState } from "../types/branch.js";
import type { RegressionReport } from "../types/regression.js";

export type ErrorContext = {
  branch?: string;
  batchId?: string;
  operation?: string;
  runId?: string;
  cause?: unknown;
};

export type LabErrorCode =
  | "TRANSIENT_SERVICE_ERROR"
  | "NOT_FOUND"
  | "AUTH_ERROR"
  | "CONFLICT"
  | "REGRESSION_DETECTED"
  | "INVALID_TRANSITION"
  | "RETRY_LIMIT_EXCEEDED"
  | "TRUNK_VALIDATION_FAILED"
  | "CONFIG_ERROR"
  | "STATE_ERROR"
  | "SERVICE_ERROR";

/**
 * Base class for every error labctl raises on purpose. `context` carries what a
 * caller needs to drive the fix/retry or rollback paths.
 */
export class LabError extends Error {
  readonly code: LabErrorCode;
  readonly context: ErrorContext;

  constructor(code: LabErrorCode, message: string, context: ErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = new.target.name;
    this.code = code;
    this.context = context;
  }

  toJSON(): Record<string, unknown> {
    const { cause, ...rest } = this.context;
    return {
      code: this.code,
      message: this.message,
      ...rest,
      ...(cause === undefined ? {} : { cause: describeCause(cause) }),
    };
  }
}

/** Retried locally with backoff by the adapters. */
export class TransientServiceError extends LabError {
  constructor(message: string, context?: ErrorContext) {
    super("TRANSIENT_SERVICE_ERROR", message, context);
  }
}

export class NotFoundError extends LabError {
  constructor(message: string, context?: ErrorContext) {
    super("NOT_FOUND", message, context);
  }
}

export class AuthError extends LabError {
  constructor(message: string, context?: ErrorContext) {
    super("AUTH_ERROR", message, context);
  }
}

export type ConflictDetail = {
  branches: string[];
  files?: string[];
  parameters?: string[];
};

/** Halts the sequential merge until an operator picks a side. */
export class ConflictError extends LabError {
  readonly detail: ConflictDetail;

  constructor(message: string, detail: ConflictDetail, context?: ErrorContext) {
    super("CONFLICT", message, context);
    this.detail = detail;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), detail: this.detail };
  }
}

/** Not fatal: carries the report and a recommended rollback. */
export class RegressionDetected extends LabError {
  readonly report: RegressionReport;

  constructor(report: RegressionReport, context?: ErrorContext) {
    const metrics = report.regressed.map((d) => d.metric).join(", ");
    super("REGRESSION_DETECTED", `Baseline ${report.baseline_id} regressed on: ${metrics}`, context);
    this.report = report;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), report: this.report };
  }
}

export class InvalidTransitionError extends LabError {
  readonly from: LifecycleState;
  readonly to: LifecycleState;

  constructor(from: LifecycleState, to: LifecycleState, context?: ErrorContext) {
    const who = context?.branch ? ` for branch '${context.branch}'` : "";
    super("INVALID_TRANSITION", `Invalid transition ${from} -> ${to}${who}`, context);
    this.from = from;
    this.to = to;
  }
}

export class RetryLimitExceededError extends LabError {
  constructor(branch: string, limit: number) {
    super("RETRY_LIMIT_EXCEEDED", `Branch '${branch}' reached the retry limit (${limit})`, {
      branch,
      operation: "retry",
    });
  }
}

export class TrunkValidationError extends LabError {
  readonly output: string;

  constructor(message: string, output: string, context?: ErrorContext) {
    super("TRUNK_VALIDATION_FAILED", message, context);
    this.output = output;
  }
}

/** An external service failed in a way that is neither transient, auth nor not-found. */
export class ServiceError extends LabError {
  constructor(message: string, context?: ErrorContext) {
    super("SERVICE_ERROR", message, context);
  }
}

/** A run record the tracker returned that cannot be turned into a Run. */
export class InvalidRunRecordError extends LabError {
  constructor(message: string, context?: ErrorContext) {
    super("STATE_ERROR", message, context);
  }
}

export class ConfigError extends LabError {
  constructor(message: string, context?: ErrorContext) {
    super("CONFIG_ERROR", message, context);
  }
}

export class StateError extends LabError {
  constructor(message: string, context?: ErrorContext) {
    super("STATE_ERROR", message, context);
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? `${cause.name}: ${cause.message}` : String(cause);
}
