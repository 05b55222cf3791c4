export type ReleaseGateErrorCode =
  | "CONFLICT"
  | "RUN_NOT_FOUND"
  | "UNKNOWN_ENVIRONMENT"
  | "INVALID_STATE"
  | "INVALID_TRANSITION"
  | "RESOURCE_TRANSIENT"
  | "RESOURCE_TERMINAL"
  | "TIMEOUT"
  | "CANCELLED"
  | "CONFIG_INVALID";

export class ReleaseGateError extends Error {
  constructor(
    message: string,
    readonly code: ReleaseGateErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ReleaseGateError";
  }
}

export class ConflictError extends ReleaseGateError {
  constructor(
    message: string,
    readonly activeRunId: string
  ) {
    super(message, "CONFLICT");
    this.name = "ConflictError";
  }
}

export class RunNotFoundError extends ReleaseGateError {
  constructor(readonly runId: string) {
    super(`Promotion run not found: ${runId}`, "RUN_NOT_FOUND");
    this.name = "RunNotFoundError";
  }
}

export class UnknownEnvironmentError extends ReleaseGateError {
  constructor(readonly environment: string) {
    super(`Unknown environment: ${environment}`, "UNKNOWN_ENVIRONMENT");
    this.name = "UnknownEnvironmentError";
  }
}

export class InvalidStateError extends ReleaseGateError {
  constructor(message: string) {
    super(message, "INVALID_STATE");
    this.name = "InvalidStateError";
  }
}

export class InvalidTransitionError extends ReleaseGateError {
  constructor(
    readonly from: string,
    readonly to: string
  ) {
    super(`Invalid transition: ${from} -> ${to}`, "INVALID_TRANSITION");
    this.name = "InvalidTransitionError";
  }
}

/**
 * Errors raised by serving-platform collaborators. Adapters should throw one of
 * the two subclasses; anything else reaching the orchestrator is classified by
 * {@link classifyResourceError}.
 */
export class ResourceError extends ReleaseGateError {
  constructor(
    message: string,
    code: "RESOURCE_TRANSIENT" | "RESOURCE_TERMINAL",
    options?: { cause?: unknown }
  ) {
    super(message, code, options);
    this.name = "ResourceError";
  }
}

export class TransientResourceError extends ResourceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "RESOURCE_TRANSIENT", options);
    this.name = "TransientResourceError";
  }
}

export class TerminalResourceError extends ResourceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "RESOURCE_TERMINAL", options);
    this.name = "TerminalResourceError";
  }
}

export class OperationTimeoutError extends ReleaseGateError {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`, "TIMEOUT");
    this.name = "OperationTimeoutError";
  }
}

export class CancelledError extends ReleaseGateError {
  constructor(reason: string) {
    super(reason, "CANCELLED");
    this.name = "CancelledError";
  }
}

export class ConfigError extends ReleaseGateError {
  constructor(message: string) {
    super(message, "CONFIG_INVALID");
    this.name = "ConfigError";
  }
}

export type ResourceErrorClass = "transient" | "terminal";

export function classifyResourceError(error: unknown): ResourceErrorClass {
  if (error instanceof TransientResourceError) {
    return "transient";
  }
  if (error instanceof ReleaseGateError) {
    return "terminal";
  }

  if (typeof error === "object" && error !== null) {
    if ("retryable" in error && error.retryable === true) {
      return "transient";
    }
    if ("status" in error && typeof error.status === "number") {
      return error.status === 429 || error.status >= 500 ? "transient" : "terminal";
    }
  }

  return "terminal";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
