export type ErrorCode =
  | "PR_NOT_MERGED"
  | "NOT_FOUND"
  | "PERMISSION_DENIED"
  | "CONFLICT"
  | "MALFORMED_LEDGER"
  | "LEDGER_ACCESS_ERROR"
  | "EXTERNAL_SYNC_ERROR"
  | "NO_COMMITS"
  | "CONFIGURATION_ERROR"
  | "SESSION_STATE_ERROR"
  | "GATEWAY_ERROR"
  | "GIT_OPERATION_ERROR";

export type ResourceKind = "pull_request" | "issue" | "session" | "ledger";

export class SessionOrchestratorError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = "SessionOrchestratorError";
  }
}

export class PRNotMergedError extends SessionOrchestratorError {
  constructor(
    public readonly prNumber: number,
    public readonly state: string
  ) {
    super(`PR #${prNumber} not merged (state: ${state})`, "PR_NOT_MERGED");
    this.name = "PRNotMergedError";
  }
}

export class NotFoundError extends SessionOrchestratorError {
  constructor(
    public readonly resource: ResourceKind,
    public readonly id: number | string,
    cause?: Error
  ) {
    super(`${describeResource(resource)} ${formatId(resource, id)} not found`, "NOT_FOUND", cause);
    this.name = "NotFoundError";
  }
}

export class PermissionDeniedError extends SessionOrchestratorError {
  constructor(message: string, cause?: Error) {
    super(message, "PERMISSION_DENIED", cause);
    this.name = "PermissionDeniedError";
  }
}

export class ConflictError extends SessionOrchestratorError {
  constructor(
    public readonly resource: ResourceKind,
    public readonly id: number
  ) {
    super(
      `${describeResource(resource)} ${formatId(resource, id)} was modified concurrently`,
      "CONFLICT"
    );
    this.name = "ConflictError";
  }
}

export class MalformedLedgerError extends SessionOrchestratorError {
  constructor(
    public readonly lineNumber: number,
    public readonly lineText: string
  ) {
    super(`Malformed task entry at line ${lineNumber}: ${lineText.trim()}`, "MALFORMED_LEDGER");
    this.name = "MalformedLedgerError";
  }
}

export class LedgerAccessError extends SessionOrchestratorError {
  constructor(
    public readonly path: string,
    public readonly operation: "read" | "write",
    cause: Error
  ) {
    super(`Cannot ${operation} task file ${path}: ${cause.message}`, "LEDGER_ACCESS_ERROR", cause);
    this.name = "LedgerAccessError";
  }
}

export class ExternalSyncError extends SessionOrchestratorError {
  constructor(message: string, cause?: Error) {
    super(message, "EXTERNAL_SYNC_ERROR", cause);
    this.name = "ExternalSyncError";
  }
}

export class NoCommitsError extends SessionOrchestratorError {
  constructor(
    public readonly branch: string,
    public readonly baseBranch: string
  ) {
    super(`No commits on ${branch} ahead of ${baseBranch}`, "NO_COMMITS");
    this.name = "NoCommitsError";
  }
}

export class ConfigurationError extends SessionOrchestratorError {
  constructor(message: string, cause?: Error) {
    super(message, "CONFIGURATION_ERROR", cause);
    this.name = "ConfigurationError";
  }
}

export class SessionStateError extends SessionOrchestratorError {
  constructor(message: string, cause?: Error) {
    super(message, "SESSION_STATE_ERROR", cause);
    this.name = "SessionStateError";
  }
}

export class GatewayError extends SessionOrchestratorError {
  constructor(message: string, cause?: Error) {
    super(message, "GATEWAY_ERROR", cause);
    this.name = "GatewayError";
  }
}

export class GitOperationError extends SessionOrchestratorError {
  constructor(message: string, cause?: Error) {
    super(message, "GIT_OPERATION_ERROR", cause);
    this.name = "GitOperationError";
  }
}

function describeResource(resource: ResourceKind): string {
  switch (resource) {
    case "pull_request":
      return "PR";
    case "issue":
      return "Issue";
    case "session":
      return "Session";
    case "ledger":
      return "Task file";
  }
}

function formatId(resource: ResourceKind, id: number | string): string {
  return (resource === "pull_request" || resource === "issue") && typeof id === "number"
    ? `#${id}`
    : String(id);
}

export function isSessionOrchestratorError(error: unknown): error is SessionOrchestratorError {
  return error instanceof SessionOrchestratorError;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
