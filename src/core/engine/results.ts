import {
  NoCommitsError,
  NotFoundError,
  PRNotMergedError,
  SessionOrchestratorError,
  type ErrorCode,
} from "../../infra/errors.js";
import type { PullRequest } from "../../types/pr.js";
import type { ErrorResult, PRSnapshot } from "../../types/result.js";

const ERROR_LABELS: Record<ErrorCode, string> = {
  PR_NOT_MERGED: "PR not merged",
  NOT_FOUND: "Not found",
  PERMISSION_DENIED: "Permission denied",
  CONFLICT: "Concurrent update",
  MALFORMED_LEDGER: "Malformed task file",
  LEDGER_ACCESS_ERROR: "Task file unavailable",
  EXTERNAL_SYNC_ERROR: "Board sync failed",
  NO_COMMITS: "No commits to create PR from",
  CONFIGURATION_ERROR: "Invalid session configuration",
  SESSION_STATE_ERROR: "Session state error",
  GATEWAY_ERROR: "GitHub request failed",
  GIT_OPERATION_ERROR: "Git command failed",
};

export function prSnapshot(pr: PullRequest | null, prNumber: number | null): PRSnapshot {
  if (pr) {
    return { number: pr.number, state: pr.state, merged: pr.merged };
  }
  return { number: prNumber, state: null, merged: false };
}

export function errorResult(error: SessionOrchestratorError, pr: PRSnapshot): ErrorResult {
  const result: ErrorResult = {
    status: "error",
    error: error instanceof NotFoundError ? error.message : ERROR_LABELS[error.code],
    code: error.code,
    pr,
    message: nextAction(error),
  };
  if (error instanceof NotFoundError) {
    result.resource = { kind: error.resource, id: error.id };
  }
  return deepFreeze(result);
}

function nextAction(error: SessionOrchestratorError): string {
  if (error instanceof PRNotMergedError) {
    return `Merge PR #${error.prNumber} first, then retry finalize`;
  }
  if (error instanceof NoCommitsError) {
    return `Commit your work on ${error.branch} before publishing`;
  }
  if (error instanceof NotFoundError && error.resource === "pull_request") {
    return "Publish the session's work as a PR first, then retry finalize";
  }
  return error.message;
}

/** Freeze a result object and everything it contains */
export function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (typeof child === "object" && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  Object.freeze(value);
  return value;
}
