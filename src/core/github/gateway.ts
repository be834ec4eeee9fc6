/**
 * External State Gateway - the capability set the engines need from the issue
 * tracker and PR host.
 *
 * Implementations perform exactly one logical operation per call and never
 * retry. Failures are reported with the errors from infra/errors.ts:
 * NotFoundError, PermissionDeniedError, ConflictError, ExternalSyncError, and
 * GatewayError for anything else (including timeouts).
 */

import type { BodyTransform, Issue } from "../../types/issue.js";
import type { CreatePRInput, EditPRInput, PullRequest } from "../../types/pr.js";

export interface BodyUpdate {
  /** Body after the update (or the current body when nothing changed) */
  body: string;
  /** Whether a write was performed */
  changed: boolean;
}

export interface ExternalStateGateway {
  getPR(prNumber: number): Promise<PullRequest>;

  /** Most recent PR (any state) whose head is `branch`, or null */
  findPRForBranch(branch: string): Promise<number | null>;

  createPR(input: CreatePRInput): Promise<PullRequest>;

  editPR(prNumber: number, input: EditPRInput): Promise<PullRequest>;

  /** Take a draft PR out of draft */
  markPRReady(prNumber: number): Promise<void>;

  /**
   * Read the PR body, apply `transform`, and write it back if it changed.
   * Throws ConflictError when the body changed between read and write.
   */
  updatePRBody(prNumber: number, transform: BodyTransform): Promise<BodyUpdate>;

  getIssue(issueNumber: number): Promise<Issue>;

  closeIssue(issueNumber: number, comment: string): Promise<void>;

  /** Same contract as updatePRBody, for issues */
  updateIssueBody(issueNumber: number, transform: BodyTransform): Promise<BodyUpdate>;

  /** Push task status to the external project board */
  syncExternalBoard(ledgerPath: string, milestone: string): Promise<void>;
}
