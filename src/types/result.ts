/**
 * Structured results of the publish and finalize commands. Field names are
 * snake_case because these objects are printed verbatim by `--json`.
 */

import type { ErrorCode, ResourceKind } from "../infra/errors.js";
import type { PRState, PublishAction } from "./pr.js";
import type { SessionType, SessionWorkflow, StepStatus, WorkflowStep } from "./session.js";

export interface PRSnapshot {
  number: number | null;
  state: PRState | null;
  merged: boolean;
}

export interface IssueClosure {
  number: number;
  /** Issue is closed after finalize (by this run or an earlier one) */
  closed: boolean;
  /** Comment posted by this run, null when the issue was already closed */
  comment: string | null;
}

export interface TaskSummary {
  file: string;
  total: number;
  completed: number;
  /** Entries toggled to done by this run */
  marked: number;
}

export interface ParentIssueUpdate {
  number: number;
  /** The parent body was written by this run */
  updated: boolean;
  /** e.g. "4/6 phases complete" */
  progress: string;
  /** The phase's checklist line is checked after finalize */
  checklist_updated: boolean;
}

export interface DraftTransition {
  number: number;
  description_updated: boolean;
  still_draft: boolean;
  reason: string;
}

interface FinalizeSuccessBase {
  status: "success";
  pr_merged: true;
  tasks: TaskSummary;
  synced_to_projects: boolean;
  warnings: string[];
  ready_for_wrap: boolean;
}

export interface GitHubIssueFinalizeResult extends FinalizeSuccessBase {
  session_type: "github_issue";
  issue: IssueClosure;
}

export interface SpeckitFinalizeResult extends FinalizeSuccessBase {
  session_type: "speckit";
  phase_issue: IssueClosure;
  parent_issue: ParentIssueUpdate;
  pr: DraftTransition;
}

export interface UnstructuredFinalizeResult extends FinalizeSuccessBase {
  session_type: "unstructured";
}

export interface ErrorResult {
  status: "error";
  /** Short error label, e.g. "PR not merged" */
  error: string;
  code: ErrorCode;
  pr: PRSnapshot;
  /** What the operator should do next */
  message: string;
  resource?: { kind: ResourceKind; id: number | string };
}

export type FinalizeSuccess =
  | GitHubIssueFinalizeResult
  | SpeckitFinalizeResult
  | UnstructuredFinalizeResult;

export type FinalizeResult = FinalizeSuccess | ErrorResult;

export interface PublishedPR {
  number: number;
  url: string;
  state: PRState;
  draft: boolean;
  action: PublishAction;
  linked_issues: number[];
}

export interface PublishSuccess {
  status: "success";
  pr: PublishedPR;
  next_steps: string[];
}

export type PublishResult = PublishSuccess | ErrorResult;

export interface SessionStatus {
  session_id: string;
  dir: string;
  session_type: SessionType;
  workflow: SessionWorkflow;
  issue_number: number | null;
  parent_issue: number | null;
  pr_number: number | null;
  /** null when the ledger location cannot be resolved */
  tasks: (Omit<TaskSummary, "marked"> & { exists: boolean; open: string[] }) | null;
  touched_tasks: string[];
  step: { current: WorkflowStep; status: StepStatus };
}
