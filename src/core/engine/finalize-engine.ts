/**
 * Finalize Engine - post-merge reconciliation of a session.
 *
 *   Start → PRChecked → Dispatched(type) → Synced → Done
 *                     ↘ Aborted (PR missing or not merged)
 *
 * Every side effect is idempotent so that re-running finalize is the recovery
 * path after a partial failure.
 */

import { basename, join } from "node:path";
import { logger } from "../../infra/logger.js";
import {
  ConfigurationError,
  ConflictError,
  NotFoundError,
  PRNotMergedError,
  isSessionOrchestratorError,
  toError,
} from "../../infra/errors.js";
import type { ExternalStateGateway } from "../github/gateway.js";
import type { TaskDocumentStore } from "../ledger/task-documents.js";
import { count, markDone } from "../ledger/task-ledger.js";
import {
  checkPhase,
  findPhaseItems,
  formatProgress,
  phaseProgress,
  type PhaseProgress,
} from "../github/checklist.js";
import { deepFreeze, errorResult, prSnapshot } from "./results.js";
import type { PullRequest } from "../../types/pr.js";
import type {
  GitHubIssueSession,
  SessionContext,
  SpeckitSession,
} from "../../types/session.js";
import type {
  DraftTransition,
  FinalizeResult,
  FinalizeSuccess,
  GitHubIssueFinalizeResult,
  IssueClosure,
  ParentIssueUpdate,
  SpeckitFinalizeResult,
  TaskSummary,
  UnstructuredFinalizeResult,
} from "../../types/result.js";

export interface FinalizeEngineOptions {
  gateway: ExternalStateGateway;
  documents: TaskDocumentStore;
  /** Run the best-effort board sync step (default true) */
  syncBoard?: boolean;
}

export interface FinalizeInput {
  context: SessionContext;
  /** Current branch; used to find the PR when the record has no pr_number */
  branch?: string | null;
}

interface PreparedTasks {
  file: string;
  original: string | null;
  text: string;
  marked: number;
  touched: string[];
}

interface ParentOutcome {
  update: ParentIssueUpdate;
  progress: PhaseProgress;
}

export function issueCloseComment(prNumber: number): string {
  return `Resolved via PR #${prNumber}`;
}

export function phaseCloseComment(prNumber: number): string {
  return `✅ Phase complete. All tasks done. (PR #${prNumber})`;
}

export function phaseNote(phaseIssue: number, progress: PhaseProgress): string {
  return `Phase #${phaseIssue} complete: ${formatProgress(progress)}`;
}

/**
 * Task ledger location: the feature directory for speckit sessions, otherwise the
 * session directory
 */
export function ledgerPath(context: SessionContext): string {
  const { session } = context;
  if (session.type === "speckit") {
    return join(speckitSpecDir(session), "tasks.md");
  }
  return join(context.dir, "tasks.md");
}

/**
 * Append a phase note to a PR description unless one for this phase is
 * already there. Existing text is never modified.
 */
export function appendPhaseNote(body: string, phaseIssue: number, note: string): string {
  if (body.includes(`Phase #${phaseIssue} complete`)) {
    return body;
  }
  if (body.length === 0) {
    return note;
  }
  return body + (body.endsWith("\n") ? "\n" : "\n\n") + note;
}

export class FinalizeEngine {
  private gateway: ExternalStateGateway;
  private documents: TaskDocumentStore;
  private syncEnabled: boolean;

  constructor(options: FinalizeEngineOptions) {
    this.gateway = options.gateway;
    this.documents = options.documents;
    this.syncEnabled = options.syncBoard ?? true;
  }

  async finalize(input: FinalizeInput): Promise<FinalizeResult> {
    const { context } = input;
    let prNumber = context.session.pr_number ?? null;
    let pr: PullRequest | null = null;

    try {
      if (prNumber === null && input.branch) {
        prNumber = await this.gateway.findPRForBranch(input.branch);
      }
      if (prNumber === null) {
        throw new NotFoundError("pull_request", input.branch ?? context.id);
      }

      pr = await this.gateway.getPR(prNumber);
      if (!pr.merged) {
        logger.warn(`PR #${pr.number} not merged (state: ${pr.state})`);
        throw new PRNotMergedError(pr.number, pr.state);
      }
      logger.step(1, 3, `PR #${pr.number} merged`);

      const result = await this.dispatch(context, pr);
      logger.step(3, 3, "Finalize complete");
      return deepFreeze(result);
    } catch (error) {
      if (isSessionOrchestratorError(error)) {
        logger.error(`Finalize aborted: ${error.message}`);
        return errorResult(error, prSnapshot(pr, prNumber));
      }
      throw error;
    }
  }

  private async dispatch(context: SessionContext, pr: PullRequest): Promise<FinalizeSuccess> {
    const { session } = context;
    logger.step(2, 3, `Finalizing ${session.type} session ${context.id}`);

    switch (session.type) {
      case "github_issue":
        return this.finalizeIssueSession(context, session, pr);
      case "speckit":
        return this.finalizeSpeckitSession(session, pr);
      case "unstructured":
        return this.finalizeUnstructuredSession(context, session.touched_tasks);
      default:
        return assertNever(session);
    }
  }

  private async finalizeIssueSession(
    context: SessionContext,
    session: GitHubIssueSession,
    pr: PullRequest
  ): Promise<GitHubIssueFinalizeResult> {
    const issueNumber = requireLink(session.issue_number, "issue_number", session.type);
    const warnings: string[] = [];

    const tasks = await this.prepareTasks(ledgerPath(context), session.touched_tasks);
    const issue = await this.closeIssue(issueNumber, issueCloseComment(pr.number));
    const taskSummary = await this.commitTasks(tasks, warnings);
    const synced = await this.syncBoard(taskSummary.file, `issue-${issueNumber}`, warnings);

    return {
      status: "success",
      pr_merged: true,
      session_type: "github_issue",
      issue,
      tasks: taskSummary,
      synced_to_projects: synced,
      warnings,
      ready_for_wrap: true,
    };
  }

  private async finalizeSpeckitSession(
    session: SpeckitSession,
    pr: PullRequest
  ): Promise<SpeckitFinalizeResult> {
    // Validate every link before the first mutation
    const phaseIssue = requireLink(session.issue_number, "issue_number", session.type);
    const parentIssue = requireLink(session.parent_issue, "parent_issue", session.type);
    const specDir = speckitSpecDir(session);
    const warnings: string[] = [];

    const tasks = await this.prepareTasks(join(specDir, "tasks.md"), session.touched_tasks);
    const phase = await this.closeIssue(phaseIssue, phaseCloseComment(pr.number));
    const parent = await this.updateParent(parentIssue, phaseIssue, warnings);
    const taskSummary = await this.commitTasks(tasks, warnings);
    const draft = await this.transitionDraft(pr, phaseIssue, parent.progress, warnings);
    const synced = await this.syncBoard(
      taskSummary.file,
      session.feature_id ?? basename(specDir),
      warnings
    );

    return {
      status: "success",
      pr_merged: true,
      session_type: "speckit",
      phase_issue: phase,
      parent_issue: parent.update,
      tasks: taskSummary,
      pr: draft,
      synced_to_projects: synced,
      warnings,
      // A conflict leaves a warning and a stale body; re-running finalize repairs it
      ready_for_wrap: true,
    };
  }

  private async finalizeUnstructuredSession(
    context: SessionContext,
    touched: string[]
  ): Promise<UnstructuredFinalizeResult> {
    const warnings: string[] = [];
    const tasks = await this.prepareTasks(ledgerPath(context), touched);
    const taskSummary = await this.commitTasks(tasks, warnings);
    const synced = await this.syncBoard(taskSummary.file, context.id, warnings);

    return {
      status: "success",
      pr_merged: true,
      session_type: "unstructured",
      tasks: taskSummary,
      synced_to_projects: synced,
      warnings,
      ready_for_wrap: true,
    };
  }

  private async closeIssue(issueNumber: number, comment: string): Promise<IssueClosure> {
    const issue = await this.gateway.getIssue(issueNumber);
    if (issue.state === "closed") {
      logger.info(`Issue #${issueNumber} already closed`);
      return { number: issueNumber, closed: true, comment: null };
    }

    await this.gateway.closeIssue(issueNumber, comment);
    logger.success(`Closed issue #${issueNumber}`);
    return { number: issueNumber, closed: true, comment };
  }

  private async updateParent(
    parentIssue: number,
    phaseIssue: number,
    warnings: string[]
  ): Promise<ParentOutcome> {
    const parent = await this.gateway.getIssue(parentIssue);

    try {
      const update = await this.gateway.updateIssueBody(parentIssue, (body) =>
        checkPhase(body, phaseIssue)
      );
      const progress = phaseProgress(update.body);
      const matches = findPhaseItems(update.body, phaseIssue);

      if (matches.length === 0) {
        warnings.push(`Parent issue #${parentIssue} has no checklist line for #${phaseIssue}`);
      } else if (matches.length > 1) {
        warnings.push(
          `Parent issue #${parentIssue} has ${matches.length} checklist lines for #${phaseIssue}; left unchanged`
        );
      }
      if (update.changed) {
        logger.success(`Checked phase #${phaseIssue} on parent issue #${parentIssue}`);
      }

      return {
        update: {
          number: parentIssue,
          updated: update.changed,
          progress: formatProgress(progress),
          checklist_updated: matches.length === 1 && matches[0]?.checked === true,
        },
        progress,
      };
    } catch (error) {
      if (!(error instanceof ConflictError)) {
        throw error;
      }
      warnings.push(`Parent issue #${parentIssue} changed during update; re-run finalize`);
      logger.warn(error.message);
      const progress = phaseProgress(parent.body);
      return {
        update: {
          number: parentIssue,
          updated: false,
          progress: formatProgress(progress),
          checklist_updated: false,
        },
        progress,
      };
    }
  }

  private async transitionDraft(
    pr: PullRequest,
    phaseIssue: number,
    progress: PhaseProgress,
    warnings: string[]
  ): Promise<DraftTransition> {
    if (progress.total > 0 && progress.complete === progress.total) {
      if (pr.draft) {
        await this.gateway.markPRReady(pr.number);
        logger.success(`PR #${pr.number} marked ready for review`);
      }
      return {
        number: pr.number,
        description_updated: false,
        still_draft: false,
        reason: "All phases complete",
      };
    }

    const reason = `${formatProgress(progress)}; awaiting remaining phases`;
    const note = phaseNote(phaseIssue, progress);
    try {
      const update = await this.gateway.updatePRBody(pr.number, (body) =>
        appendPhaseNote(body, phaseIssue, note)
      );
      return {
        number: pr.number,
        description_updated: update.changed,
        still_draft: pr.draft,
        reason,
      };
    } catch (error) {
      if (!(error instanceof ConflictError)) {
        throw error;
      }
      warnings.push(`PR #${pr.number} description changed during update; re-run finalize`);
      logger.warn(error.message);
      return {
        number: pr.number,
        description_updated: false,
        still_draft: pr.draft,
        reason,
      };
    }
  }

  /**
   * Read the ledger and compute the marked version up front so that a
   * malformed file aborts finalize before any issue is touched.
   */
  private async prepareTasks(file: string, touched: string[]): Promise<PreparedTasks> {
    const original = await this.documents.read(file);
    if (original === null) {
      return { file, original, text: "", marked: 0, touched };
    }
    const { text, marked } = markDone(original, touched);
    return { file, original, text, marked, touched };
  }

  private async commitTasks(prepared: PreparedTasks, warnings: string[]): Promise<TaskSummary> {
    const { file } = prepared;
    if (prepared.original === null) {
      if (prepared.touched.length > 0) {
        warnings.push(`Task file ${file} not found; ${prepared.touched.length} task(s) not marked`);
      }
      return { file, total: 0, completed: 0, marked: 0 };
    }

    if (prepared.marked > 0) {
      await this.documents.write(file, prepared.text);
      logger.success(`Marked ${prepared.marked} task(s) complete in ${file}`);
    }

    const { total, completed } = count(prepared.text);
    return { file, total, completed, marked: prepared.marked };
  }

  private async syncBoard(file: string, milestone: string, warnings: string[]): Promise<boolean> {
    if (!this.syncEnabled) {
      return false;
    }
    try {
      await this.gateway.syncExternalBoard(file, milestone);
      return true;
    } catch (error) {
      const message = toError(error).message;
      logger.warn(`Board sync failed: ${message}`);
      warnings.push(`Board sync failed: ${message}`);
      return false;
    }
  }
}

function requireLink(value: number | undefined, field: string, type: string): number {
  if (value === undefined) {
    throw new ConfigurationError(`${type} session is missing ${field}`);
  }
  return value;
}

function speckitSpecDir(session: SpeckitSession): string {
  if (session.spec_dir) {
    return session.spec_dir;
  }
  if (session.feature_id) {
    return join("specs", session.feature_id);
  }
  throw new ConfigurationError("speckit session is missing feature_id");
}

function assertNever(value: never): never {
  throw new Error(`Unhandled session type: ${JSON.stringify(value)}`);
}
