/**
 * Publish Engine - create or update the session's pull request.
 *
 * Title and description arrive pre-written; this engine only decides between
 * creating and updating, and links the PR to the session's issue.
 */

import { logger } from "../../infra/logger.js";
import {
  ConfigurationError,
  GitOperationError,
  NoCommitsError,
  isSessionOrchestratorError,
} from "../../infra/errors.js";
import type { ExternalStateGateway } from "../github/gateway.js";
import type { BranchInspector } from "../git/git-operations.js";
import { deepFreeze, errorResult, prSnapshot } from "./results.js";
import type { PublishAction, PullRequest } from "../../types/pr.js";
import type { Session, SessionContext } from "../../types/session.js";
import type { PublishResult, PublishSuccess } from "../../types/result.js";

export interface PublishEngineOptions {
  gateway: ExternalStateGateway;
  git: BranchInspector;
}

export interface PublishInput {
  context: SessionContext;
  title: string;
  description: string;
  /** Open as draft; for an existing draft PR, false promotes it to ready */
  draft: boolean;
  /** Issue to link; defaults to the session's issue */
  issueNumber?: number;
}

/**
 * Append a closing-keyword link unless the body already closes the issue
 */
export function linkIssue(body: string, issueNumber: number): string {
  const closing = new RegExp(`\\b(close[sd]?|fix(e[sd])?|resolve[sd]?)\\s+#${issueNumber}(?!\\d)`, "i");
  if (closing.test(body)) {
    return body;
  }
  const link = `Closes #${issueNumber}`;
  if (body.trim().length === 0) {
    return link;
  }
  return body + (body.endsWith("\n") ? "\n" : "\n\n") + link;
}

export function sessionIssue(session: Session): number | undefined {
  switch (session.type) {
    case "github_issue":
    case "speckit":
      return session.issue_number;
    case "unstructured":
      return undefined;
  }
}

export function nextSteps(prUrl: string): string[] {
  return [
    `Monitor CI checks: ${prUrl}/checks`,
    "Fix any CI failures if needed",
    "Get PR reviewed (if required)",
    "Merge PR when ready",
    "Then run: session-orchestrator finalize",
  ];
}

export class PublishEngine {
  private gateway: ExternalStateGateway;
  private git: BranchInspector;

  constructor(options: PublishEngineOptions) {
    this.gateway = options.gateway;
    this.git = options.git;
  }

  async publish(input: PublishInput): Promise<PublishResult> {
    const { session } = input.context;

    try {
      if (input.title.trim().length === 0) {
        throw new ConfigurationError("Missing required argument: title");
      }

      const branch = await this.git.getCurrentBranch();
      if (branch === null) {
        throw new GitOperationError("Not on a branch");
      }
      const base = await this.git.getDefaultBranch();
      const ahead = await this.git.countCommitsAhead(base);
      if (ahead === 0) {
        throw new NoCommitsError(branch, base);
      }
      logger.debug(`${branch} is ${ahead} commit(s) ahead of ${base}`);

      const issueNumber = input.issueNumber ?? sessionIssue(session);
      const body =
        issueNumber === undefined ? input.description : linkIssue(input.description, issueNumber);

      const existing = await this.findOpenPR(session.pr_number, branch);
      let pr: PullRequest;
      let action: PublishAction;

      if (existing) {
        pr = await this.gateway.editPR(existing.number, { title: input.title, body });
        if (!input.draft && pr.draft) {
          await this.gateway.markPRReady(pr.number);
          pr = { ...pr, draft: false };
        }
        action = "updated";
        logger.success(`Updated existing PR #${pr.number}`);
      } else {
        pr = await this.gateway.createPR({
          title: input.title,
          body,
          base,
          head: branch,
          draft: input.draft,
        });
        action = "created";
        logger.success(`Created PR #${pr.number}`);
      }

      const result: PublishSuccess = {
        status: "success",
        pr: {
          number: pr.number,
          url: pr.url,
          state: pr.state,
          draft: pr.draft,
          action,
          linked_issues: issueNumber === undefined ? [] : [issueNumber],
        },
        next_steps: nextSteps(pr.url),
      };
      return deepFreeze(result);
    } catch (error) {
      if (isSessionOrchestratorError(error)) {
        logger.error(`Publish failed: ${error.message}`);
        return errorResult(error, prSnapshot(null, session.pr_number ?? null));
      }
      throw error;
    }
  }

  /**
   * The session's PR if it is still open. A merged or closed PR for the
   * branch is not reused.
   */
  private async findOpenPR(
    recorded: number | undefined,
    branch: string
  ): Promise<PullRequest | null> {
    const prNumber = recorded ?? (await this.gateway.findPRForBranch(branch));
    if (prNumber === null) {
      return null;
    }
    const pr = await this.gateway.getPR(prNumber);
    if (pr.state !== "open") {
      logger.info(`PR #${pr.number} is ${pr.merged ? "merged" : "closed"}; creating a new one`);
      return null;
    }
    return pr;
  }
}
