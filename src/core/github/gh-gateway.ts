/**
 * GitHub gateway backed by the gh CLI
 */

import { existsSync } from "node:fs";
import { isAbsolute, join } from "node:path";
import { z } from "zod";
import { logger } from "../../infra/logger.js";
import { runCommand, type RunResult } from "../../infra/process.js";
import {
  ConflictError,
  ExternalSyncError,
  GatewayError,
  NotFoundError,
  PermissionDeniedError,
  toError,
  type ResourceKind,
} from "../../infra/errors.js";
import type { BodyTransform, Issue, IssueState } from "../../types/issue.js";
import type { CreatePRInput, EditPRInput, PullRequest } from "../../types/pr.js";
import type { BodyUpdate, ExternalStateGateway } from "./gateway.js";

export interface GhGatewayOptions {
  /** GitHub CLI path */
  ghPath?: string;
  /** owner/name; omitted lets gh infer the repository from `cwd` */
  repo?: string;
  /** Working directory for gh and the board sync script */
  cwd: string;
  /** Timeout per gh invocation */
  timeoutMs?: number;
  /** Board sync script, relative to `cwd` */
  boardScript?: string;
}

const PR_FIELDS = "number,url,title,body,state,isDraft,mergedAt,headRefName,baseRefName";
const ISSUE_FIELDS = "number,title,body,state";

const GhPullRequestSchema = z.object({
  number: z.number().int(),
  url: z.string(),
  title: z.string(),
  body: z.string().nullish(),
  state: z.string(),
  isDraft: z.boolean().nullish(),
  mergedAt: z.string().nullish(),
  headRefName: z.string(),
  baseRefName: z.string(),
});

const GhIssueSchema = z.object({
  number: z.number().int(),
  title: z.string(),
  body: z.string().nullish(),
  state: z.string(),
});

const GhPRListSchema = z.array(z.object({ number: z.number().int() }));

interface GhTarget {
  resource: ResourceKind;
  id: number;
}

export class GhGateway implements ExternalStateGateway {
  private ghPath: string;
  private timeoutMs: number;

  constructor(private readonly options: GhGatewayOptions) {
    this.ghPath = options.ghPath ?? "gh";
    this.timeoutMs = options.timeoutMs ?? 60_000;
  }

  async getPR(prNumber: number): Promise<PullRequest> {
    const json = await this.runGh(
      ["pr", "view", String(prNumber), "--json", PR_FIELDS, ...this.repoArgs()],
      { resource: "pull_request", id: prNumber }
    );
    return this.mapPullRequest(this.parseJson(json, GhPullRequestSchema));
  }

  async findPRForBranch(branch: string): Promise<number | null> {
    const json = await this.runGh([
      "pr",
      "list",
      "--head",
      branch,
      "--state",
      "all",
      "--json",
      "number",
      "--limit",
      "1",
      ...this.repoArgs(),
    ]);
    const [first] = this.parseJson(json, GhPRListSchema);
    return first?.number ?? null;
  }

  async createPR(input: CreatePRInput): Promise<PullRequest> {
    const args = [
      "pr",
      "create",
      "--title",
      input.title,
      "--body",
      input.body,
      "--base",
      input.base,
      "--head",
      input.head,
      ...this.repoArgs(),
    ];
    if (input.draft) {
      args.push("--draft");
    }

    const output = await this.runGh(args);
    const prNumber = this.parsePRNumber(output);
    if (prNumber === null) {
      throw new GatewayError(`Could not determine PR number from gh output: ${output.trim()}`);
    }
    logger.debug(`Created PR #${prNumber}`);
    return this.getPR(prNumber);
  }

  async editPR(prNumber: number, input: EditPRInput): Promise<PullRequest> {
    await this.runGh(
      [
        "pr",
        "edit",
        String(prNumber),
        "--title",
        input.title,
        "--body",
        input.body,
        ...this.repoArgs(),
      ],
      { resource: "pull_request", id: prNumber }
    );
    return this.getPR(prNumber);
  }

  async markPRReady(prNumber: number): Promise<void> {
    await this.runGh(["pr", "ready", String(prNumber), ...this.repoArgs()], {
      resource: "pull_request",
      id: prNumber,
    });
  }

  async updatePRBody(prNumber: number, transform: BodyTransform): Promise<BodyUpdate> {
    return this.updateBody(
      { resource: "pull_request", id: prNumber },
      async () => (await this.getPR(prNumber)).body,
      transform,
      (body) => ["pr", "edit", String(prNumber), "--body", body]
    );
  }

  async getIssue(issueNumber: number): Promise<Issue> {
    const json = await this.runGh(
      ["issue", "view", String(issueNumber), "--json", ISSUE_FIELDS, ...this.repoArgs()],
      { resource: "issue", id: issueNumber }
    );
    const data = this.parseJson(json, GhIssueSchema);
    return {
      number: data.number,
      title: data.title,
      body: data.body ?? "",
      state: this.mapIssueState(data.state),
    };
  }

  async closeIssue(issueNumber: number, comment: string): Promise<void> {
    await this.runGh(
      ["issue", "close", String(issueNumber), "--comment", comment, ...this.repoArgs()],
      { resource: "issue", id: issueNumber }
    );
  }

  async updateIssueBody(issueNumber: number, transform: BodyTransform): Promise<BodyUpdate> {
    return this.updateBody(
      { resource: "issue", id: issueNumber },
      async () => (await this.getIssue(issueNumber)).body,
      transform,
      (body) => ["issue", "edit", String(issueNumber), "--body", body]
    );
  }

  async syncExternalBoard(ledgerPath: string, milestone: string): Promise<void> {
    const script = this.options.boardScript;
    if (!script) {
      throw new ExternalSyncError("No board sync script configured");
    }
    const scriptPath = isAbsolute(script) ? script : join(this.options.cwd, script);
    if (!existsSync(scriptPath)) {
      throw new ExternalSyncError(`Board sync script not found: ${script}`);
    }

    let result: RunResult;
    try {
      result = await runCommand(scriptPath, [ledgerPath, milestone], {
        cwd: this.options.cwd,
        timeoutMs: this.timeoutMs,
      });
    } catch (error) {
      throw new ExternalSyncError(`Failed to run ${script}`, toError(error));
    }

    if (result.timedOut) {
      throw new ExternalSyncError(`${script} timed out after ${this.timeoutMs / 1000}s`);
    }
    if (result.code !== 0) {
      throw new ExternalSyncError(
        `${script} exited with code ${result.code}: ${(result.stderr || result.stdout).trim()}`
      );
    }
  }

  /**
   * Read-transform-write with a re-read just before the write, so a body
   * edited by someone else in between is reported instead of overwritten.
   */
  private async updateBody(
    target: GhTarget,
    read: () => Promise<string>,
    transform: BodyTransform,
    editArgs: (body: string) => string[]
  ): Promise<BodyUpdate> {
    const original = await read();
    const next = transform(original);
    if (next === original) {
      return { body: original, changed: false };
    }

    const current = await read();
    if (current !== original) {
      throw new ConflictError(target.resource, target.id);
    }

    await this.runGh([...editArgs(next), ...this.repoArgs()], target);
    return { body: next, changed: true };
  }

  private repoArgs(): string[] {
    return this.options.repo ? ["--repo", this.options.repo] : [];
  }

  private parseJson<T>(json: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
    let data: unknown;
    try {
      data = JSON.parse(json);
    } catch (error) {
      throw new GatewayError("gh returned invalid JSON", toError(error));
    }
    const result = schema.safeParse(data);
    if (!result.success) {
      const errors = result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
      throw new GatewayError(`Unexpected gh response: ${errors}`);
    }
    return result.data;
  }

  private parsePRNumber(output: string): number | null {
    const match = output.match(/\/pull\/(\d+)/);
    return match?.[1] ? parseInt(match[1], 10) : null;
  }

  private mapPullRequest(data: z.infer<typeof GhPullRequestSchema>): PullRequest {
    const state = data.state.toUpperCase();
    return {
      number: data.number,
      url: data.url,
      title: data.title,
      body: data.body ?? "",
      state: state === "OPEN" ? "open" : "closed",
      merged: state === "MERGED" || Boolean(data.mergedAt),
      draft: data.isDraft ?? false,
      headBranch: data.headRefName,
      baseBranch: data.baseRefName,
    };
  }

  private mapIssueState(state: string): IssueState {
    return state.toUpperCase() === "OPEN" ? "open" : "closed";
  }

  private async runGh(args: string[], target?: GhTarget): Promise<string> {
    logger.debug(`gh ${args.join(" ")}`);

    let result: RunResult;
    try {
      result = await runCommand(this.ghPath, args, {
        cwd: this.options.cwd,
        timeoutMs: this.timeoutMs,
      });
    } catch (error) {
      throw new GatewayError(`Failed to spawn gh: ${toError(error).message}`, toError(error));
    }

    if (result.timedOut) {
      throw new GatewayError(`gh command timed out after ${this.timeoutMs / 1000}s: gh ${args[0]}`);
    }
    if (result.code === 0) {
      return result.stdout;
    }

    const output = (result.stderr || result.stdout).trim();
    if (target && isNotFound(output)) {
      throw new NotFoundError(target.resource, target.id, new Error(output));
    }
    if (isPermissionDenied(output)) {
      throw new PermissionDeniedError(output);
    }
    throw new GatewayError(`gh command failed: gh ${args.slice(0, 2).join(" ")}\n${output}`);
  }
}

function isNotFound(output: string): boolean {
  return (
    output.includes("Could not resolve to") ||
    output.includes("no pull requests found") ||
    output.includes("HTTP 404")
  );
}

function isPermissionDenied(output: string): boolean {
  return (
    output.includes("HTTP 403") ||
    output.includes("Resource not accessible") ||
    output.includes("must have push access") ||
    output.includes("does not have the correct permissions")
  );
}
