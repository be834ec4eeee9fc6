/**
 * In-memory stand-ins for the gateway, task documents and git, shared by the
 * engine tests. Every mutating call is recorded in `calls`.
 */

import {
  ConflictError,
  ExternalSyncError,
  GitOperationError,
  NotFoundError,
} from "../src/infra/errors.js";
import type { BodyUpdate, ExternalStateGateway } from "../src/core/github/gateway.js";
import type { TaskDocumentStore } from "../src/core/ledger/task-documents.js";
import type { BranchInspector } from "../src/core/git/git-operations.js";
import { SessionSchema, type SessionContext } from "../src/types/session.js";
import type { BodyTransform, Issue } from "../src/types/issue.js";
import type { CreatePRInput, EditPRInput, PullRequest } from "../src/types/pr.js";

export type MutatingMethod =
  | "createPR"
  | "editPR"
  | "markPRReady"
  | "updatePRBody"
  | "closeIssue"
  | "updateIssueBody"
  | "syncExternalBoard";

export interface GatewayCall {
  method: MutatingMethod;
  target: number | string;
  detail?: string;
}

export class MemoryGateway implements ExternalStateGateway {
  readonly prs = new Map<number, PullRequest>();
  readonly issues = new Map<number, Issue>();
  readonly branches = new Map<string, number>();
  readonly calls: GatewayCall[] = [];
  /** Body someone else writes between our read and our write, keyed "issue:N" or "pr:N" */
  readonly concurrentEdits = new Map<string, string>();
  syncFailure: string | null = null;
  nextPRNumber = 700;

  addPR(pr: PullRequest): this {
    this.prs.set(pr.number, pr);
    this.branches.set(pr.headBranch, pr.number);
    return this;
  }

  addIssue(issue: Issue): this {
    this.issues.set(issue.number, issue);
    return this;
  }

  methods(): MutatingMethod[] {
    return this.calls.map((call) => call.method);
  }

  async getPR(prNumber: number): Promise<PullRequest> {
    const pr = this.prs.get(prNumber);
    if (!pr) {
      throw new NotFoundError("pull_request", prNumber);
    }
    return { ...pr };
  }

  async findPRForBranch(branch: string): Promise<number | null> {
    return this.branches.get(branch) ?? null;
  }

  async createPR(input: CreatePRInput): Promise<PullRequest> {
    const number = this.nextPRNumber++;
    const pr: PullRequest = {
      number,
      url: `https://github.com/acme/widgets/pull/${number}`,
      title: input.title,
      body: input.body,
      state: "open",
      merged: false,
      draft: input.draft,
      headBranch: input.head,
      baseBranch: input.base,
    };
    this.addPR(pr);
    this.calls.push({ method: "createPR", target: number, detail: input.title });
    return { ...pr };
  }

  async editPR(prNumber: number, input: EditPRInput): Promise<PullRequest> {
    const pr = await this.getPR(prNumber);
    const updated = { ...pr, title: input.title, body: input.body };
    this.prs.set(prNumber, updated);
    this.calls.push({ method: "editPR", target: prNumber, detail: input.title });
    return { ...updated };
  }

  async markPRReady(prNumber: number): Promise<void> {
    const pr = await this.getPR(prNumber);
    this.prs.set(prNumber, { ...pr, draft: false });
    this.calls.push({ method: "markPRReady", target: prNumber });
  }

  async updatePRBody(prNumber: number, transform: BodyTransform): Promise<BodyUpdate> {
    const pr = await this.getPR(prNumber);
    return this.updateBody(`pr:${prNumber}`, pr.body, transform, (body) => {
      this.prs.set(prNumber, { ...pr, body });
      this.calls.push({ method: "updatePRBody", target: prNumber });
    });
  }

  async getIssue(issueNumber: number): Promise<Issue> {
    const issue = this.issues.get(issueNumber);
    if (!issue) {
      throw new NotFoundError("issue", issueNumber);
    }
    return { ...issue };
  }

  async closeIssue(issueNumber: number, comment: string): Promise<void> {
    const issue = await this.getIssue(issueNumber);
    this.issues.set(issueNumber, { ...issue, state: "closed" });
    this.calls.push({ method: "closeIssue", target: issueNumber, detail: comment });
  }

  async updateIssueBody(issueNumber: number, transform: BodyTransform): Promise<BodyUpdate> {
    const issue = await this.getIssue(issueNumber);
    return this.updateBody(`issue:${issueNumber}`, issue.body, transform, (body) => {
      this.issues.set(issueNumber, { ...issue, body });
      this.calls.push({ method: "updateIssueBody", target: issueNumber });
    });
  }

  async syncExternalBoard(ledgerPath: string, milestone: string): Promise<void> {
    this.calls.push({ method: "syncExternalBoard", target: ledgerPath, detail: milestone });
    if (this.syncFailure !== null) {
      throw new ExternalSyncError(this.syncFailure);
    }
  }

  private updateBody(
    key: string,
    original: string,
    transform: BodyTransform,
    write: (body: string) => void
  ): BodyUpdate {
    const next = transform(original);
    if (next === original) {
      return { body: original, changed: false };
    }
    const concurrent = this.concurrentEdits.get(key);
    if (concurrent !== undefined) {
      const [kind, id] = key.split(":");
      throw new ConflictError(kind === "pr" ? "pull_request" : "issue", Number(id));
    }
    write(next);
    return { body: next, changed: true };
  }
}

export class MemoryTaskDocuments implements TaskDocumentStore {
  readonly files = new Map<string, string>();
  readonly writes: Array<{ path: string; text: string }> = [];

  constructor(files: Record<string, string> = {}) {
    for (const [path, text] of Object.entries(files)) {
      this.files.set(path, text);
    }
  }

  async read(path: string): Promise<string | null> {
    return this.files.get(path) ?? null;
  }

  async write(path: string, text: string): Promise<void> {
    this.files.set(path, text);
    this.writes.push({ path, text });
  }
}

export class FakeBranchInspector implements BranchInspector {
  constructor(
    public branch: string | null = "feature/widget-export",
    public defaultBranch = "main",
    public ahead = 3
  ) {}

  async getCurrentBranch(): Promise<string | null> {
    return this.branch;
  }

  async getDefaultBranch(): Promise<string> {
    return this.defaultBranch;
  }

  /** stderr of a failing `git rev-list` */
  aheadFailure: string | null = null;

  async countCommitsAhead(): Promise<number> {
    if (this.aheadFailure !== null) {
      throw new GitOperationError(this.aheadFailure);
    }
    return this.ahead;
  }
}

export const SESSION_ID = "2026-10-18-1";
export const SESSION_DIR = ".session/sessions/2026-10/2026-10-18-1";

export function makeContext(record: Record<string, unknown>): SessionContext {
  return {
    id: SESSION_ID,
    dir: SESSION_DIR,
    root: "/repo",
    session: SessionSchema.parse({ schema_version: "2.2", session_id: SESSION_ID, ...record }),
  };
}

export function makePR(overrides: Partial<PullRequest> & { number: number }): PullRequest {
  return {
    url: `https://github.com/acme/widgets/pull/${overrides.number}`,
    title: "Add widget export",
    body: "",
    state: "closed",
    merged: true,
    draft: false,
    headBranch: "feature/widget-export",
    baseBranch: "main",
    ...overrides,
  };
}

export function makeIssue(overrides: Partial<Issue> & { number: number }): Issue {
  return {
    title: `Issue ${overrides.number}`,
    body: "",
    state: "open",
    ...overrides,
  };
}

/** tasks.md with `total` entries, the first `done` of them checked */
export function ledger(total: number, done = 0): string {
  const lines = ["# Tasks", ""];
  for (let i = 1; i <= total; i++) {
    const id = `T${String(i).padStart(3, "0")}`;
    lines.push(`- [${i <= done ? "x" : " "}] ${id} Task number ${i}`);
  }
  return lines.join("\n") + "\n";
}

export function taskIds(total: number): string[] {
  return Array.from({ length: total }, (_, i) => `T${String(i + 1).padStart(3, "0")}`);
}
