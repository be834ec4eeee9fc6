import { logger } from "../../infra/logger.js";
import { GitOperationError, toError } from "../../infra/errors.js";
import { runCommand, type RunResult } from "../../infra/process.js";
import type { GitConfig } from "../../types/config.js";

/**
 * What the publish engine needs to know about the working copy
 */
export interface BranchInspector {
  /** Current branch, or null when HEAD is detached */
  getCurrentBranch(): Promise<string | null>;
  getDefaultBranch(): Promise<string>;
  /** Number of commits on HEAD that are not on `<remote>/<base>` */
  countCommitsAhead(baseBranch: string): Promise<number>;
}

/**
 * GitOperations - read-only git queries for the repository at `cwd`.
 * Uses git CLI directly for reliability and compatibility.
 */
export class GitOperations implements BranchInspector {
  constructor(
    private config: GitConfig,
    private cwd: string
  ) {}

  async getCurrentBranch(): Promise<string | null> {
    const branch = (await this.git(["branch", "--show-current"])).trim();
    return branch.length > 0 ? branch : null;
  }

  /**
   * Get the default branch of the repository
   */
  async getDefaultBranch(): Promise<string> {
    try {
      // Try to get from origin/HEAD
      const ref = await this.git(["symbolic-ref", `refs/remotes/${this.config.remote}/HEAD`]);
      return ref.trim().replace(`refs/remotes/${this.config.remote}/`, "");
    } catch (error) {
      // Fall back to configured default
      logger.debug(`origin/HEAD not set, using ${this.config.defaultBranch}`, {
        reason: toError(error).message,
      });
      return this.config.defaultBranch;
    }
  }

  async countCommitsAhead(baseBranch: string): Promise<number> {
    const range = `${this.config.remote}/${baseBranch}..HEAD`;
    const output = await this.git(["rev-list", "--count", range]);
    const count = parseInt(output.trim(), 10);
    if (Number.isNaN(count)) {
      throw new GitOperationError(`Unexpected git rev-list output for ${range}: ${output.trim()}`);
    }
    return count;
  }

  /**
   * Execute a git command
   */
  private async git(args: string[]): Promise<string> {
    let result: RunResult;
    try {
      result = await runCommand("git", args, { cwd: this.cwd });
    } catch (error) {
      throw new GitOperationError(`Failed to spawn git: ${toError(error).message}`, toError(error));
    }
    if (result.code !== 0) {
      throw new GitOperationError(
        `Git command failed: git ${args.join(" ")}\n${result.stderr || result.stdout}`
      );
    }
    return result.stdout;
  }
}
