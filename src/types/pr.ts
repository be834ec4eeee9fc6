/**
 * Pull request types as seen by the publish and finalize engines
 */

export type PRState = "open" | "closed";

export interface PullRequest {
  /** PR number */
  number: number;
  /** GitHub PR URL */
  url: string;
  /** PR title */
  title: string;
  /** PR body/description */
  body: string;
  /** Open or closed; a merged PR is closed with `merged` set */
  state: PRState;
  /** Whether the PR was merged */
  merged: boolean;
  /** Whether PR is a draft */
  draft: boolean;
  /** Source branch */
  headBranch: string;
  /** Target branch */
  baseBranch: string;
}

export interface CreatePRInput {
  title: string;
  body: string;
  base: string;
  head: string;
  draft: boolean;
}

export interface EditPRInput {
  title: string;
  body: string;
}

export type PublishAction = "created" | "updated";
