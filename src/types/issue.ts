export type IssueState = "open" | "closed";

export interface Issue {
  number: number;
  title: string;
  body: string;
  state: IssueState;
}

/** Rewrites an issue or PR body; returning the input unchanged skips the write */
export type BodyTransform = (body: string) => string;
