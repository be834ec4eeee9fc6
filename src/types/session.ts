import { z } from "zod";

export const SESSION_INFO_SCHEMA_VERSION = "2.2";
export const STATE_SCHEMA_VERSION = "1.0";

export type SessionType = "github_issue" | "speckit" | "unstructured";

export type SessionWorkflow = "development" | "spike";

const issueNumber = z.number().int().positive();
const taskId = z.string().regex(/^T\d+$/, "task identifiers look like T001");

const SessionBaseSchema = z.object({
  schema_version: z.string().optional(),
  session_id: z.string().optional(),
  workflow: z.enum(["development", "spike"]).default("development"),
  created_at: z.string().optional(),
  pr_number: issueNumber.optional(),
  // Tasks worked on during this session; finalize marks exactly these done
  touched_tasks: z.array(taskId).default([]),
});

export const GitHubIssueSessionSchema = SessionBaseSchema.extend({
  type: z.literal("github_issue"),
  issue_number: issueNumber.optional(),
  issue_title: z.string().optional(),
  parent_issue: z.undefined({
    invalid_type_error: "parent_issue is only valid for speckit sessions",
  }),
}).passthrough();

export const SpeckitSessionSchema = SessionBaseSchema.extend({
  type: z.literal("speckit"),
  issue_number: issueNumber.optional(),
  parent_issue: issueNumber.optional(),
  feature_id: z.string().min(1).optional(),
  spec_dir: z.string().min(1).optional(),
}).passthrough();

export const UnstructuredSessionSchema = SessionBaseSchema.extend({
  type: z.literal("unstructured"),
  goal: z.string().optional(),
}).passthrough();

export const SessionSchema = z.discriminatedUnion("type", [
  GitHubIssueSessionSchema,
  SpeckitSessionSchema,
  UnstructuredSessionSchema,
]);

export type GitHubIssueSession = z.infer<typeof GitHubIssueSessionSchema>;
export type SpeckitSession = z.infer<typeof SpeckitSessionSchema>;
export type UnstructuredSession = z.infer<typeof UnstructuredSessionSchema>;
export type Session = z.infer<typeof SessionSchema>;

/**
 * The active session resolved from the session pointer. Passed explicitly to
 * the engines rather than read from ambient state.
 */
export interface SessionContext {
  /** Session identifier (YYYY-MM-DD-N) */
  id: string;
  /** Directory holding session-info.json, state.json and tasks.md */
  dir: string;
  /** Repository root every relative path is resolved against */
  root: string;
  session: Session;
}

// === Workflow step tracking ===

export type WorkflowStep =
  | "none"
  | "start"
  | "plan"
  | "task"
  | "execute"
  | "validate"
  | "publish"
  | "finalize"
  | "wrap";

export type StepStatus = "none" | "in_progress" | "completed" | "failed";

/** Steps that may follow each step */
export const WORKFLOW_TRANSITIONS: Record<WorkflowStep, WorkflowStep[]> = {
  none: ["plan"],
  start: ["plan", "execute"],
  plan: ["task", "execute"],
  task: ["execute"],
  execute: ["validate", "execute"],
  validate: ["publish", "execute"],
  publish: ["finalize"],
  finalize: ["wrap"],
  wrap: [],
};

export const WorkflowStateSchema = z
  .object({
    schema_version: z.string().optional(),
    current_step: z
      .enum(["none", "start", "plan", "task", "execute", "validate", "publish", "finalize", "wrap"])
      .default("none"),
    step_status: z.enum(["none", "in_progress", "completed", "failed"]).default("none"),
    step_started_at: z.string().optional(),
    step_updated_at: z.string().optional(),
  })
  .passthrough();

export type WorkflowState = z.infer<typeof WorkflowStateSchema>;
