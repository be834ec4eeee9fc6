import { z } from "zod";

export const GitConfigSchema = z.object({
  // Used when origin/HEAD is not set
  defaultBranch: z.string().default("main"),
  // Remote the PR base is compared against
  remote: z.string().default("origin"),
});

export const GitHubConfigSchema = z.object({
  // Path to the gh CLI binary
  ghPath: z.string().default("gh"),
  // owner/name; gh infers it from the working directory when unset
  repo: z
    .string()
    .regex(/^[^/\s]+\/[^/\s]+$/, "expected owner/name")
    .optional(),
  // Timeout for a single gh invocation (ms)
  timeoutMs: z
    .number()
    .int()
    .positive()
    .default(60 * 1000),
});

export const BoardConfigSchema = z.object({
  // Sync task status to an external project board after finalize
  enabled: z.boolean().default(true),
  // Script invoked as: <script> <tasks-file> <milestone>
  script: z.string().default("scripts/sync-task-status.sh"),
});

export const LoggingConfigSchema = z.object({
  consoleLevel: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

export const ConfigSchema = z.object({
  // Session directory, relative to the repository root
  sessionRoot: z.string().default(".session"),
  git: GitConfigSchema.default({}),
  github: GitHubConfigSchema.default({}),
  board: BoardConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
  verbose: z.boolean().default(false),
});

export type GitConfig = z.infer<typeof GitConfigSchema>;
export type GitHubConfig = z.infer<typeof GitHubConfigSchema>;
export type BoardConfig = z.infer<typeof BoardConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;
