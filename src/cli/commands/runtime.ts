import { resolve } from "node:path";
import type { Command } from "commander";
import { logger } from "../../infra/logger.js";
import { loadConfig, loadEnvFile } from "../config/loader.js";
import { SessionStore } from "../../core/state/session-store.js";
import { GitOperations, type BranchInspector } from "../../core/git/git-operations.js";
import { GhGateway } from "../../core/github/gh-gateway.js";
import type { ExternalStateGateway } from "../../core/github/gateway.js";
import {
  FileTaskDocumentStore,
  type TaskDocumentStore,
} from "../../core/ledger/task-documents.js";
import type { Config } from "../../types/config.js";
import type { WorkflowStep } from "../../types/session.js";

interface GlobalOptions {
  verbose?: boolean;
  cwd?: string;
}

/**
 * Everything a command needs, wired for the repository the CLI runs in
 */
export interface CommandRuntime {
  root: string;
  config: Config;
  store: SessionStore;
  git: BranchInspector;
  gateway: ExternalStateGateway;
  documents: TaskDocumentStore;
}

export function createRuntime(command: Command): CommandRuntime {
  const globals = command.optsWithGlobals<GlobalOptions>();
  const root = resolve(globals.cwd ?? process.cwd());

  loadEnvFile(root);
  const config = loadConfig(root);

  if (globals.verbose || config.verbose) {
    logger.configure({ level: "debug", verbose: true });
  } else {
    logger.configure({ level: config.logging.consoleLevel });
  }
  logger.debug(`Repository root: ${root}`);

  return {
    root,
    config,
    store: new SessionStore(root, config.sessionRoot),
    git: new GitOperations(config.git, root),
    gateway: new GhGateway({
      ghPath: config.github.ghPath,
      repo: config.github.repo,
      cwd: root,
      timeoutMs: config.github.timeoutMs,
      boardScript: config.board.script,
    }),
    documents: new FileTaskDocumentStore(root),
  };
}

/**
 * Record that a workflow step started. Out-of-order steps are reported, never
 * blocked.
 */
export function beginStep(store: SessionStore, sessionId: string, step: WorkflowStep): void {
  const check = store.checkTransition(sessionId, step);
  if (!check.allowed) {
    logger.warn(
      `Running '${step}' after '${check.current}' (${check.status}): ${check.reason ?? "unexpected step"}`
    );
  }
  store.setWorkflowStep(sessionId, step, "in_progress");
}

export function endStep(
  store: SessionStore,
  sessionId: string,
  step: WorkflowStep,
  succeeded: boolean
): void {
  store.setWorkflowStep(sessionId, step, succeeded ? "completed" : "failed");
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}
