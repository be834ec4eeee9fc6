import { Command } from "commander";
import { logger } from "../../infra/logger.js";
import { isSessionOrchestratorError } from "../../infra/errors.js";
import { ledgerPath } from "../../core/engine/finalize-engine.js";
import { count, incomplete } from "../../core/ledger/task-ledger.js";
import { formatSessionStatus } from "../output/reporter.js";
import { createRuntime, printJson, type CommandRuntime } from "./runtime.js";
import type { SessionStatus } from "../../types/result.js";

export function createStatusCommand(): Command {
  return new Command("status")
    .description("Show the active session, its task ledger and workflow step")
    .option("--json", "Print the status as JSON", false)
    .action(async (options: { json: boolean }, command: Command) => {
      try {
        const status = await collectStatus(createRuntime(command));
        if (options.json) {
          printJson(status);
        } else {
          console.log(formatSessionStatus(status));
        }
      } catch (error) {
        if (!isSessionOrchestratorError(error)) {
          throw error;
        }
        if (options.json) {
          printJson({ status: "error", error: error.message, code: error.code });
        } else {
          logger.error(error.message);
        }
        process.exitCode = 1;
      }
    });
}

export async function collectStatus(runtime: CommandRuntime): Promise<SessionStatus> {
  const context = runtime.store.loadActive();
  const { session } = context;
  const workflow = runtime.store.getWorkflowState(context.id);

  let tasks: SessionStatus["tasks"] = null;
  try {
    const file = ledgerPath(context);
    const text = await runtime.documents.read(file);
    tasks =
      text === null
        ? { file, total: 0, completed: 0, exists: false, open: [] }
        : {
            file,
            ...count(text),
            exists: true,
            open: incomplete(text).map((entry) => entry.identifier),
          };
  } catch (error) {
    if (!isSessionOrchestratorError(error) || error.code !== "CONFIGURATION_ERROR") {
      throw error;
    }
    logger.warn(error.message);
  }

  return {
    session_id: context.id,
    dir: context.dir,
    session_type: session.type,
    workflow: session.workflow,
    issue_number: session.type === "unstructured" ? null : (session.issue_number ?? null),
    parent_issue: session.type === "speckit" ? (session.parent_issue ?? null) : null,
    pr_number: session.pr_number ?? null,
    tasks,
    touched_tasks: session.touched_tasks,
    step: { current: workflow.current_step, status: workflow.step_status },
  };
}
