import { Command } from "commander";
import ora from "ora";
import { isSessionOrchestratorError } from "../../infra/errors.js";
import { FinalizeEngine } from "../../core/engine/finalize-engine.js";
import { errorResult, prSnapshot } from "../../core/engine/results.js";
import { formatFinalizeResult } from "../output/reporter.js";
import { beginStep, createRuntime, endStep, printJson, type CommandRuntime } from "./runtime.js";
import type { FinalizeResult } from "../../types/result.js";

export interface FinalizeOptions {
  json: boolean;
}

export function createFinalizeCommand(): Command {
  return new Command("finalize")
    .description("Close out the session after its PR is merged")
    .option("--json", "Print the result as JSON", false)
    .action(async (options: FinalizeOptions, command: Command) => {
      let result: FinalizeResult;
      try {
        result = await runFinalize(createRuntime(command), options.json);
      } catch (error) {
        // Configuration problems surface before a runtime exists
        if (!isSessionOrchestratorError(error)) {
          throw error;
        }
        result = errorResult(error, prSnapshot(null, null));
      }

      if (options.json) {
        printJson(result);
      } else {
        console.log(formatFinalizeResult(result));
      }
      process.exitCode = result.status === "success" ? 0 : 1;
    });
}

export async function runFinalize(runtime: CommandRuntime, quiet: boolean): Promise<FinalizeResult> {
  const { store } = runtime;
  const spinner = ora({ text: "Finalizing session...", isSilent: quiet }).start();
  let sessionId: string | null = null;

  try {
    const context = store.loadActive();
    sessionId = context.id;
    beginStep(store, context.id, "finalize");

    // The branch is only needed to find a PR the session record does not name
    const branch =
      context.session.pr_number === undefined ? await runtime.git.getCurrentBranch() : null;

    const engine = new FinalizeEngine({
      gateway: runtime.gateway,
      documents: runtime.documents,
      syncBoard: runtime.config.board.enabled,
    });
    const result = await engine.finalize({ context, branch });
    endStep(store, context.id, "finalize", result.status === "success");

    if (result.status === "success") {
      spinner.succeed(`Finalized session ${context.id}`);
    } else {
      spinner.fail(result.error);
    }
    return result;
  } catch (error) {
    if (sessionId !== null) {
      endStep(store, sessionId, "finalize", false);
    }
    if (isSessionOrchestratorError(error)) {
      spinner.fail(error.message);
      return errorResult(error, prSnapshot(null, null));
    }
    spinner.stop();
    throw error;
  }
}
