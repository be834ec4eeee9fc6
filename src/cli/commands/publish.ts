import { Command, InvalidArgumentError, Option } from "commander";
import ora from "ora";
import { isSessionOrchestratorError } from "../../infra/errors.js";
import { PublishEngine } from "../../core/engine/publish-engine.js";
import { errorResult, prSnapshot } from "../../core/engine/results.js";
import { formatPublishResult } from "../output/reporter.js";
import { beginStep, createRuntime, endStep, printJson, type CommandRuntime } from "./runtime.js";
import type { PublishResult } from "../../types/result.js";

export interface PublishOptions {
  title: string;
  description: string;
  draft: boolean;
  issue?: number;
  json: boolean;
}

export function parseIssueNumber(value: string): number {
  const parsed = Number(value.replace(/^#/, ""));
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected an issue number");
  }
  return parsed;
}

export function createPublishCommand(): Command {
  return new Command("publish")
    .description("Create or update the pull request for the session's branch")
    .requiredOption("-t, --title <title>", "PR title")
    .option("-d, --description <text>", "PR description", "")
    .addOption(new Option("--draft", "Open the PR as a draft").default(false).conflicts("ready"))
    .addOption(new Option("--ready", "Open the PR ready for review (default)"))
    .option("--issue <number>", "Issue to link (defaults to the session's issue)", parseIssueNumber)
    .option("--json", "Print the result as JSON", false)
    .action(async (options: PublishOptions, command: Command) => {
      let result: PublishResult;
      try {
        result = await runPublish(createRuntime(command), options);
      } catch (error) {
        if (!isSessionOrchestratorError(error)) {
          throw error;
        }
        result = errorResult(error, prSnapshot(null, null));
      }

      if (options.json) {
        printJson(result);
      } else {
        console.log(formatPublishResult(result));
      }
      process.exitCode = result.status === "success" ? 0 : 1;
    });
}

export async function runPublish(
  runtime: CommandRuntime,
  options: PublishOptions
): Promise<PublishResult> {
  const { store } = runtime;
  const spinner = ora({ text: "Publishing...", isSilent: options.json }).start();
  let sessionId: string | null = null;

  try {
    const context = store.loadActive();
    sessionId = context.id;
    beginStep(store, context.id, "publish");

    const engine = new PublishEngine({ gateway: runtime.gateway, git: runtime.git });
    const result = await engine.publish({
      context,
      title: options.title,
      description: options.description,
      draft: options.draft,
      issueNumber: options.issue,
    });
    endStep(store, context.id, "publish", result.status === "success");

    if (result.status === "success") {
      spinner.succeed(`PR #${result.pr.number} ${result.pr.action}`);
    } else {
      spinner.fail(result.error);
    }
    return result;
  } catch (error) {
    if (sessionId !== null) {
      endStep(store, sessionId, "publish", false);
    }
    if (isSessionOrchestratorError(error)) {
      spinner.fail(error.message);
      return errorResult(error, prSnapshot(null, null));
    }
    spinner.stop();
    throw error;
  }
}
