#!/usr/bin/env node

import { Command } from "commander";
import pc from "picocolors";
import { createFinalizeCommand, createPublishCommand, createStatusCommand } from "./commands/index.js";
import { logger } from "../infra/logger.js";

const VERSION = "0.1.0";

const program = new Command();

program
  .name("session-orchestrator")
  .description(pc.cyan("Publish and finalize development sessions tracked in GitHub"))
  .version(VERSION, "-V, --version", "Output the version number")
  .option("-v, --verbose", "Enable verbose output")
  .option("--cwd <dir>", "Repository root (default: current directory)");

program.addCommand(createPublishCommand());
program.addCommand(createFinalizeCommand());
program.addCommand(createStatusCommand());

// Error handling
program.exitOverride((err) => {
  if (err.code === "commander.help" || err.code === "commander.helpDisplayed") {
    process.exit(0);
  }
  if (err.code === "commander.version") {
    process.exit(0);
  }
  process.exit(err.exitCode);
});

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof Error) {
      logger.error(error.message, error);
    }
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.error("Unexpected error", error instanceof Error ? error : undefined);
  process.exit(1);
});
