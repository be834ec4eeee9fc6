/**
 * Human-readable rendering of finalize and publish results
 */

import pc from "picocolors";
import type {
  ErrorResult,
  FinalizeResult,
  FinalizeSuccess,
  IssueClosure,
  PublishResult,
  SessionStatus,
  TaskSummary,
} from "../../types/result.js";

export interface ReporterOptions {
  /** Emit ANSI colors (default: picocolors' terminal detection) */
  color?: boolean;
}

type Colors = ReturnType<typeof pc.createColors>;

export function formatFinalizeResult(result: FinalizeResult, options: ReporterOptions = {}): string {
  const c = pc.createColors(options.color ?? pc.isColorSupported);
  if (result.status === "error") {
    return formatError("Cannot finalize", result, c);
  }
  return formatFinalizeSuccess(result, c).join("\n");
}

export function formatPublishResult(result: PublishResult, options: ReporterOptions = {}): string {
  const c = pc.createColors(options.color ?? pc.isColorSupported);
  if (result.status === "error") {
    return formatError("Cannot publish", result, c);
  }

  const { pr } = result;
  const lines = [
    c.green(`✓ ${pr.action === "created" ? "Created" : "Updated"} PR #${pr.number}`) +
      (pr.draft ? c.dim(" (draft)") : ""),
    `  ${c.dim("URL:")}    ${pr.url}`,
  ];
  if (pr.linked_issues.length > 0) {
    lines.push(`  ${c.dim("Closes:")} ${pr.linked_issues.map((n) => `#${n}`).join(", ")}`);
  }
  lines.push("", c.bold("Next steps:"));
  result.next_steps.forEach((step, index) => {
    lines.push(`  ${index + 1}. ${step}`);
  });
  return lines.join("\n");
}

export function formatSessionStatus(status: SessionStatus, options: ReporterOptions = {}): string {
  const c = pc.createColors(options.color ?? pc.isColorSupported);
  const lines = [
    c.bold(`Session ${status.session_id}`),
    c.dim("─".repeat(40)),
    `  Type:      ${c.cyan(status.session_type)} (${status.workflow})`,
    `  Directory: ${c.dim(status.dir)}`,
  ];
  if (status.issue_number !== null) {
    lines.push(`  Issue:     #${status.issue_number}`);
  }
  if (status.parent_issue !== null) {
    lines.push(`  Parent:    #${status.parent_issue}`);
  }
  lines.push(`  PR:        ${status.pr_number === null ? c.dim("none") : `#${status.pr_number}`}`);
  lines.push(`  Step:      ${status.step.current} (${status.step.status})`);

  if (status.tasks === null) {
    lines.push(`  Tasks:     ${c.yellow("task file location unknown")}`);
  } else if (!status.tasks.exists) {
    lines.push(`  Tasks:     ${c.dim(`${status.tasks.file} (missing)`)}`);
  } else {
    lines.push(
      `  Tasks:     ${status.tasks.completed}/${status.tasks.total} complete ${c.dim(status.tasks.file)}`
    );
    if (status.tasks.open.length > 0) {
      lines.push(`  Open:      ${status.tasks.open.join(", ")}`);
    }
  }
  if (status.touched_tasks.length > 0) {
    lines.push(`  Touched:   ${status.touched_tasks.join(", ")}`);
  }
  return lines.join("\n");
}

function formatFinalizeSuccess(result: FinalizeSuccess, c: Colors): string[] {
  const lines: string[] = [];

  switch (result.session_type) {
    case "github_issue":
      lines.push(c.green("✓ Session finalized"));
      lines.push(issueLine("Issue", result.issue, c));
      break;
    case "speckit":
      lines.push(c.green("✓ Phase finalized"));
      lines.push(issueLine("Phase issue", result.phase_issue, c));
      lines.push(
        `Parent issue #${result.parent_issue.number}: ${result.parent_issue.progress}` +
          (result.parent_issue.updated ? c.dim(" (checklist updated)") : "")
      );
      lines.push(
        `PR #${result.pr.number}: ${result.pr.still_draft ? c.yellow("draft") : "ready"}` +
          c.dim(` (${result.pr.reason})`)
      );
      break;
    case "unstructured":
      lines.push(c.green("✓ Session finalized"));
      break;
  }

  lines.push(taskLine(result.tasks));
  if (result.synced_to_projects) {
    lines.push(c.dim("Synced to project board"));
  }
  for (const warning of result.warnings) {
    lines.push(c.yellow(`⚠ ${warning}`));
  }
  lines.push(
    result.ready_for_wrap
      ? c.cyan("Ready to wrap up the session")
      : c.yellow("Not ready to wrap: re-run finalize after resolving the warnings above")
  );
  return lines;
}

function issueLine(label: string, issue: IssueClosure, c: Colors): string {
  const detail = issue.comment === null ? c.dim(" (already closed)") : "";
  return `${label} #${issue.number}: ${issue.closed ? "Closed" : "Open"}${detail}`;
}

function taskLine(tasks: TaskSummary): string {
  const marked = tasks.marked > 0 ? ` (${tasks.marked} marked now)` : "";
  return `Tasks: ${tasks.completed}/${tasks.total} complete${marked}`;
}

function formatError(heading: string, result: ErrorResult, c: Colors): string {
  const lines = [c.red(`✗ ${heading}: ${result.error}`)];
  if (result.pr.number !== null) {
    const state = result.pr.merged ? "merged" : (result.pr.state ?? "unknown");
    lines.push(`  ${c.dim("PR:")} #${result.pr.number} (state: ${state})`);
  }
  if (result.message !== result.error) {
    lines.push(`  ${result.message}`);
  }
  return lines.join("\n");
}
