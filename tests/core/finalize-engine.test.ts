import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  FinalizeEngine,
  appendPhaseNote,
  ledgerPath,
} from "../../src/core/engine/finalize-engine.js";
import { FileTaskDocumentStore } from "../../src/core/ledger/task-documents.js";
import {
  MemoryGateway,
  MemoryTaskDocuments,
  SESSION_DIR,
  ledger,
  makeContext,
  makeIssue,
  makePR,
  taskIds,
} from "../helpers.js";

const ISSUE_LEDGER = `${SESSION_DIR}/tasks.md`;
const SPEC_LEDGER = "specs/004-widget-export/tasks.md";

function parentBody(checked: number[]): string {
  const phases: Array<[string, number]> = [
    ["Setup", 601],
    ["Models", 605],
    ["Storage", 607],
    ["Core engine", 610],
    ["CLI", 612],
    ["Docs", 615],
  ];
  const lines = phases.map(
    ([name, issue], index) =>
      `- [${checked.includes(issue) ? "x" : " "}] Phase ${index + 1}: ${name} (#${issue})`
  );
  return ["## Widget export", "", ...lines, "", "Owner: @platform-team"].join("\n");
}

describe("FinalizeEngine", () => {
  let gateway: MemoryGateway;
  let documents: MemoryTaskDocuments;
  let engine: FinalizeEngine;

  beforeEach(() => {
    gateway = new MemoryGateway();
    documents = new MemoryTaskDocuments();
    engine = new FinalizeEngine({ gateway, documents });
  });

  describe("github_issue sessions", () => {
    const context = makeContext({
      type: "github_issue",
      issue_number: 663,
      pr_number: 664,
      touched_tasks: taskIds(7),
    });

    beforeEach(() => {
      gateway.addPR(makePR({ number: 664 })).addIssue(makeIssue({ number: 663 }));
      documents.files.set(ISSUE_LEDGER, ledger(7));
    });

    it("should close the issue and mark the session's tasks", async () => {
      const result = await engine.finalize({ context });

      expect(result).toEqual({
        status: "success",
        pr_merged: true,
        session_type: "github_issue",
        issue: { number: 663, closed: true, comment: "Resolved via PR #664" },
        tasks: { file: ISSUE_LEDGER, total: 7, completed: 7, marked: 7 },
        synced_to_projects: true,
        warnings: [],
        ready_for_wrap: true,
      });
      expect(gateway.calls).toEqual([
        { method: "closeIssue", target: 663, detail: "Resolved via PR #664" },
        { method: "syncExternalBoard", target: ISSUE_LEDGER, detail: "issue-663" },
      ]);
      expect(documents.files.get(ISSUE_LEDGER)).toBe(ledger(7, 7));
    });

    it("should make no new mutations when re-run", async () => {
      await engine.finalize({ context });
      gateway.calls.length = 0;
      documents.writes.length = 0;

      const result = await engine.finalize({ context });

      expect(result).toMatchObject({
        status: "success",
        issue: { number: 663, closed: true, comment: null },
        tasks: { total: 7, completed: 7, marked: 0 },
      });
      expect(gateway.methods()).toEqual(["syncExternalBoard"]);
      expect(documents.writes).toEqual([]);
    });

    it("should only mark tasks recorded on the session", async () => {
      const partial = makeContext({
        type: "github_issue",
        issue_number: 663,
        pr_number: 664,
        touched_tasks: ["T002", "T005"],
      });

      const result = await engine.finalize({ context: partial });

      expect(result).toMatchObject({ tasks: { total: 7, completed: 2, marked: 2 } });
      expect(documents.files.get(ISSUE_LEDGER)).toBe(
        ledger(7).replace("- [ ] T002", "- [x] T002").replace("- [ ] T005", "- [x] T005")
      );
    });

    it("should find the PR by branch when the session has no pr_number", async () => {
      const unlinked = makeContext({ type: "github_issue", issue_number: 663 });

      const result = await engine.finalize({ context: unlinked, branch: "feature/widget-export" });

      expect(result).toMatchObject({
        status: "success",
        issue: { number: 663, closed: true, comment: "Resolved via PR #664" },
      });
    });

    it("should report a missing PR with the branch it looked for", async () => {
      const unlinked = makeContext({ type: "github_issue", issue_number: 663 });

      const result = await engine.finalize({ context: unlinked, branch: "feature/other" });

      expect(result).toEqual({
        status: "error",
        error: "PR feature/other not found",
        code: "NOT_FOUND",
        pr: { number: null, state: null, merged: false },
        message: "Publish the session's work as a PR first, then retry finalize",
        resource: { kind: "pull_request", id: "feature/other" },
      });
      expect(gateway.calls).toEqual([]);
    });

    it("should surface a missing issue with its number", async () => {
      gateway.issues.delete(663);

      const result = await engine.finalize({ context });

      expect(result).toEqual({
        status: "error",
        error: "Issue #663 not found",
        code: "NOT_FOUND",
        pr: { number: 664, state: "closed", merged: true },
        message: "Issue #663 not found",
        resource: { kind: "issue", id: 663 },
      });
      expect(documents.writes).toEqual([]);
    });

    it("should warn when the task file is missing", async () => {
      documents.files.clear();

      const result = await engine.finalize({ context });

      expect(result).toMatchObject({
        status: "success",
        tasks: { file: ISSUE_LEDGER, total: 0, completed: 0, marked: 0 },
        warnings: [`Task file ${ISSUE_LEDGER} not found; 7 task(s) not marked`],
        ready_for_wrap: true,
      });
    });

    it("should abort before closing the issue when the task file is malformed", async () => {
      documents.files.set(ISSUE_LEDGER, "# Tasks\n- [?] T001 broken\n");

      const result = await engine.finalize({ context });

      expect(result).toMatchObject({
        status: "error",
        error: "Malformed task file",
        code: "MALFORMED_LEDGER",
        message: "Malformed task entry at line 2: - [?] T001 broken",
      });
      expect(gateway.calls).toEqual([]);
      expect(gateway.issues.get(663)?.state).toBe("open");
    });

    it("should fail when the session has no issue_number", async () => {
      const broken = makeContext({ type: "github_issue", pr_number: 664 });

      const result = await engine.finalize({ context: broken });

      expect(result).toMatchObject({
        status: "error",
        error: "Invalid session configuration",
        code: "CONFIGURATION_ERROR",
        message: "github_issue session is missing issue_number",
      });
      expect(gateway.calls).toEqual([]);
    });

    it("should keep success when the board sync fails", async () => {
      gateway.syncFailure = "sync script exited with code 1";

      const result = await engine.finalize({ context });

      expect(result).toMatchObject({
        status: "success",
        synced_to_projects: false,
        warnings: ["Board sync failed: sync script exited with code 1"],
        ready_for_wrap: true,
      });
    });

    it("should skip the board sync when disabled", async () => {
      const quiet = new FinalizeEngine({ gateway, documents, syncBoard: false });

      const result = await quiet.finalize({ context });

      expect(result).toMatchObject({ status: "success", synced_to_projects: false, warnings: [] });
      expect(gateway.methods()).toEqual(["closeIssue"]);
    });

    it("should return a frozen result", async () => {
      const result = await engine.finalize({ context });

      expect(Object.isFrozen(result)).toBe(true);
      expect(result.status).toBe("success");
      if (result.status === "success") {
        expect(Object.isFrozen(result.warnings)).toBe(true);
      }
    });

    describe("with the task file on disk", () => {
      let root: string;

      beforeEach(() => {
        root = mkdtempSync(join(tmpdir(), "finalize-engine-test-"));
        engine = new FinalizeEngine({ gateway, documents: new FileTaskDocumentStore(root) });
      });

      afterEach(() => {
        rmSync(root, { recursive: true, force: true });
      });

      it("should return an error result when the task file cannot be read", async () => {
        mkdirSync(join(root, ISSUE_LEDGER), { recursive: true });

        const result = await engine.finalize({ context });

        expect(result).toEqual({
          status: "error",
          error: "Task file unavailable",
          code: "LEDGER_ACCESS_ERROR",
          pr: { number: 664, state: "closed", merged: true },
          message: expect.stringMatching(/^Cannot read task file .+\/tasks\.md: EISDIR/),
        });
        expect(gateway.calls).toEqual([]);
        expect(gateway.issues.get(663)?.state).toBe("open");
      });

      it("should mark tasks in the file", async () => {
        mkdirSync(join(root, SESSION_DIR), { recursive: true });
        writeFileSync(join(root, ISSUE_LEDGER), ledger(7));

        const result = await engine.finalize({ context });

        expect(result).toMatchObject({ status: "success", tasks: { completed: 7, marked: 7 } });
        expect(readFileSync(join(root, ISSUE_LEDGER), "utf-8")).toBe(ledger(7, 7));
      });
    });
  });

  describe("merge gate", () => {
    it("should refuse to finalize an open PR", async () => {
      gateway.addPR(makePR({ number: 665, state: "open", merged: false }));
      gateway.addIssue(makeIssue({ number: 663 }));
      documents.files.set(ISSUE_LEDGER, ledger(3));
      const context = makeContext({
        type: "github_issue",
        issue_number: 663,
        pr_number: 665,
        touched_tasks: ["T001"],
      });

      const result = await engine.finalize({ context });

      expect(result).toEqual({
        status: "error",
        error: "PR not merged",
        code: "PR_NOT_MERGED",
        pr: { number: 665, state: "open", merged: false },
        message: "Merge PR #665 first, then retry finalize",
      });
      expect(gateway.calls).toEqual([]);
      expect(documents.writes).toEqual([]);
    });

    const sessionLinks: Array<[string, Record<string, unknown>]> = [
      ["github_issue", { issue_number: 663 }],
      ["speckit", { issue_number: 610, parent_issue: 654, feature_id: "004-widget-export" }],
      ["unstructured", { goal: "Tidy logging" }],
    ];

    it.each(sessionLinks)("should not mutate anything for an unmerged %s session", async (type, links) => {
      gateway.addPR(makePR({ number: 670, state: "closed", merged: false }));
      gateway.addIssue(makeIssue({ number: 663 })).addIssue(makeIssue({ number: 610 }));
      gateway.addIssue(makeIssue({ number: 654, body: parentBody([601]) }));
      const context = makeContext({ type, pr_number: 670, touched_tasks: ["T001"], ...links });

      const result = await engine.finalize({ context });

      expect(result.status).toBe("error");
      expect(result).toMatchObject({ pr: { number: 670, state: "closed", merged: false } });
      expect(gateway.calls).toEqual([]);
      expect(documents.writes).toEqual([]);
    });
  });

  describe("speckit sessions", () => {
    const context = makeContext({
      type: "speckit",
      issue_number: 610,
      parent_issue: 654,
      feature_id: "004-widget-export",
      pr_number: 661,
      touched_tasks: ["T010", "T011"],
    });
    const phaseLedger = [
      "# Tasks: Widget export",
      "- [x] T009 Storage adapter",
      "- [ ] T010 Export engine",
      "- [ ] T011 Export tests",
      "- [ ] T012 CLI flag",
      "",
    ].join("\n");

    beforeEach(() => {
      gateway.addPR(makePR({ number: 661, draft: true, body: "Implements the export feature." }));
      gateway.addIssue(makeIssue({ number: 610 }));
      gateway.addIssue(makeIssue({ number: 654, body: parentBody([601, 605, 607]) }));
      documents.files.set(SPEC_LEDGER, phaseLedger);
    });

    it("should close the phase and record progress on the parent", async () => {
      const result = await engine.finalize({ context });

      expect(result).toEqual({
        status: "success",
        pr_merged: true,
        session_type: "speckit",
        phase_issue: {
          number: 610,
          closed: true,
          comment: "✅ Phase complete. All tasks done. (PR #661)",
        },
        parent_issue: {
          number: 654,
          updated: true,
          progress: "4/6 phases complete",
          checklist_updated: true,
        },
        tasks: { file: SPEC_LEDGER, total: 4, completed: 3, marked: 2 },
        pr: {
          number: 661,
          description_updated: true,
          still_draft: true,
          reason: "4/6 phases complete; awaiting remaining phases",
        },
        synced_to_projects: true,
        warnings: [],
        ready_for_wrap: true,
      });
      expect(gateway.methods()).toEqual([
        "closeIssue",
        "updateIssueBody",
        "updatePRBody",
        "syncExternalBoard",
      ]);
      expect(gateway.calls[3]).toEqual({
        method: "syncExternalBoard",
        target: SPEC_LEDGER,
        detail: "004-widget-export",
      });
    });

    it("should change only the phase line in the parent body", async () => {
      await engine.finalize({ context });

      expect(gateway.issues.get(654)?.body).toBe(parentBody([601, 605, 607, 610]));
    });

    it("should append a phase note to the PR description", async () => {
      await engine.finalize({ context });

      expect(gateway.prs.get(661)?.body).toBe(
        "Implements the export feature.\n\nPhase #610 complete: 4/6 phases complete"
      );
    });

    it("should not duplicate the phase note or re-check the parent when re-run", async () => {
      await engine.finalize({ context });
      gateway.calls.length = 0;

      const result = await engine.finalize({ context });

      expect(result).toMatchObject({
        phase_issue: { closed: true, comment: null },
        parent_issue: { updated: false, progress: "4/6 phases complete", checklist_updated: true },
        pr: { description_updated: false, still_draft: true },
        tasks: { marked: 0, completed: 3 },
      });
      expect(gateway.methods()).toEqual(["syncExternalBoard"]);
    });

    it("should mark the PR ready when the last phase completes", async () => {
      gateway.addIssue(makeIssue({ number: 654, body: parentBody([601, 605, 607, 612, 615]) }));

      const result = await engine.finalize({ context });

      expect(result).toMatchObject({
        parent_issue: { progress: "6/6 phases complete", checklist_updated: true },
        pr: {
          number: 661,
          description_updated: false,
          still_draft: false,
          reason: "All phases complete",
        },
      });
      expect(gateway.methods()).toContain("markPRReady");
      expect(gateway.methods()).not.toContain("updatePRBody");
      expect(gateway.prs.get(661)?.draft).toBe(false);
    });

    it("should keep going when the parent body changes concurrently", async () => {
      gateway.concurrentEdits.set("issue:654", "edited elsewhere");

      const result = await engine.finalize({ context });

      expect(result).toMatchObject({
        status: "success",
        parent_issue: {
          number: 654,
          updated: false,
          progress: "3/6 phases complete",
          checklist_updated: false,
        },
        tasks: { completed: 3, marked: 2 },
        warnings: ["Parent issue #654 changed during update; re-run finalize"],
        ready_for_wrap: true,
      });
      expect(documents.writes).toHaveLength(1);
    });

    it("should keep going when the PR description changes concurrently", async () => {
      gateway.concurrentEdits.set("pr:661", "edited elsewhere");

      const result = await engine.finalize({ context });

      expect(result).toMatchObject({
        status: "success",
        parent_issue: { number: 654, updated: true, progress: "4/6 phases complete" },
        pr: {
          number: 661,
          description_updated: false,
          still_draft: true,
          reason: "4/6 phases complete; awaiting remaining phases",
        },
        tasks: { completed: 3, marked: 2 },
        warnings: ["PR #661 description changed during update; re-run finalize"],
        ready_for_wrap: true,
      });
      expect(gateway.methods()).toEqual(["closeIssue", "updateIssueBody", "syncExternalBoard"]);
      expect(gateway.prs.get(661)?.body).toBe("Implements the export feature.");
    });

    it("should warn when the parent has no line for the phase", async () => {
      gateway.addIssue(makeIssue({ number: 654, body: "- [x] Phase 1 (#601)\n- [ ] Phase 2 (#602)" }));

      const result = await engine.finalize({ context });

      expect(result).toMatchObject({
        parent_issue: { updated: false, progress: "1/2 phases complete", checklist_updated: false },
        warnings: ["Parent issue #654 has no checklist line for #610"],
        ready_for_wrap: true,
      });
    });

    it("should use spec_dir for the task file when set", async () => {
      const withDir = makeContext({
        type: "speckit",
        issue_number: 610,
        parent_issue: 654,
        spec_dir: "docs/specs/widget-export",
        pr_number: 661,
      });
      documents.files.set("docs/specs/widget-export/tasks.md", "- [ ] T001 one\n");

      const result = await engine.finalize({ context: withDir });

      expect(result).toMatchObject({
        tasks: { file: "docs/specs/widget-export/tasks.md", total: 1, completed: 0 },
      });
      expect(gateway.calls.at(-1)).toMatchObject({ detail: "widget-export" });
    });

    it("should fail before any mutation when parent_issue is missing", async () => {
      const broken = makeContext({
        type: "speckit",
        issue_number: 610,
        feature_id: "004-widget-export",
        pr_number: 661,
      });

      const result = await engine.finalize({ context: broken });

      expect(result).toMatchObject({
        status: "error",
        code: "CONFIGURATION_ERROR",
        message: "speckit session is missing parent_issue",
      });
      expect(gateway.calls).toEqual([]);
    });
  });

  describe("unstructured sessions", () => {
    it("should mark tasks and sync using the session id", async () => {
      gateway.addPR(makePR({ number: 664 }));
      documents.files.set(ISSUE_LEDGER, ledger(3, 1));
      const context = makeContext({
        type: "unstructured",
        goal: "Tidy logging",
        pr_number: 664,
        touched_tasks: ["T002"],
      });

      const result = await engine.finalize({ context });

      expect(result).toEqual({
        status: "success",
        pr_merged: true,
        session_type: "unstructured",
        tasks: { file: ISSUE_LEDGER, total: 3, completed: 2, marked: 1 },
        synced_to_projects: true,
        warnings: [],
        ready_for_wrap: true,
      });
      expect(gateway.calls).toEqual([
        { method: "syncExternalBoard", target: ISSUE_LEDGER, detail: "2026-10-18-1" },
      ]);
    });
  });
});

describe("ledgerPath", () => {
  it("should use the session directory for issue sessions", () => {
    const context = makeContext({ type: "github_issue", issue_number: 1 });
    expect(ledgerPath(context)).toBe(ISSUE_LEDGER);
  });

  it("should use the feature directory for speckit sessions", () => {
    const context = makeContext({ type: "speckit", feature_id: "004-widget-export" });
    expect(ledgerPath(context)).toBe(SPEC_LEDGER);
  });
});

describe("appendPhaseNote", () => {
  it("should start an empty description with the note", () => {
    expect(appendPhaseNote("", 610, "Phase #610 complete: 4/6 phases complete")).toBe(
      "Phase #610 complete: 4/6 phases complete"
    );
  });

  it("should keep earlier phase notes", () => {
    const body = "Summary\n\nPhase #607 complete: 3/6 phases complete\n";
    expect(appendPhaseNote(body, 610, "Phase #610 complete: 4/6 phases complete")).toBe(
      "Summary\n\nPhase #607 complete: 3/6 phases complete\n\nPhase #610 complete: 4/6 phases complete"
    );
  });
});
