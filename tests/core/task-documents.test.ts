import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { FileTaskDocumentStore } from "../../src/core/ledger/task-documents.js";
import { LedgerAccessError } from "../../src/infra/errors.js";

const LEDGER = "specs/004-widget-export/tasks.md";

describe("FileTaskDocumentStore", () => {
  let root: string;
  let store: FileTaskDocumentStore;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "task-documents-test-"));
    store = new FileTaskDocumentStore(root);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("should return null for a missing file", async () => {
    expect(await store.read(LEDGER)).toBeNull();
  });

  it("should create parent directories when writing", async () => {
    await store.write(LEDGER, "- [x] T001 Done\n");

    expect(readFileSync(join(root, LEDGER), "utf-8")).toBe("- [x] T001 Done\n");
    expect(await store.read(LEDGER)).toBe("- [x] T001 Done\n");
  });

  it("should report a task path that cannot be read", async () => {
    mkdirSync(join(root, LEDGER), { recursive: true });

    const error = await store.read(LEDGER).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LedgerAccessError);
    expect(error).toMatchObject({
      code: "LEDGER_ACCESS_ERROR",
      path: LEDGER,
      operation: "read",
      message: expect.stringMatching(/^Cannot read task file specs\/004-widget-export\/tasks\.md: EISDIR/),
    });
  });

  it("should report a failed write and leave no temp file behind", async () => {
    mkdirSync(join(root, LEDGER), { recursive: true });

    const error = await store.write(LEDGER, "- [x] T001 Done\n").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LedgerAccessError);
    expect(error).toMatchObject({ code: "LEDGER_ACCESS_ERROR", path: LEDGER, operation: "write" });
    expect(readdirSync(join(root, "specs/004-widget-export"))).toEqual(["tasks.md"]);
  });
});
