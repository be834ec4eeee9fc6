import { readFile, rename, rm, writeFile, mkdir } from "node:fs/promises";
import { dirname, isAbsolute, join } from "node:path";
import { logger } from "../../infra/logger.js";
import { LedgerAccessError, toError } from "../../infra/errors.js";

/**
 * Read/write access to task-list documents. Paths are relative to the
 * repository root unless absolute. File-system failures other than a missing
 * file surface as LedgerAccessError.
 */
export interface TaskDocumentStore {
  /** Document text, or null when the file does not exist */
  read(path: string): Promise<string | null>;
  write(path: string, text: string): Promise<void>;
}

export class FileTaskDocumentStore implements TaskDocumentStore {
  constructor(private readonly root: string) {}

  resolve(path: string): string {
    return isAbsolute(path) ? path : join(this.root, path);
  }

  async read(path: string): Promise<string | null> {
    try {
      return await readFile(this.resolve(path), "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw new LedgerAccessError(path, "read", toError(error));
    }
  }

  async write(path: string, text: string): Promise<void> {
    const target = this.resolve(path);
    const tmp = `${target}.${process.pid}.tmp`;
    try {
      await mkdir(dirname(target), { recursive: true });
      await writeFile(tmp, text, "utf-8");
      await rename(tmp, target);
    } catch (error) {
      await rm(tmp, { force: true });
      throw new LedgerAccessError(path, "write", toError(error));
    }
    logger.debug(`Wrote task file ${path}`);
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
