import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { logger } from "../../infra/logger.js";
import { SessionStateError, toError } from "../../infra/errors.js";
import {
  SESSION_INFO_SCHEMA_VERSION,
  STATE_SCHEMA_VERSION,
  SessionContext,
  SessionSchema,
  StepStatus,
  WORKFLOW_TRANSITIONS,
  WorkflowState,
  WorkflowStateSchema,
  WorkflowStep,
} from "../../types/session.js";

const ACTIVE_SESSION_FILE = "ACTIVE_SESSION";
const SESSION_INFO_FILE = "session-info.json";
const STATE_FILE = "state.json";
const SESSION_ID_PATTERN = /^(\d{4}-\d{2})-\d{2}-\d+$/;

export interface TransitionCheck {
  allowed: boolean;
  current: WorkflowStep;
  status: StepStatus;
  reason?: string;
}

/**
 * SessionStore - file-backed session records
 *
 * Layout, relative to the repository root:
 *
 *   .session/ACTIVE_SESSION                      active session id
 *   .session/sessions/YYYY-MM/<id>/session-info.json
 *   .session/sessions/YYYY-MM/<id>/state.json    workflow step tracking
 *   .session/sessions/YYYY-MM/<id>/tasks.md
 *
 * The store is only used by one command at a time; there is no locking.
 */
export class SessionStore {
  constructor(
    private readonly root: string,
    private readonly sessionRoot: string = ".session"
  ) {}

  getActiveSessionId(): string | null {
    const pointer = join(this.root, this.sessionRoot, ACTIVE_SESSION_FILE);
    if (!existsSync(pointer)) {
      return null;
    }
    const id = readFileSync(pointer, "utf-8").trim();
    return id.length > 0 ? id : null;
  }

  setActiveSession(sessionId: string): void {
    this.assertSessionId(sessionId);
    this.writeFileAtomic(join(this.root, this.sessionRoot, ACTIVE_SESSION_FILE), `${sessionId}\n`);
  }

  /**
   * Session directory relative to the repository root
   */
  getSessionDir(sessionId: string): string {
    const yearMonth = this.assertSessionId(sessionId);
    return join(this.sessionRoot, "sessions", yearMonth, sessionId);
  }

  /**
   * Resolve the active session pointer into a context for the engines
   */
  loadActive(): SessionContext {
    const sessionId = this.getActiveSessionId();
    if (!sessionId) {
      throw new SessionStateError("No active session");
    }
    return this.load(sessionId);
  }

  load(sessionId: string): SessionContext {
    const dir = this.getSessionDir(sessionId);
    const raw = this.readRecord(join(dir, SESSION_INFO_FILE));
    if (raw === null) {
      throw new SessionStateError(`Session info not found for ${sessionId}`);
    }

    if (raw["schema_version"] !== SESSION_INFO_SCHEMA_VERSION) {
      logger.warn(
        `Schema version mismatch in ${SESSION_INFO_FILE}: expected ${SESSION_INFO_SCHEMA_VERSION}, got ${String(raw["schema_version"] ?? "missing")}`
      );
    }

    const result = SessionSchema.safeParse(raw);
    if (!result.success) {
      const errors = result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
      throw new SessionStateError(`Invalid session record ${sessionId}: ${errors}`);
    }

    logger.debug(`Loaded session ${sessionId} (${result.data.type})`);
    return { id: sessionId, dir, root: this.root, session: result.data };
  }

  /**
   * Append task identifiers to the session's ownership record. Existing
   * entries keep their order; duplicates are dropped.
   */
  recordTouchedTasks(sessionId: string, identifiers: string[]): string[] {
    const infoPath = join(this.getSessionDir(sessionId), SESSION_INFO_FILE);
    const raw = this.readRecord(infoPath);
    if (raw === null) {
      throw new SessionStateError(`Session info not found for ${sessionId}`);
    }

    const existing = raw["touched_tasks"];
    const current = Array.isArray(existing)
      ? existing.filter((id): id is string => typeof id === "string")
      : [];
    const merged = [...new Set([...current, ...identifiers])];

    this.writeFileAtomic(
      join(this.root, infoPath),
      JSON.stringify({ ...raw, touched_tasks: merged }, null, 2) + "\n"
    );
    return merged;
  }

  getWorkflowState(sessionId: string): WorkflowState {
    const raw = this.readRecord(join(this.getSessionDir(sessionId), STATE_FILE));
    const result = WorkflowStateSchema.safeParse(raw ?? {});
    if (!result.success) {
      logger.warn(`Ignoring unreadable ${STATE_FILE} for ${sessionId}`);
      return WorkflowStateSchema.parse({});
    }
    return result.data;
  }

  setWorkflowStep(sessionId: string, step: WorkflowStep, status: StepStatus): WorkflowState {
    const statePath = join(this.getSessionDir(sessionId), STATE_FILE);
    const existing = this.readRecord(statePath) ?? { schema_version: STATE_SCHEMA_VERSION };
    const timestamp = new Date().toISOString();

    const next: Record<string, unknown> = {
      ...existing,
      current_step: step,
      step_status: status,
      step_updated_at: timestamp,
    };
    if (status === "in_progress") {
      next["step_started_at"] = timestamp;
    }

    this.writeFileAtomic(join(this.root, statePath), JSON.stringify(next, null, 2) + "\n");
    logger.debug(`Workflow step: ${step} (${status})`);
    return WorkflowStateSchema.parse(next);
  }

  /**
   * Whether `target` may follow the recorded step. Re-running the recorded
   * step is always allowed.
   */
  checkTransition(sessionId: string, target: WorkflowStep): TransitionCheck {
    const state = this.getWorkflowState(sessionId);
    const current = state.current_step;
    const status = state.step_status;

    if (current === target) {
      return { allowed: true, current, status };
    }
    if (status === "in_progress") {
      return {
        allowed: false,
        current,
        status,
        reason: `Step '${current}' is still in progress`,
      };
    }
    if (WORKFLOW_TRANSITIONS[current].includes(target)) {
      return { allowed: true, current, status };
    }

    const validNext = WORKFLOW_TRANSITIONS[current];
    return {
      allowed: false,
      current,
      status,
      reason:
        validNext.length === 0
          ? "Session workflow complete - no more steps"
          : `Expected one of: ${validNext.join(", ")}`,
    };
  }

  private assertSessionId(sessionId: string): string {
    const match = SESSION_ID_PATTERN.exec(sessionId);
    if (!match?.[1]) {
      throw new SessionStateError(`Invalid session id: ${sessionId}`);
    }
    return match[1];
  }

  private readRecord(relativePath: string): Record<string, unknown> | null {
    const fullPath = join(this.root, relativePath);
    if (!existsSync(fullPath)) {
      return null;
    }

    let data: unknown;
    try {
      data = JSON.parse(readFileSync(fullPath, "utf-8"));
    } catch (error) {
      throw new SessionStateError(`Failed to parse ${relativePath}`, toError(error));
    }
    if (typeof data !== "object" || data === null || Array.isArray(data)) {
      throw new SessionStateError(`Expected a JSON object in ${relativePath}`);
    }
    return Object.fromEntries(Object.entries(data));
  }

  // Rename is atomic on the same filesystem
  private writeFileAtomic(fullPath: string, content: string): void {
    const dir = dirname(fullPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    const tmp = `${fullPath}.${process.pid}.tmp`;
    writeFileSync(tmp, content);
    renameSync(tmp, fullPath);
  }
}
