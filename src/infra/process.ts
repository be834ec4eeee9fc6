import { spawn } from "node:child_process";

export interface RunOptions {
  cwd?: string;
  /** Kill the process after this many ms; 0 disables the timeout */
  timeoutMs?: number;
}

export interface RunResult {
  code: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

/** Grace period between SIGTERM and SIGKILL for a timed-out process */
const KILL_GRACE_MS = 5000;

/**
 * Run a command to completion and collect its output. Never rejects on a
 * non-zero exit; callers inspect `code`. Rejects when the process cannot be
 * spawned.
 */
export function runCommand(
  command: string,
  args: string[],
  options: RunOptions = {}
): Promise<RunResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, {
      cwd: options.cwd,
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let timeoutId: ReturnType<typeof setTimeout> | undefined;

    if (options.timeoutMs !== undefined && options.timeoutMs > 0) {
      timeoutId = setTimeout(() => {
        timedOut = true;
        proc.kill("SIGTERM");
        setTimeout(() => {
          if (proc.exitCode === null) {
            proc.kill("SIGKILL");
          }
        }, KILL_GRACE_MS).unref();
      }, options.timeoutMs);
    }

    const cleanup = (): void => {
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
    };

    // Decode across chunk boundaries so split multi-byte characters survive
    proc.stdout.setEncoding("utf8");
    proc.stderr.setEncoding("utf8");

    proc.stdout.on("data", (data: string) => {
      stdout += data;
    });

    proc.stderr.on("data", (data: string) => {
      stderr += data;
    });

    proc.on("close", (code) => {
      cleanup();
      resolve({ code, stdout, stderr, timedOut });
    });

    proc.on("error", (error) => {
      cleanup();
      reject(error);
    });
  });
}
