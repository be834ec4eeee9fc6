import pc from "picocolors";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

interface LoggerOptions {
  level: LogLevel;
  verbose: boolean;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Console logger. Everything goes to stderr so that `--json` output on stdout
 * stays parseable.
 */
class Logger {
  private level: LogLevel = "info";
  private verbose = false;

  configure(options: Partial<LoggerOptions>): void {
    if (options.level !== undefined) {
      this.level = options.level;
    }
    if (options.verbose !== undefined) {
      this.verbose = options.verbose;
    }
  }

  private shouldLog(level: Exclude<LogLevel, "silent">): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private formatTimestamp(): string {
    return new Date().toISOString().slice(11, 19);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog("debug")) return;
    const prefix = pc.gray(`[${this.formatTimestamp()}] ${pc.dim("DEBUG")}`);
    console.error(`${prefix} ${message}`, data ? pc.gray(JSON.stringify(data)) : "");
  }

  info(message: string): void {
    if (!this.shouldLog("info")) return;
    const prefix = pc.blue(`[${this.formatTimestamp()}]`) + " " + pc.cyan("INFO");
    console.error(`${prefix}  ${message}`);
  }

  success(message: string): void {
    if (!this.shouldLog("info")) return;
    const prefix = pc.green(`[${this.formatTimestamp()}]`) + " " + pc.green("✓");
    console.error(`${prefix} ${message}`);
  }

  warn(message: string): void {
    if (!this.shouldLog("warn")) return;
    const prefix = pc.yellow(`[${this.formatTimestamp()}]`) + " " + pc.yellow("WARN");
    console.error(`${prefix}  ${message}`);
  }

  /**
   * With `verbose`, also prints the stack and the chain of causes, e.g. the
   * fs or `gh` failure behind a wrapped error.
   */
  error(message: string, error?: unknown): void {
    if (!this.shouldLog("error")) return;
    const prefix = pc.red(`[${this.formatTimestamp()}]`) + " " + pc.red("ERROR");
    console.error(`${prefix} ${message}`);
    if (!this.verbose) return;

    let current: unknown = error;
    let label = "";
    while (current instanceof Error) {
      console.error(pc.red(`${label}${current.stack ?? current.message}`));
      current = current.cause;
      label = "Caused by: ";
    }
  }

  /** Progress line for a multi-step command, e.g. "[2/3] Finalizing" */
  step(step: number, total: number, message: string): void {
    if (!this.shouldLog("info")) return;
    const prefix = pc.dim(`[${step}/${total}]`);
    console.error(`${prefix} ${message}`);
  }
}

export const logger = new Logger();
