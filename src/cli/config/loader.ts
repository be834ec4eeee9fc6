import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { config as loadEnv } from "dotenv";
import { Config, ConfigSchema } from "../../types/config.js";
import { ConfigurationError, toError } from "../../infra/errors.js";
import { logger } from "../../infra/logger.js";

const CONFIG_FILE_NAME = "config.json";
const DEFAULT_SESSION_ROOT = ".session";
const ENV_PREFIX = "SESSION_ORCHESTRATOR_";

type Env = Record<string, string | undefined>;
type Section = Record<string, unknown>;

/**
 * Load `<root>/.env` into process.env without overriding variables already set
 */
export function loadEnvFile(root: string): void {
  const envPath = join(root, ".env");
  if (existsSync(envPath)) {
    loadEnv({ path: envPath });
    logger.debug(`Loaded environment from ${envPath}`);
  }
}

export function getConfigPath(root: string, env: Env = process.env): string {
  const sessionRoot = env[`${ENV_PREFIX}SESSION_ROOT`] ?? DEFAULT_SESSION_ROOT;
  return join(root, sessionRoot, CONFIG_FILE_NAME);
}

/**
 * Resolve configuration for a repository: defaults < config file < environment
 */
export function loadConfig(root: string, env: Env = process.env): Config {
  const configPath = getConfigPath(root, env);
  const fileConfig = readConfigFile(configPath);
  const envConfig = readEnvConfig(env);

  const merged: Section = { ...fileConfig, ...envConfig.top };
  for (const key of ["git", "github", "board", "logging"] as const) {
    merged[key] = { ...asSection(fileConfig[key]), ...envConfig[key] };
  }

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
    throw new ConfigurationError(`Invalid configuration: ${errors}`);
  }

  return result.data;
}

export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

function readConfigFile(configPath: string): Section {
  if (!existsSync(configPath)) {
    return {};
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    throw new ConfigurationError(`Failed to parse config file: ${configPath}`, toError(error));
  }
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new ConfigurationError(`Config file must contain a JSON object: ${configPath}`);
  }

  logger.debug(`Loaded config from ${configPath}`);
  return asSection(data);
}

interface EnvConfig {
  top: Section;
  git: Section;
  github: Section;
  board: Section;
  logging: Section;
}

function readEnvConfig(env: Env): EnvConfig {
  const read = (name: string): string | undefined => {
    const value = env[`${ENV_PREFIX}${name}`];
    return value === undefined || value === "" ? undefined : value;
  };
  const config: EnvConfig = { top: {}, git: {}, github: {}, board: {}, logging: {} };

  const sessionRoot = read("SESSION_ROOT");
  if (sessionRoot) config.top["sessionRoot"] = sessionRoot;

  const verbose = read("VERBOSE");
  if (verbose) config.top["verbose"] = parseBoolean(verbose);

  const defaultBranch = read("DEFAULT_BRANCH");
  if (defaultBranch) config.git["defaultBranch"] = defaultBranch;

  const ghPath = read("GH_PATH");
  if (ghPath) config.github["ghPath"] = ghPath;

  const repo = read("REPO");
  if (repo) config.github["repo"] = repo;

  const timeout = read("GH_TIMEOUT_MS");
  if (timeout) config.github["timeoutMs"] = Number(timeout);

  const boardEnabled = read("BOARD_ENABLED");
  if (boardEnabled) config.board["enabled"] = parseBoolean(boardEnabled);

  const boardScript = read("BOARD_SCRIPT");
  if (boardScript) config.board["script"] = boardScript;

  const logLevel = read("LOG_LEVEL");
  if (logLevel) config.logging["consoleLevel"] = logLevel;

  return config;
}

// Anything other than true/false is passed through for zod to reject
function parseBoolean(value: string): boolean | string {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  return value;
}

function asSection(value: unknown): Section {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return {};
  }
  return Object.fromEntries(Object.entries(value));
}
