/**
 * Server Configuration
 *
 * Loads settings from an optional YAML file and applies environment
 * overrides on top.
 *
 * Files:
 * - ~/.config/chunk-recall/config.yaml (or $CHUNK_RECALL_CONFIG)
 *
 * Environment overrides: PORT, HOST, DATABASE_PATH, LOG_LEVEL
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { formatValidationError } from "@chunk-recall/shared";
import { createLogger } from "./logger";

const log = createLogger("Config");

// =============================================================================
// Constants
// =============================================================================

const CONFIG_DIR = ".config/chunk-recall";
const CONFIG_FILE = "config.yaml";
const DATA_DIR = ".local/share/chunk-recall";
const DATABASE_FILE = "chunks.db";

export const DEFAULT_PORT = 3000;
export const DEFAULT_HOST = "0.0.0.0";

// =============================================================================
// Schema
// =============================================================================

const ConfigSchema = z.object({
  port: z.number().int().min(1).max(65535).default(DEFAULT_PORT),
  host: z.string().min(1).default(DEFAULT_HOST),
  /** Path to the SQLite database file, or ":memory:" */
  databasePath: z.string().min(1).optional(),
  logLevel: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  corsOrigins: z
    .array(z.string().min(1))
    .default(["http://localhost:5173", "http://localhost:3000"]),
});

export type AppConfig = z.infer<typeof ConfigSchema> & { databasePath: string };

/**
 * Raised when the config file or an environment override is invalid.
 * Startup aborts on this error rather than guessing a value.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

// =============================================================================
// Path Resolution
// =============================================================================

function getHome(env: NodeJS.ProcessEnv): string {
  return env.HOME ?? homedir();
}

/**
 * Get the absolute path of the config file.
 */
export function getConfigFilePath(env: NodeJS.ProcessEnv = process.env): string {
  return env.CHUNK_RECALL_CONFIG ?? join(getHome(env), CONFIG_DIR, CONFIG_FILE);
}

/**
 * Get the default database location when none is configured.
 */
export function getDefaultDatabasePath(env: NodeJS.ProcessEnv = process.env): string {
  return join(getHome(env), DATA_DIR, DATABASE_FILE);
}

// =============================================================================
// Loading
// =============================================================================

async function readConfigFile(path: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      log.debug(`No config file at ${path}, using defaults`);
      return {};
    }
    throw error;
  }

  try {
    return parseYaml(content) ?? {};
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid YAML in ${path}: ${message}`);
  }
}

function parsePort(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || String(parsed) !== value.trim()) {
    throw new ConfigError(`Invalid PORT "${value}"`);
  }
  return parsed;
}

/**
 * Load the configuration. Missing file means defaults; env vars win over
 * file values.
 *
 * @param env - Environment to read overrides from (injectable for tests)
 */
export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
  const path = getConfigFilePath(env);
  const fromFile = await readConfigFile(path);

  if (typeof fromFile !== "object" || fromFile === null || Array.isArray(fromFile)) {
    throw new ConfigError(`Config file ${path} must contain a mapping`);
  }

  const merged: Record<string, unknown> = { ...fromFile };
  if (env.PORT) merged.port = parsePort(env.PORT);
  if (env.HOST) merged.host = env.HOST;
  if (env.DATABASE_PATH) merged.databasePath = env.DATABASE_PATH;
  if (env.LOG_LEVEL) merged.logLevel = env.LOG_LEVEL;

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatValidationError(result.error)}`);
  }

  return {
    ...result.data,
    databasePath: result.data.databasePath ?? getDefaultDatabasePath(env),
  };
}
