/**
 * Configuration loader with validation
 *
 * Values come from <dataDir>/config/config.json, overridden by environment
 * variables.
 */

import { readFileSync } from "fs";
import { mkdir, rename, writeFile } from "fs/promises";
import { dirname, join } from "path";
import type { ZodIssue } from "zod";
import type { AppConfig } from "../types/config";
import { ConfigMissingError, errorMessage, hasErrorCode } from "../utils/errors";
import {
  type RawConfig,
  type StoredConfig,
  configSchema,
  defaultDataDir,
  parseEnvVars,
  storedConfigSchema,
} from "./schema";

export { configSchema, storedConfigSchema, type StoredConfig } from "./schema";

export function configFilePath(dataDir: string): string {
  return join(dataDir, "config", "config.json");
}

function formatIssues(issues: ZodIssue[], source?: string): string[] {
  const prefix = source ? `${source}: ` : "";
  return issues.map((i) => `  - ${prefix}${i.path.join(".")}: ${i.message}`);
}

/** CONVERSE_DATA_DIR, or ~/.converse */
export function resolveDataDir(): string {
  return process.env["CONVERSE_DATA_DIR"] || defaultDataDir;
}

/**
 * Read the stored config file. A missing file is an empty config.
 * @throws ConfigMissingError if the file is unreadable or malformed
 */
export function readConfigFile(path: string): StoredConfig {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) return {};
    throw new ConfigMissingError([`  - ${path}: ${errorMessage(error)}`]);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigMissingError([`  - ${path}: ${errorMessage(error)}`]);
  }

  const result = storedConfigSchema.safeParse(json);
  if (!result.success) {
    throw new ConfigMissingError(formatIssues(result.error.issues, path));
  }
  return result.data;
}

/**
 * Load and validate configuration from the config file and environment
 * @throws ConfigMissingError if required config is missing or invalid
 */
export function loadConfig(): AppConfig {
  const env = parseEnvVars();
  const dataDir = resolveDataDir();
  const configFile = configFilePath(dataDir);

  const input: RawConfig = { ...readConfigFile(configFile), ...env, dataDir };
  const result = configSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigMissingError(formatIssues(result.error.issues));
  }

  return {
    ...result.data,
    sessionsDir: join(dataDir, "chat_sessions"),
    configFile,
  };
}

/**
 * Validate configuration without throwing
 * Returns validation result with errors if any
 */
export function validateConfig():
  | { success: true; config: AppConfig }
  | { success: false; errors: string[] } {
  try {
    const config = loadConfig();
    return { success: true, config };
  } catch (error) {
    if (error instanceof ConfigMissingError) {
      return { success: false, errors: error.issues };
    }
    if (error instanceof Error) {
      return { success: false, errors: [error.message] };
    }
    return { success: false, errors: ["Unknown configuration error"] };
  }
}

/**
 * Merge values into the config file, writing atomically (temp, rename).
 */
export async function saveConfigFile(path: string, values: StoredConfig): Promise<StoredConfig> {
  const merged = { ...readConfigFile(path), ...values };
  await mkdir(dirname(path), { recursive: true });
  const tmpFile = `${path}.tmp`;
  await writeFile(tmpFile, `${JSON.stringify(merged, null, 2)}\n`, { mode: 0o600 });
  await rename(tmpFile, path);
  return merged;
}

/**
 * Mask an API key for display: first and last four characters only.
 */
export function maskApiKey(key: string): string {
  return key.length > 8 ? `${key.slice(0, 4)}...${key.slice(-4)}` : "<hidden>";
}
