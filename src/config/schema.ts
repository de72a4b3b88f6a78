/**
 * Configuration schema validation with Zod
 */

import { homedir } from "os";
import { join } from "path";
import { z } from "zod";

export const defaultDataDir = join(homedir(), ".converse");

export const DEFAULT_ALLOWED_EXTENSIONS = [
  ".txt",
  ".md",
  ".py",
  ".ts",
  ".js",
  ".json",
  ".csv",
  ".html",
  ".css",
  ".yaml",
  ".yml",
  ".sh",
  ".xml",
  ".log",
  ".ini",
  ".cfg",
  ".toml",
];

function normalizeExtension(ext: string): string {
  const lower = ext.trim().toLowerCase();
  return lower.startsWith(".") ? lower : `.${lower}`;
}

const API_KEY_REQUIRED = "apiKey is required (set CONVERSE_API_KEY or run `converse setup`)";
const MODEL_REQUIRED = "model is required (set CONVERSE_MODEL or run `converse setup`)";

export const configSchema = z.object({
  // Required
  apiKey: z
    .string({ required_error: API_KEY_REQUIRED })
    .min(1, API_KEY_REQUIRED)
    .describe("API key for the selected provider"),

  model: z
    .string({ required_error: MODEL_REQUIRED })
    .min(1, MODEL_REQUIRED)
    .describe("Model identifier, e.g. gpt-4o or gemini-2.0-flash"),

  // Optional with defaults
  provider: z.enum(["openai", "gemini"]).default("openai").describe("Provider implementation"),

  temperature: z.number().min(0).max(2).default(0.7).describe("Sampling temperature"),

  maxFileSizeBytes: z
    .number()
    .int()
    .positive()
    .default(50 * 1024)
    .describe("Largest file /upload will stage (default 50 KB)"),

  allowedExtensions: z
    .array(z.string().min(1))
    .default(DEFAULT_ALLOWED_EXTENSIONS)
    .transform((exts) => exts.map(normalizeExtension))
    .describe("Extensions /upload accepts; empty accepts any"),

  commandPrefix: z.string().length(1).default("/").describe("Command prefix character"),

  editor: z.string().min(1).optional().describe("Editor command for /edit"),

  dataDir: z.string().default(defaultDataDir).describe("Base directory for converse data"),
});

/** Fields `converse setup` persists to the config file. */
export const storedConfigSchema = configSchema
  .pick({
    apiKey: true,
    model: true,
    provider: true,
    temperature: true,
    maxFileSizeBytes: true,
    allowedExtensions: true,
    commandPrefix: true,
    editor: true,
  })
  .partial();

export type ConfigOutput = z.output<typeof configSchema>;
export type StoredConfig = z.output<typeof storedConfigSchema>;

/** Unvalidated configuration values gathered from the file and environment. */
export type RawConfig = Record<string, unknown>;

function parseNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  return Number(raw);
}

function parseList(raw: string | undefined): string[] | undefined {
  if (raw === undefined) return undefined;
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

/**
 * Parse environment variables into config input. Unset variables are
 * omitted so they do not mask values from the config file.
 */
export function parseEnvVars(): RawConfig {
  const env = process.env;
  const values: RawConfig = {
    apiKey: env["CONVERSE_API_KEY"] || undefined,
    provider: env["CONVERSE_PROVIDER"] || undefined,
    model: env["CONVERSE_MODEL"] || undefined,
    temperature: parseNumber(env["CONVERSE_TEMPERATURE"]),
    maxFileSizeBytes: parseNumber(env["CONVERSE_MAX_FILE_SIZE"]),
    allowedExtensions: parseList(env["CONVERSE_ALLOWED_EXTENSIONS"]),
    commandPrefix: env["CONVERSE_COMMAND_PREFIX"] || undefined,
    editor: env["VISUAL"] || env["EDITOR"] || undefined,
    dataDir: env["CONVERSE_DATA_DIR"] || undefined,
  };

  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}
