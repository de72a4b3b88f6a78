/**
 * Configuration types for converse
 */

export type ProviderName = "openai" | "gemini";

export interface AppConfig {
  /** API key for the selected provider */
  apiKey: string;

  /** Which provider implementation to use */
  provider: ProviderName;

  /** Model identifier passed to the provider */
  model: string;

  /** Sampling temperature for conversation requests */
  temperature: number;

  /** Largest file (in bytes) that /upload will stage */
  maxFileSizeBytes: number;

  /** Extensions (lowercase, with leading dot) /upload accepts; empty = any */
  allowedExtensions: string[];

  /** Character that marks an input line as a command */
  commandPrefix: string;

  /** External editor command used by /edit */
  editor?: string;

  /** Base directory for converse data */
  dataDir: string;

  /** Directory holding one JSON file per session */
  sessionsDir: string;

  /** Path to the persisted configuration file */
  configFile: string;
}
