/**
 * Error types shared across converse
 */

export type ConverseErrorCode =
  | "CONFIG_MISSING"
  | "NOT_FOUND"
  | "INVALID_ARGUMENT"
  | "PROVIDER_ERROR"
  | "STORAGE_ERROR";

export class ConverseError extends Error {
  readonly code: ConverseErrorCode;

  constructor(code: ConverseErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Required configuration is absent or invalid. Fatal before any session work. */
export class ConfigMissingError extends ConverseError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("CONFIG_MISSING", `Configuration validation failed:\n${issues.join("\n")}`);
    this.issues = issues;
  }
}

export class NotFoundError extends ConverseError {
  readonly storageKey: string;

  constructor(storageKey: string) {
    super("NOT_FOUND", `Session '${storageKey}' not found.`);
    this.storageKey = storageKey;
  }
}

/** A request that cannot be carried out as given; nothing was changed. */
export class InvalidArgumentError extends ConverseError {
  constructor(message: string) {
    super("INVALID_ARGUMENT", message);
  }
}

export class ProviderError extends ConverseError {
  readonly provider: string;

  constructor(provider: string, message: string, options?: { cause?: unknown }) {
    super("PROVIDER_ERROR", message, options);
    this.provider = provider;
  }
}

/** Session storage could not be read or written. */
export class StorageError extends ConverseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("STORAGE_ERROR", message, options);
  }
}

/**
 * Whether a caught value is a Node system error with the given code.
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Errors after which the interaction loop must stop.
 */
export function isFatal(error: unknown): boolean {
  return error instanceof ConfigMissingError || error instanceof StorageError;
}
