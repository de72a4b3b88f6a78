/**
 * FileStager - Files waiting to be folded into the next message
 *
 * Content is read when a file is staged, not when it is sent.
 */

import { type Stats, readFileSync, statSync } from "fs";
import { homedir } from "os";
import { basename, extname, resolve } from "path";
import type { Logger } from "pino";
import type { RejectReason, StageResult, StagedFile } from "../types";
import { errorMessage, hasErrorCode } from "../utils/errors";

export interface StagerOptions {
  maxFileSizeBytes: number;
  /** Lowercase extensions with leading dot; empty accepts any */
  allowedExtensions: string[];
}

export function formatKb(bytes: number): string {
  return `${(bytes / 1024).toFixed(1)} KB`;
}

/**
 * Resolve a user-supplied path, expanding a leading ~.
 */
export function resolveUserPath(input: string, cwd: string = process.cwd()): string {
  const trimmed = input.trim();
  if (trimmed === "~") return homedir();
  if (trimmed.startsWith("~/")) return resolve(homedir(), trimmed.slice(2));
  return resolve(cwd, trimmed);
}

const UTF8 = new TextDecoder("utf-8", { fatal: true });

export class FileStager {
  private options: StagerOptions;
  private log: Logger;
  private files = new Map<string, StagedFile>();

  constructor(options: StagerOptions, logger: Logger) {
    this.options = options;
    this.log = logger;
  }

  /**
   * Validate and stage a file. A path that is already staged is reported
   * as a duplicate and stays staged once.
   */
  stage(input: string): StageResult {
    const path = resolveUserPath(input);
    const name = basename(path);

    let stats: Stats;
    try {
      stats = statSync(path);
    } catch (error) {
      if (hasErrorCode(error, "ENOENT") || hasErrorCode(error, "ENOTDIR")) {
        return this.reject("not-found", `File not found: ${input}`);
      }
      return this.reject("not-found", `Cannot access ${input}: ${errorMessage(error)}`);
    }

    if (!stats.isFile()) {
      return this.reject("not-a-file", `Path is not a file: ${input}`);
    }

    const { maxFileSizeBytes, allowedExtensions } = this.options;
    if (stats.size > maxFileSizeBytes) {
      return this.reject(
        "too-large",
        `File is too large (${formatKb(stats.size)}). Max: ${formatKb(maxFileSizeBytes)}.`
      );
    }

    const extension = extname(path).toLowerCase();
    if (allowedExtensions.length > 0 && !allowedExtensions.includes(extension)) {
      return this.reject(
        "extension-not-allowed",
        `Invalid file type '${extension || name}'. Allowed: ${allowedExtensions.join(", ")}`
      );
    }

    const existing = this.files.get(path);
    if (existing) {
      return { status: "duplicate", file: existing };
    }

    let buffer: Buffer;
    try {
      buffer = readFileSync(path);
    } catch (error) {
      return this.reject("not-found", `Error reading file ${input}: ${errorMessage(error)}`);
    }

    if (buffer.includes(0)) {
      return this.reject("not-text", `Could not read ${input} as text. Might be binary?`);
    }

    let contentSnapshot: string;
    try {
      contentSnapshot = UTF8.decode(buffer);
    } catch {
      return this.reject("not-text", `Could not read ${input} as UTF-8 text.`);
    }

    const file: StagedFile = {
      path,
      name,
      sizeBytes: stats.size,
      extension,
      contentSnapshot,
    };
    this.files.set(path, file);
    this.log.debug({ path, sizeBytes: file.sizeBytes }, "File staged");
    return { status: "staged", file };
  }

  /** Staged files in staging order */
  list(): StagedFile[] {
    return [...this.files.values()];
  }

  get size(): number {
    return this.files.size;
  }

  clear(): void {
    this.files.clear();
  }

  /**
   * Return every staged file and empty the set in one step.
   */
  drain(): StagedFile[] {
    const drained = this.list();
    this.files.clear();
    if (drained.length > 0) {
      this.log.debug({ count: drained.length }, "Staged files drained");
    }
    return drained;
  }

  private reject(reason: RejectReason, message: string): StageResult {
    this.log.debug({ reason }, message);
    return { status: "rejected", reason, message };
  }
}
