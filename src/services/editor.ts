/**
 * ExternalEditor - compose a message in $EDITOR
 *
 * Opens the editor on a temporary markdown file and reads it back once the
 * editor exits.
 */

import { spawn } from "child_process";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import type { Logger } from "pino";
import type { ComposeResult, Editor } from "../types";
import { errorMessage, hasErrorCode } from "../utils/errors";

export const EDITOR_HEADER = "# Enter your prompt below. Save and exit the editor when done.";

/**
 * Drop the instruction header and surrounding whitespace.
 */
export function stripEditorHeader(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith(EDITOR_HEADER)) return trimmed;
  return trimmed.slice(EDITOR_HEADER.length).trim();
}

export class ExternalEditor implements Editor {
  private command: string | undefined;
  private log: Logger;

  constructor(command: string | undefined, logger: Logger) {
    this.command = command;
    this.log = logger;
  }

  async compose(): Promise<ComposeResult> {
    const [cmd, ...args] = (this.command ?? "").trim().split(/\s+/).filter(Boolean);
    if (!cmd) {
      return {
        status: "failed",
        message: "$EDITOR is not set. Set it to your preferred editor (e.g. vim, nano, code --wait).",
      };
    }

    const dir = await mkdtemp(join(tmpdir(), "converse-"));
    const file = join(dir, "prompt.md");

    try {
      await writeFile(file, `${EDITOR_HEADER}\n`);
      const exitCode = await this.run(cmd, [...args, file]);
      if (exitCode !== 0) {
        this.log.warn({ editor: cmd, exitCode }, "Editor exited with non-zero status");
      }

      const text = stripEditorHeader(await readFile(file, "utf-8"));
      return text ? { status: "composed", text } : { status: "cancelled" };
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        return { status: "failed", message: `Editor command not found: '${cmd}'` };
      }
      this.log.error({ editor: cmd, error: errorMessage(error) }, "Editor failed");
      return { status: "failed", message: `Error during editor process: ${errorMessage(error)}` };
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }

  private run(cmd: string, args: string[]): Promise<number | null> {
    this.log.debug({ cmd, args }, "Launching editor");
    return new Promise<number | null>((resolve, reject) => {
      const child = spawn(cmd, args, { stdio: "inherit" });
      child.on("close", (code) => resolve(code));
      child.on("error", (err) => reject(err));
    });
  }
}
