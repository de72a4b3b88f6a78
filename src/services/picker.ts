/**
 * FzfPicker - interactive file selection through fzf
 */

import { spawn } from "child_process";
import type { Logger } from "pino";
import type { FilePicker, PickResult } from "../types";
import { hasErrorCode } from "../utils/errors";

/** fzf exit status when the user aborts with Esc or Ctrl-C */
const FZF_INTERRUPTED = 130;

export class FzfPicker implements FilePicker {
  private command: string;
  private log: Logger;

  constructor(logger: Logger, command = "fzf") {
    this.command = command;
    this.log = logger;
  }

  pick(): Promise<PickResult> {
    return new Promise<PickResult>((resolve) => {
      const child = spawn(this.command, [], { stdio: ["inherit", "pipe", "inherit"] });

      let stdout = "";
      child.stdout?.on("data", (chunk: Buffer) => {
        stdout += chunk.toString();
      });

      child.on("close", (code) => {
        const selected = stdout.trim();
        this.log.debug({ exitCode: code }, "fzf exited");
        if (code === 0 && selected) {
          resolve({ status: "selected", path: selected });
        } else if (code === FZF_INTERRUPTED || code === 0) {
          resolve({ status: "cancelled" });
        } else {
          resolve({ status: "failed", message: `${this.command} exited with code ${code}` });
        }
      });

      child.on("error", (err) => {
        if (hasErrorCode(err, "ENOENT")) {
          resolve({ status: "unavailable" });
        } else {
          this.log.error({ error: err.message }, "fzf spawn error");
          resolve({ status: "failed", message: err.message });
        }
      });
    });
  }
}
