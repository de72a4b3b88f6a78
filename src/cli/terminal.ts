/**
 * Terminal adapters for the collaborator interfaces: chalk output, an ora
 * spinner and line-based prompts over readline.
 */

import chalk from "chalk";
import ora from "ora";
import type { Interface } from "readline";
import type {
  ComposeResult,
  Confirmer,
  Editor,
  FilePicker,
  PickResult,
  ProgressIndicator,
  Renderer,
  Role,
} from "../types";

const ROLE_LABELS: Record<Role, string> = {
  user: chalk.blue.bold("You:"),
  assistant: chalk.green.bold("AI:"),
  system: chalk.gray.bold("System:"),
};

export class ConsoleRenderer implements Renderer {
  private out: NodeJS.WritableStream;

  constructor(out: NodeJS.WritableStream = process.stdout) {
    this.out = out;
  }

  info(message: string): void {
    this.write(message);
  }

  success(message: string): void {
    this.write(chalk.green(message));
  }

  warn(message: string): void {
    this.write(chalk.yellow(message));
  }

  error(message: string): void {
    this.write(chalk.red(message));
  }

  turn(role: Role, content: string): void {
    this.write(`\n${ROLE_LABELS[role]}\n${content}\n`);
  }

  private write(line: string): void {
    this.out.write(`${line}\n`);
  }
}

/**
 * Spinner on stderr; stdout stays clean for piped output.
 */
export class SpinnerProgress implements ProgressIndicator {
  start(label: string): () => void {
    const spinner = ora({ text: label, stream: process.stderr }).start();
    return () => {
      spinner.stop();
    };
  }
}

/**
 * Ask one question. Resolves with null once the interface is closed
 * (end of input or Ctrl-C).
 */
export function ask(rl: Interface, query: string): Promise<string | null> {
  return new Promise((resolve) => {
    const onClose = () => resolve(null);
    rl.once("close", onClose);
    try {
      rl.question(query, (answer) => {
        rl.off("close", onClose);
        resolve(answer);
      });
    } catch {
      // already closed
      rl.off("close", onClose);
      resolve(null);
    }
  });
}

export class ReadlineConfirmer implements Confirmer {
  private rl: Interface;

  constructor(rl: Interface) {
    this.rl = rl;
  }

  async confirm(question: string): Promise<boolean> {
    const answer = await ask(this.rl, `${chalk.yellow(question)} (y/N) `);
    return /^y(es)?$/i.test(answer?.trim() ?? "");
  }
}

/**
 * Child processes that take over the terminal need readline paused while
 * they run.
 */
export class PausedInputEditor implements Editor {
  private rl: Interface;
  private inner: Editor;

  constructor(rl: Interface, inner: Editor) {
    this.rl = rl;
    this.inner = inner;
  }

  async compose(): Promise<ComposeResult> {
    this.rl.pause();
    try {
      return await this.inner.compose();
    } finally {
      this.rl.resume();
    }
  }
}

export class PausedInputPicker implements FilePicker {
  private rl: Interface;
  private inner: FilePicker;

  constructor(rl: Interface, inner: FilePicker) {
    this.rl = rl;
    this.inner = inner;
  }

  async pick(): Promise<PickResult> {
    this.rl.pause();
    try {
      return await this.inner.pick();
    } finally {
      this.rl.resume();
    }
  }
}
