/**
 * Test setup and fixtures
 */

import { ChildProcess } from "child_process";
import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import pino from "pino";
import { PassThrough } from "stream";
import type {
  ComposeResult,
  Confirmer,
  Editor,
  FilePicker,
  PickResult,
  ProgressIndicator,
  Provider,
  Renderer,
  Role,
  SubmitOptions,
  Turn,
} from "../src/types";
import { ProviderError } from "../src/utils/errors";

/** Logger that drops everything */
export const testLogger = pino({ level: "silent" });

const CONVERSE_ENV_KEYS = [
  "CONVERSE_API_KEY",
  "CONVERSE_PROVIDER",
  "CONVERSE_MODEL",
  "CONVERSE_TEMPERATURE",
  "CONVERSE_MAX_FILE_SIZE",
  "CONVERSE_ALLOWED_EXTENSIONS",
  "CONVERSE_COMMAND_PREFIX",
  "CONVERSE_DATA_DIR",
  "VISUAL",
  "EDITOR",
];

/**
 * Mock environment variables for tests
 */
export function mockEnv(overrides: Record<string, string | undefined> = {}) {
  const originalEnv = { ...process.env };

  const testEnv: Record<string, string | undefined> = {
    ...Object.fromEntries(CONVERSE_ENV_KEYS.map((key) => [key, undefined])),
    CONVERSE_API_KEY: "test-api-key",
    CONVERSE_MODEL: "test-model",
    NODE_ENV: "test",
    LOG_LEVEL: "error", // Suppress logs in tests
    ...overrides,
  };

  for (const [key, value] of Object.entries(testEnv)) {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }

  return () => {
    // Restore original environment
    for (const key of Object.keys(testEnv)) {
      const original = originalEnv[key];
      if (original === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = original;
      }
    }
  };
}

export function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "converse-test-"));
}

export function removeTempDir(dir: string): Promise<void> {
  return rm(dir, { recursive: true, force: true });
}

type ScriptedReply = string | Error;

/**
 * Provider that answers from a script and records every call.
 */
export class FakeProvider implements Provider {
  readonly name = "fake";
  readonly calls: { turns: Turn[]; options?: SubmitOptions }[] = [];
  private replies: ScriptedReply[];

  constructor(replies: ScriptedReply[] = []) {
    this.replies = [...replies];
  }

  queue(...replies: ScriptedReply[]): void {
    this.replies.push(...replies);
  }

  async submit(turns: Turn[], options?: SubmitOptions): Promise<string> {
    this.calls.push({ turns, options });
    const next = this.replies.shift();
    if (next === undefined) {
      throw new ProviderError(this.name, "No scripted reply left");
    }
    if (next instanceof Error) throw next;
    return next;
  }
}

export interface RenderedLine {
  level: "info" | "success" | "warn" | "error" | Role;
  message: string;
}

export class RecordingRenderer implements Renderer {
  readonly lines: RenderedLine[] = [];

  info(message: string): void {
    this.lines.push({ level: "info", message });
  }

  success(message: string): void {
    this.lines.push({ level: "success", message });
  }

  warn(message: string): void {
    this.lines.push({ level: "warn", message });
  }

  error(message: string): void {
    this.lines.push({ level: "error", message });
  }

  turn(role: Role, content: string): void {
    this.lines.push({ level: role, message: content });
  }

  messages(level?: RenderedLine["level"]): string[] {
    return this.lines.filter((l) => level === undefined || l.level === level).map((l) => l.message);
  }
}

export class FakeConfirmer implements Confirmer {
  readonly questions: string[] = [];
  private answer: boolean;

  constructor(answer: boolean) {
    this.answer = answer;
  }

  async confirm(question: string): Promise<boolean> {
    this.questions.push(question);
    return this.answer;
  }
}

export class FakeEditor implements Editor {
  private result: ComposeResult;

  constructor(result: ComposeResult) {
    this.result = result;
  }

  async compose(): Promise<ComposeResult> {
    return this.result;
  }
}

export class FakePicker implements FilePicker {
  private result: PickResult;

  constructor(result: PickResult) {
    this.result = result;
  }

  async pick(): Promise<PickResult> {
    return this.result;
  }
}

/** Progress indicator that records labels */
export class RecordingProgress implements ProgressIndicator {
  readonly labels: string[] = [];
  active = 0;

  start(label: string): () => void {
    this.labels.push(label);
    this.active += 1;
    return () => {
      this.active -= 1;
    };
  }
}

/**
 * Mock child_process.spawn ChildProcess. Emits stdout data then `close`
 * with the exit code, or `error` when one is given.
 */
export function createMockSpawnNode(
  output: string,
  exitCode: number | null = 0,
  options?: { error?: NodeJS.ErrnoException; delay?: number }
): ChildProcess {
  const proc = new ChildProcess();
  const stdout = new PassThrough();
  proc.stdout = stdout;

  const delay = options?.delay ?? 0;
  setTimeout(() => {
    if (options?.error) {
      proc.emit("error", options.error);
      return;
    }
    if (output) {
      stdout.write(Buffer.from(output));
    }
    stdout.end();
    // Let the data event reach listeners before close
    setImmediate(() => proc.emit("close", exitCode));
  }, delay);

  return proc;
}

export function errnoError(code: string, message: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(message);
  error.code = code;
  return error;
}
