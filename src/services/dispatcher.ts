/**
 * CommandDispatcher - routes one line of input
 *
 * Lines starting with the command prefix go to a handler from a fixed
 * table; everything else is sent to the model as-is. Each line is fully
 * handled (confirmation prompts included) before the caller reads the next.
 */

import type { Logger } from "pino";
import type {
  ActiveSession,
  Confirmer,
  Editor,
  FilePicker,
  Renderer,
  StageResult,
} from "../types";
import { ConverseError, errorMessage, isFatal } from "../utils/errors";
import type { ConversationEngine, SendResult } from "./conversation";
import { type FileStager, formatKb } from "./stager";
import type { SessionStore } from "./store";

export type DispatchOutcome = "continue" | "exit";

export type ParsedInput =
  | { kind: "empty" }
  | { kind: "command"; name: string; argument: string }
  | { kind: "content"; text: string };

interface CommandSpec {
  usage: string;
  description: string;
  run(active: ActiveSession, argument: string): Promise<DispatchOutcome>;
}

export interface DispatcherDeps {
  store: SessionStore;
  stager: FileStager;
  engine: ConversationEngine;
  renderer: Renderer;
  confirmer: Confirmer;
  editor: Editor;
  picker: FilePicker;
  logger: Logger;
  prefix: string;
}

/**
 * Classify a line. Only the first word after the prefix names the command;
 * names are case-insensitive.
 */
export function parseLine(line: string, prefix: string): ParsedInput {
  const trimmed = line.trim();
  if (!trimmed) return { kind: "empty" };
  if (!trimmed.startsWith(prefix)) return { kind: "content", text: line };

  const body = trimmed.slice(prefix.length);
  const match = /^(\S*)\s*([\s\S]*)$/.exec(body);
  return {
    kind: "command",
    name: (match?.[1] ?? "").toLowerCase(),
    argument: (match?.[2] ?? "").trim(),
  };
}

export class CommandDispatcher {
  private store: SessionStore;
  private stager: FileStager;
  private engine: ConversationEngine;
  private renderer: Renderer;
  private confirmer: Confirmer;
  private editor: Editor;
  private picker: FilePicker;
  private log: Logger;
  private prefix: string;
  private commands: ReadonlyMap<string, CommandSpec>;

  constructor(deps: DispatcherDeps) {
    this.store = deps.store;
    this.stager = deps.stager;
    this.engine = deps.engine;
    this.renderer = deps.renderer;
    this.confirmer = deps.confirmer;
    this.editor = deps.editor;
    this.picker = deps.picker;
    this.log = deps.logger;
    this.prefix = deps.prefix;
    this.commands = this.buildCommands();
  }

  async dispatch(active: ActiveSession, line: string): Promise<DispatchOutcome> {
    const input = parseLine(line, this.prefix);

    try {
      switch (input.kind) {
        case "empty":
          return "continue";
        case "content":
          await this.sendMessage(active, input.text);
          return "continue";
        case "command": {
          const command = this.commands.get(input.name);
          if (!command) {
            this.log.debug({ command: input.name }, "Unknown command");
            this.renderer.error(`Unknown command: ${this.prefix}${input.name}`);
            this.showHelp(active);
            return "continue";
          }
          return await command.run(active, input.argument);
        }
      }
    } catch (error) {
      if (isFatal(error)) throw error;
      if (!(error instanceof ConverseError)) {
        this.log.error({ error: errorMessage(error) }, "Unexpected error while handling input");
      }
      this.renderer.error(errorMessage(error));
      return "continue";
    }
  }

  helpLines(active: ActiveSession): string[] {
    const seen = new Set<CommandSpec>();
    const lines = ["Available Commands:"];
    for (const command of this.commands.values()) {
      if (seen.has(command)) continue;
      seen.add(command);
      const description = command.description.replace("{name}", active.session.displayName);
      lines.push(`  ${command.usage.padEnd(24)} - ${description}`);
    }
    return lines;
  }

  private showHelp(active: ActiveSession): void {
    for (const line of this.helpLines(active)) {
      this.renderer.info(line);
    }
  }

  private async sendMessage(active: ActiveSession, text: string): Promise<void> {
    this.report(await this.engine.send(active, text));
  }

  private report(result: SendResult): void {
    if (!result.success) {
      this.renderer.error(`AI Error: ${result.error.message}`);
      this.renderer.info(`Use ${this.prefix}retry to ask again.`);
      return;
    }
    this.renderer.turn("assistant", result.reply);
    if (result.renamedTo) {
      this.renderer.success(`Session automatically named: ${result.renamedTo}`);
    }
  }

  private buildCommands(): ReadonlyMap<string, CommandSpec> {
    const p = this.prefix;
    const exit: CommandSpec = {
      usage: `${p}exit | ${p}quit`,
      description: "End the chat session",
      run: (active) => this.handleExit(active),
    };

    return new Map<string, CommandSpec>([
      [
        "rename",
        {
          usage: `${p}rename <new_name>`,
          description: "Rename the current session '{name}'",
          run: (active, argument) => this.handleRename(active, argument),
        },
      ],
      [
        "history",
        {
          usage: `${p}history`,
          description: "Show current session message history",
          run: async (active) => {
            this.showHistory(active);
            return "continue";
          },
        },
      ],
      [
        "retry",
        {
          usage: `${p}retry`,
          description: "Ask again for a reply to the last message after an error",
          run: async (active) => {
            this.report(await this.engine.retry(active));
            return "continue";
          },
        },
      ],
      [
        "clear",
        {
          usage: `${p}clear`,
          description: "Clear current session message history (cannot be undone)",
          run: (active) => this.handleClear(active),
        },
      ],
      [
        "upload",
        {
          usage: `${p}upload [file_path]`,
          description: "Stage a file for the next prompt (picker if path omitted and fzf installed)",
          run: (_active, argument) => this.handleUpload(argument),
        },
      ],
      [
        "edit",
        {
          usage: `${p}edit`,
          description: "Open external editor ($EDITOR) for multi-line input",
          run: (active) => this.handleEdit(active),
        },
      ],
      [
        "status",
        {
          usage: `${p}status`,
          description: "Show pending files to be sent with the next prompt",
          run: async () => {
            this.showStatus();
            return "continue";
          },
        },
      ],
      [
        "clearfiles",
        {
          usage: `${p}clearfiles`,
          description: "Clear all pending files without sending",
          run: async () => {
            this.clearFiles();
            return "continue";
          },
        },
      ],
      [
        "help",
        {
          usage: `${p}help`,
          description: "Show this help message",
          run: async (active) => {
            this.showHelp(active);
            return "continue";
          },
        },
      ],
      ["exit", exit],
      ["quit", exit],
    ]);
  }

  private async handleRename(active: ActiveSession, argument: string): Promise<DispatchOutcome> {
    if (!argument) {
      this.renderer.warn(`Please provide a new name: ${this.prefix}rename <new_name>`);
      return "continue";
    }

    const oldName = active.session.displayName;
    await this.store.rename(active.session, argument);
    active.needsName = false;
    this.renderer.success(`Session renamed from '${oldName}' to '${active.session.displayName}'`);
    return "continue";
  }

  private showHistory(active: ActiveSession): void {
    const { session } = active;
    if (session.messages.length === 0) {
      this.renderer.warn("Session history is empty.");
      return;
    }
    this.renderer.info(`History for Session: ${session.displayName}`);
    for (const turn of session.messages) {
      this.renderer.turn(turn.role, turn.content);
    }
  }

  private async handleClear(active: ActiveSession): Promise<DispatchOutcome> {
    const name = active.session.displayName;
    const confirmed = await this.confirmer.confirm(
      `Are you sure you want to clear all history for session '${name}'? This cannot be undone.`
    );
    if (!confirmed) {
      this.renderer.info("Clear operation cancelled.");
      return "continue";
    }

    await this.store.clearHistory(active.session);
    delete active.firstUserText;
    this.renderer.success(`History for session '${name}' cleared.`);
    return "continue";
  }

  private async handleUpload(argument: string): Promise<DispatchOutcome> {
    if (argument) {
      this.reportStage(this.stager.stage(argument));
      return "continue";
    }

    const picked = await this.picker.pick();
    switch (picked.status) {
      case "selected":
        this.renderer.info(`Selected: ${picked.path}`);
        this.reportStage(this.stager.stage(picked.path));
        break;
      case "cancelled":
        this.renderer.warn("File selection cancelled.");
        break;
      case "unavailable":
        this.renderer.error("'fzf' command not found.");
        this.renderer.info(
          `Install fzf for interactive selection, or provide the path directly: ${this.prefix}upload <file_path>`
        );
        break;
      case "failed":
        this.renderer.error(`File selection failed: ${picked.message}`);
        break;
    }
    return "continue";
  }

  private reportStage(result: StageResult): void {
    switch (result.status) {
      case "staged":
        this.renderer.success(`File '${result.file.name}' staged (${formatKb(result.file.sizeBytes)}).`);
        this.renderer.info(
          `Use ${this.prefix}status to view pending files, ${this.prefix}clearfiles to remove.`
        );
        break;
      case "duplicate":
        this.renderer.warn(`File '${result.file.name}' is already staged for the next prompt.`);
        break;
      case "rejected":
        this.renderer.error(result.message);
        break;
    }
  }

  private async handleEdit(active: ActiveSession): Promise<DispatchOutcome> {
    const result = await this.editor.compose();
    switch (result.status) {
      case "cancelled":
        this.renderer.info("Editor closed without content. Nothing sent.");
        break;
      case "failed":
        this.renderer.error(result.message);
        break;
      case "composed":
        this.renderer.turn("user", result.text);
        await this.sendMessage(active, result.text);
        break;
    }
    return "continue";
  }

  private showStatus(): void {
    const files = this.stager.list();
    if (files.length === 0) {
      this.renderer.warn("No files pending for the next prompt.");
      return;
    }

    this.renderer.info(`Pending files (${files.length}):`);
    let total = 0;
    files.forEach((file, i) => {
      total += file.sizeBytes;
      this.renderer.info(`  ${i + 1}. ${file.name} (${formatKb(file.sizeBytes)})`);
    });
    this.renderer.info(`Total size: ${formatKb(total)}`);
    this.renderer.info(`Use ${this.prefix}clearfiles to remove all pending files.`);
  }

  private clearFiles(): void {
    const count = this.stager.size;
    if (count === 0) {
      this.renderer.warn("No pending files to clear.");
      return;
    }
    this.stager.clear();
    this.renderer.success(`Cleared ${count} pending file(s).`);
  }

  private async handleExit(active: ActiveSession): Promise<DispatchOutcome> {
    await this.store.save(active.session);
    return "exit";
  }
}
