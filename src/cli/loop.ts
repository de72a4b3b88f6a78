/**
 * Interactive session loop
 *
 * Reads one line at a time and hands it to the dispatcher; the next prompt
 * is shown only after the line is fully handled.
 */

import chalk from "chalk";
import type { Logger } from "pino";
import type { Interface } from "readline";
import type { CommandDispatcher } from "../services/dispatcher";
import type { FileStager } from "../services/stager";
import { type SessionStore, storageKey } from "../services/store";
import type { ActiveSession, Renderer, StagedFile } from "../types";
import { ask } from "./terminal";

const MAX_PROMPT_FILES = 3;

export interface SessionLoopDeps {
  rl: Interface;
  dispatcher: CommandDispatcher;
  stager: FileStager;
  store: SessionStore;
  renderer: Renderer;
  logger: Logger;
  prefix: string;
}

/**
 * Staged file names for the prompt, e.g. "a.txt, b.md, c.py, ... (5 total)".
 */
export function describeStagedFiles(files: StagedFile[]): string {
  const names = files.slice(0, MAX_PROMPT_FILES).map((file) => file.name);
  const more = files.length > MAX_PROMPT_FILES ? `, ... (${files.length} total)` : "";
  return names.join(", ") + more;
}

export function formatPrompt(displayName: string, files: StagedFile[]): string {
  const staged = files.length > 0 ? ` ${chalk.magenta(`[${describeStagedFiles(files)}]`)}` : "";
  return `${chalk.cyan.bold(displayName)}${staged} ${chalk.blue.bold("You:")} `;
}

export async function runSessionLoop(deps: SessionLoopDeps, active: ActiveSession): Promise<void> {
  const { rl, dispatcher, stager, store, renderer, logger, prefix } = deps;

  renderer.info(`Session: ${active.session.displayName}`);
  renderer.info(`Type '${prefix}help' for commands, '${prefix}exit' or '${prefix}quit' to end.`);

  for (;;) {
    const line = await ask(rl, `\n${formatPrompt(active.session.displayName, stager.list())}`);
    if (line === null) {
      // End of input or Ctrl-C
      await store.save(active.session);
      break;
    }
    if ((await dispatcher.dispatch(active, line)) === "exit") break;
  }

  if (stager.size > 0) {
    renderer.warn(`Discarding ${stager.size} pending file(s).`);
    stager.clear();
  }

  const { session } = active;
  if (active.needsName && session.messages.length === 0) {
    await store.delete(storageKey(session));
    renderer.warn("No messages exchanged, session discarded.");
    return;
  }

  logger.info({ storageKey: storageKey(session), turns: session.messages.length }, "Session ended");
  renderer.info(`Exiting session '${session.displayName}'.`);
}
