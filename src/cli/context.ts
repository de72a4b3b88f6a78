/**
 * Wires the services for one interactive session
 */

import { type Interface, createInterface } from "readline";
import { createProvider } from "../providers";
import {
  CommandDispatcher,
  ConversationEngine,
  ExternalEditor,
  FileStager,
  FzfPicker,
  ProviderNamer,
  SessionStore,
} from "../services";
import type { AppConfig, Renderer } from "../types";
import { createLogger } from "../utils";
import type { SessionLoopDeps } from "./loop";
import {
  ConsoleRenderer,
  PausedInputEditor,
  PausedInputPicker,
  ReadlineConfirmer,
  SpinnerProgress,
} from "./terminal";

export function createStore(config: Pick<AppConfig, "sessionsDir">): SessionStore {
  return new SessionStore(config.sessionsDir, createLogger("store"));
}

export function createStager(config: Pick<AppConfig, "maxFileSizeBytes" | "allowedExtensions">): FileStager {
  return new FileStager(
    { maxFileSizeBytes: config.maxFileSizeBytes, allowedExtensions: config.allowedExtensions },
    createLogger("stager")
  );
}

export function createSessionContext(
  config: AppConfig,
  rl: Interface,
  renderer: Renderer = new ConsoleRenderer()
): SessionLoopDeps {
  const store = createStore(config);
  const stager = createStager(config);
  const provider = createProvider(config, createLogger(config.provider));
  const progress = new SpinnerProgress();

  const engine = new ConversationEngine({
    store,
    stager,
    provider,
    namer: new ProviderNamer(provider),
    progress,
    logger: createLogger("conversation"),
  });

  const dispatcher = new CommandDispatcher({
    store,
    stager,
    engine,
    renderer,
    confirmer: new ReadlineConfirmer(rl),
    editor: new PausedInputEditor(rl, new ExternalEditor(config.editor, createLogger("editor"))),
    picker: new PausedInputPicker(rl, new FzfPicker(createLogger("picker"))),
    logger: createLogger("dispatcher"),
    prefix: config.commandPrefix,
  });

  return {
    rl,
    dispatcher,
    stager,
    store,
    renderer,
    logger: createLogger("session"),
    prefix: config.commandPrefix,
  };
}

/**
 * Run `fn` with a readline interface on the terminal. Ctrl-C closes the
 * interface, which ends the session loop.
 */
export async function withTerminal<T>(fn: (rl: Interface) => Promise<T>): Promise<T> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  rl.on("SIGINT", () => rl.close());
  try {
    return await fn(rl);
  } finally {
    rl.close();
  }
}
