/**
 * ConversationEngine - request/response orchestration
 *
 * Folds staged files into the user's turn, persists it, asks the provider
 * for a reply and persists that. A failed call keeps the user turn so the
 * question is still in the history on retry.
 */

import type { Logger } from "pino";
import type {
  ActiveSession,
  NamingCapability,
  ProgressIndicator,
  Provider,
  StagedFile,
} from "../types";
import { InvalidArgumentError, ProviderError, errorMessage } from "../utils/errors";
import { fallbackName } from "../utils/slug";
import type { FileStager } from "./stager";
import { PLACEHOLDER_NAME, type SessionStore } from "./store";

export type SendResult =
  | { success: true; reply: string; renamedTo?: string }
  | { success: false; error: ProviderError };

export interface ConversationDeps {
  store: SessionStore;
  stager: FileStager;
  provider: Provider;
  namer: NamingCapability;
  progress: ProgressIndicator;
  logger: Logger;
}

/**
 * Prefix the user's text with the content of each staged file.
 */
export function embedFiles(userText: string, files: StagedFile[]): string {
  const blocks = files.map(
    (file, i) =>
      `[User uploaded file ${i + 1}: '${file.name}']\n` +
      `--- File Content Start (${file.name}) ---\n` +
      `${file.contentSnapshot}\n` +
      `--- File Content End (${file.name}) ---\n\n`
  );
  return blocks.join("") + userText;
}

const FILE_BLOCKS =
  /^(?:\[User uploaded file \d+: '([^\n]*?)'\]\n--- File Content Start \(\1\) ---\n[\s\S]*?\n--- File Content End \(\1\) ---\n\n)+/;

/**
 * Recover the typed text from a stored user turn.
 */
export function stripFileBlocks(content: string): string {
  return content.replace(FILE_BLOCKS, "");
}

/**
 * Text used to name a session: the first message as typed, or for a
 * resumed session the first stored user turn.
 */
function firstUserTextOf(active: ActiveSession): string {
  if (active.firstUserText !== undefined) return active.firstUserText;
  const first = active.session.messages.find((turn) => turn.role === "user");
  return first ? stripFileBlocks(first.content) : "";
}

function isPlaceholder(name: string): boolean {
  return name.trim().toLowerCase() === PLACEHOLDER_NAME;
}

export class ConversationEngine {
  private store: SessionStore;
  private stager: FileStager;
  private provider: Provider;
  private namer: NamingCapability;
  private progress: ProgressIndicator;
  private log: Logger;

  constructor(deps: ConversationDeps) {
    this.store = deps.store;
    this.stager = deps.stager;
    this.provider = deps.provider;
    this.namer = deps.namer;
    this.progress = deps.progress;
    this.log = deps.logger;
  }

  /**
   * Send one user message. Storage failures propagate; provider failures
   * are returned.
   */
  async send(active: ActiveSession, userText: string): Promise<SendResult> {
    const { session } = active;
    const files = this.stager.drain();
    const content = embedFiles(userText, files);

    if (active.firstUserText === undefined && !session.messages.some((t) => t.role === "user")) {
      active.firstUserText = userText;
    }
    session.messages.push({ role: "user", content });
    await this.store.save(session);
    this.log.info(
      { turns: session.messages.length, files: files.length, provider: this.provider.name },
      "User turn recorded"
    );

    return this.complete(active);
  }

  /**
   * Ask again for a reply to the last user turn, after a failed call.
   * @throws InvalidArgumentError when the last turn already has a reply
   */
  async retry(active: ActiveSession): Promise<SendResult> {
    const { messages } = active.session;
    const last = messages[messages.length - 1];
    if (!last || last.role !== "user") {
      throw new InvalidArgumentError("Nothing to retry: the last message already has a reply.");
    }
    this.log.info({ turns: messages.length }, "Retrying last user turn");
    return this.complete(active);
  }

  private async complete(active: ActiveSession): Promise<SendResult> {
    const { session } = active;

    let reply: string;
    const stop = this.progress.start("Thinking...");
    try {
      reply = await this.provider.submit([...session.messages]);
    } catch (error) {
      const providerError =
        error instanceof ProviderError
          ? error
          : new ProviderError(this.provider.name, `Unexpected error during AI call: ${errorMessage(error)}`, {
              cause: error,
            });
      this.log.warn({ error: providerError.message }, "Provider call failed");
      return { success: false, error: providerError };
    } finally {
      stop();
    }

    if (!reply.trim()) {
      this.log.warn("Provider returned an empty response");
      return { success: false, error: new ProviderError(this.provider.name, "Empty response received") };
    }

    session.messages.push({ role: "assistant", content: reply });
    await this.store.save(session);

    if (active.needsName) {
      const renamedTo = await this.autoName(active, firstUserTextOf(active));
      return { success: true, reply, renamedTo };
    }
    return { success: true, reply };
  }

  /**
   * Name a session after its first exchange. Falls back to a slug of the
   * first 20 characters of the message when the naming call fails.
   */
  async autoName(active: ActiveSession, firstUserText: string): Promise<string> {
    let name = "";
    const stop = this.progress.start("Generating session name...");
    try {
      name = await this.namer.suggestName(firstUserText);
    } catch (error) {
      this.log.warn({ error: errorMessage(error) }, "Naming call failed, using fallback");
    } finally {
      stop();
    }

    if (!name || isPlaceholder(name)) {
      name = fallbackName(firstUserText);
    }
    if (isPlaceholder(name)) {
      name = "chat";
    }

    await this.store.rename(active.session, name);
    active.needsName = false;
    this.log.info({ displayName: name }, "Session auto-named");
    return name;
  }
}
