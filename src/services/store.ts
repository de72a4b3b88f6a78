/**
 * SessionStore - Durable session persistence
 *
 * One JSON file per session under the sessions directory, named
 * `<slug(displayName)>_<id>.json`. Writes replace the whole file
 * (write temp, rename).
 */

import { randomUUID } from "crypto";
import { access, mkdir, readFile, readdir, rename, unlink, writeFile } from "fs/promises";
import { join } from "path";
import type { Logger } from "pino";
import { z } from "zod";
import type { Session, SessionSummary } from "../types";
import { TURN_ROLES } from "../types";
import {
  InvalidArgumentError,
  NotFoundError,
  StorageError,
  errorMessage,
  hasErrorCode,
} from "../utils/errors";
import { slugify } from "../utils/slug";

/** Display name of a session that has not been named yet */
export const PLACEHOLDER_NAME = "untitled";

const sessionRecordSchema = z.object({
  id: z.string().regex(/^[a-f0-9]{8}$/),
  displayName: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
  messages: z.array(
    z.object({
      role: z.enum(TURN_ROLES),
      content: z.string(),
    })
  ),
});

export function storageKeyFor(displayName: string, id: string): string {
  return `${slugify(displayName) || "session"}_${id}`;
}

export function storageKey(session: Session): string {
  return storageKeyFor(session.displayName, session.id);
}

function assertNotPlaceholder(name: string): void {
  if (name.toLowerCase() === PLACEHOLDER_NAME) {
    throw new InvalidArgumentError(`'${PLACEHOLDER_NAME}' is reserved for unnamed sessions.`);
  }
}

function generateId(): string {
  return randomUUID().replace(/-/g, "").slice(0, 8);
}

export class SessionStore {
  private sessionsDir: string;
  private log: Logger;

  constructor(sessionsDir: string, logger: Logger) {
    this.sessionsDir = sessionsDir;
    this.log = logger;
  }

  pathFor(key: string): string {
    return join(this.sessionsDir, `${key}.json`);
  }

  async exists(key: string): Promise<boolean> {
    try {
      await access(this.pathFor(key));
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Create and persist an empty session. Without a name the session gets
   * the placeholder name until it is auto-named.
   */
  async create(displayName?: string): Promise<Session> {
    const given = displayName?.trim();
    if (given) assertNotPlaceholder(given);
    const name = given || PLACEHOLDER_NAME;
    await this.ensureDir();

    let id = generateId();
    while (await this.exists(storageKeyFor(name, id))) {
      id = generateId();
    }

    const now = new Date().toISOString();
    const session: Session = {
      id,
      displayName: name,
      createdAt: now,
      updatedAt: now,
      messages: [],
    };
    await this.save(session);
    this.log.info({ storageKey: storageKey(session) }, "Session created");
    return session;
  }

  /**
   * Load a session by storage key.
   * @throws NotFoundError when no such session exists
   * @throws StorageError when the file is unreadable or malformed
   */
  async load(key: string): Promise<Session> {
    let data: string;
    try {
      data = await readFile(this.pathFor(key), "utf-8");
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        throw new NotFoundError(key);
      }
      throw new StorageError(`Failed to read session '${key}': ${errorMessage(error)}`, {
        cause: error,
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(data);
    } catch (error) {
      throw new StorageError(`Session file '${key}.json' is not valid JSON`, { cause: error });
    }

    const result = sessionRecordSchema.safeParse(json);
    if (!result.success) {
      const issue = result.error.issues[0];
      const detail = issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid record";
      throw new StorageError(`Session file '${key}.json' is malformed (${detail})`);
    }
    return result.data;
  }

  /**
   * Persist the session atomically and refresh updatedAt.
   */
  async save(session: Session): Promise<void> {
    session.updatedAt = new Date().toISOString();
    await this.writeRecord(storageKey(session), session);
  }

  /**
   * List sessions, most recently updated first. Unreadable files are skipped.
   */
  async listAll(): Promise<SessionSummary[]> {
    let entries: string[];
    try {
      entries = await readdir(this.sessionsDir);
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) return [];
      throw new StorageError(`Failed to list sessions: ${errorMessage(error)}`, { cause: error });
    }

    const summaries: SessionSummary[] = [];
    for (const entry of entries) {
      if (!entry.endsWith(".json")) continue;
      const key = entry.slice(0, -".json".length);
      try {
        const session = await this.load(key);
        summaries.push({ displayName: session.displayName, storageKey: key, updatedAt: session.updatedAt });
      } catch (error) {
        this.log.warn({ storageKey: key, error: errorMessage(error) }, "Skipping unreadable session");
      }
    }

    return summaries.sort((a, b) => Date.parse(b.updatedAt) - Date.parse(a.updatedAt));
  }

  /**
   * Give the session a new display name, moving its file to the new key.
   * Either the new file replaces the old one or the old one is left as it
   * was; the session object changes only on success.
   */
  async rename(session: Session, newDisplayName: string): Promise<void> {
    const name = newDisplayName.trim();
    if (!name) {
      throw new InvalidArgumentError("New session name cannot be empty.");
    }
    assertNotPlaceholder(name);

    const oldKey = storageKey(session);
    const newKey = storageKeyFor(name, session.id);
    const updated: Session = { ...session, displayName: name, updatedAt: new Date().toISOString() };

    if (newKey === oldKey) {
      await this.writeRecord(newKey, updated);
      Object.assign(session, updated);
      return;
    }

    if (await this.exists(newKey)) {
      throw new InvalidArgumentError(`A session with storage key '${newKey}' already exists.`);
    }

    await this.writeRecord(newKey, updated);
    try {
      await unlink(this.pathFor(oldKey));
    } catch (error) {
      if (!hasErrorCode(error, "ENOENT")) {
        await unlink(this.pathFor(newKey)).catch((rollbackError: unknown) => {
          this.log.error({ newKey, error: errorMessage(rollbackError) }, "Rename rollback failed");
        });
        throw new StorageError(`Failed to rename session '${oldKey}': ${errorMessage(error)}`, {
          cause: error,
        });
      }
    }

    Object.assign(session, updated);
    this.log.info({ oldKey, newKey }, "Session renamed");
  }

  /**
   * Delete a session file.
   * @throws NotFoundError when no such session exists
   */
  async delete(key: string): Promise<void> {
    try {
      await unlink(this.pathFor(key));
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        throw new NotFoundError(key);
      }
      throw new StorageError(`Failed to delete session '${key}': ${errorMessage(error)}`, {
        cause: error,
      });
    }
    this.log.info({ storageKey: key }, "Session deleted");
  }

  /**
   * Discard the whole history and persist the empty session.
   */
  async clearHistory(session: Session): Promise<void> {
    session.messages = [];
    await this.save(session);
    this.log.info({ storageKey: storageKey(session) }, "Session history cleared");
  }

  private async ensureDir(): Promise<void> {
    try {
      await mkdir(this.sessionsDir, { recursive: true });
    } catch (error) {
      throw new StorageError(`Cannot create sessions directory: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private async writeRecord(key: string, session: Session): Promise<void> {
    const file = this.pathFor(key);
    const tmpFile = `${file}.tmp`;
    const record = {
      id: session.id,
      displayName: session.displayName,
      createdAt: session.createdAt,
      updatedAt: session.updatedAt,
      messages: session.messages,
    };

    try {
      await this.ensureDir();
      await writeFile(tmpFile, JSON.stringify(record, null, 2));
      await rename(tmpFile, file);
    } catch (error) {
      await unlink(tmpFile).catch(() => undefined);
      if (error instanceof StorageError) throw error;
      throw new StorageError(`Failed to write session '${key}': ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
