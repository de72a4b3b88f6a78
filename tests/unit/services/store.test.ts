/**
 * SessionStore unit tests
 */

import { readFile, readdir, writeFile } from "fs/promises";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  PLACEHOLDER_NAME,
  SessionStore,
  storageKey,
  storageKeyFor,
} from "../../../src/services/store";
import { InvalidArgumentError, NotFoundError, StorageError } from "../../../src/utils/errors";
import { makeTempDir, removeTempDir, testLogger } from "../../setup";

describe("storage keys", () => {
  test("slugifies the display name and appends the id", () => {
    expect(storageKeyFor("My Chat!", "0a1b2c3d")).toBe("my-chat_0a1b2c3d");
  });

  test("falls back to 'session' when the name slugifies to nothing", () => {
    expect(storageKeyFor("!!!", "0a1b2c3d")).toBe("session_0a1b2c3d");
  });
});

describe("SessionStore", () => {
  let dir: string;
  let sessionsDir: string;
  let store: SessionStore;

  beforeEach(async () => {
    dir = await makeTempDir();
    sessionsDir = join(dir, "chat_sessions");
    store = new SessionStore(sessionsDir, testLogger);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe("create", () => {
    test("persists an empty session under the placeholder name", async () => {
      const session = await store.create();

      expect(session.displayName).toBe(PLACEHOLDER_NAME);
      expect(session.id).toMatch(/^[a-f0-9]{8}$/);
      expect(session.messages).toEqual([]);
      expect(await readdir(sessionsDir)).toEqual([`untitled_${session.id}.json`]);
    });

    test("uses the given name", async () => {
      const session = await store.create("  Project Plan ");

      expect(session.displayName).toBe("Project Plan");
      expect(storageKey(session)).toBe(`project-plan_${session.id}`);
    });

    test("the placeholder name cannot be chosen", async () => {
      await expect(store.create(" Untitled ")).rejects.toThrow("'untitled' is reserved for unnamed sessions.");
      expect(await store.listAll()).toEqual([]);
    });
  });

  describe("load and save", () => {
    test("round-trips a session", async () => {
      const session = await store.create("notes");
      session.messages.push({ role: "user", content: "hi" }, { role: "assistant", content: "hello" });
      await store.save(session);

      const loaded = await store.load(storageKey(session));

      expect(loaded).toEqual(session);
    });

    test("writes two-space indented JSON", async () => {
      const session = await store.create("notes");
      const raw = await readFile(store.pathFor(storageKey(session)), "utf-8");

      expect(raw).toBe(JSON.stringify(session, null, 2));
    });

    test("missing key is NotFoundError", async () => {
      await expect(store.load("nothing_0a1b2c3d")).rejects.toBeInstanceOf(NotFoundError);
    });

    test("invalid JSON is StorageError", async () => {
      await store.create("notes");
      await writeFile(join(sessionsDir, "broken_0a1b2c3d.json"), "{not json");

      await expect(store.load("broken_0a1b2c3d")).rejects.toBeInstanceOf(StorageError);
    });

    test("record with an unknown role is StorageError", async () => {
      await store.create("notes");
      const record = {
        id: "0a1b2c3d",
        displayName: "bad",
        createdAt: "2024-01-01T00:00:00.000Z",
        updatedAt: "2024-01-01T00:00:00.000Z",
        messages: [{ role: "robot", content: "beep" }],
      };
      await writeFile(join(sessionsDir, "bad_0a1b2c3d.json"), JSON.stringify(record));

      await expect(store.load("bad_0a1b2c3d")).rejects.toThrow("malformed");
    });

    test("save refreshes updatedAt", async () => {
      const session = await store.create("notes");
      session.updatedAt = "2000-01-01T00:00:00.000Z";

      await store.save(session);

      expect(session.updatedAt).not.toBe("2000-01-01T00:00:00.000Z");
    });
  });

  describe("listAll", () => {
    test("returns an empty list when the directory does not exist", async () => {
      expect(await store.listAll()).toEqual([]);
    });

    test("sorts by most recently updated and skips unreadable files", async () => {
      const older = await store.create("older");
      const newer = await store.create("newer");
      older.updatedAt = "2024-01-01T00:00:00.000Z";
      newer.updatedAt = "2024-06-01T00:00:00.000Z";
      await writeFile(store.pathFor(storageKey(older)), JSON.stringify(older));
      await writeFile(store.pathFor(storageKey(newer)), JSON.stringify(newer));
      await writeFile(join(sessionsDir, "junk_0a1b2c3d.json"), "[]");
      await writeFile(join(sessionsDir, "readme.txt"), "not a session");

      const summaries = await store.listAll();

      expect(summaries).toEqual([
        { displayName: "newer", storageKey: storageKey(newer), updatedAt: "2024-06-01T00:00:00.000Z" },
        { displayName: "older", storageKey: storageKey(older), updatedAt: "2024-01-01T00:00:00.000Z" },
      ]);
    });
  });

  describe("rename", () => {
    test("moves the file and updates the session", async () => {
      const session = await store.create();
      const oldKey = storageKey(session);

      await store.rename(session, "Trip Ideas");

      expect(session.displayName).toBe("Trip Ideas");
      expect(await store.exists(oldKey)).toBe(false);
      expect(await readdir(sessionsDir)).toEqual([`trip-ideas_${session.id}.json`]);
    });

    test("repeated renames leave a single file with the final name", async () => {
      const session = await store.create();

      for (const name of ["first", "second", "third", "final name"]) {
        await store.rename(session, name);
      }

      expect(await readdir(sessionsDir)).toEqual([`final-name_${session.id}.json`]);
      const summaries = await store.listAll();
      expect(summaries.map((s) => s.displayName)).toEqual(["final name"]);
    });

    test("same storage key only updates the display name", async () => {
      const session = await store.create("notes");

      await store.rename(session, "Notes");

      expect(session.displayName).toBe("Notes");
      const loaded = await store.load(`notes_${session.id}`);
      expect(loaded.displayName).toBe("Notes");
    });

    test("empty name is rejected without changes", async () => {
      const session = await store.create("notes");

      await expect(store.rename(session, "   ")).rejects.toBeInstanceOf(InvalidArgumentError);
      expect(session.displayName).toBe("notes");
    });

    test("renaming to the placeholder name is rejected", async () => {
      const session = await store.create("notes");

      await expect(store.rename(session, "untitled")).rejects.toBeInstanceOf(InvalidArgumentError);
      expect(session.displayName).toBe("notes");
      expect(await store.exists(`notes_${session.id}`)).toBe(true);
    });

    test("existing target key is rejected and the session keeps its name", async () => {
      const session = await store.create("notes");
      await writeFile(store.pathFor(`taken_${session.id}`), JSON.stringify({ ...session, displayName: "taken" }));

      await expect(store.rename(session, "taken")).rejects.toBeInstanceOf(InvalidArgumentError);
      expect(session.displayName).toBe("notes");
      expect(await store.exists(`notes_${session.id}`)).toBe(true);
    });
  });

  describe("delete", () => {
    test("removes the session file", async () => {
      const session = await store.create("notes");

      await store.delete(storageKey(session));

      expect(await store.listAll()).toEqual([]);
    });

    test("missing key is NotFoundError", async () => {
      await expect(store.delete("ghost_0a1b2c3d")).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  test("clearHistory persists an empty message list", async () => {
    const session = await store.create("notes");
    session.messages.push({ role: "user", content: "hi" });
    await store.save(session);

    await store.clearHistory(session);

    expect((await store.load(storageKey(session))).messages).toEqual([]);
  });
});
