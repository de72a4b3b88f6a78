/**
 * Configuration loader tests
 */

import { mkdir, readFile, stat, writeFile } from "fs/promises";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  configFilePath,
  loadConfig,
  maskApiKey,
  readConfigFile,
  saveConfigFile,
  validateConfig,
} from "../../../src/config";
import { DEFAULT_ALLOWED_EXTENSIONS } from "../../../src/config/schema";
import { ConfigMissingError } from "../../../src/utils/errors";
import { makeTempDir, mockEnv, removeTempDir } from "../../setup";

describe("Config Loader", () => {
  let dir: string;
  let restoreEnv: () => void;

  async function writeConfigFile(values: unknown): Promise<void> {
    await mkdir(join(dir, "config"), { recursive: true });
    await writeFile(configFilePath(dir), JSON.stringify(values));
  }

  beforeEach(async () => {
    dir = await makeTempDir();
    restoreEnv = mockEnv({ CONVERSE_DATA_DIR: dir });
  });

  afterEach(async () => {
    restoreEnv();
    await removeTempDir(dir);
  });

  test("loads valid configuration from the environment", () => {
    const config = loadConfig();

    expect(config.apiKey).toBe("test-api-key");
    expect(config.model).toBe("test-model");
  });

  test("logging variables stay with the logger, not the loaded config", () => {
    const config = loadConfig();

    expect(config).not.toHaveProperty("nodeEnv");
    expect(config).not.toHaveProperty("logLevel");
  });

  test("uses defaults for optional values", () => {
    const config = loadConfig();

    expect(config.provider).toBe("openai");
    expect(config.temperature).toBe(0.7);
    expect(config.maxFileSizeBytes).toBe(51200);
    expect(config.allowedExtensions).toEqual(DEFAULT_ALLOWED_EXTENSIONS);
    expect(config.commandPrefix).toBe("/");
    expect(config.editor).toBeUndefined();
  });

  test("derives paths from the data directory", () => {
    const config = loadConfig();

    expect(config.dataDir).toBe(dir);
    expect(config.sessionsDir).toBe(join(dir, "chat_sessions"));
    expect(config.configFile).toBe(join(dir, "config", "config.json"));
  });

  test("throws on missing API key", () => {
    restoreEnv();
    restoreEnv = mockEnv({ CONVERSE_DATA_DIR: dir, CONVERSE_API_KEY: undefined });

    expect(() => loadConfig()).toThrow(ConfigMissingError);
    expect(() => loadConfig()).toThrow("apiKey is required");
  });

  test("reads the config file and lets the environment win", async () => {
    await writeConfigFile({ apiKey: "file-key", model: "file-model", provider: "gemini" });
    restoreEnv();
    restoreEnv = mockEnv({ CONVERSE_DATA_DIR: dir, CONVERSE_API_KEY: undefined });

    const config = loadConfig();

    expect(config.apiKey).toBe("file-key");
    expect(config.model).toBe("test-model");
    expect(config.provider).toBe("gemini");
  });

  test("parses file limits from the environment", () => {
    restoreEnv();
    restoreEnv = mockEnv({
      CONVERSE_DATA_DIR: dir,
      CONVERSE_MAX_FILE_SIZE: "2048",
      CONVERSE_ALLOWED_EXTENSIONS: "TXT, .Md",
      EDITOR: "nano",
    });

    const config = loadConfig();

    expect(config.maxFileSizeBytes).toBe(2048);
    expect(config.allowedExtensions).toEqual([".txt", ".md"]);
    expect(config.editor).toBe("nano");
  });

  test("rejects an unknown provider", () => {
    restoreEnv();
    restoreEnv = mockEnv({ CONVERSE_DATA_DIR: dir, CONVERSE_PROVIDER: "llama" });

    expect(() => loadConfig()).toThrow(ConfigMissingError);
  });

  test("malformed config file is a configuration error", async () => {
    await mkdir(join(dir, "config"), { recursive: true });
    await writeFile(configFilePath(dir), "{oops");

    expect(() => readConfigFile(configFilePath(dir))).toThrow(ConfigMissingError);
  });

  test("missing config file reads as empty", () => {
    expect(readConfigFile(join(dir, "nowhere.json"))).toEqual({});
  });

  describe("validateConfig", () => {
    test("returns success with valid config", () => {
      const result = validateConfig();

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.config.apiKey).toBe("test-api-key");
      }
    });

    test("returns one line per issue", () => {
      restoreEnv();
      restoreEnv = mockEnv({ CONVERSE_DATA_DIR: dir, CONVERSE_API_KEY: undefined, CONVERSE_MODEL: undefined });

      const result = validateConfig();

      expect(result).toEqual({
        success: false,
        errors: [
          "  - apiKey: apiKey is required (set CONVERSE_API_KEY or run `converse setup`)",
          "  - model: model is required (set CONVERSE_MODEL or run `converse setup`)",
        ],
      });
    });
  });

  describe("saveConfigFile", () => {
    test("merges with existing values and restricts permissions", async () => {
      await writeConfigFile({ model: "old-model", temperature: 0.2 });

      const saved = await saveConfigFile(configFilePath(dir), { model: "new-model", apiKey: "test-secret" });

      expect(saved).toEqual({ model: "new-model", temperature: 0.2, apiKey: "test-secret" });
      expect(JSON.parse(await readFile(configFilePath(dir), "utf-8"))).toEqual(saved);
      expect((await stat(configFilePath(dir))).mode & 0o777).toBe(0o600);
    });

    test("creates the config directory", async () => {
      await saveConfigFile(configFilePath(dir), { provider: "gemini" });

      expect(readConfigFile(configFilePath(dir))).toEqual({ provider: "gemini" });
    });
  });
});

describe("maskApiKey", () => {
  test("shows the first and last four characters", () => {
    expect(maskApiKey("test-secret-value")).toBe("test...alue");
  });

  test("hides short keys entirely", () => {
    expect(maskApiKey("12345678")).toBe("<hidden>");
  });
});
