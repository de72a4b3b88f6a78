/**
 * Logger utility tests
 */

import { describe, expect, test } from "vitest";
import { createLogger, logger, parseLogLevel } from "../../../src/utils/logger";

describe("Logger", () => {
  test("logger has expected methods", () => {
    expect(typeof logger.info).toBe("function");
    expect(typeof logger.warn).toBe("function");
    expect(typeof logger.error).toBe("function");
    expect(typeof logger.debug).toBe("function");
  });

  test("createLogger binds the module name", () => {
    const childLogger = createLogger("test-module");

    expect(childLogger.bindings()).toMatchObject({ service: "converse", module: "test-module" });
  });
});

describe("parseLogLevel", () => {
  test("accepts known levels case-insensitively", () => {
    expect(parseLogLevel("DEBUG")).toBe("debug");
  });

  test("falls back for unknown or missing values", () => {
    expect(parseLogLevel("verbose")).toBe("warn");
    expect(parseLogLevel(undefined, "error")).toBe("error");
  });
});
