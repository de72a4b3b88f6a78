/**
 * Terminal adapter tests
 */

import chalk from "chalk";
import { createInterface } from "readline";
import { PassThrough } from "stream";
import { beforeAll, describe, expect, test } from "vitest";
import { ConsoleRenderer, ask } from "../../../src/cli/terminal";

beforeAll(() => {
  chalk.level = 0;
});

describe("ConsoleRenderer", () => {
  test("writes one line per message", () => {
    const out = new PassThrough();
    const renderer = new ConsoleRenderer(out);

    renderer.info("plain");
    renderer.error("broken");

    expect(out.read()?.toString()).toBe("plain\nbroken\n");
  });
});

describe("ask", () => {
  test("resolves with the answer", async () => {
    const input = new PassThrough();
    const rl = createInterface({ input, output: new PassThrough(), terminal: false });

    const answer = ask(rl, "? ");
    input.write("yes please\n");

    expect(await answer).toBe("yes please");
    rl.close();
  });

  test("resolves with null when input ends", async () => {
    const input = new PassThrough();
    const rl = createInterface({ input, output: new PassThrough(), terminal: false });

    const answer = ask(rl, "? ");
    input.end();

    expect(await answer).toBeNull();
  });
});
