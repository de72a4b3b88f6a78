#!/usr/bin/env node
/**
 * converse - Entry Point
 *
 * Parses the command line and runs the selected command. Fatal errors are
 * logged, printed and end the process with exit code 1.
 *
 * Run: npm run start -- new
 */

import chalk from "chalk";
import { buildProgram } from "./cli/program";
import { ConfigMissingError, ConverseError, errorMessage } from "./utils/errors";
import { createLogger } from "./utils/logger";

const log = createLogger("main");

function reportFatal(error: unknown): void {
  if (error instanceof ConfigMissingError) {
    console.error(chalk.red("Configuration error:"));
    for (const issue of error.issues) {
      console.error(issue);
    }
    console.error("\nSetup instructions:");
    console.error("1. Run `converse setup`, or");
    console.error("2. Set CONVERSE_API_KEY and CONVERSE_MODEL (and CONVERSE_PROVIDER for gemini)");
    return;
  }
  console.error(chalk.red(`Error: ${errorMessage(error)}`));
}

async function main(): Promise<void> {
  await buildProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const code = error instanceof ConverseError ? error.code : "UNEXPECTED";
  log.error({ code, error: errorMessage(error) }, "Fatal error");
  reportFatal(error);
  process.exit(1);
});
