/**
 * Command-line interface
 *
 * `converse new|resume|list|delete|ask|setup|config`
 */

import chalk from "chalk";
import { Command } from "commander";
import { writeFile } from "fs/promises";
import inquirer from "inquirer";
import {
  configFilePath,
  loadConfig,
  maskApiKey,
  readConfigFile,
  resolveDataDir,
  saveConfigFile,
  validateConfig,
} from "../config";
import { createProvider } from "../providers";
import { DirectPrompt, OUTPUT_FORMATS, PLACEHOLDER_NAME, isOutputFormat } from "../services";
import type { ActiveSession, AppConfig, ProviderName, SessionSummary } from "../types";
import { InvalidArgumentError, createLogger, errorMessage } from "../utils";
import { createSessionContext, createStager, createStore, withTerminal } from "./context";
import { runSessionLoop } from "./loop";
import { ConsoleRenderer, SpinnerProgress } from "./terminal";

const VERSION = "0.1.0";
const PROVIDERS: ProviderName[] = ["openai", "gemini"];

const log = createLogger("cli");

function formatSummary(summary: SessionSummary): string {
  const updated = new Date(summary.updatedAt).toLocaleString();
  return `${summary.displayName} ${chalk.gray(`(${updated})`)}`;
}

async function startSession(config: AppConfig, active: ActiveSession): Promise<void> {
  await withTerminal(async (rl) => {
    const deps = createSessionContext(config, rl);
    await runSessionLoop(deps, active);
  });
}

async function newSession(options: { name?: string }): Promise<void> {
  const config = loadConfig();
  const session = await createStore(config).create(options.name);
  const named = Boolean(options.name?.trim());
  log.info({ named }, "Starting new session");
  await startSession(config, { session, needsName: !named });
}

async function resumeSession(): Promise<void> {
  const config = loadConfig();
  const store = createStore(config);
  const renderer = new ConsoleRenderer();

  const sessions = await store.listAll();
  if (sessions.length === 0) {
    renderer.warn("No saved sessions found to resume.");
    return;
  }

  const { selected } = await inquirer.prompt<{ selected: string }>([
    {
      type: "list",
      name: "selected",
      message: "Select a session to resume:",
      choices: sessions.map((s) => ({ name: formatSummary(s), value: s.storageKey })),
      pageSize: 15,
    },
  ]);

  const session = await store.load(selected);
  renderer.success(`Resumed session: ${session.displayName}`);
  for (const turn of session.messages) {
    renderer.turn(turn.role, turn.content);
  }
  await startSession(config, { session, needsName: session.displayName === PLACEHOLDER_NAME });
}

async function listSessions(): Promise<void> {
  const store = createStore(loadConfig());
  const renderer = new ConsoleRenderer();
  const sessions = await store.listAll();
  if (sessions.length === 0) {
    renderer.warn("No saved sessions found.");
    return;
  }
  renderer.info(chalk.bold(`Saved sessions (${sessions.length}):`));
  sessions.forEach((s, i) => renderer.info(`  ${i + 1}. ${formatSummary(s)}`));
}

async function deleteSessions(): Promise<void> {
  const store = createStore(loadConfig());
  const renderer = new ConsoleRenderer();

  const sessions = await store.listAll();
  if (sessions.length === 0) {
    renderer.warn("No saved sessions found to delete.");
    return;
  }

  const { selected } = await inquirer.prompt<{ selected: string[] }>([
    {
      type: "checkbox",
      name: "selected",
      message: "Select sessions to delete (space to toggle):",
      choices: sessions.map((s) => ({ name: formatSummary(s), value: s.storageKey })),
      pageSize: 15,
    },
  ]);
  if (selected.length === 0) {
    renderer.info("No sessions selected.");
    return;
  }

  const { confirmDelete } = await inquirer.prompt<{ confirmDelete: boolean }>([
    {
      type: "confirm",
      name: "confirmDelete",
      message: `Permanently delete ${selected.length} session(s)?`,
      default: false,
    },
  ]);
  if (!confirmDelete) {
    renderer.info("Deletion cancelled.");
    return;
  }

  const failures: string[] = [];
  for (const key of selected) {
    try {
      await store.delete(key);
    } catch (error) {
      failures.push(`${key}: ${errorMessage(error)}`);
    }
  }

  const deleted = selected.length - failures.length;
  if (deleted > 0) renderer.success(`Deleted ${deleted} session(s).`);
  if (failures.length > 0) {
    renderer.error(`Failed to delete ${failures.length} session(s):`);
    failures.forEach((failure) => renderer.error(`  - ${failure}`));
    process.exitCode = 1;
  }
}

async function readStdin(): Promise<string | undefined> {
  if (process.stdin.isTTY) return undefined;
  process.stdin.setEncoding("utf-8");
  let text = "";
  for await (const chunk of process.stdin) {
    text += String(chunk);
  }
  return text.trim() ? text : undefined;
}

interface AskCommandOptions {
  file?: string;
  format: string;
  output?: string;
}

async function askOnce(words: string[], options: AskCommandOptions): Promise<void> {
  const { format } = options;
  if (!isOutputFormat(format)) {
    throw new InvalidArgumentError(
      `Unknown output format '${format}'. Expected one of: ${OUTPUT_FORMATS.join(", ")}`
    );
  }

  const config = loadConfig();
  const direct = new DirectPrompt({
    provider: createProvider(config, createLogger(config.provider)),
    stager: createStager(config),
    progress: new SpinnerProgress(),
    logger: createLogger("ask"),
  });

  const result = await direct.ask({
    prompt: words.join(" "),
    file: options.file,
    stdin: await readStdin(),
    format,
  });

  if (!result.success) {
    process.stderr.write(`${chalk.red(result.error)}\n`);
    process.exitCode = 1;
    return;
  }
  if (result.warning) {
    process.stderr.write(`${chalk.yellow(result.warning)}\n`);
  }

  if (options.output) {
    await writeFile(options.output, `${result.output}\n`);
    process.stderr.write(`${chalk.green(`Output written to ${options.output}`)}\n`);
  } else {
    process.stdout.write(`${result.output}\n`);
  }
}

interface SetupOptions {
  provider?: string;
  model?: string;
  apiKey?: string;
}

async function setup(options: SetupOptions): Promise<void> {
  const path = configFilePath(resolveDataDir());
  const existing = readConfigFile(path);

  const answers = await inquirer.prompt<{ provider: ProviderName; model: string; apiKey: string }>(
    [
      {
        type: "list",
        name: "provider",
        message: "Provider:",
        choices: PROVIDERS,
        default: existing.provider ?? "openai",
      },
      {
        type: "input",
        name: "model",
        message: "Model:",
        default: existing.model,
        validate: (v: string) => v.trim().length >= 1 || "Model is required",
      },
      {
        type: "password",
        name: "apiKey",
        message: "API key:",
        mask: "*",
        validate: (v: string) =>
          v.trim().length >= 1 || Boolean(existing.apiKey) || "API key is required",
      },
    ],
    {
      ...(options.provider ? { provider: parseProvider(options.provider) } : {}),
      ...(options.model ? { model: options.model } : {}),
      ...(options.apiKey ? { apiKey: options.apiKey } : {}),
    }
  );

  const saved = await saveConfigFile(path, {
    provider: answers.provider,
    model: answers.model.trim(),
    ...(answers.apiKey.trim() ? { apiKey: answers.apiKey.trim() } : {}),
  });

  const renderer = new ConsoleRenderer();
  renderer.success(`Configuration saved to ${path}`);
  renderer.info(`  provider: ${saved.provider ?? "openai"}`);
  renderer.info(`  model:    ${saved.model ?? ""}`);
  renderer.info(`  apiKey:   ${saved.apiKey ? maskApiKey(saved.apiKey) : "(not set)"}`);
}

function parseProvider(raw: string): ProviderName {
  const provider = PROVIDERS.find((p) => p === raw.toLowerCase());
  if (!provider) {
    throw new InvalidArgumentError(`Unknown provider '${raw}'. Expected one of: ${PROVIDERS.join(", ")}`);
  }
  return provider;
}

function showConfig(): void {
  const renderer = new ConsoleRenderer();
  const validation = validateConfig();
  if (!validation.success) {
    renderer.error("Configuration error:");
    validation.errors.forEach((line) => renderer.error(line));
    renderer.info("Run `converse setup` to configure the provider, model and API key.");
    process.exitCode = 1;
    return;
  }

  const { config } = validation;
  renderer.info(chalk.bold("Current configuration:"));
  const rows: [string, string][] = [
    ["provider", config.provider],
    ["model", config.model],
    ["apiKey", maskApiKey(config.apiKey)],
    ["temperature", String(config.temperature)],
    ["maxFileSize", `${config.maxFileSizeBytes} bytes`],
    ["allowedExtensions", config.allowedExtensions.join(", ") || "(any)"],
    ["editor", config.editor ?? "(not set)"],
    ["dataDir", config.dataDir],
    ["sessionsDir", config.sessionsDir],
    ["configFile", config.configFile],
  ];
  for (const [key, value] of rows) {
    renderer.info(`  ${key.padEnd(18)} ${value}`);
  }
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("converse")
    .description("Chat with an LLM from the terminal, with sessions saved to disk")
    .version(VERSION);

  program
    .command("new")
    .description("Start a new chat session")
    .option("-n, --name <name>", "Session name (otherwise named after the first message)")
    .action((options: { name?: string }) => newSession(options));

  program
    .command("resume")
    .description("Resume a saved chat session")
    .action(() => resumeSession());

  program
    .command("list")
    .description("List saved chat sessions")
    .action(() => listSessions());

  program
    .command("delete")
    .description("Delete one or more saved chat sessions")
    .action(() => deleteSessions());

  program
    .command("ask")
    .description("Send a single prompt without a session (reads context from stdin when piped)")
    .argument("<prompt...>", "Prompt text")
    .option("-f, --file <path>", "Include a file as context")
    .option("--format <format>", `Output format (${OUTPUT_FORMATS.join(", ")})`, "markdown")
    .option("-o, --output <path>", "Write the response to a file instead of stdout")
    .action((words: string[], options: AskCommandOptions) => askOnce(words, options));

  program
    .command("setup")
    .description("Configure the provider, model and API key")
    .option("--provider <provider>", `Provider (${PROVIDERS.join(", ")})`)
    .option("--model <model>", "Model identifier")
    .option("--api-key <key>", "API key")
    .action((options: SetupOptions) => setup(options));

  program
    .command("config")
    .description("Show the current configuration")
    .action(() => showConfig());

  return program;
}
