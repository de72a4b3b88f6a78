/**
 * DirectPrompt - one-shot prompts outside a session
 *
 * Optional context comes from stdin or a single file (validated with the
 * same rules as /upload). Nothing is persisted.
 */

import type { Logger } from "pino";
import type { ProgressIndicator, Provider } from "../types";
import { ProviderError } from "../utils/errors";
import type { FileStager } from "./stager";

export const OUTPUT_FORMATS = ["markdown", "raw", "json"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

const FORMAT_INSTRUCTIONS: Record<OutputFormat, string> = {
  markdown: "",
  raw:
    "\n\nRESPONSE FORMATTING INSTRUCTIONS: Your entire response MUST be ONLY the requested raw text. " +
    "Do not add explanations, headings, or Markdown code fences.",
  json:
    "\n\nRESPONSE FORMATTING INSTRUCTIONS: Your entire response MUST be ONLY a single, valid JSON " +
    "object or array. Do not add explanations or Markdown code fences.",
};

const CODE_FENCE = /^\s*```(?:\w*\s*)?\n?([\s\S]*?)\n?```\s*$/i;

export interface AskOptions {
  prompt: string;
  file?: string;
  stdin?: string;
  format: OutputFormat;
}

export type AskResult =
  | { success: true; output: string; warning?: string }
  | { success: false; error: string };

export interface DirectPromptDeps {
  provider: Provider;
  stager: FileStager;
  progress: ProgressIndicator;
  logger: Logger;
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Remove a Markdown code fence wrapping the whole reply.
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const match = CODE_FENCE.exec(trimmed);
  return match ? (match[1] ?? "").trim() : trimmed;
}

export class DirectPrompt {
  private provider: Provider;
  private stager: FileStager;
  private progress: ProgressIndicator;
  private log: Logger;

  constructor(deps: DirectPromptDeps) {
    this.provider = deps.provider;
    this.stager = deps.stager;
    this.progress = deps.progress;
    this.log = deps.logger;
  }

  /**
   * Build the full prompt text, or report why the file cannot be used.
   */
  buildContent(options: AskOptions): { success: true; content: string } | { success: false; error: string } {
    let context = "";

    if (options.stdin) {
      context =
        "[Data from standard input]\n\n" +
        `--- Input Data Start ---\n${options.stdin}\n--- Input Data End ---\n\n`;
    } else if (options.file) {
      const staged = this.stager.stage(options.file);
      this.stager.clear();
      if (staged.status === "rejected") {
        return { success: false, error: staged.message };
      }
      const { name, contentSnapshot } = staged.file;
      context =
        `[User uploaded file: '${name}']\n\n` +
        `--- File Content Start (${name}) ---\n${contentSnapshot}\n--- File Content End (${name}) ---\n\n`;
    }

    return { success: true, content: context + options.prompt + FORMAT_INSTRUCTIONS[options.format] };
  }

  async ask(options: AskOptions): Promise<AskResult> {
    const built = this.buildContent(options);
    if (!built.success) return built;

    let reply: string;
    const stop = this.progress.start("Thinking...");
    try {
      reply = await this.provider.submit([{ role: "user", content: built.content }]);
    } catch (error) {
      if (error instanceof ProviderError) {
        return { success: false, error: `AI Error: ${error.message}` };
      }
      throw error;
    } finally {
      stop();
    }

    if (!reply.trim()) {
      return { success: false, error: "Empty response received" };
    }
    this.log.debug({ format: options.format, length: reply.length }, "Direct prompt answered");

    switch (options.format) {
      case "markdown":
        return { success: true, output: reply };
      case "raw":
        return { success: true, output: stripCodeFence(reply) };
      case "json": {
        const body = stripCodeFence(reply);
        try {
          return { success: true, output: JSON.stringify(JSON.parse(body), null, 2) };
        } catch {
          return { success: true, output: body, warning: "Not valid JSON. Raw output:" };
        }
      }
    }
  }
}
