/**
 * GeminiProvider - generateContent over the Google Gen AI SDK
 *
 * System turns become the system instruction; assistant turns use the
 * "model" role.
 */

import { type Content, GoogleGenAI } from "@google/genai";
import type { Logger } from "pino";
import type { Provider, SubmitOptions, Turn } from "../types";
import { ProviderError, errorMessage } from "../utils/errors";

export interface GeminiProviderOptions {
  apiKey: string;
  model: string;
  temperature: number;
}

export function toGeminiRequest(turns: Turn[]): {
  contents: Content[];
  systemInstruction?: string;
} {
  const system = turns.filter((t) => t.role === "system").map((t) => t.content);
  const contents = turns
    .filter((t) => t.role !== "system")
    .map((t) => ({
      role: t.role === "assistant" ? "model" : "user",
      parts: [{ text: t.content }],
    }));

  return system.length > 0 ? { contents, systemInstruction: system.join("\n\n") } : { contents };
}

export class GeminiProvider implements Provider {
  readonly name = "gemini";
  private client: GoogleGenAI;
  private options: GeminiProviderOptions;
  private log: Logger;

  constructor(options: GeminiProviderOptions, logger: Logger) {
    this.options = options;
    this.log = logger;
    this.client = new GoogleGenAI({ apiKey: options.apiKey });
  }

  async submit(turns: Turn[], options?: SubmitOptions): Promise<string> {
    const startTime = Date.now();
    const { contents, systemInstruction } = toGeminiRequest(turns);
    this.log.debug({ model: this.options.model, turns: turns.length }, "Requesting content");

    try {
      const response = await this.client.models.generateContent({
        model: this.options.model,
        contents,
        config: {
          systemInstruction,
          temperature: options?.temperature ?? this.options.temperature,
        },
      });
      this.log.info({ duration: Date.now() - startTime }, "Content received");
      return response.text ?? "";
    } catch (error) {
      this.log.error({ error: errorMessage(error) }, "Gemini request failed");
      throw new ProviderError(this.name, `Gemini API error: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
