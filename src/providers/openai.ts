/**
 * OpenAIProvider - chat completions over the OpenAI SDK
 */

import OpenAI from "openai";
import type { Logger } from "pino";
import type { Provider, SubmitOptions, Turn } from "../types";
import { ProviderError, errorMessage } from "../utils/errors";

export interface OpenAIProviderOptions {
  apiKey: string;
  model: string;
  temperature: number;
}

function toMessage(turn: Turn): OpenAI.Chat.Completions.ChatCompletionMessageParam {
  switch (turn.role) {
    case "system":
      return { role: "system", content: turn.content };
    case "user":
      return { role: "user", content: turn.content };
    case "assistant":
      return { role: "assistant", content: turn.content };
  }
}

export class OpenAIProvider implements Provider {
  readonly name = "openai";
  private client: OpenAI;
  private options: OpenAIProviderOptions;
  private log: Logger;

  constructor(options: OpenAIProviderOptions, logger: Logger) {
    this.options = options;
    this.log = logger;
    this.client = new OpenAI({ apiKey: options.apiKey });
  }

  async submit(turns: Turn[], options?: SubmitOptions): Promise<string> {
    const startTime = Date.now();
    this.log.debug({ model: this.options.model, turns: turns.length }, "Requesting completion");

    try {
      const response = await this.client.chat.completions.create({
        model: this.options.model,
        messages: turns.map(toMessage),
        temperature: options?.temperature ?? this.options.temperature,
      });
      this.log.info({ duration: Date.now() - startTime }, "Completion received");
      return response.choices[0]?.message.content ?? "";
    } catch (error) {
      this.log.error({ error: errorMessage(error) }, "OpenAI request failed");
      throw new ProviderError(this.name, `OpenAI API error: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
