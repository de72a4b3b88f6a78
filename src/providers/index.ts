/**
 * Provider selection, done once at startup
 */

import type { Logger } from "pino";
import type { AppConfig, Provider } from "../types";
import { GeminiProvider } from "./gemini";
import { OpenAIProvider } from "./openai";

export { GeminiProvider, toGeminiRequest } from "./gemini";
export { OpenAIProvider } from "./openai";

export function createProvider(
  config: Pick<AppConfig, "provider" | "apiKey" | "model" | "temperature">,
  logger: Logger
): Provider {
  const options = { apiKey: config.apiKey, model: config.model, temperature: config.temperature };
  switch (config.provider) {
    case "openai":
      return new OpenAIProvider(options, logger);
    case "gemini":
      return new GeminiProvider(options, logger);
  }
}
