/**
 * ProviderNamer - asks the provider for a short session title
 */

import type { NamingCapability, Provider } from "../types";
import { sanitizeSuggestedName } from "../utils/slug";

const NAMING_TEMPERATURE = 0.3;

export function buildNamingPrompt(firstUserText: string): string {
  return [
    "Based on the following user message, generate a concise, 2-4 word title",
    "suitable for a filename (use lowercase words, separated by hyphens).",
    "Example: 'analyze-stock-data'. Do not include any explanation, just the title.",
    "",
    `User Message: "${firstUserText}"`,
  ].join("\n");
}

export class ProviderNamer implements NamingCapability {
  private provider: Provider;

  constructor(provider: Provider) {
    this.provider = provider;
  }

  /**
   * Resolves with a slug, or "" when the reply had nothing usable.
   * Rejects with ProviderError.
   */
  async suggestName(text: string): Promise<string> {
    const reply = await this.provider.submit([{ role: "user", content: buildNamingPrompt(text) }], {
      temperature: NAMING_TEMPERATURE,
    });
    return sanitizeSuggestedName(reply);
  }
}
