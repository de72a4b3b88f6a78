/**
 * Interfaces for the pieces the engine talks to but does not own:
 * the provider, naming, progress display, rendering and user prompts.
 */

import type { Role, Turn } from "./session";

export interface SubmitOptions {
  temperature?: number;
}

export interface Provider {
  readonly name: string;

  /**
   * Send the ordered history and resolve with the reply text.
   * Rejects with ProviderError.
   */
  submit(turns: Turn[], options?: SubmitOptions): Promise<string>;
}

export interface NamingCapability {
  suggestName(text: string): Promise<string>;
}

export interface ProgressIndicator {
  /** Show an indeterminate indicator; the returned function hides it */
  start(label: string): () => void;
}

export interface Renderer {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  turn(role: Role, content: string): void;
}

export interface Confirmer {
  confirm(question: string): Promise<boolean>;
}

export type ComposeResult =
  | { status: "composed"; text: string }
  | { status: "cancelled" }
  | { status: "failed"; message: string };

export interface Editor {
  /** An empty buffer counts as cancelled */
  compose(): Promise<ComposeResult>;
}

export type PickResult =
  | { status: "selected"; path: string }
  | { status: "cancelled" }
  | { status: "unavailable" }
  | { status: "failed"; message: string };

export interface FilePicker {
  pick(): Promise<PickResult>;
}
