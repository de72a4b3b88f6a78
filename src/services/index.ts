/**
 * Service module exports
 */

export { ConversationEngine, embedFiles, type SendResult } from "./conversation";
export { CommandDispatcher, parseLine, type DispatchOutcome, type ParsedInput } from "./dispatcher";
export { ExternalEditor, stripEditorHeader } from "./editor";
export { ProviderNamer, buildNamingPrompt } from "./naming";
export { FzfPicker } from "./picker";
export {
  DirectPrompt,
  OUTPUT_FORMATS,
  isOutputFormat,
  stripCodeFence,
  type AskOptions,
  type AskResult,
  type OutputFormat,
} from "./prompt";
export { FileStager, formatKb, resolveUserPath } from "./stager";
export {
  PLACEHOLDER_NAME,
  SessionStore,
  storageKey,
  storageKeyFor,
} from "./store";
