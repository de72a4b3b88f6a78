/**
 * Centralized type exports
 */

export type { AppConfig, ProviderName } from "./config";
export type { ActiveSession, Role, Session, SessionSummary, Turn } from "./session";
export { TURN_ROLES } from "./session";
export type { RejectReason, StageResult, StagedFile } from "./staging";
export type {
  ComposeResult,
  Confirmer,
  Editor,
  FilePicker,
  NamingCapability,
  PickResult,
  ProgressIndicator,
  Provider,
  Renderer,
  SubmitOptions,
} from "./collaborators";
