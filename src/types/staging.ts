/**
 * File staging types
 */

export interface StagedFile {
  /** Resolved absolute path, the identity of a staged file */
  path: string;

  /** Base name shown to the user and to the model */
  name: string;

  sizeBytes: number;

  /** Lowercase extension including the dot, "" when absent */
  extension: string;

  /** File content as read when it was staged */
  contentSnapshot: string;
}

export type RejectReason =
  | "not-found"
  | "not-a-file"
  | "too-large"
  | "extension-not-allowed"
  | "not-text";

export type StageResult =
  | { status: "staged"; file: StagedFile }
  | { status: "duplicate"; file: StagedFile }
  | { status: "rejected"; reason: RejectReason; message: string };
