/**
 * Session types for durable conversations
 */

export const TURN_ROLES = ["system", "user", "assistant"] as const;
export type Role = (typeof TURN_ROLES)[number];

export interface Turn {
  role: Role;
  content: string;
}

export interface Session {
  /** Eight hex characters, fixed at creation */
  id: string;

  /** Label shown to the user; the storage key is derived from it */
  displayName: string;

  /** ISO timestamp of creation */
  createdAt: string;

  /** ISO timestamp of the last persisted mutation */
  updatedAt: string;

  /** Conversation in order */
  messages: Turn[];
}

export interface SessionSummary {
  displayName: string;
  storageKey: string;
  updatedAt: string;
}

/**
 * Handle for the session the interaction loop is working on.
 */
export interface ActiveSession {
  session: Session;

  /** True until the first completed exchange names the session */
  needsName: boolean;

  /** What the user typed first in this session, without file blocks */
  firstUserText?: string;
}
