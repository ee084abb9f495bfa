import type { JsonValue } from "./json";

/**
 * Sender id used for messages that originate outside the agency.
 */
export const USER_SENDER = "user";

export const DEFAULT_CONVERSATION_ID = "main";

export type ThreadRole = "user" | "assistant" | "tool";

export type ThreadMessageKind =
  | "message"
  | "tool_call"
  | "tool_result"
  | "error"
  | "cancellation";

export interface ThreadMessage {
  threadKey: string;
  /** 1-based position within the owning thread. */
  sequence: number;
  role: ThreadRole;
  kind: ThreadMessageKind;
  sender: string;
  recipient: string;
  content: string;
  timestamp: string;
  toolCallId?: string;
  toolName?: string;
  data?: JsonValue;
  attachments?: string[];
}

export type ThreadMessageDraft = Omit<
  ThreadMessage,
  "threadKey" | "sequence" | "timestamp"
>;

export type ThreadSnapshot = Record<string, ThreadMessage[]>;
