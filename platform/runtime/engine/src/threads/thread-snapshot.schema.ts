import { z } from "zod";
import type { PersistedAgencyState, ThreadSnapshot } from "@switchboard/types";

const THREAD_MESSAGE_SCHEMA = z.object({
  threadKey: z.string().min(1),
  sequence: z.number().int().positive(),
  role: z.enum(["user", "assistant", "tool"]),
  kind: z.enum(["message", "tool_call", "tool_result", "error", "cancellation"]),
  sender: z.string().min(1),
  recipient: z.string().min(1),
  content: z.string(),
  timestamp: z.string().min(1),
  toolCallId: z.string().optional(),
  toolName: z.string().optional(),
  data: z.json().optional(),
  attachments: z.array(z.string()).optional(),
});

export const THREAD_SNAPSHOT_SCHEMA = z.record(
  z.string(),
  z.array(THREAD_MESSAGE_SCHEMA),
);

export const PERSISTED_STATE_SCHEMA = z.object({
  threads: THREAD_SNAPSHOT_SCHEMA,
  context: z.record(z.string(), z.json()).optional(),
});

const describeIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.map(String).join(".") || "<root>"}: ${issue.message}`)
    .join("; ");

export function parseThreadSnapshot(raw: unknown): ThreadSnapshot {
  const result = THREAD_SNAPSHOT_SCHEMA.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid thread snapshot: ${describeIssues(result.error)}`);
  }
  return result.data;
}

export function parsePersistedState(raw: unknown): PersistedAgencyState {
  const result = PERSISTED_STATE_SCHEMA.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid persisted agency state: ${describeIssues(result.error)}`);
  }
  return result.data;
}
