import { z } from "zod";
import type { CompletionResponse } from "@switchboard/types";
import { CompletionFailure } from "../errors";

const TOOL_CALL_SCHEMA = z.object({
  id: z.string().min(1, "tool call id must be provided"),
  name: z.string().min(1, "tool name must be provided"),
  arguments: z.record(z.string(), z.unknown()),
});

export const COMPLETION_RESPONSE_SCHEMA = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("final"),
    content: z.string(),
    data: z.json().optional(),
  }),
  z.object({
    type: z.literal("tool_calls"),
    calls: z.array(TOOL_CALL_SCHEMA).min(1, "at least one tool call is required"),
  }),
]);

export function parseCompletionResponse(
  raw: unknown,
  agentId: string,
): CompletionResponse {
  const result = COMPLETION_RESPONSE_SCHEMA.safeParse(raw);
  if (result.success) {
    return result.data;
  }

  const details = result.error.issues
    .map((issue) => {
      const path = issue.path.map(String).join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");
  throw new CompletionFailure(
    `Malformed completion response from "${agentId}": ${details}`,
  );
}
