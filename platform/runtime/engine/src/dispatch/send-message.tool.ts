import { z } from "zod";
import type { ToolSchema } from "@switchboard/types";
import type { AgentRegistry } from "../agents/agent-registry";
import type { CommunicationGraph } from "../graph/communication-graph";

export const SEND_MESSAGE_TOOL_NAME = "send_message";

export const SEND_MESSAGE_ARGUMENTS_SCHEMA = z.object({
  recipientAgentId: z
    .string({ error: "recipientAgentId must be a string" })
    .trim()
    .min(1, "recipientAgentId is required"),
  message: z
    .string({ error: "message must be a string" })
    .trim()
    .min(1, "message is required"),
  additionalInstructions: z.string().optional(),
  attachments: z.array(z.string()).optional(),
});

export type SendMessageArguments = z.infer<typeof SEND_MESSAGE_ARGUMENTS_SCHEMA>;

export type SendMessageParseResult =
  | { success: true; data: SendMessageArguments }
  | { success: false; error: string };

export function parseSendMessageArguments(raw: unknown): SendMessageParseResult {
  const result = SEND_MESSAGE_ARGUMENTS_SCHEMA.safeParse(raw);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    error: result.error.issues.map((issue) => issue.message).join("; "),
  };
}

/**
 * Schema of the delegation tool for `agentId`. The recipient enum is exactly
 * the agent's outgoing flows; agents without any get no tool.
 */
export function buildSendMessageToolSchema(
  agentId: string,
  graph: CommunicationGraph,
  agents: AgentRegistry,
): ToolSchema | undefined {
  const recipients = Array.from(graph.listOutgoing(agentId));
  if (recipients.length === 0) {
    return undefined;
  }

  const roster = recipients.map((recipientId) => {
    const description = agents.get(recipientId)?.description?.trim();
    return description ? `- ${recipientId}: ${description}` : `- ${recipientId}`;
  });

  return {
    type: "function",
    name: SEND_MESSAGE_TOOL_NAME,
    description: [
      "Send a message to another agent and wait for its reply.",
      "Recipients:",
      ...roster,
    ].join("\n"),
    parameters: {
      type: "object",
      properties: {
        recipientAgentId: {
          type: "string",
          enum: recipients,
          description: "Agent that should receive the message.",
        },
        message: {
          type: "string",
          description: "Self-contained task or question for the recipient.",
        },
        additionalInstructions: {
          type: "string",
          description: "Extra instructions added to the recipient's own for this call.",
        },
        attachments: {
          type: "array",
          items: { type: "string" },
          description: "References to files or resources the recipient should use.",
        },
      },
      required: ["recipientAgentId", "message"],
      additionalProperties: false,
    },
  };
}
