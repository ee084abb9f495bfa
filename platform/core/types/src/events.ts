import type { ToolCallArguments } from "./tools";

export interface AgencyStreamEventBase {
  runId: string;
  /** Agent whose step produced the event. */
  actingAgentId: string;
  callingAgentId?: string;
  /** Tool call id of the delegation that opened the acting frame. */
  callCorrelationId?: string;
  depth: number;
  timestamp: string;
}

export type AgencyStreamEvent =
  | ({
      type: "agent_start";
      threadKey: string;
    } & AgencyStreamEventBase)
  | ({
      type: "delta";
      content: string;
    } & AgencyStreamEventBase)
  | ({
      type: "tool_call";
      toolName: string;
      toolCallId: string;
      arguments: ToolCallArguments;
    } & AgencyStreamEventBase)
  | ({
      type: "tool_result";
      toolName: string;
      toolCallId: string;
      content: string;
      isError: boolean;
    } & AgencyStreamEventBase)
  | ({
      type: "message";
      threadKey: string;
      content: string;
    } & AgencyStreamEventBase)
  | ({
      type: "error";
      errorType: string;
      content: string;
    } & AgencyStreamEventBase)
  | ({
      type: "run_complete";
      status: "success" | "failure";
      content: string;
    } & AgencyStreamEventBase);

export type AgencyStreamEventType = AgencyStreamEvent["type"];
