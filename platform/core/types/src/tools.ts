import type { JSONSchema7 } from "json-schema";
import type { RunContextStore } from "./context";
import type { JsonValue } from "./json";

export interface ToolCallArguments {
  [key: string]: unknown;
}

export interface ToolSchema {
  type: "function";
  name: string;
  description?: string;
  parameters: JSONSchema7;
}

export interface ToolResult {
  /** Text surfaced to the model as the tool message content. */
  content: string;
  data?: JsonValue;
  isError?: boolean;
}

export interface ToolExecutionContext {
  runId: string;
  agentId: string;
  callerId: string;
  toolCallId: string;
  context: RunContextStore;
  signal: AbortSignal;
}

export interface ToolDefinition {
  name: string;
  description?: string;
  jsonSchema: JSONSchema7;
  /**
   * Calls to tools marked parallel may run concurrently when every call in
   * the same step is parallel.
   */
  parallel?: boolean;
  handler(
    args: ToolCallArguments,
    ctx: ToolExecutionContext,
  ): Promise<ToolResult | string>;
}
