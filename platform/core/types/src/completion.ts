import type { RunContextStore } from "./context";
import type { JsonValue } from "./json";
import type { ThreadMessage } from "./messages";
import type { ToolCallArguments, ToolSchema } from "./tools";

export interface AgentDescriptor {
  id: string;
  description?: string;
  instructions?: string;
  model?: string;
}

export interface CompletionToolCall {
  id: string;
  name: string;
  arguments: ToolCallArguments;
}

export type CompletionResponse =
  | {
      type: "final";
      content: string;
      data?: JsonValue;
    }
  | {
      type: "tool_calls";
      calls: CompletionToolCall[];
    };

export interface CompletionRequest {
  agent: AgentDescriptor;
  /** Shared, agent and per-call instructions joined in that order. */
  instructions: string;
  threadKey: string;
  messages: readonly ThreadMessage[];
  tools: ToolSchema[];
  context: RunContextStore;
  callerId: string;
  /** 1-based attempt counter for the current step. */
  attempt: number;
  signal: AbortSignal;
  emitDelta(text: string): Promise<void>;
}

/**
 * Model-facing collaborator. Implementations wrap a provider SDK; the engine
 * validates whatever they return before acting on it.
 */
export interface CompletionAdapter {
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}
