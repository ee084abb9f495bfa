import type { AgentDescriptor, CompletionAdapter } from "./completion";
import type { ToolDefinition } from "./tools";

export interface AgentDefinition extends AgentDescriptor {
  completion: CompletionAdapter;
  tools?: ToolDefinition[];
}

export interface CommunicationFlow {
  from: string;
  to: string;
}

/** Completion adapter and tools attached to a configured agent id. */
export interface AgentBinding {
  completion: CompletionAdapter;
  tools?: ToolDefinition[];
}
