export type { JsonObject, JsonPrimitive, JsonValue } from "./json";
export {
  DEFAULT_CONVERSATION_ID,
  USER_SENDER,
} from "./messages";
export type {
  ThreadMessage,
  ThreadMessageDraft,
  ThreadMessageKind,
  ThreadRole,
  ThreadSnapshot,
} from "./messages";
export type { RunContextSnapshot, RunContextStore } from "./context";
export type {
  ToolCallArguments,
  ToolDefinition,
  ToolExecutionContext,
  ToolResult,
  ToolSchema,
} from "./tools";
export type {
  AgentDescriptor,
  CompletionAdapter,
  CompletionRequest,
  CompletionResponse,
  CompletionToolCall,
} from "./completion";
export type {
  AgentBinding,
  AgentDefinition,
  CommunicationFlow,
} from "./agents";
export type {
  AgencyResponse,
  DispatchFailure,
  DispatchResult,
  DispatchSuccess,
  FailureDescription,
  FailureType,
} from "./results";
export type {
  AgencyStreamEvent,
  AgencyStreamEventBase,
  AgencyStreamEventType,
} from "./events";
export type {
  LoadThreadsHook,
  PersistedAgencyState,
  SaveThreadsHook,
  ThreadPersistenceHooks,
} from "./persistence";
export * from "./config";

export function composeInstructions(
  ...sections: Array<string | undefined>
): string {
  return sections
    .map((section) => section?.trim() ?? "")
    .filter((section) => section.length > 0)
    .join("\n\n");
}
