import type { JsonValue } from "./json";

export type FailureType =
  | "GraphConfigError"
  | "InvalidRequestError"
  | "PermissionError"
  | "RecursionLimitError"
  | "CompletionFailure"
  | "PersistenceError"
  | "RunCancelledError";

export interface FailureDescription {
  type: FailureType;
  message: string;
  agentId?: string;
  details?: JsonValue;
}

export interface DispatchSuccess {
  status: "success";
  agentId: string;
  content: string;
  data?: JsonValue;
}

export interface DispatchFailure {
  status: "failure";
  agentId: string;
  error: FailureDescription;
}

export type DispatchResult = DispatchSuccess | DispatchFailure;

export type AgencyResponse = DispatchResult & { runId: string };
