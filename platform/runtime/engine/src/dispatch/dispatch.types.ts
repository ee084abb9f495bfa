import type {
  AgencyStreamEvent,
  AgencyStreamEventBase,
} from "@switchboard/types";
import type { Logger } from "@switchboard/io";
import type { AgentRegistry } from "../agents/agent-registry";
import type { RunContext } from "../context/run-context";
import type { CommunicationGraph } from "../graph/communication-graph";
import type { ThreadCompactor } from "../thread-compactors/types";
import type { ThreadManager } from "../threads/thread-manager";
import type { CallFrame } from "./call-stack";

export interface DispatchRequest {
  callerId: string;
  recipientId: string;
  message: string;
  conversationId: string;
  additionalInstructions?: string;
  attachments?: string[];
  /** Tool call that requested the delegation, when an agent is the caller. */
  toolCallId?: string;
}

export interface DispatchLimits {
  maxStepsPerCall: number;
  completionRetries: number;
}

/**
 * Everything one run needs while walking its call tree.
 */
export interface DispatchRuntime {
  runId: string;
  graph: CommunicationGraph;
  agents: AgentRegistry;
  threads: ThreadManager;
  context: RunContext;
  limits: DispatchLimits;
  sharedInstructions?: string;
  compactor?: ThreadCompactor;
  logger: Logger;
  emit(event: AgencyStreamEvent): Promise<void>;
}

export const frameEventBase = (
  runtime: DispatchRuntime,
  frame: CallFrame,
): AgencyStreamEventBase => ({
  runId: runtime.runId,
  actingAgentId: frame.calleeId,
  callingAgentId: frame.callerId,
  ...(frame.toolCallId ? { callCorrelationId: frame.toolCallId } : {}),
  depth: frame.depth,
  timestamp: new Date().toISOString(),
});
