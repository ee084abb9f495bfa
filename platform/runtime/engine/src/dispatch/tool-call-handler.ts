import { Injectable } from "@nestjs/common";
import type {
  CompletionToolCall,
  DispatchResult,
  FailureDescription,
  JsonObject,
  ToolResult,
} from "@switchboard/types";
import type { RegisteredAgent } from "../agents/agent-registry";
import { RunCancelledError, serializeError } from "../errors";
import type { Thread } from "../threads/thread";
import { raceWithAbort, throwIfCancelled } from "./abort.util";
import type { CallFrame } from "./call-stack";
import {
  type DispatchRequest,
  type DispatchRuntime,
  frameEventBase,
} from "./dispatch.types";
import {
  SEND_MESSAGE_TOOL_NAME,
  parseSendMessageArguments,
} from "./send-message.tool";

export interface ToolCallScope {
  frame: CallFrame;
  agent: RegisteredAgent;
  thread: Thread;
  runtime: DispatchRuntime;
  delegate(request: DispatchRequest): Promise<DispatchResult>;
}

const failureToJson = (failure: FailureDescription): JsonObject => ({
  type: failure.type,
  message: failure.message,
  ...(failure.agentId ? { agentId: failure.agentId } : {}),
  ...(failure.details === undefined ? {} : { details: failure.details }),
});

/**
 * Executes the tool calls of one completion step. Every call is recorded in
 * the acting thread before any of them runs, and results are recorded in
 * request order.
 */
@Injectable()
export class ToolCallHandler {
  async handleBatch(
    calls: readonly CompletionToolCall[],
    scope: ToolCallScope,
  ): Promise<void> {
    for (const call of calls) {
      await this.recordCall(call, scope);
    }

    if (this.canRunInParallel(calls, scope.agent)) {
      const results = await Promise.all(
        calls.map((call) => this.execute(call, scope)),
      );
      for (const [index, call] of calls.entries()) {
        await this.recordResult(call, results[index], scope);
      }
      return;
    }

    for (const call of calls) {
      const result = await this.execute(call, scope);
      await this.recordResult(call, result, scope);
    }
  }

  private canRunInParallel(
    calls: readonly CompletionToolCall[],
    agent: RegisteredAgent,
  ): boolean {
    return (
      calls.length > 1 &&
      calls.every(
        (call) =>
          call.name !== SEND_MESSAGE_TOOL_NAME &&
          agent.tools.get(call.name)?.parallel === true,
      )
    );
  }

  private async execute(
    call: CompletionToolCall,
    scope: ToolCallScope,
  ): Promise<ToolResult> {
    const { agent, frame, runtime } = scope;
    const { signal } = runtime.context;
    throwIfCancelled(signal);

    if (call.name === SEND_MESSAGE_TOOL_NAME) {
      return this.sendMessage(call, scope);
    }

    const tool = agent.tools.get(call.name);
    if (!tool) {
      runtime.logger.warn(
        { tool: call.name, agent: agent.id },
        "Model requested an unknown tool"
      );
      return { content: `Unknown tool "${call.name}".`, isError: true };
    }

    try {
      const output = await raceWithAbort(
        tool.handler(call.arguments, {
          runId: runtime.runId,
          agentId: agent.id,
          callerId: frame.callerId,
          toolCallId: call.id,
          context: runtime.context,
          signal,
        }),
        signal,
      );
      return typeof output === "string" ? { content: output } : output;
    } catch (error) {
      if (error instanceof RunCancelledError) {
        throw error;
      }
      const serialized = serializeError(error);
      runtime.logger.warn(
        { err: serialized.message, tool: call.name, agent: agent.id },
        "Tool execution failed"
      );
      return {
        content: `Tool execution failed: ${serialized.message}`,
        isError: true,
      };
    }
  }

  private async sendMessage(
    call: CompletionToolCall,
    scope: ToolCallScope,
  ): Promise<ToolResult> {
    const { agent, thread, runtime } = scope;
    const parsed = parseSendMessageArguments(call.arguments);
    if (!parsed.success) {
      return {
        content: `Invalid ${SEND_MESSAGE_TOOL_NAME} arguments: ${parsed.error}`,
        isError: true,
      };
    }

    const { recipientAgentId, message, additionalInstructions, attachments } =
      parsed.data;
    const recipientId =
      runtime.agents.resolve(recipientAgentId)?.id ?? recipientAgentId;

    runtime.logger.debug(
      { agent: agent.id, delegatedTo: recipientId, toolCallId: call.id },
      "Delegating to agent"
    );

    const result = await scope.delegate({
      callerId: agent.id,
      recipientId,
      message,
      conversationId: thread.conversationId,
      toolCallId: call.id,
      ...(additionalInstructions ? { additionalInstructions } : {}),
      ...(attachments?.length ? { attachments } : {}),
    });

    if (result.status === "success") {
      return {
        content: result.content,
        ...(result.data === undefined ? {} : { data: result.data }),
      };
    }

    return {
      content: `${result.error.type}: ${result.error.message}`,
      isError: true,
      data: { error: failureToJson(result.error) },
    };
  }

  private async recordCall(
    call: CompletionToolCall,
    scope: ToolCallScope,
  ): Promise<void> {
    const { agent, frame, thread, runtime } = scope;
    await runtime.threads.appendMessage(thread.key, {
      role: "assistant",
      kind: "tool_call",
      sender: agent.id,
      recipient: frame.callerId,
      content: JSON.stringify(call.arguments),
      toolCallId: call.id,
      toolName: call.name,
    });
    await runtime.emit({
      ...frameEventBase(runtime, frame),
      type: "tool_call",
      toolName: call.name,
      toolCallId: call.id,
      arguments: call.arguments,
    });
  }

  private async recordResult(
    call: CompletionToolCall,
    result: ToolResult,
    scope: ToolCallScope,
  ): Promise<void> {
    const { agent, frame, thread, runtime } = scope;
    const isError = result.isError === true;
    await runtime.threads.appendMessage(thread.key, {
      role: "tool",
      kind: "tool_result",
      sender: agent.id,
      recipient: frame.callerId,
      content: result.content,
      toolCallId: call.id,
      toolName: call.name,
      ...(result.data === undefined ? {} : { data: result.data }),
    });
    await runtime.emit({
      ...frameEventBase(runtime, frame),
      type: "tool_result",
      toolName: call.name,
      toolCallId: call.id,
      content: result.content,
      isError,
    });
  }
}
