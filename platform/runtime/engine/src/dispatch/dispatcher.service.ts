import { Inject, Injectable } from "@nestjs/common";
import {
  USER_SENDER,
  composeInstructions,
  type AgentDescriptor,
  type CompletionResponse,
  type DispatchResult,
  type ThreadMessageDraft,
  type ToolSchema,
} from "@switchboard/types";
import type { RegisteredAgent } from "../agents/agent-registry";
import {
  CompletionFailure,
  InvalidRequestError,
  PermissionError,
  RecursionLimitError,
  RunCancelledError,
  SwitchboardError,
  serializeError,
} from "../errors";
import type { Thread } from "../threads/thread";
import { createThreadKey } from "../threads/thread-key";
import { raceWithAbort, throwIfCancelled } from "./abort.util";
import type { CallFrame } from "./call-stack";
import { parseCompletionResponse } from "./completion-response.schema";
import {
  type DispatchRequest,
  type DispatchRuntime,
  frameEventBase,
} from "./dispatch.types";
import { buildSendMessageToolSchema } from "./send-message.tool";
import { ToolCallHandler } from "./tool-call-handler";

type FinalResponse = Extract<CompletionResponse, { type: "final" }>;

interface ActiveCall {
  agent: RegisteredAgent;
  frame: CallFrame;
  thread: Thread;
  instructions: string;
  tools: ToolSchema[];
}

type Authorization =
  | { allowed: true; agent: RegisteredAgent }
  | { allowed: false; error: PermissionError };

const toDescriptor = (agent: RegisteredAgent): AgentDescriptor => ({
  id: agent.id,
  description: agent.description,
  instructions: agent.instructions,
  model: agent.model,
});

/**
 * Runs one agent call: permission check, frame push, completion steps and
 * tool execution. Nested send_message calls re-enter `dispatch` with the
 * calling agent as sender. Engine failures become failure results at the
 * frame that raised them; anything else propagates.
 */
@Injectable()
export class DispatcherService {
  constructor(
    @Inject(ToolCallHandler) private readonly toolCallHandler: ToolCallHandler,
  ) {}

  async dispatch(
    request: DispatchRequest,
    runtime: DispatchRuntime,
  ): Promise<DispatchResult> {
    const { logger } = runtime;
    if (request.conversationId.trim() === "") {
      const error = new InvalidRequestError("A conversation id must not be empty.", {
        details: { field: "conversationId" },
      });
      return {
        status: "failure",
        agentId: request.recipientId,
        error: error.toFailure(request.recipientId),
      };
    }

    const authorization = this.authorize(request, runtime);
    if (!authorization.allowed) {
      logger.warn(
        { sender: request.callerId, recipient: request.recipientId },
        "Rejected message outside the communication graph"
      );
      return {
        status: "failure",
        agentId: request.recipientId,
        error: authorization.error.toFailure(request.recipientId),
      };
    }

    const { agent } = authorization;
    const { callStack } = runtime.context;
    let frame: CallFrame;
    try {
      frame = callStack.push({
        callerId: request.callerId,
        calleeId: agent.id,
        threadKey: createThreadKey(request.callerId, agent.id, request.conversationId),
        toolCallId: request.toolCallId,
      });
    } catch (error) {
      if (!(error instanceof RecursionLimitError)) {
        throw error;
      }
      logger.warn(
        { sender: request.callerId, recipient: agent.id, reason: error.reason },
        "Call rejected by recursion guard"
      );
      return { status: "failure", agentId: agent.id, error: error.toFailure(agent.id) };
    }

    try {
      const thread = runtime.threads.getOrCreateThread(
        request.callerId,
        agent.id,
        request.conversationId,
      );
      await runtime.emit({
        ...frameEventBase(runtime, frame),
        type: "agent_start",
        threadKey: thread.key,
      });
      await runtime.threads.appendMessage(thread.key, {
        role: "user",
        kind: "message",
        sender: request.callerId,
        recipient: agent.id,
        content: request.message,
        ...(request.attachments?.length ? { attachments: [...request.attachments] } : {}),
      });

      const response = await this.runSteps(
        {
          agent,
          frame,
          thread,
          instructions: composeInstructions(
            runtime.sharedInstructions,
            agent.instructions,
            request.additionalInstructions,
          ),
          tools: this.collectTools(agent, runtime),
        },
        runtime,
      );

      await this.appendFromAgent(runtime, frame, {
        role: "assistant",
        kind: "message",
        content: response.content,
        ...(response.data === undefined ? {} : { data: response.data }),
      });
      await runtime.emit({
        ...frameEventBase(runtime, frame),
        type: "message",
        threadKey: thread.key,
        content: response.content,
      });

      return {
        status: "success",
        agentId: agent.id,
        content: response.content,
        ...(response.data === undefined ? {} : { data: response.data }),
      };
    } catch (error) {
      return await this.handleFrameError(error, frame, runtime);
    } finally {
      callStack.pop(frame);
    }
  }

  private authorize(request: DispatchRequest, runtime: DispatchRuntime): Authorization {
    const { callerId, recipientId } = request;
    const agent = runtime.agents.get(recipientId);
    if (!agent) {
      return {
        allowed: false,
        error: new PermissionError(callerId, recipientId, `Unknown recipient "${recipientId}".`),
      };
    }

    if (callerId === USER_SENDER) {
      return runtime.graph.isEntryPoint(agent.id)
        ? { allowed: true, agent }
        : {
            allowed: false,
            error: new PermissionError(
              callerId,
              agent.id,
              `"${agent.id}" is not an entry point of the agency.`,
            ),
          };
    }

    return runtime.graph.canInitiate(callerId, agent.id)
      ? { allowed: true, agent }
      : { allowed: false, error: new PermissionError(callerId, agent.id) };
  }

  private async runSteps(
    call: ActiveCall,
    runtime: DispatchRuntime,
  ): Promise<FinalResponse> {
    const { maxStepsPerCall } = runtime.limits;

    for (let step = 1; step <= maxStepsPerCall; step += 1) {
      throwIfCancelled(runtime.context.signal);
      await this.compact(call, step, runtime);

      const response = await this.complete(call, runtime);
      if (response.type === "final") {
        return response;
      }

      await this.toolCallHandler.handleBatch(response.calls, {
        frame: call.frame,
        agent: call.agent,
        thread: call.thread,
        runtime,
        delegate: (next) => this.dispatch(next, runtime),
      });
    }

    throw new CompletionFailure(
      `"${call.agent.id}" did not produce a final response within ${maxStepsPerCall} steps.`,
      { details: { maxStepsPerCall } },
    );
  }

  private async complete(
    call: ActiveCall,
    runtime: DispatchRuntime,
  ): Promise<CompletionResponse> {
    const { agent, frame, thread } = call;
    const { signal } = runtime.context;
    const attempts = runtime.limits.completionRetries + 1;
    let lastError: CompletionFailure | undefined;

    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      throwIfCancelled(signal);
      try {
        const raw = await raceWithAbort(
          agent.completion.complete({
            agent: toDescriptor(agent),
            instructions: call.instructions,
            threadKey: thread.key,
            messages: thread.messages,
            tools: call.tools,
            context: runtime.context,
            callerId: frame.callerId,
            attempt,
            signal,
            emitDelta: (text) =>
              runtime.emit({
                ...frameEventBase(runtime, frame),
                type: "delta",
                content: text,
              }),
          }),
          signal,
        );
        return parseCompletionResponse(raw, agent.id);
      } catch (error) {
        if (error instanceof RunCancelledError) {
          throw error;
        }
        lastError =
          error instanceof CompletionFailure
            ? error
            : new CompletionFailure(serializeError(error).message, { cause: error });

        runtime.logger.warn(
          { agent: agent.id, attempt, attempts, err: lastError.message },
          "Completion attempt failed"
        );
        await this.appendFromAgent(runtime, frame, {
          role: "assistant",
          kind: "error",
          content: `Completion attempt ${attempt} of ${attempts} failed: ${lastError.message}`,
          data: { type: lastError.type, attempt },
        });
        await runtime.emit({
          ...frameEventBase(runtime, frame),
          type: "error",
          errorType: lastError.type,
          content: lastError.message,
        });
      }
    }

    throw new CompletionFailure(
      `Completion failed after ${attempts} attempts: ${lastError?.message ?? "no response"}`,
      { details: { attempts }, cause: lastError },
    );
  }

  private async compact(
    call: ActiveCall,
    step: number,
    runtime: DispatchRuntime,
  ): Promise<void> {
    if (!runtime.compactor) {
      return;
    }

    const result = await runtime.threads.compact(call.thread.key, runtime.compactor, {
      agentId: call.agent.id,
      iteration: step,
    });
    if (result) {
      runtime.logger.debug(
        {
          agent: call.agent.id,
          thread: call.thread.key,
          removedMessages: result.removedMessages,
          reason: result.reason,
        },
        "Compacted thread"
      );
    }
  }

  private collectTools(agent: RegisteredAgent, runtime: DispatchRuntime): ToolSchema[] {
    const tools: ToolSchema[] = Array.from(agent.tools.values(), (tool) => ({
      type: "function",
      name: tool.name,
      ...(tool.description ? { description: tool.description } : {}),
      parameters: tool.jsonSchema,
    }));
    const sendMessage = buildSendMessageToolSchema(agent.id, runtime.graph, runtime.agents);
    if (sendMessage) {
      tools.push(sendMessage);
    }
    return tools;
  }

  private async handleFrameError(
    error: unknown,
    frame: CallFrame,
    runtime: DispatchRuntime,
  ): Promise<DispatchResult> {
    if (error instanceof RunCancelledError) {
      await this.appendFromAgent(runtime, frame, {
        role: "assistant",
        kind: "cancellation",
        content: error.message,
        data: { reason: error.reason },
      });
      throw error;
    }

    if (!(error instanceof SwitchboardError)) {
      throw error;
    }

    const failure = error.toFailure(frame.calleeId);
    runtime.logger.warn(
      { agent: frame.calleeId, caller: frame.callerId, type: failure.type, err: failure.message },
      "Agent call failed"
    );
    await this.appendFromAgent(runtime, frame, {
      role: "assistant",
      kind: "error",
      content: `${failure.type}: ${failure.message}`,
      data: { type: failure.type },
    });
    await runtime.emit({
      ...frameEventBase(runtime, frame),
      type: "error",
      errorType: failure.type,
      content: failure.message,
    });
    return { status: "failure", agentId: frame.calleeId, error: failure };
  }

  private async appendFromAgent(
    runtime: DispatchRuntime,
    frame: CallFrame,
    draft: Omit<ThreadMessageDraft, "sender" | "recipient">,
  ): Promise<void> {
    await runtime.threads.appendMessage(frame.threadKey, {
      ...draft,
      sender: frame.calleeId,
      recipient: frame.callerId,
    });
  }
}
