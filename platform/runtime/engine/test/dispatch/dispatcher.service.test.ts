import { describe, expect, it, vi } from "vitest";
import type {
  AgentDefinition,
  CompletionAdapter,
  ToolDefinition,
} from "@switchboard/types";
import { RunCancelledError } from "../../src/errors";
import type { DispatchRequest } from "../../src/dispatch/dispatch.types";
import { ThreadManager } from "../../src/threads/thread-manager";
import {
  createDispatcher,
  createTestRuntime,
  type TestRuntimeInit,
} from "../__fixtures__/agency-fixture";
import {
  ScriptedCompletion,
  callTools,
  final,
  sendMessage,
  toolCall,
} from "../__fixtures__/scripted-completion";

const fromUser = (recipientId: string, message = "hi"): DispatchRequest => ({
  callerId: "user",
  recipientId,
  message,
  conversationId: "main",
});

const setup = (init: TestRuntimeInit) => ({
  dispatcher: createDispatcher(),
  ...createTestRuntime(init),
});

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

describe("DispatcherService", () => {
  it("answers a user message with the entry agent's final response", async () => {
    const ceo = new ScriptedCompletion([final("hello")]);
    const { dispatcher, runtime, events } = setup({
      agents: [{ id: "CEO", instructions: "Lead the team.", completion: ceo }],
      flows: [],
      entryPoints: ["CEO"],
      sharedInstructions: "Be brief.",
    });

    const result = await dispatcher.dispatch(fromUser("CEO"), runtime);

    expect(result).toEqual({ status: "success", agentId: "CEO", content: "hello" });
    const thread = runtime.threads.getThread("user", "CEO");
    expect(thread?.messages.map(({ role, sender, content }) => ({ role, sender, content }))).toEqual([
      { role: "user", sender: "user", content: "hi" },
      { role: "assistant", sender: "CEO", content: "hello" },
    ]);
    expect(ceo.requests[0]?.instructions).toBe("Be brief.\n\nLead the team.");
    expect(ceo.requests[0]?.tools).toEqual([]);
    expect(ceo.requests[0]?.callerId).toBe("user");
    expect(events.map((event) => event.type)).toEqual(["agent_start", "message"]);
    expect(runtime.context.callStack.depth).toBe(0);
  });

  it("rejects callers outside the graph without touching threads", async () => {
    const { dispatcher, runtime } = setup({
      agents: [
        { id: "CEO", completion: new ScriptedCompletion([]) },
        { id: "Dev", completion: new ScriptedCompletion([]) },
      ],
      flows: [{ from: "CEO", to: "Dev" }],
      entryPoints: ["CEO"],
    });

    const notEntry = await dispatcher.dispatch(fromUser("Dev"), runtime);
    const reversed = await dispatcher.dispatch(
      { callerId: "Dev", recipientId: "CEO", message: "help", conversationId: "main" },
      runtime,
    );
    const unknown = await dispatcher.dispatch(fromUser("Ops"), runtime);

    expect(notEntry).toMatchObject({
      status: "failure",
      agentId: "Dev",
      error: { type: "PermissionError", message: '"Dev" is not an entry point of the agency.' },
    });
    expect(reversed).toMatchObject({
      status: "failure",
      agentId: "CEO",
      error: { type: "PermissionError", message: 'Agent "Dev" is not allowed to message "CEO".' },
    });
    expect(unknown).toMatchObject({
      status: "failure",
      agentId: "Ops",
      error: { type: "PermissionError", message: 'Unknown recipient "Ops".' },
    });
    expect(runtime.threads.listThreads()).toEqual([]);
  });

  it("delegates through send_message and keeps each pair in its own thread", async () => {
    const ceo = new ScriptedCompletion([
      sendMessage("call-1", "Dev", "ping"),
      final("Dev said pong"),
    ]);
    const dev = new ScriptedCompletion([final("pong")]);
    const { dispatcher, runtime, events } = setup({
      agents: [
        { id: "CEO", completion: ceo },
        { id: "Dev", description: "Writes code", completion: dev },
      ],
      flows: [{ from: "CEO", to: "Dev" }],
      entryPoints: ["CEO"],
    });

    const result = await dispatcher.dispatch(fromUser("CEO"), runtime);

    expect(result).toEqual({ status: "success", agentId: "CEO", content: "Dev said pong" });

    const pair = runtime.threads.getThread("CEO", "Dev");
    expect(pair?.initiator).toBe("CEO");
    expect(pair?.messages.map(({ sender, recipient, content }) => ({ sender, recipient, content }))).toEqual([
      { sender: "CEO", recipient: "Dev", content: "ping" },
      { sender: "Dev", recipient: "CEO", content: "pong" },
    ]);

    const entry = runtime.threads.getThread("user", "CEO");
    expect(entry?.messages.map((message) => message.kind)).toEqual([
      "message",
      "tool_call",
      "tool_result",
      "message",
    ]);
    expect(entry?.messages[1]).toMatchObject({
      toolCallId: "call-1",
      toolName: "send_message",
      content: '{"recipientAgentId":"Dev","message":"ping"}',
    });
    expect(entry?.messages[2]).toMatchObject({ role: "tool", content: "pong" });

    expect(ceo.requests[0]?.tools.map((tool) => tool.name)).toEqual(["send_message"]);
    expect(dev.requests[0]?.tools).toEqual([]);
    expect(dev.requests[0]?.messages.map((message) => message.content)).toEqual(["ping"]);
    expect(ceo.requests[1]?.messages).toHaveLength(3);

    expect(
      events.map(({ type, actingAgentId, depth }) => `${type}:${actingAgentId}:${depth}`),
    ).toEqual([
      "agent_start:CEO:1",
      "tool_call:CEO:1",
      "agent_start:Dev:2",
      "message:Dev:2",
      "tool_result:CEO:1",
      "message:CEO:1",
    ]);
    expect(events[2]).toMatchObject({ callingAgentId: "CEO", callCorrelationId: "call-1" });
  });

  it("passes per-call instructions, attachments and case-insensitive recipients", async () => {
    const dev = new ScriptedCompletion([final("done")]);
    const { dispatcher, runtime } = setup({
      agents: [
        {
          id: "CEO",
          completion: new ScriptedCompletion([
            sendMessage("call-1", "dev", "build it", {
              additionalInstructions: "Use TypeScript.",
              attachments: ["spec.md"],
            }),
            final("ok"),
          ]),
        },
        { id: "Dev", instructions: "You write code.", completion: dev },
      ],
      flows: [{ from: "CEO", to: "Dev" }],
      entryPoints: ["CEO"],
      sharedInstructions: "Be brief.",
    });

    await dispatcher.dispatch(fromUser("CEO"), runtime);

    expect(dev.requests[0]?.instructions).toBe(
      "Be brief.\n\nYou write code.\n\nUse TypeScript.",
    );
    expect(runtime.threads.getThread("CEO", "Dev")?.messages[0]?.attachments).toEqual([
      "spec.md",
    ]);
  });

  it("answers invalid send_message arguments with an error tool result", async () => {
    const { dispatcher, runtime } = setup({
      agents: [
        {
          id: "CEO",
          completion: new ScriptedCompletion([
            callTools(toolCall("call-1", "send_message", { recipientAgentId: "Dev" })),
            final("ok"),
          ]),
        },
        { id: "Dev", completion: new ScriptedCompletion([]) },
      ],
      flows: [{ from: "CEO", to: "Dev" }],
      entryPoints: ["CEO"],
    });

    await dispatcher.dispatch(fromUser("CEO"), runtime);

    expect(runtime.threads.getThread("user", "CEO")?.messages[2]).toMatchObject({
      kind: "tool_result",
      content: "Invalid send_message arguments: message must be a string",
    });
    expect(runtime.threads.getThread("CEO", "Dev")).toBeUndefined();
  });

  it("returns a permission failure to an agent messaging against the flow", async () => {
    const { dispatcher, runtime, events } = setup({
      agents: [
        {
          id: "CEO",
          completion: new ScriptedCompletion([
            sendMessage("call-1", "Dev", "task"),
            final("finished"),
          ]),
        },
        {
          id: "Dev",
          completion: new ScriptedCompletion([
            sendMessage("call-2", "CEO", "I need help"),
            final("done"),
          ]),
        },
      ],
      flows: [{ from: "CEO", to: "Dev" }],
      entryPoints: ["CEO"],
    });

    const result = await dispatcher.dispatch(fromUser("CEO"), runtime);

    expect(result).toMatchObject({ status: "success", content: "finished" });
    const devThread = runtime.threads.getThread("CEO", "Dev");
    expect(devThread?.messages[2]).toMatchObject({
      kind: "tool_result",
      sender: "Dev",
      content: 'PermissionError: Agent "Dev" is not allowed to message "CEO".',
      data: {
        error: {
          type: "PermissionError",
          message: 'Agent "Dev" is not allowed to message "CEO".',
          agentId: "CEO",
          details: { senderId: "Dev", recipientId: "CEO" },
        },
      },
    });
    expect(runtime.threads.listThreads()).toHaveLength(2);
    expect(events.find((event) => event.type === "tool_result" && event.isError)).toMatchObject({
      actingAgentId: "Dev",
      toolCallId: "call-2",
    });
  });

  it("retries failed completions and records each failure", async () => {
    const ceo = new ScriptedCompletion([
      new Error("rate limited"),
      new Error("rate limited"),
      final("ok"),
    ]);
    const { dispatcher, runtime, events } = setup({
      agents: [{ id: "CEO", completion: ceo }],
      flows: [],
      entryPoints: ["CEO"],
    });

    const result = await dispatcher.dispatch(fromUser("CEO"), runtime);

    expect(result).toEqual({ status: "success", agentId: "CEO", content: "ok" });
    const messages = runtime.threads.getThread("user", "CEO")?.messages ?? [];
    expect(messages.filter((message) => message.kind === "error").map((message) => message.content)).toEqual([
      "Completion attempt 1 of 3 failed: rate limited",
      "Completion attempt 2 of 3 failed: rate limited",
    ]);
    expect(ceo.requests.map((request) => request.attempt)).toEqual([1, 2, 3]);
    expect(events.filter((event) => event.type === "error")).toHaveLength(2);
  });

  it("fails the frame once retries are exhausted", async () => {
    const { dispatcher, runtime } = setup({
      agents: [
        {
          id: "CEO",
          completion: new ScriptedCompletion([new Error("first"), new Error("second")]),
        },
      ],
      flows: [],
      entryPoints: ["CEO"],
      runtime: { completionRetries: 1 },
    });

    const result = await dispatcher.dispatch(fromUser("CEO"), runtime);

    expect(result).toEqual({
      status: "failure",
      agentId: "CEO",
      error: {
        type: "CompletionFailure",
        message: "Completion failed after 2 attempts: second",
        agentId: "CEO",
        details: { attempts: 2 },
      },
    });
    expect(runtime.threads.getThread("user", "CEO")?.messages.at(-1)).toMatchObject({
      kind: "error",
      content: "CompletionFailure: Completion failed after 2 attempts: second",
    });
    expect(runtime.context.callStack.depth).toBe(0);
  });

  it("treats malformed completion output as a failed attempt", async () => {
    const completion: CompletionAdapter = {
      complete: vi
        .fn()
        .mockResolvedValueOnce({ type: "final" })
        .mockResolvedValueOnce({ type: "final", content: "ok" }),
    };
    const { dispatcher, runtime } = setup({
      agents: [{ id: "CEO", completion }],
      flows: [],
      entryPoints: ["CEO"],
    });

    const result = await dispatcher.dispatch(fromUser("CEO"), runtime);

    expect(result).toMatchObject({ status: "success", content: "ok" });
    const error = runtime.threads.getThread("user", "CEO")?.messages[1];
    expect(error?.kind).toBe("error");
    expect(error?.content).toContain(
      'Completion attempt 1 of 3 failed: Malformed completion response from "CEO": content:',
    );
  });

  it("stops agents that never produce a final response", async () => {
    const lookup: ToolDefinition = {
      name: "lookup",
      jsonSchema: { type: "object" },
      handler: async () => "nothing",
    };
    const { dispatcher, runtime } = setup({
      agents: [
        {
          id: "CEO",
          tools: [lookup],
          completion: new ScriptedCompletion([
            callTools(toolCall("t1", "lookup")),
            callTools(toolCall("t2", "lookup")),
          ]),
        },
      ],
      flows: [],
      entryPoints: ["CEO"],
      runtime: { maxStepsPerCall: 2 },
    });

    const result = await dispatcher.dispatch(fromUser("CEO"), runtime);

    expect(result).toMatchObject({
      status: "failure",
      error: {
        type: "CompletionFailure",
        message: '"CEO" did not produce a final response within 2 steps.',
      },
    });
  });

  describe("tool execution", () => {
    const agentWithTools = (
      tools: ToolDefinition[],
      ...calls: Parameters<typeof callTools>
    ): AgentDefinition => ({
      id: "CEO",
      tools,
      completion: new ScriptedCompletion([callTools(...calls), final("done")]),
    });

    const trackConcurrency = () => {
      let active = 0;
      let peak = 0;
      const handler = (name: string) => async () => {
        active += 1;
        peak = Math.max(peak, active);
        await tick();
        active -= 1;
        return `${name}-result`;
      };
      return { handler, peak: () => peak };
    };

    it("runs parallel-safe batches concurrently and records results in order", async () => {
      const tracker = trackConcurrency();
      const tools: ToolDefinition[] = ["a", "b"].map((name) => ({
        name,
        jsonSchema: { type: "object" },
        parallel: true,
        handler: tracker.handler(name),
      }));
      const { dispatcher, runtime } = setup({
        agents: [agentWithTools(tools, toolCall("c1", "a"), toolCall("c2", "b"))],
        flows: [],
        entryPoints: ["CEO"],
      });

      await dispatcher.dispatch(fromUser("CEO"), runtime);

      expect(tracker.peak()).toBe(2);
      const messages = runtime.threads.getThread("user", "CEO")?.messages ?? [];
      expect(messages.map((message) => `${message.kind}:${message.toolCallId ?? ""}`)).toEqual([
        "message:",
        "tool_call:c1",
        "tool_call:c2",
        "tool_result:c1",
        "tool_result:c2",
        "message:",
      ]);
      expect(messages[3]?.content).toBe("a-result");
    });

    it("runs batches sequentially unless every tool is parallel-safe", async () => {
      const tracker = trackConcurrency();
      const tools: ToolDefinition[] = [
        { name: "a", jsonSchema: { type: "object" }, parallel: true, handler: tracker.handler("a") },
        { name: "b", jsonSchema: { type: "object" }, handler: tracker.handler("b") },
      ];
      const { dispatcher, runtime } = setup({
        agents: [agentWithTools(tools, toolCall("c1", "a"), toolCall("c2", "b"))],
        flows: [],
        entryPoints: ["CEO"],
      });

      await dispatcher.dispatch(fromUser("CEO"), runtime);

      expect(tracker.peak()).toBe(1);
    });

    it("turns handler errors and unknown tools into error results", async () => {
      const failing: ToolDefinition = {
        name: "deploy",
        jsonSchema: { type: "object" },
        handler: async () => {
          throw new Error("disk full");
        },
      };
      const { dispatcher, runtime, events } = setup({
        agents: [agentWithTools([failing], toolCall("c1", "deploy"), toolCall("c2", "nope"))],
        flows: [],
        entryPoints: ["CEO"],
      });

      const result = await dispatcher.dispatch(fromUser("CEO"), runtime);

      expect(result).toMatchObject({ status: "success", content: "done" });
      const results = events.filter((event) => event.type === "tool_result");
      expect(results).toEqual([
        expect.objectContaining({ toolCallId: "c1", content: "Tool execution failed: disk full", isError: true }),
        expect.objectContaining({ toolCallId: "c2", content: 'Unknown tool "nope".', isError: true }),
      ]);
    });

    it("hands tools the run context and keeps structured results", async () => {
      const remember: ToolDefinition = {
        name: "remember",
        jsonSchema: { type: "object" },
        handler: async (args, ctx) => {
          ctx.context.set("note", `${ctx.agentId}:${ctx.callerId}:${ctx.toolCallId}`);
          return { content: "stored", data: { key: "note", value: String(args.value) } };
        },
      };
      const { dispatcher, runtime } = setup({
        agents: [agentWithTools([remember], toolCall("c1", "remember", { value: 42 }))],
        flows: [],
        entryPoints: ["CEO"],
      });

      await dispatcher.dispatch(fromUser("CEO"), runtime);

      expect(runtime.context.get("note")).toBe("CEO:user:c1");
      expect(runtime.threads.getThread("user", "CEO")?.messages[2]).toMatchObject({
        content: "stored",
        data: { key: "note", value: "42" },
      });
    });
  });

  it("forwards streamed deltas as events", async () => {
    const { dispatcher, runtime, events } = setup({
      agents: [
        {
          id: "CEO",
          completion: new ScriptedCompletion([
            async (request) => {
              await request.emitDelta("hel");
              await request.emitDelta("lo");
              return final("hello");
            },
          ]),
        },
      ],
      flows: [],
      entryPoints: ["CEO"],
    });

    await dispatcher.dispatch(fromUser("CEO"), runtime);

    expect(
      events.flatMap((event) => (event.type === "delta" ? [event.content] : [])),
    ).toEqual(["hel", "lo"]);
  });

  it("offers the compactor every step", async () => {
    const plan = vi.fn(() => null);
    const { dispatcher, runtime } = setup({
      agents: [{ id: "CEO", completion: new ScriptedCompletion([final("ok")]) }],
      flows: [],
      entryPoints: ["CEO"],
      compactor: { plan },
    });

    await dispatcher.dispatch(fromUser("CEO"), runtime);

    expect(plan).toHaveBeenCalledTimes(1);
    expect(plan).toHaveBeenCalledWith(
      runtime.threads.getThread("user", "CEO"),
      { agentId: "CEO", iteration: 1 },
    );
  });

  it("rejects an empty conversation id before pushing a frame", async () => {
    const ceo = new ScriptedCompletion([final("unused")]);
    const { dispatcher, runtime } = setup({
      agents: [{ id: "CEO", completion: ceo }],
      flows: [],
      entryPoints: ["CEO"],
    });

    const result = await dispatcher.dispatch({ ...fromUser("CEO"), conversationId: "" }, runtime);

    expect(result).toEqual({
      status: "failure",
      agentId: "CEO",
      error: {
        type: "InvalidRequestError",
        message: "A conversation id must not be empty.",
        agentId: "CEO",
        details: { field: "conversationId" },
      },
    });
    expect(runtime.context.callStack.depth).toBe(0);
    expect(runtime.threads.listThreads()).toEqual([]);
    expect(ceo.requests).toHaveLength(0);
  });

  it("pops the frame when the thread cannot be opened", async () => {
    const threads = new ThreadManager();
    vi.spyOn(threads, "getOrCreateThread").mockImplementation(() => {
      throw new Error("thread store unavailable");
    });
    const { dispatcher, runtime } = setup({
      agents: [{ id: "CEO", completion: new ScriptedCompletion([final("unused")]) }],
      flows: [],
      entryPoints: ["CEO"],
      threads,
    });

    await expect(dispatcher.dispatch(fromUser("CEO"), runtime)).rejects.toThrow(
      "thread store unavailable",
    );
    expect(runtime.context.callStack.depth).toBe(0);
  });

  it("unwinds every frame with a cancellation message when the run aborts", async () => {
    const controller = new AbortController();
    const threads = new ThreadManager();
    const appendSpy = vi.spyOn(threads, "appendMessage");
    const { dispatcher, runtime } = setup({
      agents: [
        {
          id: "CEO",
          completion: new ScriptedCompletion([sendMessage("call-1", "Dev", "work")]),
        },
        {
          id: "Dev",
          completion: new ScriptedCompletion([
            () => {
              controller.abort(new RunCancelledError("aborted"));
              return new Promise<never>(() => undefined);
            },
          ]),
        },
      ],
      flows: [{ from: "CEO", to: "Dev" }],
      entryPoints: ["CEO"],
      signal: controller.signal,
      threads,
    });

    await expect(dispatcher.dispatch(fromUser("CEO"), runtime)).rejects.toBeInstanceOf(
      RunCancelledError,
    );

    const cancellations = appendSpy.mock.calls
      .filter(([, draft]) => draft.kind === "cancellation")
      .map(([key]) => key);
    expect(cancellations).toEqual(["main/CEO~Dev", "main/user~CEO"]);
    expect(runtime.context.callStack.depth).toBe(0);
  });
});
