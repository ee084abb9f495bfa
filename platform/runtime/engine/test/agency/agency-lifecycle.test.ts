import { describe, expect, it, vi } from "vitest";
import type { LoggerEvent } from "@switchboard/io";
import type {
  AgencyStreamEvent,
  CompletionAdapter,
  LoadThreadsHook,
  PersistedAgencyState,
  SaveThreadsHook,
} from "@switchboard/types";
import {
  createSilentLoggerService,
  createTestAgency,
} from "../__fixtures__/agency-fixture";
import {
  ScriptedCompletion,
  final,
  hangingCompletion,
  sendMessage,
} from "../__fixtures__/scripted-completion";

const captureLogs = () => {
  const loggerService = createSilentLoggerService();
  const logged: LoggerEvent[] = [];
  loggerService.registerListener((event) => logged.push(event));
  return { loggerService, logged };
};

const errorsOf = (logged: LoggerEvent[]) =>
  logged.filter((event) => event.level === "error");

describe("Agency streaming", () => {
  it("streams one run lazily and ends with run_complete", async () => {
    const ceo = new ScriptedCompletion([final("hello")]);
    const agency = createTestAgency({
      agents: [{ id: "CEO", completion: ceo }],
      flows: [],
      entryPoints: ["CEO"],
    });

    const stream = agency.getResponseStream("hi", { runId: "stream-1" });
    expect(ceo.requests).toHaveLength(0);

    const events: AgencyStreamEvent[] = [];
    for await (const event of stream) {
      events.push(event);
    }

    expect(events.map((event) => event.type)).toEqual([
      "agent_start",
      "message",
      "run_complete",
    ]);
    expect(events.every((event) => event.runId === "stream-1")).toBe(true);
    expect(events.at(-1)).toMatchObject({
      type: "run_complete",
      status: "success",
      content: "hello",
      actingAgentId: "CEO",
      depth: 0,
    });
    expect(() => stream[Symbol.asyncIterator]()).toThrow(
      "Response streams cannot be restarted.",
    );
  });

  it("cancels the run when the consumer stops early", async () => {
    const save = vi.fn<SaveThreadsHook>();
    const agency = createTestAgency({
      agents: [{ id: "CEO", completion: hangingCompletion() }],
      flows: [],
      entryPoints: ["CEO"],
      persistence: { save },
    });

    for await (const event of agency.getResponseStream("hi")) {
      expect(event.type).toBe("agent_start");
      break;
    }

    expect(save).toHaveBeenCalledTimes(1);
    const threads = save.mock.lastCall?.[0];
    expect(threads?.["main/user~CEO"]?.map((message) => message.kind)).toEqual([
      "message",
      "cancellation",
    ]);
  });

  it("rethrows defects after streaming what happened", async () => {
    const agency = createTestAgency({
      agents: [{ id: "CEO", completion: new ScriptedCompletion([final("never")]) }],
      flows: [],
      entryPoints: ["CEO"],
      compactor: {
        plan: () => {
          throw new Error("compactor bug");
        },
      },
    });
    const events: AgencyStreamEvent[] = [];

    const consume = (async () => {
      for await (const event of agency.getResponseStream("hi")) {
        events.push(event);
      }
    })();

    await expect(consume).rejects.toThrow("compactor bug");
    expect(events.map((event) => event.type)).toEqual(["agent_start"]);
  });
});

describe("Agency cancellation", () => {
  it("times out a run and unwinds every frame", async () => {
    const save = vi.fn<SaveThreadsHook>();
    const agency = createTestAgency({
      agents: [
        { id: "CEO", completion: new ScriptedCompletion([sendMessage("call-1", "Dev", "work")]) },
        { id: "Dev", completion: hangingCompletion() },
      ],
      flows: [{ from: "CEO", to: "Dev" }],
      entryPoints: ["CEO"],
      runtime: { runTimeoutMs: 20 },
      persistence: { save },
    });

    const response = await agency.getResponse("start");

    expect(response).toMatchObject({
      status: "failure",
      agentId: "CEO",
      error: {
        type: "RunCancelledError",
        message: "Run timed out after 20ms.",
        agentId: "CEO",
        details: { reason: "timeout" },
      },
    });
    expect(agency.getThreadMessages("CEO", "Dev").at(-1)).toMatchObject({
      kind: "cancellation",
      sender: "Dev",
      content: "Run timed out after 20ms.",
    });
    expect(agency.getThreadMessages("user", "CEO").at(-1)).toMatchObject({
      kind: "cancellation",
      sender: "CEO",
    });
    expect(save).toHaveBeenCalledTimes(1);
  });

  it("honours a caller supplied abort signal", async () => {
    const controller = new AbortController();
    controller.abort();
    const agency = createTestAgency({
      agents: [{ id: "CEO", completion: new ScriptedCompletion([final("late")]) }],
      flows: [],
      entryPoints: ["CEO"],
    });

    const response = await agency.getResponse("hi", { signal: controller.signal });

    expect(response).toMatchObject({
      status: "failure",
      error: { type: "RunCancelledError", message: "Run was cancelled." },
    });
  });
});

describe("Agency persistence", () => {
  const counter: CompletionAdapter = {
    complete: async (request) => {
      const count = Number(request.context.get("count", 0)) + 1;
      request.context.set("count", count);
      return final(`visit ${count}`);
    },
  };

  it("resumes threads and context saved by an earlier agency", async () => {
    const store: { saved?: PersistedAgencyState } = {};
    const first = createTestAgency({
      agents: [{ id: "CEO", completion: counter }],
      flows: [],
      entryPoints: ["CEO"],
      persistence: {
        save: (threads, context) => {
          store.saved = { threads, context };
        },
      },
    });
    expect(await first.getResponse("hi")).toMatchObject({ content: "visit 1" });
    expect(store.saved?.context).toEqual({ count: 1 });

    const second = createTestAgency({
      agents: [{ id: "CEO", completion: counter }],
      flows: [],
      entryPoints: ["CEO"],
      persistence: { load: () => store.saved },
    });
    const response = await second.getResponse("again");

    expect(response).toMatchObject({ status: "success", content: "visit 2" });
    expect(
      second.getThreadMessages("user", "CEO").map(({ sequence, content }) => `${sequence}:${content}`),
    ).toEqual(["1:hi", "2:visit 1", "3:again", "4:visit 2"]);
  });

  it("only seeds context from the most recent load", async () => {
    const saved: PersistedAgencyState = { threads: {}, context: { count: 5 } };
    const loads: Array<() => PersistedAgencyState | undefined> = [
      () => saved,
      () => undefined,
      () => saved,
      () => {
        throw new Error("store offline");
      },
    ];
    const agency = createTestAgency({
      agents: [{ id: "CEO", completion: counter }],
      flows: [],
      entryPoints: ["CEO"],
      persistence: { load: () => loads.shift()?.() },
    });

    const contents: string[] = [];
    for (const message of ["one", "two", "three", "four"]) {
      const response = await agency.getResponse(message);
      contents.push(response.status === "success" ? response.content : response.error.type);
    }

    expect(contents).toEqual(["visit 6", "visit 1", "visit 6", "visit 1"]);
  });

  it("logs a failing save hook and still answers", async () => {
    const { loggerService, logged } = captureLogs();
    const agency = createTestAgency(
      {
        agents: [{ id: "CEO", completion: new ScriptedCompletion([final("hello")]) }],
        flows: [],
        entryPoints: ["CEO"],
        persistence: {
          save: async () => {
            throw new Error("disk full");
          },
        },
      },
      loggerService,
    );

    const response = await agency.getResponse("hi");

    expect(response).toMatchObject({ status: "success", content: "hello" });
    expect(errorsOf(logged)).toEqual([
      {
        level: "error",
        scope: "engine:agency",
        args: [{ err: "Failed to save agency state: disk full" }, "Failed to save agency state"],
      },
    ]);
  });

  it("logs invalid saved state and starts from empty threads", async () => {
    const { loggerService, logged } = captureLogs();
    const agency = createTestAgency(
      {
        agents: [{ id: "CEO", completion: new ScriptedCompletion([final("hello")]) }],
        flows: [],
        entryPoints: ["CEO"],
        persistence: {
          load: () => ({
            threads: {
              "main/user~CEO": [
                {
                  threadKey: "main/CEO~Dev",
                  sequence: 1,
                  role: "user",
                  kind: "message",
                  sender: "user",
                  recipient: "CEO",
                  content: "stale",
                  timestamp: "2026-01-01T00:00:00.000Z",
                },
              ],
            },
          }),
        },
      },
      loggerService,
    );

    const response = await agency.getResponse("hi");

    expect(response).toMatchObject({ status: "success" });
    expect(agency.getThreadMessages("user", "CEO")).toHaveLength(2);
    expect(errorsOf(logged).map((event) => event.args)).toEqual([
      [
        {
          err: 'Failed to load agency state: Message 0 of thread "main/user~CEO" belongs to "main/CEO~Dev".',
        },
        "Failed to load agency state",
      ],
    ]);
  });

  it("loads once for runs that overlap", async () => {
    const load = vi.fn<LoadThreadsHook>(() => undefined);
    const agency = createTestAgency({
      agents: [{ id: "CEO", completion: { complete: async () => final("ok") } }],
      flows: [],
      entryPoints: ["CEO"],
      persistence: { load },
    });

    await Promise.all([
      agency.getResponse("a", { conversationId: "a" }),
      agency.getResponse("b", { conversationId: "b" }),
    ]);
    expect(load).toHaveBeenCalledTimes(1);

    await agency.getResponse("c");
    expect(load).toHaveBeenCalledTimes(2);
  });

  it("saves and rethrows when a run hits a defect", async () => {
    const { loggerService, logged } = captureLogs();
    const save = vi.fn<SaveThreadsHook>();
    const agency = createTestAgency(
      {
        agents: [{ id: "CEO", completion: new ScriptedCompletion([final("never")]) }],
        flows: [],
        entryPoints: ["CEO"],
        compactor: {
          plan: () => {
            throw new Error("compactor bug");
          },
        },
        persistence: { save },
      },
      loggerService,
    );

    await expect(agency.getResponse("hi")).rejects.toThrow("compactor bug");
    expect(save).toHaveBeenCalledTimes(1);
    expect(errorsOf(logged).map((event) => event.args[1])).toEqual(["Run failed unexpectedly"]);
  });
});
