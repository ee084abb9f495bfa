import { randomUUID } from "crypto";
import { Observable, Subject, filter } from "rxjs";
import {
  DEFAULT_CONVERSATION_ID,
  USER_SENDER,
  type AgencyResponse,
  type AgencyStreamEvent,
  type AgentDefinition,
  type CommunicationFlow,
  type DispatchResult,
  type JsonObject,
  type RunContextSnapshot,
  type RuntimeConfig,
  type ThreadMessage,
  type ThreadPersistenceHooks,
} from "@switchboard/types";
import type { Logger } from "@switchboard/io";
import { AgentRegistry } from "../agents/agent-registry";
import { RunContext } from "../context/run-context";
import { CallStack } from "../dispatch/call-stack";
import type { DispatchRuntime } from "../dispatch/dispatch.types";
import type { DispatcherService } from "../dispatch/dispatcher.service";
import {
  InvalidRequestError,
  PermissionError,
  PersistenceError,
  RunCancelledError,
  serializeError,
} from "../errors";
import { CommunicationGraph } from "../graph/communication-graph";
import type { ThreadCompactor } from "../thread-compactors/types";
import { ThreadManager } from "../threads/thread-manager";
import { parsePersistedState } from "../threads/thread-snapshot.schema";
import { type AgencyStructure, describeAgencyStructure } from "./agency-structure";
import { AsyncEventQueue } from "./event-queue";
import type { RunTraceWriter } from "./trace-writer";

export interface AgencyOptions {
  name?: string;
  agents: AgentDefinition[];
  flows: CommunicationFlow[];
  entryPoints: string[];
  sharedInstructions?: string;
  userContext?: JsonObject;
  runtime: RuntimeConfig;
  defaultConversationId?: string;
  compactor?: ThreadCompactor;
  persistence?: ThreadPersistenceHooks;
  clock?: () => Date;
}

export interface AgencyDependencies {
  dispatcher: DispatcherService;
  logger: Logger;
  traceWriter?: RunTraceWriter;
}

export interface AgencyRequestOptions {
  /** Entry point to address; optional when the agency has exactly one. */
  recipientAgentId?: string;
  conversationId?: string;
  /** Values layered over the agency's user context for this run only. */
  context?: RunContextSnapshot;
  timeoutMs?: number;
  signal?: AbortSignal;
  runId?: string;
}

interface RunOutcome {
  error?: unknown;
}

/**
 * Public surface of a set of collaborating agents. Each request starts a run
 * with its own context and call stack; threads are shared across runs.
 */
export class Agency {
  readonly name?: string;
  readonly agents: AgentRegistry;
  readonly graph: CommunicationGraph;
  readonly threads: ThreadManager;
  readonly events$: Observable<AgencyStreamEvent>;

  private readonly events = new Subject<AgencyStreamEvent>();
  private readonly defaultConversationId: string;
  private activeRuns = 0;
  private loading: Promise<void> | null = null;
  private resumedContext: RunContextSnapshot = {};

  constructor(
    private readonly options: AgencyOptions,
    private readonly deps: AgencyDependencies,
  ) {
    this.name = options.name;
    this.agents = new AgentRegistry(options.agents);
    this.graph = new CommunicationGraph(
      this.agents.ids(),
      options.flows,
      options.entryPoints,
    );
    this.defaultConversationId =
      options.defaultConversationId ?? DEFAULT_CONVERSATION_ID;
    this.threads = new ThreadManager({
      defaultConversationId: this.defaultConversationId,
      clock: options.clock,
    });
    this.events$ = this.events.asObservable();
  }

  async getResponse(
    message: string,
    options: AgencyRequestOptions = {},
  ): Promise<AgencyResponse> {
    return this.execute(options.runId ?? randomUUID(), message, options);
  }

  /**
   * Streams the events of one run. The run starts on the first pull and the
   * stream ends after its `run_complete` event; it cannot be iterated twice.
   */
  getResponseStream(
    message: string,
    options: AgencyRequestOptions = {},
  ): AsyncIterable<AgencyStreamEvent> {
    let started = false;
    return {
      [Symbol.asyncIterator]: () => {
        if (started) {
          throw new Error("Response streams cannot be restarted.");
        }
        started = true;
        return this.stream(message, options);
      },
    };
  }

  getAgencyStructure(): AgencyStructure {
    return describeAgencyStructure(this.graph, this.agents, this.name);
  }

  /** History of the thread `initiator` opened towards `recipient`. */
  getThreadMessages(
    initiator: string,
    recipient: string,
    conversationId: string = this.defaultConversationId,
  ): ThreadMessage[] {
    const thread = this.threads.getThread(initiator, recipient, conversationId);
    return thread ? structuredClone([...thread.messages]) : [];
  }

  clearThreads(): void {
    if (this.activeRuns > 0) {
      throw new Error("Threads cannot be cleared while a run is in progress.");
    }
    this.threads.clear();
  }

  private async *stream(
    message: string,
    options: AgencyRequestOptions,
  ): AsyncGenerator<AgencyStreamEvent> {
    const runId = options.runId ?? randomUUID();
    const queue = new AsyncEventQueue<AgencyStreamEvent>();
    const subscription = this.events$
      .pipe(filter((event) => event.runId === runId))
      .subscribe((event) => queue.push(event));

    const controller = new AbortController();
    const onAbort = () => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener("abort", onAbort, { once: true });
    }

    let settled = false;
    const outcome = this.execute(runId, message, {
      ...options,
      signal: controller.signal,
    }).then(
      (): RunOutcome => ({}),
      (error: unknown): RunOutcome => ({ error }),
    );
    const finished = outcome.then((result) => {
      settled = true;
      queue.close();
      return result;
    });

    try {
      for await (const event of queue) {
        yield event;
      }
      const result = await finished;
      if (result.error !== undefined) {
        throw result.error;
      }
    } finally {
      subscription.unsubscribe();
      options.signal?.removeEventListener("abort", onAbort);
      if (!settled) {
        controller.abort();
      }
      await finished;
    }
  }

  private async execute(
    runId: string,
    message: string,
    options: AgencyRequestOptions,
  ): Promise<AgencyResponse> {
    const logger = this.deps.logger.child({ runId });
    const emit = (event: AgencyStreamEvent) => this.publish(event, logger);

    const recipientId = this.resolveEntryPoint(options.recipientAgentId);
    if (recipientId === undefined) {
      const error = new PermissionError(
        USER_SENDER,
        "",
        `A recipient is required: the agency has ${this.graph.listEntryPoints().length} entry points.`,
      );
      return this.reject(runId, { status: "failure", agentId: "", error: error.toFailure() }, emit);
    }

    const conversationId = options.conversationId ?? this.defaultConversationId;
    if (conversationId.trim() === "") {
      const error = new InvalidRequestError("A conversation id must not be empty.", {
        details: { field: "conversationId" },
      });
      logger.warn({ recipient: recipientId }, "Rejected request without a conversation id");
      return this.reject(
        runId,
        { status: "failure", agentId: recipientId, error: error.toFailure(recipientId) },
        emit,
      );
    }

    this.activeRuns += 1;
    try {
      if (this.activeRuns === 1) {
        this.loading = this.load(logger);
      }
      await this.loading;

      const { runtime } = this.options;
      const controller = new AbortController();
      const timeoutMs = options.timeoutMs ?? runtime.runTimeoutMs;
      const timer =
        timeoutMs === undefined
          ? undefined
          : setTimeout(
              () =>
                controller.abort(
                  new RunCancelledError("timeout", `Run timed out after ${timeoutMs}ms.`),
                ),
              timeoutMs,
            );
      const onAbort = () => controller.abort(new RunCancelledError("aborted"));
      if (options.signal?.aborted) {
        onAbort();
      } else {
        options.signal?.addEventListener("abort", onAbort, { once: true });
      }

      const context = new RunContext({
        runId,
        agents: this.agents,
        threads: this.threads,
        callStack: new CallStack(runtime.maxCallDepth),
        signal: controller.signal,
        initial: {
          ...this.options.userContext,
          ...this.resumedContext,
          ...options.context,
        },
      });
      const dispatchRuntime: DispatchRuntime = {
        runId,
        graph: this.graph,
        agents: this.agents,
        threads: this.threads,
        context,
        limits: {
          maxStepsPerCall: runtime.maxStepsPerCall,
          completionRetries: runtime.completionRetries,
        },
        sharedInstructions: this.options.sharedInstructions,
        compactor: this.options.compactor,
        logger,
        emit,
      };

      logger.debug({ recipient: recipientId }, "Run started");
      let result: DispatchResult;
      try {
        result = await this.deps.dispatcher.dispatch(
          {
            callerId: USER_SENDER,
            recipientId,
            message,
            conversationId,
          },
          dispatchRuntime,
        );
      } catch (error) {
        if (!(error instanceof RunCancelledError)) {
          logger.error({ err: serializeError(error) }, "Run failed unexpectedly");
          await this.save(context, logger);
          throw error;
        }
        logger.warn({ reason: error.reason }, "Run cancelled");
        result = {
          status: "failure",
          agentId: recipientId,
          error: error.toFailure(recipientId),
        };
      } finally {
        if (timer) {
          clearTimeout(timer);
        }
        options.signal?.removeEventListener("abort", onAbort);
      }

      await this.save(context, logger);
      await this.complete(runId, result, emit);
      return { ...result, runId };
    } finally {
      this.activeRuns -= 1;
    }
  }

  private async reject(
    runId: string,
    result: DispatchResult,
    emit: (event: AgencyStreamEvent) => Promise<void>,
  ): Promise<AgencyResponse> {
    await this.complete(runId, result, emit);
    return { ...result, runId };
  }

  private resolveEntryPoint(requested?: string): string | undefined {
    if (requested !== undefined) {
      return this.agents.resolve(requested)?.id ?? requested;
    }
    const entryPoints = this.graph.listEntryPoints();
    return entryPoints.length === 1 ? entryPoints[0] : undefined;
  }

  private async complete(
    runId: string,
    result: DispatchResult,
    emit: (event: AgencyStreamEvent) => Promise<void>,
  ): Promise<void> {
    await emit({
      type: "run_complete",
      runId,
      actingAgentId: result.agentId,
      callingAgentId: USER_SENDER,
      depth: 0,
      timestamp: new Date().toISOString(),
      status: result.status,
      content:
        result.status === "success"
          ? result.content
          : `${result.error.type}: ${result.error.message}`,
    });
  }

  private async load(logger: Logger): Promise<void> {
    const hook = this.options.persistence?.load;
    if (!hook) {
      return;
    }

    try {
      const raw = await hook();
      if (raw === undefined) {
        this.resumedContext = {};
        return;
      }
      const state = parsePersistedState(raw);
      this.threads.restore(state.threads);
      this.resumedContext = state.context ?? {};
      logger.debug(
        { threads: Object.keys(state.threads).length },
        "Restored agency state"
      );
    } catch (error) {
      this.resumedContext = {};
      const failure = new PersistenceError("load", error);
      logger.error({ err: failure.message }, "Failed to load agency state");
    }
  }

  private async save(context: RunContext, logger: Logger): Promise<void> {
    const hook = this.options.persistence?.save;
    if (!hook) {
      return;
    }

    try {
      await hook(this.threads.snapshot(), context.snapshot());
    } catch (error) {
      const failure = new PersistenceError("save", error);
      logger.error({ err: failure.message }, "Failed to save agency state");
    }
  }

  private async publish(event: AgencyStreamEvent, logger: Logger): Promise<void> {
    this.events.next(event);
    const { traceWriter } = this.deps;
    if (!traceWriter) {
      return;
    }
    try {
      await traceWriter.write(event);
    } catch (error) {
      logger.warn(
        { err: serializeError(error).message, file: traceWriter.filePath },
        "Failed to write trace event"
      );
    }
  }
}
