import type {
  JsonValue,
  RunContextSnapshot,
  RunContextStore,
} from "@switchboard/types";
import type { AgentRegistry } from "../agents/agent-registry";
import type { CallStack } from "../dispatch/call-stack";
import type { ThreadManager } from "../threads/thread-manager";

export type ThreadReader = Pick<
  ThreadManager,
  "getThread" | "getThreadByKey" | "listThreads" | "snapshot"
>;

export type AgentReader = Pick<AgentRegistry, "get" | "has" | "ids" | "describe">;

export interface RunContextInit {
  runId: string;
  agents: AgentRegistry;
  threads: ThreadManager;
  callStack: CallStack;
  signal: AbortSignal;
  initial?: RunContextSnapshot;
}

/**
 * State shared by every agent taking part in one top-level run. It is passed
 * by reference down the call tree and never reused across runs.
 */
export class RunContext implements RunContextStore {
  readonly runId: string;
  readonly agents: AgentReader;
  readonly threads: ThreadReader;
  readonly callStack: CallStack;
  readonly signal: AbortSignal;
  private readonly values = new Map<string, JsonValue>();

  constructor(init: RunContextInit) {
    this.runId = init.runId;
    this.agents = init.agents;
    this.threads = init.threads;
    this.callStack = init.callStack;
    this.signal = init.signal;
    if (init.initial) {
      this.restore(init.initial);
    }
  }

  get(key: string): JsonValue | undefined;
  get(key: string, fallback: JsonValue): JsonValue;
  get(key: string, fallback?: JsonValue): JsonValue | undefined {
    return this.values.has(key) ? this.values.get(key) : fallback;
  }

  set(key: string, value: JsonValue): void {
    this.values.set(key, value);
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  delete(key: string): boolean {
    return this.values.delete(key);
  }

  keys(): string[] {
    return Array.from(this.values.keys());
  }

  snapshot(): RunContextSnapshot {
    const snapshot: RunContextSnapshot = {};
    for (const [key, value] of this.values) {
      snapshot[key] = structuredClone(value);
    }
    return snapshot;
  }

  restore(snapshot: RunContextSnapshot): void {
    this.values.clear();
    for (const [key, value] of Object.entries(snapshot)) {
      this.values.set(key, structuredClone(value));
    }
  }
}
