import type { ThreadCompactorConfig, ThreadMessage } from "@switchboard/types";
import type { Thread } from "../threads/thread";

export interface ThreadCompactionContext {
  /** Agent whose step triggered the compaction. */
  agentId: string;
  iteration: number;
}

export interface ThreadCompactionPlan {
  reason: string;
  /** Returns the messages to keep, in order. */
  retain(messages: readonly ThreadMessage[]): ThreadMessage[];
}

export interface ThreadCompactionResult {
  reason: string;
  removedMessages: number;
}

export interface ThreadCompactor {
  plan(
    thread: Thread,
    context: ThreadCompactionContext,
  ):
    | Promise<ThreadCompactionPlan | null | undefined>
    | ThreadCompactionPlan
    | null
    | undefined;
}

export interface ThreadCompactorFactory<
  Config extends ThreadCompactorConfig = ThreadCompactorConfig,
> {
  strategy: string;
  create(config: Config): ThreadCompactor;
}
