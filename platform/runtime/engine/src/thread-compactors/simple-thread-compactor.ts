import type { ThreadCompactorConfig, ThreadMessage } from "@switchboard/types";
import type { Thread } from "../threads/thread";
import type {
  ThreadCompactionContext,
  ThreadCompactionPlan,
  ThreadCompactor,
  ThreadCompactorFactory,
} from "./types";
import { registerThreadCompactor } from "./registry";

/**
 * Drops the oldest messages so a thread holds at most `maxMessages`, never
 * keeping fewer than `keepLast`. A retained history never holds a tool
 * result whose call was dropped.
 */
export class SimpleThreadCompactor implements ThreadCompactor {
  constructor(
    private readonly maxMessages = 200,
    private readonly keepLast = 50,
  ) {}

  plan(thread: Thread, context: ThreadCompactionContext): ThreadCompactionPlan | null {
    const total = thread.messages.length;
    if (total <= this.maxMessages) {
      return null;
    }

    const targetKeep = Math.min(this.maxMessages, Math.max(this.keepLast, 1));
    const removableCount = total - targetKeep;

    return {
      reason: `truncate ${removableCount} oldest messages (limit ${this.maxMessages}; iteration ${context.iteration})`,
      retain: (messages) => this.retain(messages, targetKeep),
    };
  }

  private retain(
    messages: readonly ThreadMessage[],
    targetKeep: number,
  ): ThreadMessage[] {
    let start = Math.max(0, messages.length - targetKeep);
    while (start < messages.length - 1 && messages[start]?.kind === "tool_result") {
      start += 1;
    }
    const retained = messages.slice(start);
    const callIds = new Set(
      retained
        .filter((message) => message.kind === "tool_call")
        .map((message) => message.toolCallId),
    );
    return retained.filter(
      (message) =>
        message.kind !== "tool_result" ||
        (message.toolCallId !== undefined && callIds.has(message.toolCallId)),
    );
  }
}

const factory: ThreadCompactorFactory<ThreadCompactorConfig> = {
  strategy: "simple",
  create: (config) =>
    new SimpleThreadCompactor(config.maxMessages, config.keepLast),
};

registerThreadCompactor(factory, { builtin: true });

export const SimpleThreadCompactorStrategy = factory.strategy;
