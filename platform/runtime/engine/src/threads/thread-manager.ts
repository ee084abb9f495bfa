import {
  DEFAULT_CONVERSATION_ID,
  type ThreadMessage,
  type ThreadMessageDraft,
  type ThreadSnapshot,
} from "@switchboard/types";
import type {
  ThreadCompactionContext,
  ThreadCompactionResult,
  ThreadCompactor,
} from "../thread-compactors/types";
import { KeyedMutex } from "./keyed-mutex";
import { type Thread, ThreadState } from "./thread";
import { createThreadKey, parseThreadKey } from "./thread-key";
import { parseThreadSnapshot } from "./thread-snapshot.schema";

export interface ThreadManagerOptions {
  defaultConversationId?: string;
  clock?: () => Date;
}

/**
 * Owns every thread of an agency. Appends and compactions are serialized per
 * thread key; different threads never wait on each other.
 */
export class ThreadManager {
  private readonly threads = new Map<string, ThreadState>();
  private readonly mutex = new KeyedMutex();
  private readonly defaultConversationId: string;
  private readonly clock: () => Date;

  constructor(options: ThreadManagerOptions = {}) {
    this.defaultConversationId =
      options.defaultConversationId ?? DEFAULT_CONVERSATION_ID;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Returns the thread `initiator` opened towards `recipient`, creating it
   * when it does not exist yet.
   */
  getOrCreateThread(
    initiator: string,
    recipient: string,
    conversationId: string = this.defaultConversationId,
  ): Thread {
    const key = createThreadKey(initiator, recipient, conversationId);
    const existing = this.threads.get(key);
    if (existing) {
      return existing;
    }

    const thread = new ThreadState(key);
    this.threads.set(key, thread);
    return thread;
  }

  getThread(
    initiator: string,
    recipient: string,
    conversationId: string = this.defaultConversationId,
  ): Thread | undefined {
    return this.threads.get(createThreadKey(initiator, recipient, conversationId));
  }

  getThreadByKey(key: string): Thread | undefined {
    return this.threads.get(key);
  }

  listThreads(): Thread[] {
    return Array.from(this.threads.values());
  }

  async appendMessage(
    threadKey: string,
    draft: ThreadMessageDraft,
  ): Promise<ThreadMessage> {
    return this.mutex.runExclusive(threadKey, () => {
      const thread = this.requireThread(threadKey);
      if (!thread.includes(draft.sender) || thread.counterpart(draft.sender) !== draft.recipient) {
        throw new Error(
          `Message from "${draft.sender}" to "${draft.recipient}" does not belong to thread "${threadKey}".`,
        );
      }

      const message: ThreadMessage = Object.freeze({
        ...structuredClone(draft),
        threadKey,
        sequence: thread.lastSequence + 1,
        timestamp: this.clock().toISOString(),
      });
      thread.append(message);
      return message;
    });
  }

  async compact(
    threadKey: string,
    compactor: ThreadCompactor,
    context: ThreadCompactionContext,
  ): Promise<ThreadCompactionResult | null> {
    return this.mutex.runExclusive(threadKey, async () => {
      const thread = this.requireThread(threadKey);
      const plan = await compactor.plan(thread, context);
      if (!plan) {
        return null;
      }

      const before = thread.messages;
      const retained = plan.retain(before);
      thread.replace(retained);
      return {
        reason: plan.reason,
        removedMessages: before.length - retained.length,
      };
    });
  }

  snapshot(): ThreadSnapshot {
    const snapshot: ThreadSnapshot = {};
    for (const [key, thread] of this.threads) {
      snapshot[key] = structuredClone([...thread.messages]);
    }
    return snapshot;
  }

  /**
   * Replaces every thread with the snapshot contents. The snapshot is
   * validated first; on failure the current threads are kept.
   */
  restore(raw: unknown): void {
    const snapshot = parseThreadSnapshot(raw);
    const restored = new Map<string, ThreadState>();

    for (const [key, messages] of Object.entries(snapshot)) {
      parseThreadKey(key);
      const ordered = [...messages].sort((a, b) => a.sequence - b.sequence);
      ordered.forEach((message, index) => {
        if (message.threadKey !== key) {
          throw new Error(`Message ${index} of thread "${key}" belongs to "${message.threadKey}".`);
        }
        if (index > 0 && ordered[index - 1]?.sequence === message.sequence) {
          throw new Error(`Thread "${key}" repeats sequence ${message.sequence}.`);
        }
      });

      restored.set(
        key,
        new ThreadState(key, ordered.map((message) => Object.freeze(message))),
      );
    }

    this.threads.clear();
    for (const [key, thread] of restored) {
      this.threads.set(key, thread);
    }
  }

  clear(): void {
    this.threads.clear();
  }

  private requireThread(threadKey: string): ThreadState {
    const thread = this.threads.get(threadKey);
    if (!thread) {
      throw new Error(`Unknown thread "${threadKey}".`);
    }
    return thread;
  }
}
