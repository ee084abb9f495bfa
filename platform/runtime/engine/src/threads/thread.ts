import type { ThreadMessage } from "@switchboard/types";
import { parseThreadKey } from "./thread-key";

/**
 * Read view of one conversation between two participants. Only the
 * ThreadManager appends to or compacts a thread.
 */
export interface Thread {
  readonly key: string;
  readonly conversationId: string;
  /** `[initiator, recipient]` */
  readonly participants: readonly [string, string];
  /** Participant that opened the thread. */
  readonly initiator: string;
  readonly recipient: string;
  readonly messages: readonly ThreadMessage[];
  readonly lastSequence: number;
  includes(participantId: string): boolean;
  counterpart(participantId: string): string;
}

export class ThreadState implements Thread {
  readonly conversationId: string;
  readonly participants: readonly [string, string];
  readonly initiator: string;
  readonly recipient: string;
  private entries: readonly ThreadMessage[];
  private sequence: number;

  constructor(
    readonly key: string,
    messages: readonly ThreadMessage[] = [],
  ) {
    const parts = parseThreadKey(key);
    this.conversationId = parts.conversationId;
    this.initiator = parts.initiator;
    this.recipient = parts.recipient;
    this.participants = [parts.initiator, parts.recipient];
    this.entries = Object.freeze([...messages]);
    this.sequence = messages.reduce(
      (max, message) => Math.max(max, message.sequence),
      0,
    );
  }

  get messages(): readonly ThreadMessage[] {
    return this.entries;
  }

  get lastSequence(): number {
    return this.sequence;
  }

  includes(participantId: string): boolean {
    return this.participants.includes(participantId);
  }

  counterpart(participantId: string): string {
    const [first, second] = this.participants;
    if (participantId === first) {
      return second;
    }
    if (participantId === second) {
      return first;
    }
    throw new Error(`"${participantId}" is not a participant of thread "${this.key}".`);
  }

  append(message: ThreadMessage): void {
    this.entries = Object.freeze([...this.entries, message]);
    this.sequence = message.sequence;
  }

  replace(messages: readonly ThreadMessage[]): void {
    this.entries = Object.freeze([...messages]);
  }
}
