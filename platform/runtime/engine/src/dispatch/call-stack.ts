import { RecursionLimitError } from "../errors";

export interface CallFrame {
  readonly id: string;
  readonly callerId: string;
  readonly calleeId: string;
  readonly threadKey: string;
  /** 1-based; the entry agent's frame has depth 1. */
  readonly depth: number;
  readonly startedAt: string;
  readonly toolCallId?: string;
}

export type CallFrameInit = Pick<CallFrame, "callerId" | "calleeId" | "threadKey" | "toolCallId">;

/**
 * In-flight delegation chain of one run.
 */
export class CallStack {
  private readonly stack: CallFrame[] = [];
  private counter = 0;

  constructor(readonly maxDepth: number) {}

  get depth(): number {
    return this.stack.length;
  }

  get frames(): readonly CallFrame[] {
    return [...this.stack];
  }

  current(): CallFrame | undefined {
    return this.stack[this.stack.length - 1];
  }

  isPending(callerId: string, calleeId: string): boolean {
    return this.stack.some(
      (frame) => frame.callerId === callerId && frame.calleeId === calleeId,
    );
  }

  push(init: CallFrameInit, now: Date = new Date()): CallFrame {
    if (this.stack.length >= this.maxDepth) {
      throw new RecursionLimitError(
        "depth",
        `Call depth limit of ${this.maxDepth} reached while "${init.callerId}" called "${init.calleeId}".`,
        { maxDepth: this.maxDepth, path: this.describePath(init) },
      );
    }

    if (this.isPending(init.callerId, init.calleeId)) {
      throw new RecursionLimitError(
        "cycle",
        `"${init.callerId}" is already waiting on "${init.calleeId}"; the call would form a cycle.`,
        { path: this.describePath(init) },
      );
    }

    this.counter += 1;
    const frame: CallFrame = Object.freeze({
      ...init,
      id: `frame-${this.counter}`,
      depth: this.stack.length + 1,
      startedAt: now.toISOString(),
    });
    this.stack.push(frame);
    return frame;
  }

  pop(frame: CallFrame): void {
    const top = this.current();
    if (top?.id !== frame.id) {
      throw new Error(
        `Call stack corrupted: expected to pop ${top?.id ?? "<empty>"}, got ${frame.id}.`,
      );
    }
    this.stack.pop();
  }

  private describePath(next: CallFrameInit): string[] {
    const path = this.stack.map((frame) => frame.callerId);
    path.push(next.callerId, next.calleeId);
    return path;
  }
}
