import { describe, expect, it } from "vitest";
import { RecursionLimitError } from "../../src/errors";
import { CallStack } from "../../src/dispatch/call-stack";

const frame = (callerId: string, calleeId: string) => ({
  callerId,
  calleeId,
  threadKey: `main/${callerId}~${calleeId}`,
});

describe("CallStack", () => {
  it("pushes frames with increasing depth", () => {
    const stack = new CallStack(3);
    const now = new Date("2026-01-01T00:00:00.000Z");

    const root = stack.push(frame("user", "CEO"), now);
    const child = stack.push({ ...frame("CEO", "Dev"), toolCallId: "call-1" }, now);

    expect(root).toEqual({
      id: "frame-1",
      callerId: "user",
      calleeId: "CEO",
      threadKey: "main/user~CEO",
      depth: 1,
      startedAt: "2026-01-01T00:00:00.000Z",
    });
    expect(child.depth).toBe(2);
    expect(child.toolCallId).toBe("call-1");
    expect(stack.current()).toBe(child);
    expect(stack.depth).toBe(2);
  });

  it("rejects pushes beyond the depth limit", () => {
    const stack = new CallStack(2);
    stack.push(frame("user", "A"));
    stack.push(frame("A", "B"));

    let failure: unknown;
    try {
      stack.push(frame("B", "C"));
    } catch (error) {
      failure = error;
    }

    expect(failure).toBeInstanceOf(RecursionLimitError);
    expect(failure).toMatchObject({
      reason: "depth",
      message: 'Call depth limit of 2 reached while "B" called "C".',
      details: { reason: "depth", maxDepth: 2, path: ["user", "A", "B", "C"] },
    });
    expect(stack.depth).toBe(2);
  });

  it("rejects a delegation that is already pending", () => {
    const stack = new CallStack(8);
    stack.push(frame("user", "A"));
    stack.push(frame("A", "B"));
    stack.push(frame("B", "A"));

    expect(() => stack.push(frame("A", "B"))).toThrow(
      '"A" is already waiting on "B"; the call would form a cycle.',
    );
    expect(stack.isPending("B", "A")).toBe(true);
  });

  it("pops only the top frame", () => {
    const stack = new CallStack(4);
    const root = stack.push(frame("user", "A"));
    const child = stack.push(frame("A", "B"));

    expect(() => stack.pop(root)).toThrow(
      "Call stack corrupted: expected to pop frame-2, got frame-1.",
    );

    stack.pop(child);
    stack.pop(root);
    expect(stack.depth).toBe(0);
    expect(stack.frames).toEqual([]);
  });
});
