import type {
  FailureDescription,
  FailureType,
  JsonValue,
} from "@switchboard/types";

export interface SwitchboardErrorOptions {
  details?: JsonValue;
  cause?: unknown;
}

/**
 * Base class for failures the engine converts into typed failure results at
 * the call frame boundary.
 */
export abstract class SwitchboardError extends Error {
  abstract readonly type: FailureType;
  readonly details?: JsonValue;

  constructor(message: string, options: SwitchboardErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.details = options.details;
  }

  toFailure(agentId?: string): FailureDescription {
    return {
      type: this.type,
      message: this.message,
      ...(agentId ? { agentId } : {}),
      ...(this.details === undefined ? {} : { details: this.details }),
    };
  }
}

/** Invalid agents, flows or entry points. Raised while building an agency. */
export class GraphConfigError extends SwitchboardError {
  readonly type = "GraphConfigError";
}

/** A request to the agency that cannot be dispatched as given. */
export class InvalidRequestError extends SwitchboardError {
  readonly type = "InvalidRequestError";
}

export class PermissionError extends SwitchboardError {
  readonly type = "PermissionError";

  constructor(
    readonly senderId: string,
    readonly recipientId: string,
    message = `Agent "${senderId}" is not allowed to message "${recipientId}".`,
  ) {
    super(message, { details: { senderId, recipientId } });
  }
}

export type RecursionLimitReason = "depth" | "cycle";

export class RecursionLimitError extends SwitchboardError {
  readonly type = "RecursionLimitError";

  constructor(
    readonly reason: RecursionLimitReason,
    message: string,
    details: { [key: string]: JsonValue } = {},
  ) {
    super(message, { details: { reason, ...details } });
  }
}

export class CompletionFailure extends SwitchboardError {
  readonly type = "CompletionFailure";
}

export class PersistenceError extends SwitchboardError {
  readonly type = "PersistenceError";

  constructor(
    readonly operation: "load" | "save",
    cause: unknown,
  ) {
    super(
      `Failed to ${operation} agency state: ${serializeError(cause).message}`,
      { cause, details: { operation } },
    );
  }
}

export type CancellationReason = "timeout" | "aborted";

export class RunCancelledError extends SwitchboardError {
  readonly type = "RunCancelledError";

  constructor(
    readonly reason: CancellationReason,
    message = reason === "timeout" ? "Run timed out." : "Run was cancelled.",
  ) {
    super(message, { details: { reason } });
  }
}

export interface SerializedError {
  message: string;
  name?: string;
  stack?: string;
  cause?: unknown;
}

export const serializeError = (error: unknown): SerializedError => {
  if (error instanceof Error) {
    return {
      message: error.message,
      name: error.name,
      stack: error.stack,
      ...(error.cause === undefined ? {} : { cause: error.cause }),
    };
  }

  return { message: String(error) };
};
