import type { JsonValue } from "./json";

export type RunContextSnapshot = Record<string, JsonValue>;

/**
 * Key/value surface of a run context that completion adapters and tool
 * handlers may read and mutate. Mutations are visible to every agent in the
 * same run.
 */
export interface RunContextStore {
  readonly runId: string;
  get(key: string): JsonValue | undefined;
  get(key: string, fallback: JsonValue): JsonValue;
  set(key: string, value: JsonValue): void;
  has(key: string): boolean;
  delete(key: string): boolean;
  keys(): string[];
  snapshot(): RunContextSnapshot;
}
