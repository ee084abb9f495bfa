import type { RunContextSnapshot } from "./context";
import type { ThreadSnapshot } from "./messages";

export interface PersistedAgencyState {
  threads: ThreadSnapshot;
  context?: RunContextSnapshot;
}

export type LoadThreadsHook = () =>
  | PersistedAgencyState
  | undefined
  | Promise<PersistedAgencyState | undefined>;

export type SaveThreadsHook = (
  threads: ThreadSnapshot,
  context: RunContextSnapshot,
) => void | Promise<void>;

export interface ThreadPersistenceHooks {
  load?: LoadThreadsHook;
  save?: SaveThreadsHook;
}
