import type { FactoryProvider } from "@nestjs/common";
import { createThreadCompactor } from "./registry";

export interface ThreadCompactorFactoryBinding {
  create: typeof createThreadCompactor;
}

export const THREAD_COMPACTOR_FACTORY = Symbol.for("SWITCHBOARD_THREAD_COMPACTOR_FACTORY");

export const threadCompactorFactoryProvider = {
  provide: THREAD_COMPACTOR_FACTORY,
  useFactory: (): ThreadCompactorFactoryBinding => ({
    create: createThreadCompactor,
  }),
} satisfies FactoryProvider<ThreadCompactorFactoryBinding>;
