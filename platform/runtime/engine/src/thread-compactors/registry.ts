import type { ThreadCompactorConfig } from "@switchboard/types";
import { GraphConfigError } from "../errors";
import type { ThreadCompactor, ThreadCompactorFactory } from "./types";

const registry = new Map<string, ThreadCompactorFactory>();
const builtinFactories = new Map<string, ThreadCompactorFactory>();

export interface RegisterThreadCompactorOptions {
  builtin?: boolean;
}

export function registerThreadCompactor(
  factory: ThreadCompactorFactory,
  options: RegisterThreadCompactorOptions = {},
): void {
  if (factory.strategy.trim() === "") {
    throw new Error("Thread compactor factory must declare a strategy id.");
  }

  registry.set(factory.strategy, factory);

  if (options.builtin) {
    builtinFactories.set(factory.strategy, factory);
  }
}

export function unregisterThreadCompactor(strategy: string): void {
  registry.delete(strategy);
  const builtin = builtinFactories.get(strategy);
  if (builtin) {
    registry.set(strategy, builtin);
  }
}

export function getThreadCompactorFactory(
  strategy: string,
): ThreadCompactorFactory | undefined {
  return registry.get(strategy);
}

export function createThreadCompactor(
  config: ThreadCompactorConfig,
): ThreadCompactor {
  const factory = getThreadCompactorFactory(config.strategy);

  if (!factory) {
    throw new GraphConfigError(
      `Unsupported thread compactor strategy "${config.strategy}".`,
    );
  }

  return factory.create(config);
}

export function listThreadCompactors(): ThreadCompactorFactory[] {
  return Array.from(registry.values());
}

export function resetThreadCompactorRegistry(): void {
  registry.clear();
  for (const factory of builtinFactories.values()) {
    registry.set(factory.strategy, factory);
  }
}
