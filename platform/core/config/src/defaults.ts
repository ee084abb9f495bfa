import type { SwitchboardConfig } from "@switchboard/types";

export const CURRENT_CONFIG_VERSION = 1;

export const DEFAULT_CONFIG: SwitchboardConfig = {
  version: CURRENT_CONFIG_VERSION,
  logging: {
    level: "info",
    enableTimestamps: true,
  },
  agency: {
    entryPoints: [],
    flows: [],
    agents: [],
  },
  runtime: {
    maxCallDepth: 8,
    maxStepsPerCall: 16,
    completionRetries: 2,
  },
  threads: {
    defaultConversationId: "main",
  },
  output: {
    jsonlAppend: true,
  },
};
