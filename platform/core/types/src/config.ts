import type { JsonObject } from "./json";

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

export interface LoggingDestination {
  type: "stdout" | "stderr" | "file";
  path?: string;
  pretty?: boolean;
  colorize?: boolean;
}

export interface LoggingConfig {
  level: LogLevel;
  destination?: LoggingDestination;
  enableTimestamps?: boolean;
}

export interface AgentConfig {
  id: string;
  description?: string;
  instructions?: string;
  model?: string;
}

export interface FlowConfig {
  from: string;
  to: string;
}

export interface AgencyConfig {
  name?: string;
  /** Prepended to every agent's instructions. */
  sharedInstructions?: string;
  /** Seed values copied into every run context. */
  userContext?: JsonObject;
  entryPoints: string[];
  flows: FlowConfig[];
  agents: AgentConfig[];
}

export interface RuntimeConfig {
  maxCallDepth: number;
  maxStepsPerCall: number;
  completionRetries: number;
  runTimeoutMs?: number;
}

export interface ThreadCompactorConfig {
  strategy: string;
  maxMessages?: number;
  keepLast?: number;
}

export interface ThreadsConfig {
  defaultConversationId: string;
  compactor?: ThreadCompactorConfig;
}

export interface OutputConfig {
  jsonlTrace?: string;
  jsonlAppend?: boolean;
}

export interface SwitchboardConfig {
  version: number;
  logging: LoggingConfig;
  agency: AgencyConfig;
  runtime: RuntimeConfig;
  threads: ThreadsConfig;
  output: OutputConfig;
}

export interface SwitchboardConfigInput {
  version?: number;
  logging?: Partial<LoggingConfig>;
  agency?: Partial<AgencyConfig>;
  runtime?: Partial<RuntimeConfig>;
  threads?: Partial<ThreadsConfig>;
  output?: Partial<OutputConfig>;
}

export interface ConfigRuntimeOptions {
  /** Explicit config file path; skips discovery when set. */
  config?: string;
  logLevel?: LogLevel;
  overrides?: SwitchboardConfigInput;
}
