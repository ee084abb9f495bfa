export * from "./config.const";
export * from "./config.module";
export * from "./config.namespace";
export * from "./config.service";
export * from "./config.store";
export * from "./config-path";
export * from "./defaults";
export * from "./runtime-env";
export * from "./validation/config-validator";
export type {
  ConfigRuntimeOptions,
  LoggingConfig,
  LoggingDestination,
  LogLevel,
  SwitchboardConfig,
  SwitchboardConfigInput,
} from "@switchboard/types";
