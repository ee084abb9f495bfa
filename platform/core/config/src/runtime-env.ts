import type { ConfigRuntimeOptions, LogLevel } from "@switchboard/types";

const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "warn", "info", "debug"];

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) {
    return undefined;
  }

  const normalized = value.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized);
}

function parseString(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function resolveRuntimeOptionsFromEnv(
  env: NodeJS.ProcessEnv
): ConfigRuntimeOptions {
  const options: ConfigRuntimeOptions = {};

  const config = parseString(env.SWITCHBOARD_CONFIG);
  if (config) {
    options.config = config;
  }

  const logLevel = parseLogLevel(env.SWITCHBOARD_LOG_LEVEL);
  if (logLevel) {
    options.logLevel = logLevel;
  }

  return options;
}

/**
 * Environment options fill in whatever the module registration leaves unset.
 */
export function resolveRuntimeOptions(
  moduleOptions?: ConfigRuntimeOptions,
  env: NodeJS.ProcessEnv = process.env,
): ConfigRuntimeOptions {
  const fromEnv = resolveRuntimeOptionsFromEnv(env);
  return {
    ...fromEnv,
    ...(moduleOptions?.config ? { config: moduleOptions.config } : {}),
    ...(moduleOptions?.logLevel ? { logLevel: moduleOptions.logLevel } : {}),
    ...(moduleOptions?.overrides ? { overrides: moduleOptions.overrides } : {}),
  };
}
