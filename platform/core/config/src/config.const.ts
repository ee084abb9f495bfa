import { ConfigurableModuleBuilder } from "@nestjs/common";
import type { ConfigRuntimeOptions } from "@switchboard/types";

const configurableModule =
  new ConfigurableModuleBuilder<ConfigRuntimeOptions>().build();

export const { ConfigurableModuleClass } = configurableModule;

/**
 * Token for the runtime options passed to `ConfigModule.register`.
 */
export const { MODULE_OPTIONS_TOKEN } = configurableModule;

/**
 * Token for the configuration composed during bootstrap. Seeds the
 * ConfigStore.
 */
export const INITIAL_CONFIG_TOKEN = Symbol("SWITCHBOARD_INITIAL_CONFIG");

/**
 * Token for the resolved configuration file path, or null when the defaults
 * are used without a file.
 */
export const CONFIG_FILE_PATH_TOKEN = Symbol("SWITCHBOARD_CONFIG_FILE_PATH");
