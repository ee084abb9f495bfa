import type { FactoryProvider } from "@nestjs/common";
import type { ConfigType } from "@nestjs/config";
import type { ConfigRuntimeOptions, SwitchboardConfig } from "@switchboard/types";
import { ConfigService } from "./config.service";
import {
  CONFIG_FILE_PATH_TOKEN,
  INITIAL_CONFIG_TOKEN,
  MODULE_OPTIONS_TOKEN,
} from "./config.const";
import { switchboardConfig } from "./config.namespace";
import { resolveRuntimeOptions } from "./runtime-env";

export const initialConfigProvider: FactoryProvider<Promise<SwitchboardConfig>> = {
  provide: INITIAL_CONFIG_TOKEN,
  inject: [
    { token: MODULE_OPTIONS_TOKEN, optional: true },
    { token: switchboardConfig.KEY, optional: true },
    { token: CONFIG_FILE_PATH_TOKEN, optional: true },
  ],
  useFactory: async (
    moduleOptions?: ConfigRuntimeOptions,
    defaults?: ConfigType<typeof switchboardConfig>,
    configFilePath?: string | null,
  ): Promise<SwitchboardConfig> => {
    const combinedOptions = resolveRuntimeOptions(moduleOptions);
    const service = new ConfigService(
      undefined,
      combinedOptions,
      defaults,
      configFilePath ?? null,
    );

    return service.load();
  },
};
