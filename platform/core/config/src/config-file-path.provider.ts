import type { FactoryProvider } from "@nestjs/common";
import type { ConfigRuntimeOptions } from "@switchboard/types";
import { CONFIG_FILE_PATH_TOKEN, MODULE_OPTIONS_TOKEN } from "./config.const";
import { resolveRuntimeOptions } from "./runtime-env";
import { resolveConfigFilePath } from "./config-path";

export const configFilePathProvider: FactoryProvider<Promise<string | null>> = {
  provide: CONFIG_FILE_PATH_TOKEN,
  inject: [
    { token: MODULE_OPTIONS_TOKEN, optional: true },
  ],
  useFactory: async (
    moduleOptions?: ConfigRuntimeOptions,
  ): Promise<string | null> =>
    resolveConfigFilePath(resolveRuntimeOptions(moduleOptions)),
};
