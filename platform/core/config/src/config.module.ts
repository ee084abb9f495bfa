import { Global, Module } from "@nestjs/common";
import { ConfigModule as NestConfigModule } from "@nestjs/config";
import type { ConfigRuntimeOptions } from "@switchboard/types";
import { switchboardConfig } from "./config.namespace";
import { ConfigService } from "./config.service";
import { ConfigStore } from "./config.store";
import { initialConfigProvider } from "./initial-config.provider";
import {
  CONFIG_FILE_PATH_TOKEN,
  ConfigurableModuleClass,
  MODULE_OPTIONS_TOKEN,
} from "./config.const";
import { configFilePathProvider } from "./config-file-path.provider";
import { ConfigValidator } from "./validation/config-validator";

@Global()
@Module({
  imports: [NestConfigModule.forFeature(switchboardConfig)],
  providers: [
    configFilePathProvider,
    ConfigService,
    initialConfigProvider,
    ConfigStore,
    ConfigValidator,
  ],
  exports: [
    CONFIG_FILE_PATH_TOKEN,
    ConfigService,
    ConfigStore,
    ConfigValidator,
  ],
})
export class ConfigModule extends ConfigurableModuleClass {
  static register(
    options: ConfigRuntimeOptions,
  ): ReturnType<typeof ConfigurableModuleClass["register"]> {
    const dynamicModule = super.register(options);
    return {
      ...dynamicModule,
      exports: [...(dynamicModule.exports ?? []), MODULE_OPTIONS_TOKEN],
      global: true,
    };
  }

  static registerAsync(
    options: Parameters<typeof ConfigurableModuleClass["registerAsync"]>[0],
  ): ReturnType<typeof ConfigurableModuleClass["registerAsync"]> {
    const dynamicModule = super.registerAsync(options);
    return {
      ...dynamicModule,
      exports: [...(dynamicModule.exports ?? []), MODULE_OPTIONS_TOKEN],
      global: true,
    };
  }
}
