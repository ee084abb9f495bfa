import { Inject, Injectable, Logger, Optional } from "@nestjs/common";
import type { ConfigType } from "@nestjs/config";
import fs from "fs/promises";
import yaml from "yaml";
import type {
  ConfigRuntimeOptions,
  LoggingConfig,
  SwitchboardConfig,
  SwitchboardConfigInput,
} from "@switchboard/types";
import { ConfigValidator } from "./validation/config-validator";
import { CONFIG_FILE_PATH_TOKEN, MODULE_OPTIONS_TOKEN } from "./config.const";
import { switchboardConfig } from "./config.namespace";
import { ConfigStore } from "./config.store";
import { CURRENT_CONFIG_VERSION, DEFAULT_CONFIG } from "./defaults";
import { resolveConfigFilePath } from "./config-path";
import { resolveRuntimeOptions } from "./runtime-env";

export type ConfigFileFormat = "yaml" | "json";

/**
 * Resolves switchboard configuration from disk and layers it as
 * defaults, then file, then runtime overrides.
 */
@Injectable()
export class ConfigService {
  private readonly logger = new Logger(ConfigService.name);
  private readonly moduleOptions: ConfigRuntimeOptions;
  private readonly configFilePath: string | null;
  private readonly validator: ConfigValidator;

  constructor(
    @Optional()
    @Inject(ConfigStore)
    private readonly configStore?: ConfigStore,
    @Optional()
    @Inject(MODULE_OPTIONS_TOKEN)
    moduleOptions?: ConfigRuntimeOptions,
    @Optional()
    @Inject(switchboardConfig.KEY)
    private readonly defaultsProvider?: ConfigType<typeof switchboardConfig>,
    @Optional()
    @Inject(CONFIG_FILE_PATH_TOKEN)
    configFilePath?: string | null,
    @Optional()
    @Inject(ConfigValidator)
    validator?: ConfigValidator,
  ) {
    this.moduleOptions = moduleOptions ?? {};
    this.configFilePath = configFilePath ?? null;
    this.validator = validator ?? new ConfigValidator();
  }

  async load(options: ConfigRuntimeOptions = {}): Promise<SwitchboardConfig> {
    const runtime = resolveRuntimeOptions({ ...this.moduleOptions, ...options });
    const configPath = runtime.config
      ? await resolveConfigFilePath(runtime)
      : this.configFilePath ?? (await resolveConfigFilePath(runtime));
    const fileConfig = configPath ? await this.readConfigFile(configPath) : {};
    const config = this.compose(fileConfig, runtime);
    if (this.configStore) {
      this.configStore.setSnapshot(config);
      return this.configStore.getSnapshot();
    }
    return config;
  }

  compose(
    input: SwitchboardConfigInput,
    options: ConfigRuntimeOptions = {},
  ): SwitchboardConfig {
    if (
      typeof input.version === "number" &&
      input.version > CURRENT_CONFIG_VERSION
    ) {
      throw new Error(
        `This config declares newer config version ${input.version} than supported version ${CURRENT_CONFIG_VERSION}.`,
      );
    }

    const overrides = options.overrides
      ? this.validator.parseInput(options.overrides, "config overrides")
      : {};

    const composed = this.composeLayers(this.resolveDefaultConfig(), [
      input,
      overrides,
    ]);

    const logLevel = options.logLevel ?? this.moduleOptions.logLevel;
    if (logLevel) {
      composed.logging = { ...composed.logging, level: logLevel };
    }

    const finalConfig: SwitchboardConfig = {
      ...composed,
      version: CURRENT_CONFIG_VERSION,
    };
    this.validator.validate(finalConfig);
    return finalConfig;
  }

  parseSource(source: string, format: ConfigFileFormat): SwitchboardConfigInput {
    const content = source.trim();
    if (!content) {
      return {};
    }

    const parsed: unknown =
      format === "json" ? JSON.parse(content) : yaml.parse(content);
    if (!this.isPlainObject(parsed)) {
      throw new Error(
        `Configuration ${format.toUpperCase()} must represent an object.`,
      );
    }
    return this.validator.parseInput(parsed);
  }

  private async readConfigFile(
    candidate: string,
  ): Promise<SwitchboardConfigInput> {
    const data = await fs.readFile(candidate, "utf-8");
    const input = this.parseSource(data, this.detectFormat(candidate));
    this.logger.debug(`Loaded configuration from ${candidate}`);
    return input;
  }

  private detectFormat(candidate: string): ConfigFileFormat {
    return candidate.endsWith(".json") ? "json" : "yaml";
  }

  private resolveDefaultConfig(): SwitchboardConfig {
    return structuredClone(this.defaultsProvider ?? DEFAULT_CONFIG);
  }

  private composeLayers(
    base: SwitchboardConfig,
    layers: SwitchboardConfigInput[],
  ): SwitchboardConfig {
    return layers.reduce<SwitchboardConfig>(
      (current, layer) => ({
        version: layer.version ?? current.version,
        logging: this.mergeLogging(current.logging, layer.logging),
        agency: {
          name: layer.agency?.name ?? current.agency.name,
          sharedInstructions:
            layer.agency?.sharedInstructions ?? current.agency.sharedInstructions,
          userContext: layer.agency?.userContext
            ? { ...current.agency.userContext, ...layer.agency.userContext }
            : current.agency.userContext,
          entryPoints: layer.agency?.entryPoints ?? current.agency.entryPoints,
          flows: layer.agency?.flows ?? current.agency.flows,
          agents: layer.agency?.agents ?? current.agency.agents,
        },
        runtime: {
          maxCallDepth: layer.runtime?.maxCallDepth ?? current.runtime.maxCallDepth,
          maxStepsPerCall:
            layer.runtime?.maxStepsPerCall ?? current.runtime.maxStepsPerCall,
          completionRetries:
            layer.runtime?.completionRetries ?? current.runtime.completionRetries,
          runTimeoutMs: layer.runtime?.runTimeoutMs ?? current.runtime.runTimeoutMs,
        },
        threads: {
          defaultConversationId:
            layer.threads?.defaultConversationId ??
            current.threads.defaultConversationId,
          compactor: layer.threads?.compactor ?? current.threads.compactor,
        },
        output: {
          jsonlTrace: layer.output?.jsonlTrace ?? current.output.jsonlTrace,
          jsonlAppend: layer.output?.jsonlAppend ?? current.output.jsonlAppend,
        },
      }),
      base,
    );
  }

  private mergeLogging(
    base: LoggingConfig,
    override?: Partial<LoggingConfig>,
  ): LoggingConfig {
    return {
      level: override?.level ?? base.level,
      destination: override?.destination ?? base.destination,
      enableTimestamps: override?.enableTimestamps ?? base.enableTimestamps,
    };
  }

  private isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
  }
}
