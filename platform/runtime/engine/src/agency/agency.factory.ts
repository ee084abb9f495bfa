import { Inject, Injectable } from "@nestjs/common";
import { ConfigStore } from "@switchboard/config";
import { JsonlWriterService, LoggerService } from "@switchboard/io";
import type {
  AgentBinding,
  AgentDefinition,
  RuntimeConfig,
  SwitchboardConfig,
  ThreadPersistenceHooks,
} from "@switchboard/types";
import { DispatcherService } from "../dispatch/dispatcher.service";
import { GraphConfigError } from "../errors";
import {
  THREAD_COMPACTOR_FACTORY,
  type ThreadCompactorFactoryBinding,
} from "../thread-compactors/thread-compactor.factory";
import { Agency, type AgencyOptions } from "./agency";
import { RunTraceWriter } from "./trace-writer";

export type CreateAgencyOptions = Omit<AgencyOptions, "runtime"> & {
  /** Overrides layered over the configured runtime limits. */
  runtime?: Partial<RuntimeConfig>;
};

export type AgentBindings = Record<string, AgentBinding>;

/**
 * Builds agencies wired to the configured logging, limits, compaction and
 * trace output.
 */
@Injectable()
export class AgencyFactory {
  constructor(
    @Inject(DispatcherService) private readonly dispatcher: DispatcherService,
    @Inject(LoggerService) private readonly loggerService: LoggerService,
    @Inject(JsonlWriterService) private readonly jsonlWriter: JsonlWriterService,
    @Inject(ConfigStore) private readonly configStore: ConfigStore,
    @Inject(THREAD_COMPACTOR_FACTORY)
    private readonly compactors: ThreadCompactorFactoryBinding,
  ) {}

  create(
    options: CreateAgencyOptions,
    config: SwitchboardConfig = this.configStore.getSnapshot(),
  ): Agency {
    this.loggerService.configure(config.logging);
    const logger = this.loggerService.getLogger("engine:agency");

    const compactorConfig = config.threads.compactor;
    const compactor =
      options.compactor ??
      (compactorConfig ? this.compactors.create(compactorConfig) : undefined);

    const { jsonlTrace, jsonlAppend } = config.output;
    const traceWriter = jsonlTrace
      ? new RunTraceWriter(this.jsonlWriter, jsonlTrace, jsonlAppend ?? true)
      : undefined;

    const agency = new Agency(
      {
        ...options,
        runtime: { ...config.runtime, ...options.runtime },
        defaultConversationId:
          options.defaultConversationId ?? config.threads.defaultConversationId,
        compactor,
      },
      {
        dispatcher: this.dispatcher,
        logger: options.name ? logger.child({ agency: options.name }) : logger,
        traceWriter,
      },
    );

    logger.debug(
      {
        agency: agency.name,
        agents: agency.agents.ids(),
        entryPoints: agency.graph.listEntryPoints(),
      },
      "Agency created"
    );
    return agency;
  }

  /**
   * Builds the agency declared in the `agency` config section. Every
   * configured agent needs a binding supplying its completion adapter.
   */
  createFromConfig(
    config: SwitchboardConfig,
    bindings: AgentBindings,
    hooks?: ThreadPersistenceHooks,
  ): Agency {
    const { agency } = config;
    const agents: AgentDefinition[] = agency.agents.map((agent) => {
      const binding = bindings[agent.id];
      if (!binding) {
        throw new GraphConfigError(
          `Configured agent "${agent.id}" has no completion binding.`,
        );
      }
      return { ...agent, completion: binding.completion, tools: binding.tools };
    });

    const configured = new Set(agency.agents.map((agent) => agent.id));
    const unused = Object.keys(bindings).filter((id) => !configured.has(id));
    if (unused.length > 0) {
      this.loggerService
        .getLogger("engine:agency")
        .warn({ bindings: unused }, "Ignoring bindings for agents missing from the config");
    }

    return this.create(
      {
        name: agency.name,
        agents,
        flows: agency.flows,
        entryPoints: agency.entryPoints,
        sharedInstructions: agency.sharedInstructions,
        userContext: agency.userContext,
        persistence: hooks,
      },
      config,
    );
  }
}
