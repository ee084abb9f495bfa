import { Injectable } from "@nestjs/common";
import { z } from "zod";

import type {
  SwitchboardConfig,
  SwitchboardConfigInput,
} from "@switchboard/types";
import { CURRENT_CONFIG_VERSION } from "../defaults";

const LOG_LEVEL_SCHEMA = z.enum(["silent", "error", "warn", "info", "debug"]);

const LOGGING_DESTINATION_SCHEMA = z
  .object({
    type: z.enum(["stdout", "stderr", "file"]),
    path: z.string().min(1, "path must not be empty").optional(),
    pretty: z.boolean().optional(),
    colorize: z.boolean().optional(),
  })
  .strict();

const IDENTIFIER_SCHEMA = z.string().trim().min(1, "must be a non-empty string");

const AGENT_SCHEMA = z
  .object({
    id: IDENTIFIER_SCHEMA,
    description: z.string().optional(),
    instructions: z.string().optional(),
    model: z.string().optional(),
  })
  .loose();

const FLOW_SCHEMA = z
  .object({
    from: IDENTIFIER_SCHEMA,
    to: IDENTIFIER_SCHEMA,
  })
  .strict();

const POSITIVE_INT = z
  .number()
  .int("must be an integer")
  .positive("must be greater than zero");

const COMPACTOR_SCHEMA = z
  .object({
    strategy: IDENTIFIER_SCHEMA,
    maxMessages: POSITIVE_INT.optional(),
    keepLast: z.number().int("must be an integer").nonnegative().optional(),
  })
  .strict();

const INPUT_SCHEMA = z
  .object({
    version: z.number().int().nonnegative().optional(),
    logging: z
      .object({
        level: LOG_LEVEL_SCHEMA.optional(),
        destination: LOGGING_DESTINATION_SCHEMA.optional(),
        enableTimestamps: z.boolean().optional(),
      })
      .strict()
      .optional(),
    agency: z
      .object({
        name: z.string().optional(),
        sharedInstructions: z.string().optional(),
        userContext: z.record(z.string(), z.json()).optional(),
        entryPoints: z.array(IDENTIFIER_SCHEMA).optional(),
        flows: z.array(FLOW_SCHEMA).optional(),
        agents: z.array(AGENT_SCHEMA).optional(),
      })
      .strict()
      .optional(),
    runtime: z
      .object({
        maxCallDepth: POSITIVE_INT.optional(),
        maxStepsPerCall: POSITIVE_INT.optional(),
        completionRetries: z.number().int("must be an integer").nonnegative().optional(),
        runTimeoutMs: POSITIVE_INT.optional(),
      })
      .strict()
      .optional(),
    threads: z
      .object({
        defaultConversationId: IDENTIFIER_SCHEMA.optional(),
        compactor: COMPACTOR_SCHEMA.optional(),
      })
      .strict()
      .optional(),
    output: z
      .object({
        jsonlTrace: z.string().min(1).optional(),
        jsonlAppend: z.boolean().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export interface ConfigValidationIssue {
  path: string;
  message: string;
}

export class ConfigValidationError extends Error {
  readonly summary: string;
  readonly issues: ConfigValidationIssue[];

  constructor(summary: string, issues: ConfigValidationIssue[]) {
    super(summary);
    this.name = "ConfigValidationError";
    this.summary = summary;
    this.issues = issues;
  }
}

@Injectable()
export class ConfigValidator {
  /**
   * Parses raw file or override content into a config input. Unknown keys
   * are rejected so typos surface instead of being ignored.
   */
  parseInput(raw: unknown, source = "config"): SwitchboardConfigInput {
    const result = INPUT_SCHEMA.safeParse(raw ?? {});
    if (result.success) {
      return result.data;
    }

    const issues: ConfigValidationIssue[] = [];
    for (const issue of result.error.issues) {
      this.pushValidationIssue(
        issues,
        issue.path.map(String).join("."),
        issue.message,
      );
    }
    throw this.buildError(`Invalid ${source}`, issues);
  }

  validate(config: SwitchboardConfig): void {
    const issues: ConfigValidationIssue[] = [];

    if (config.version !== CURRENT_CONFIG_VERSION) {
      this.pushValidationIssue(
        issues,
        "version",
        `version must equal ${CURRENT_CONFIG_VERSION}. Received ${config.version}.`,
      );
    }

    const structural = INPUT_SCHEMA.safeParse(config);
    if (!structural.success) {
      for (const issue of structural.error.issues) {
        this.pushValidationIssue(
          issues,
          issue.path.map(String).join("."),
          issue.message,
        );
      }
    }

    this.validateAgency(config, issues);

    const compactor = config.threads.compactor;
    if (
      compactor?.maxMessages !== undefined &&
      compactor.keepLast !== undefined &&
      compactor.keepLast > compactor.maxMessages
    ) {
      this.pushValidationIssue(
        issues,
        "threads.compactor.keepLast",
        "threads.compactor.keepLast must not exceed maxMessages.",
      );
    }

    if (issues.length > 0) {
      throw this.buildError("Invalid configuration", issues);
    }
  }

  private validateAgency(
    config: SwitchboardConfig,
    issues: ConfigValidationIssue[],
  ): void {
    const { agents, flows, entryPoints } = config.agency;
    const known = new Set<string>();

    agents.forEach((agent, index) => {
      if (known.has(agent.id)) {
        this.pushValidationIssue(
          issues,
          `agency.agents.${index}.id`,
          `agency.agents contains duplicate id "${agent.id}".`,
        );
      }
      known.add(agent.id);
    });

    if (known.size === 0) {
      return;
    }

    flows.forEach((flow, index) => {
      for (const end of ["from", "to"] as const) {
        if (!known.has(flow[end])) {
          this.pushValidationIssue(
            issues,
            `agency.flows.${index}.${end}`,
            `agency.flows references unknown agent "${flow[end]}".`,
          );
        }
      }
    });

    entryPoints.forEach((entryPoint, index) => {
      if (!known.has(entryPoint)) {
        this.pushValidationIssue(
          issues,
          `agency.entryPoints.${index}`,
          `agency.entryPoints references unknown agent "${entryPoint}".`,
        );
      }
    });
  }

  private buildError(
    prefix: string,
    issues: ConfigValidationIssue[],
  ): ConfigValidationError {
    const details = issues
      .map((issue) => `${issue.path || "<root>"}: ${issue.message}`)
      .join("; ");
    return new ConfigValidationError(`${prefix}: ${details}`, issues);
  }

  private pushValidationIssue(
    issues: ConfigValidationIssue[],
    path: string,
    message: string,
  ): void {
    issues.push({ path, message });
  }
}
