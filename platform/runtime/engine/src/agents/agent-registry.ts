import type {
  AgentDefinition,
  AgentDescriptor,
  CompletionAdapter,
  ToolDefinition,
} from "@switchboard/types";
import { GraphConfigError } from "../errors";
import { SEND_MESSAGE_TOOL_NAME } from "../dispatch/send-message.tool";

export interface RegisteredAgent extends AgentDescriptor {
  readonly completion: CompletionAdapter;
  readonly tools: ReadonlyMap<string, ToolDefinition>;
}

/**
 * Immutable set of agents built once per agency.
 */
export class AgentRegistry {
  private readonly agents = new Map<string, RegisteredAgent>();

  constructor(definitions: readonly AgentDefinition[]) {
    for (const definition of definitions) {
      this.register(definition);
    }
  }

  get(agentId: string): RegisteredAgent | undefined {
    return this.agents.get(agentId);
  }

  has(agentId: string): boolean {
    return this.agents.has(agentId);
  }

  ids(): string[] {
    return Array.from(this.agents.keys());
  }

  list(): RegisteredAgent[] {
    return Array.from(this.agents.values());
  }

  /**
   * Resolves a recipient name. Exact ids win; otherwise a unique
   * case-insensitive match is accepted.
   */
  resolve(name: string): RegisteredAgent | undefined {
    const trimmed = name.trim();
    const exact = this.agents.get(trimmed);
    if (exact) {
      return exact;
    }

    const lowered = trimmed.toLowerCase();
    const matches = this.list().filter((agent) => agent.id.toLowerCase() === lowered);
    return matches.length === 1 ? matches[0] : undefined;
  }

  describe(agentId: string): AgentDescriptor | undefined {
    const agent = this.agents.get(agentId);
    if (!agent) {
      return undefined;
    }
    const { id, description, instructions, model } = agent;
    return { id, description, instructions, model };
  }

  private register(definition: AgentDefinition): void {
    const id = definition.id.trim();
    if (id === "") {
      throw new GraphConfigError("Agent ids must be non-empty strings.");
    }
    if (id !== definition.id) {
      throw new GraphConfigError(`Agent id "${definition.id}" has surrounding whitespace.`);
    }
    if (this.agents.has(id)) {
      throw new GraphConfigError(`Agent "${id}" is declared twice.`);
    }

    const tools = new Map<string, ToolDefinition>();
    for (const tool of definition.tools ?? []) {
      if (tool.name === SEND_MESSAGE_TOOL_NAME) {
        throw new GraphConfigError(
          `Agent "${id}" declares a tool named "${SEND_MESSAGE_TOOL_NAME}", which is reserved.`,
        );
      }
      if (tools.has(tool.name)) {
        throw new GraphConfigError(`Agent "${id}" declares tool "${tool.name}" twice.`);
      }
      tools.set(tool.name, tool);
    }

    this.agents.set(id, Object.freeze({
      id,
      description: definition.description,
      instructions: definition.instructions,
      model: definition.model,
      completion: definition.completion,
      tools,
    }));
  }
}
