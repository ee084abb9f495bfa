import type { CommunicationFlow } from "@switchboard/types";
import type { AgentRegistry } from "../agents/agent-registry";
import type { CommunicationGraph } from "../graph/communication-graph";

export interface AgencyStructureNode {
  id: string;
  description?: string;
  isEntryPoint: boolean;
  tools: string[];
  canMessage: string[];
}

export interface AgencyStructure {
  name?: string;
  entryPoints: string[];
  nodes: AgencyStructureNode[];
  edges: CommunicationFlow[];
}

/** Serializable view of the agents and flows, for visualisation. */
export function describeAgencyStructure(
  graph: CommunicationGraph,
  agents: AgentRegistry,
  name?: string,
): AgencyStructure {
  return {
    ...(name ? { name } : {}),
    entryPoints: graph.listEntryPoints(),
    nodes: agents.list().map((agent) => ({
      id: agent.id,
      ...(agent.description ? { description: agent.description } : {}),
      isEntryPoint: graph.isEntryPoint(agent.id),
      tools: Array.from(agent.tools.keys()),
      canMessage: Array.from(graph.listOutgoing(agent.id)),
    })),
    edges: graph.listFlows(),
  };
}
