import { USER_SENDER, type CommunicationFlow } from "@switchboard/types";
import { GraphConfigError } from "../errors";

/**
 * Directed initiation graph between agents. An edge `from -> to` lets `from`
 * open a conversation with `to`; `to` answers only by returning.
 */
export class CommunicationGraph {
  private readonly agentIds: ReadonlySet<string>;
  private readonly outgoing = new Map<string, Set<string>>();
  private readonly flows: CommunicationFlow[] = [];
  private readonly entryPoints: string[] = [];

  constructor(
    agentIds: Iterable<string>,
    flows: readonly CommunicationFlow[],
    entryPoints: readonly string[],
  ) {
    this.agentIds = new Set(agentIds);

    if (this.agentIds.has(USER_SENDER)) {
      throw new GraphConfigError(
        `Agent id "${USER_SENDER}" is reserved for the external caller.`,
      );
    }

    for (const flow of flows) {
      this.addFlow(flow);
    }

    if (entryPoints.length === 0) {
      throw new GraphConfigError("At least one entry point must be declared.");
    }

    for (const entryPoint of entryPoints) {
      this.assertKnown(entryPoint, "Entry point");
      if (this.entryPoints.includes(entryPoint)) {
        throw new GraphConfigError(`Entry point "${entryPoint}" is declared twice.`);
      }
      this.entryPoints.push(entryPoint);
    }
  }

  canInitiate(senderId: string, recipientId: string): boolean {
    return this.outgoing.get(senderId)?.has(recipientId) ?? false;
  }

  isEntryPoint(agentId: string): boolean {
    return this.entryPoints.includes(agentId);
  }

  hasAgent(agentId: string): boolean {
    return this.agentIds.has(agentId);
  }

  listOutgoing(agentId: string): ReadonlySet<string> {
    return new Set(this.outgoing.get(agentId) ?? []);
  }

  listEntryPoints(): string[] {
    return [...this.entryPoints];
  }

  listFlows(): CommunicationFlow[] {
    return this.flows.map((flow) => ({ ...flow }));
  }

  private addFlow(flow: CommunicationFlow): void {
    this.assertKnown(flow.from, "Flow source");
    this.assertKnown(flow.to, "Flow target");

    if (flow.from === flow.to) {
      throw new GraphConfigError(`Agent "${flow.from}" cannot open a flow to itself.`);
    }

    const targets = this.outgoing.get(flow.from) ?? new Set<string>();
    if (targets.has(flow.to)) {
      throw new GraphConfigError(
        `Flow "${flow.from}" -> "${flow.to}" is declared twice.`,
      );
    }

    targets.add(flow.to);
    this.outgoing.set(flow.from, targets);
    this.flows.push({ from: flow.from, to: flow.to });
  }

  private assertKnown(agentId: string, role: string): void {
    if (!this.agentIds.has(agentId)) {
      throw new GraphConfigError(`${role} "${agentId}" is not a registered agent.`);
    }
  }
}
