import { StructuralInconsistencyError } from '../shared/errors';
import { PLAN_NODE_EXISTS, PLAN_NODE_UNKNOWN, PLAN_PLUG_DRIVEN } from '../shared/messages';
import { componentAttr, type AttrValue, type Axis, type AxisSuffix, type NodeRef, type UtilityNodeType } from '../types/scene';

export type PlanEndpoint = { source: 'plan'; name: string } | { source: 'scene'; ref: NodeRef };

export type PlannedPlug = {
  endpoint: PlanEndpoint;
  attr: string;
};

export type PlannedConnection = {
  from: PlannedPlug;
  to: PlannedPlug;
};

export type PlannedNode = {
  name: string;
  type: UtilityNodeType;
  attrs: ReadonlyMap<string, AttrValue>;
};

/** Handle on one endpoint of a plan; builds plugs without touching the scene. */
export class PlanNodeHandle {
  readonly endpoint: PlanEndpoint;

  constructor(endpoint: PlanEndpoint) {
    this.endpoint = endpoint;
  }

  plug(attr: string): PlannedPlug {
    return { endpoint: this.endpoint, attr };
  }

  component(attr: string, axis: Axis | AxisSuffix): PlannedPlug {
    return this.plug(componentAttr(attr, axis));
  }
}

export const endpointId = (endpoint: PlanEndpoint): string =>
  endpoint.source === 'plan' ? endpoint.name : `scene:${endpoint.ref}`;

export const formatPlannedPlug = (plug: PlannedPlug): string => `${endpointId(plug.endpoint)}.${plug.attr}`;

/**
 * Ordered description of utility nodes, their attribute values and the
 * connections between them and existing scene nodes. Nothing here talks to a
 * scene; `replayPlan` applies it.
 */
export class NodeGraphPlan {
  private readonly nodes = new Map<string, { type: UtilityNodeType; attrs: Map<string, AttrValue> }>();
  private readonly connections: PlannedConnection[] = [];
  private readonly drivenPlugs = new Map<string, PlannedConnection>();

  addNode(type: UtilityNodeType, name: string, attrs: Record<string, AttrValue> = {}): PlanNodeHandle {
    if (this.nodes.has(name)) {
      throw new StructuralInconsistencyError(PLAN_NODE_EXISTS(name), { details: { name } });
    }
    this.nodes.set(name, { type, attrs: new Map(Object.entries(attrs)) });
    return new PlanNodeHandle({ source: 'plan', name });
  }

  scene(ref: NodeRef): PlanNodeHandle {
    return new PlanNodeHandle({ source: 'scene', ref });
  }

  setAttr(node: PlanNodeHandle, attr: string, value: AttrValue): void {
    const planned = this.requirePlanned(node.endpoint);
    planned.attrs.set(attr, value);
  }

  connect(from: PlannedPlug, to: PlannedPlug): void {
    this.requireKnown(from.endpoint);
    this.requireKnown(to.endpoint);
    const key = formatPlannedPlug(to);
    if (this.drivenPlugs.has(key)) {
      throw new StructuralInconsistencyError(PLAN_PLUG_DRIVEN(key), { details: { plug: key } });
    }
    const connection = { from, to };
    this.connections.push(connection);
    this.drivenPlugs.set(key, connection);
  }

  has(name: string): boolean {
    return this.nodes.has(name);
  }

  plannedNodes(): PlannedNode[] {
    return [...this.nodes.entries()].map(([name, node]) => ({ name, type: node.type, attrs: node.attrs }));
  }

  plannedConnections(): PlannedConnection[] {
    return [...this.connections];
  }

  /** The plug driving `plug`, if any. */
  incoming(plug: PlannedPlug): PlannedPlug | undefined {
    return this.drivenPlugs.get(formatPlannedPlug(plug))?.from;
  }

  connectionsFrom(node: PlanNodeHandle): PlannedConnection[] {
    const id = endpointId(node.endpoint);
    return this.connections.filter((connection) => endpointId(connection.from.endpoint) === id);
  }

  attrOf(node: PlanNodeHandle, attr: string): AttrValue | undefined {
    return this.requirePlanned(node.endpoint).attrs.get(attr);
  }

  typeOf(node: PlanNodeHandle): UtilityNodeType {
    return this.requirePlanned(node.endpoint).type;
  }

  private requireKnown(endpoint: PlanEndpoint): void {
    if (endpoint.source === 'plan') this.requirePlanned(endpoint);
  }

  private requirePlanned(endpoint: PlanEndpoint): { type: UtilityNodeType; attrs: Map<string, AttrValue> } {
    const name = endpointId(endpoint);
    const planned = endpoint.source === 'plan' ? this.nodes.get(endpoint.name) : undefined;
    if (!planned) {
      throw new StructuralInconsistencyError(PLAN_NODE_UNKNOWN(name), { details: { name } });
    }
    return planned;
  }
}
