import type { SceneGraphPort } from '../ports/sceneGraph';
import { StructuralInconsistencyError } from '../shared/errors';
import { PLAN_NODE_UNKNOWN } from '../shared/messages';
import type { AttrPlug, NodeRef } from '../types/scene';
import type { NodeGraphPlan, PlannedNode, PlannedPlug } from './NodeGraphPlan';

export type ReplayCreateHook = (ref: NodeRef, node: PlannedNode) => void;

/**
 * Applies `plan` to `scene`: creates every planned node, sets its attributes,
 * then makes every connection in the order it was planned. Returns the scene
 * ref of each planned node by name.
 */
export const replayPlan = (plan: NodeGraphPlan, scene: SceneGraphPort, onCreate?: ReplayCreateHook): Map<string, NodeRef> => {
  const refs = new Map<string, NodeRef>();
  for (const node of plan.plannedNodes()) {
    const ref = scene.createNode(node.type, node.name);
    refs.set(node.name, ref);
    onCreate?.(ref, node);
    for (const [attr, value] of node.attrs) {
      scene.setAttr({ node: ref, attr }, value);
    }
  }

  const resolve = (plug: PlannedPlug): AttrPlug => {
    if (plug.endpoint.source === 'scene') return { node: plug.endpoint.ref, attr: plug.attr };
    const ref = refs.get(plug.endpoint.name);
    if (ref === undefined) {
      throw new StructuralInconsistencyError(PLAN_NODE_UNKNOWN(plug.endpoint.name));
    }
    return { node: ref, attr: plug.attr };
  };

  for (const connection of plan.plannedConnections()) {
    scene.connect(resolve(connection.from), resolve(connection.to));
  }
  return refs;
};
