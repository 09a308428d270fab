import type { SceneGraphPort } from '../ports/sceneGraph';
import { AXIS_SUFFIXES, TRANSFORM_CHANNELS, type NodeRef } from '../types/scene';

export const snapFirstToLast = (scene: SceneGraphPort, first: NodeRef, last: NodeRef): void => {
  scene.setWorldTransform(first, scene.getWorldTransform(last));
};

/**
 * Inserts `group` between `node` and its current parent. The group starts on the
 * node's world transform, so the node's local transform becomes identity.
 */
export const insertParentGroup = (scene: SceneGraphPort, node: NodeRef, group: NodeRef): NodeRef => {
  const parent = scene.getParent(node);
  snapFirstToLast(scene, group, node);
  scene.reparent(group, parent);
  scene.reparent(node, group);
  return group;
};

export const lockTransformChannels = (scene: SceneGraphPort, node: NodeRef): void => {
  for (const channel of TRANSFORM_CHANNELS) {
    for (const axis of AXIS_SUFFIXES) {
      scene.lockAttr({ node, attr: `${channel}${axis}` });
    }
  }
};
