import type {
  AttrPlug,
  AttrValue,
  Axis,
  CustomAttrConstraints,
  CustomAttrType,
  Matrix4,
  NodeRef,
  NodeType,
  RigidConstraintOptions
} from '../types/scene';

/**
 * Mutation and query surface of the host scene graph. Implementations throw on
 * failure; callers let those errors propagate.
 */
export interface SceneGraphPort {
  /** Creates a node; the returned ref may differ from the hint when the name is taken. */
  createNode(type: NodeType, nameHint: string): NodeRef;
  /** Deletes the listed nodes. Children of a deleted node move to the world root. */
  deleteNodes(refs: NodeRef[]): void;
  getWorldTransform(ref: NodeRef): Matrix4;
  setWorldTransform(ref: NodeRef, matrix: Matrix4): void;
  setLocalTranslation(ref: NodeRef, axis: Axis, value: number): void;
  /** Moves `child` under `parent` (or the world root for null), keeping its world transform. */
  reparent(child: NodeRef, parent: NodeRef | null): void;
  getParent(ref: NodeRef): NodeRef | null;
  connect(source: AttrPlug, destination: AttrPlug): void;
  setAttr(plug: AttrPlug, value: AttrValue): void;
  getAttr(plug: AttrPlug): AttrValue | undefined;
  lockAttr(plug: AttrPlug): void;
  addCustomAttr(ref: NodeRef, name: string, type: CustomAttrType, constraints?: CustomAttrConstraints): void;
  /** Makes `driven` follow `driver`; with `maintainOffset` the current relative transform is kept. */
  constrainRigid(driver: NodeRef, driven: NodeRef, maintainOffset: boolean, options?: RigidConstraintOptions): void;
}
