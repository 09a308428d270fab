import type { RigConfig } from '../config';
import { insertParentGroup, lockTransformChannels, snapFirstToLast } from '../domain/dag';
import { formatNodeName, type NodeNaming, type Side } from '../domain/naming';
import { FieldStore } from '../fields/FieldStore';
import type { AttributeBindingValue, Field, FieldDescriptor, FieldSchemaClass } from '../fields/fieldTypes';
import { ScopedLogger, type Logger } from '../logging';
import type { SceneGraphPort } from '../ports/sceneGraph';
import { MissingReferenceError, StructuralInconsistencyError } from '../shared/errors';
import {
  MODULE_ALREADY_INITIALIZED,
  MODULE_DANGLING_DEPENDENTS,
  MODULE_NOT_INITIALIZED,
  MODULE_PARENT_JOINT_MISSING,
  MODULE_PARENT_JOINT_MISSING_FIX,
  MODULE_REFERENCE_MISSING,
  MODULE_REFERENCE_REQUIRED,
  MODULE_REFERENCE_REQUIRED_FIX
} from '../shared/messages';
import type { CustomAttrConstraints, CustomAttrType, NodeRef, NodeType } from '../types/scene';
import type { RigModuleFields } from './RigModuleFields';
import type { BuildRoots, ModuleLifecycle, RigModuleContext, RigModuleHost, RigModuleRecord } from './types';

export type RigModuleInit = {
  fields?: Record<string, unknown>;
  /** The fields come from a saved document: validate them as a whole and skip `initialize()`. */
  persisted?: boolean;
};

export type ShrinkOptions = {
  /** Redirect and update dependents before deleting; otherwise they are only reported. */
  cascade: boolean;
};

export type ControlNodes = {
  control: NodeRef;
  buffer: NodeRef;
};

export type FieldSnapshot = FieldDescriptor & { value: unknown };

/**
 * Base of every rig module: owns a typed field store, the ordered deform joints
 * and the lifecycle `initialize -> update -> build -> publish`.
 */
export abstract class RigModule<S extends RigModuleFields = RigModuleFields> {
  abstract readonly moduleType: string;

  protected readonly scene: SceneGraphPort;
  protected readonly host: RigModuleHost;
  protected readonly config: RigConfig;
  protected readonly logger: Logger;
  protected readonly store: FieldStore<S>;

  readonly name: Field<string>;
  readonly side: Field<Side>;
  readonly parentJoint: Field<NodeRef | null>;
  readonly deformJoints: Field<NodeRef[]>;
  readonly controlsGroup: Field<NodeRef | null>;
  readonly extrasGroup: Field<NodeRef | null>;
  readonly buildNodes: Field<NodeRef[]>;
  readonly persistentAttributes: Field<AttributeBindingValue[]>;

  private lifecycle: ModuleLifecycle;

  protected constructor(context: RigModuleContext, schema: FieldSchemaClass<S>, init: RigModuleInit = {}) {
    this.scene = context.scene;
    this.host = context.host;
    this.config = context.config;
    this.store = init.persisted
      ? FieldStore.hydrate(schema, init.fields ?? {})
      : FieldStore.create(schema, init.fields ?? {});
    this.logger = new ScopedLogger(context.logger, () => this.nodeName);
    this.lifecycle = init.persisted ? 'updated' : 'created';

    this.name = this.store.field('name');
    this.side = this.store.field('side');
    this.parentJoint = this.store.field('parentJoint');
    this.deformJoints = this.store.field('deformJoints');
    this.controlsGroup = this.store.field('controlsGroup');
    this.extrasGroup = this.store.field('extrasGroup');
    this.buildNodes = this.store.field('buildNodes');
    this.persistentAttributes = this.store.field('persistentAttributes');
  }

  get nodeName(): string {
    return `${this.name.get()}_${this.side.get()}`;
  }

  get lifecycleState(): ModuleLifecycle {
    return this.lifecycle;
  }

  /** Deform joints that receive a control; every deform joint unless a module narrows it. */
  get drivingJoints(): NodeRef[] {
    return this.deformJoints.get();
  }

  initialize(): void {
    if (this.lifecycle !== 'created') {
      throw new StructuralInconsistencyError(MODULE_ALREADY_INITIALIZED(this.nodeName));
    }
    this.lifecycle = 'initialized';
  }

  update(): void {
    this.updateParentJoint();
    this.lifecycle = 'updated';
  }

  /** Moves the first owned joint under `parentJoint` when the scene disagrees. */
  updateParentJoint(): void {
    const [first] = this.deformJoints.get();
    if (first === undefined) return;
    this.reparentIfNeeded(first, this.resolveParentJoint());
  }

  abstract build(): void;

  publish(): void {
    this.lifecycle = 'published';
  }

  /** Creates the module's groups under the rig roots, runs `build()` and records the new state. */
  buildInto(roots: BuildRoots): void {
    if (this.lifecycle === 'created') {
      throw new StructuralInconsistencyError(MODULE_NOT_INITIALIZED(this.nodeName));
    }
    this.prepareBuild(roots);
    this.build();
    this.lifecycle = 'built';
  }

  prepareBuild(roots: BuildRoots): void {
    const controls = this.addNode('transform', { role: 'grp', description: 'controls' });
    this.scene.reparent(controls, roots.controls);
    this.controlsGroup.set(controls);
    const extras = this.addNode('transform', { role: 'grp', description: 'extras' });
    this.scene.reparent(extras, roots.extras);
    this.extrasGroup.set(extras);
  }

  /** Deletes everything the last build created, keeping artist-authored attribute values. */
  clearBuild(): void {
    const nodes = this.buildNodes.get();
    if (nodes.length > 0) {
      this.capturePersistentAttributes();
      this.scene.deleteNodes(nodes);
    }
    this.buildNodes.set([]);
    this.controlsGroup.set(null);
    this.extrasGroup.set(null);
    this.onBuildCleared();
    if (this.lifecycle !== 'created') this.lifecycle = 'updated';
  }

  /** Reads stored attribute values back from the last build's nodes; other values are left as stored. */
  capturePersistentAttributes(): void {
    const bindings = this.persistentAttributes.get();
    if (bindings.length === 0) return;
    const built = new Set(this.buildNodes.get());
    const captured = bindings.map((binding) => {
      if (!built.has(binding.node)) return binding;
      const current = this.scene.getAttr({ node: binding.node, attr: binding.attr });
      return typeof current === 'number' ? { ...binding, value: current } : binding;
    });
    this.persistentAttributes.set(captured);
  }

  /** Removes every owned joint, redirecting dependents first. */
  teardown(): void {
    this.removeDeformJoints(this.deformJoints.get().length, { cascade: true });
  }

  /** Nodes this module reads while building; the rig builds their owners first. */
  dependencies(): NodeRef[] {
    const parent = this.parentJoint.get();
    return parent ? [parent] : [];
  }

  setField(key: string, value: unknown): void {
    this.store.setRaw(key, value);
  }

  getField(key: string): unknown {
    return this.store.readRaw(key);
  }

  describeFields(): FieldSnapshot[] {
    return this.store.descriptors().map((descriptor) => ({ ...descriptor, value: this.store.readRaw(descriptor.key) }));
  }

  hasUnsavedFields(): boolean {
    return this.store.isDirty();
  }

  markPersisted(): void {
    this.store.markPersisted();
  }

  toRecord(): RigModuleRecord {
    return { type: this.moduleType, fields: this.store.serialize() };
  }

  protected onBuildCleared(): void {}

  protected formatName(naming: NodeNaming): string {
    return formatNodeName({ module: this.name.get(), side: this.side.get(), ...naming });
  }

  /**
   * Creates one joint under `parent`, or under the resolved `parentJoint` when
   * `parent` is omitted, and appends it to the owned list.
   */
  protected addDeformJoint(parent?: NodeRef | null): NodeRef {
    const joints = this.deformJoints.get();
    const parentRef = parent === undefined ? this.resolveParentJoint() : parent;
    const joint = this.scene.createNode('joint', this.formatName({ role: 'deform', objectId: joints.length }));
    if (parentRef !== null) {
      snapFirstToLast(this.scene, joint, parentRef);
      this.scene.reparent(joint, parentRef);
    }
    this.deformJoints.set([...joints, joint]);
    this.host.registerJoint(joint, this);
    this.logger.debug('added deform joint', { joint, parent: parentRef });
    return joint;
  }

  /**
   * Drops the last `count` joints in two phases. Phase 1 finds every other
   * module hanging from a doomed joint and, with `cascade`, redirects it to the
   * last surviving joint (or this module's parent) and updates it. Phase 2
   * deletes. Dependents never see a deleted parent.
   */
  protected removeDeformJoints(count: number, options: ShrinkOptions): NodeRef[] {
    const joints = this.deformJoints.get();
    const removeCount = Math.min(Math.max(count, 0), joints.length);
    if (removeCount === 0) return [];
    const keep = joints.slice(0, joints.length - removeCount);
    const doomed = joints.slice(joints.length - removeCount);

    const dependents = this.host.modules().filter((module) => {
      if (module === this) return false;
      const parent = module.parentJoint.get();
      return parent !== null && doomed.includes(parent);
    });
    if (options.cascade) {
      const fallback = keep.length > 0 ? keep[keep.length - 1] : this.parentJoint.get();
      for (const dependent of dependents) {
        this.logger.debug('redirecting dependent', {
          dependent: dependent.nodeName,
          from: dependent.parentJoint.get(),
          to: fallback
        });
        dependent.parentJoint.set(fallback);
        dependent.update();
      }
    } else if (dependents.length > 0) {
      this.logger.warn(MODULE_DANGLING_DEPENDENTS(this.nodeName, dependents.map((dependent) => dependent.nodeName)), {
        joints: doomed
      });
    }

    this.deformJoints.set(keep);
    this.scene.deleteNodes(doomed);
    this.host.unregisterJoints(doomed);
    this.dropPersistentAttributes(doomed);
    this.logger.debug('removed deform joints', { joints: doomed });
    return doomed;
  }

  protected resolveParentJoint(): NodeRef | null {
    const ref = this.parentJoint.get();
    if (ref === null) return null;
    const resolved = this.host.resolveJoint(ref);
    if (resolved === null) {
      throw new StructuralInconsistencyError(MODULE_PARENT_JOINT_MISSING(this.nodeName, ref), {
        fix: MODULE_PARENT_JOINT_MISSING_FIX,
        details: { module: this.nodeName, parentJoint: ref }
      });
    }
    return resolved;
  }

  protected reparentIfNeeded(node: NodeRef, expectedParent: NodeRef | null): boolean {
    const actual = this.scene.getParent(node);
    if (actual === expectedParent) return false;
    this.scene.reparent(node, expectedParent);
    this.logger.debug('repaired joint parent', { joint: node, from: actual, to: expectedParent });
    return true;
  }

  /** The referenced joint, or null when the field is empty; a dead reference is an error. */
  protected resolveReference(field: Field<NodeRef | null>): NodeRef | null {
    const ref = field.get();
    if (ref === null) return null;
    if (this.host.resolveJoint(ref) === null) {
      throw new MissingReferenceError(field.key, MODULE_REFERENCE_MISSING(this.nodeName, field.key, ref), {
        fix: MODULE_REFERENCE_REQUIRED_FIX(field.key)
      });
    }
    return ref;
  }

  protected requireNode(field: Field<NodeRef | null>): NodeRef {
    const ref = field.get();
    if (ref === null) {
      throw new MissingReferenceError(field.key, MODULE_REFERENCE_REQUIRED(this.nodeName, field.key), {
        fix: MODULE_REFERENCE_REQUIRED_FIX(field.key)
      });
    }
    return ref;
  }

  protected addNode(type: NodeType, naming: NodeNaming): NodeRef {
    const ref = this.scene.createNode(type, this.formatName(naming));
    this.trackBuildNode(ref);
    return ref;
  }

  protected trackBuildNode(ref: NodeRef): void {
    this.buildNodes.set([...this.buildNodes.get(), ref]);
  }

  /** A control snapped to `joint`, under a locked `buffer` group that carries its rest transform. */
  protected addControl(joint: NodeRef, objectId: number): ControlNodes {
    const control = this.addNode('control', { role: 'ctl', objectId });
    snapFirstToLast(this.scene, control, joint);
    const buffer = this.addParentGroup(control, 'buffer', objectId);
    lockTransformChannels(this.scene, buffer);
    return { control, buffer };
  }

  protected addParentGroup(node: NodeRef, role: string, objectId?: number): NodeRef {
    const group = this.addNode('transform', objectId === undefined ? { role } : { role, objectId });
    return insertParentGroup(this.scene, node, group);
  }

  /**
   * Adds a custom attribute whose value survives rebuilds, restoring the last
   * captured value. Values are keyed by `owner`, the deform joint the node was
   * built for, so they follow the joint through renames of the module.
   */
  protected persistAttribute(
    node: NodeRef,
    owner: NodeRef,
    attr: string,
    type: CustomAttrType,
    constraints: CustomAttrConstraints = {}
  ): void {
    this.scene.addCustomAttr(node, attr, type, constraints);
    const bindings = this.persistentAttributes.get();
    const previous = bindings.find((binding) => binding.owner === owner && binding.attr === attr);
    let value = typeof constraints.defaultValue === 'number' ? constraints.defaultValue : 0;
    if (previous) {
      value = previous.value;
      this.scene.setAttr({ node, attr }, value);
    }
    const next = bindings.filter((binding) => !(binding.owner === owner && binding.attr === attr));
    next.push({ node, owner, attr, value });
    this.persistentAttributes.set(next);
  }

  private dropPersistentAttributes(joints: readonly NodeRef[]): void {
    const bindings = this.persistentAttributes.get();
    const kept = bindings.filter((binding) => !joints.includes(binding.owner));
    if (kept.length !== bindings.length) this.persistentAttributes.set(kept);
  }
}
