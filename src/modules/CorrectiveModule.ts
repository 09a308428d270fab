import { lockTransformChannels, snapFirstToLast } from '../domain/dag';
import { parseNodeName } from '../domain/naming';
import { offsetAlongLocalAxis } from '../domain/transform';
import { IntField, NodeField } from '../fields/fieldDecorators';
import type { Field } from '../fields/fieldTypes';
import { NodeGraphPlan } from '../graph/NodeGraphPlan';
import { replayPlan } from '../graph/replayPlan';
import { MissingReferenceError } from '../shared/errors';
import { MODULE_VECTOR_BASE_REQUIRED, MODULE_VECTOR_BASE_REQUIRED_FIX } from '../shared/messages';
import { AXIS_SUFFIXES, type NodeRef } from '../types/scene';
import { planAngleReader } from './corrective/angleReader';
import { CORRECTIVE_AXES, planCorrectiveOffsets } from './corrective/offsetWiring';
import { RigModule, type RigModuleInit } from './RigModule';
import { RigModuleFields } from './RigModuleFields';
import type { RigModuleContext } from './types';

export const CORRECTIVE_MODULE_TYPE = 'corrective';

export class CorrectiveFields extends RigModuleFields {
  @IntField({ min: 1, displayable: true, editable: true, guiOrder: 1, tooltip: 'Number of corrective joints.' })
  jointCount = 1;

  @NodeField({
    displayable: true,
    editable: true,
    guiOrder: 2,
    tooltip: 'Joint the measured vector starts from. If left empty, this will automatically be set to the parent joint.'
  })
  vectorBase: NodeRef | null = null;

  @NodeField({
    displayable: true,
    editable: true,
    guiOrder: 3,
    tooltip: 'Joint the measured vector points at. If left empty, a point one unit along the base X axis is used.'
  })
  vectorTip: NodeRef | null = null;

  @NodeField()
  vectorBaseLoc: NodeRef | null = null;

  @NodeField()
  vectorTipLoc: NodeRef | null = null;

  @NodeField()
  origPoseVectorTipLoc: NodeRef | null = null;
}

export type CorrectiveLocators = {
  space: NodeRef;
  base: NodeRef;
  tip: NodeRef;
  origTip: NodeRef;
};

/**
 * Joints that follow an artist-authored offset, scaled by how far the vector
 * from `vectorBase` to `vectorTip` has rotated away from its rest direction.
 */
export class CorrectiveModule extends RigModule<CorrectiveFields> {
  readonly moduleType = CORRECTIVE_MODULE_TYPE;
  readonly jointCount: Field<number>;
  readonly vectorBase: Field<NodeRef | null>;
  readonly vectorTip: Field<NodeRef | null>;
  readonly vectorBaseLoc: Field<NodeRef | null>;
  readonly vectorTipLoc: Field<NodeRef | null>;
  readonly origPoseVectorTipLoc: Field<NodeRef | null>;

  constructor(context: RigModuleContext, init: RigModuleInit = {}) {
    super(context, CorrectiveFields, init);
    this.jointCount = this.store.field('jointCount');
    this.vectorBase = this.store.field('vectorBase');
    this.vectorTip = this.store.field('vectorTip');
    this.vectorBaseLoc = this.store.field('vectorBaseLoc');
    this.vectorTipLoc = this.store.field('vectorTipLoc');
    this.origPoseVectorTipLoc = this.store.field('origPoseVectorTipLoc');
  }

  initialize(): void {
    super.initialize();
    this.updateJointCount();
  }

  update(): void {
    super.update();
    this.updateJointCount();
  }

  /** Every corrective joint hangs directly from `parentJoint`. */
  updateParentJoint(): void {
    const expected = this.resolveParentJoint();
    for (const joint of this.deformJoints.get()) {
      this.reparentIfNeeded(joint, expected);
    }
  }

  dependencies(): NodeRef[] {
    const refs = super.dependencies();
    for (const ref of [this.vectorBase.get(), this.vectorTip.get()]) {
      if (ref !== null && !refs.includes(ref)) refs.push(ref);
    }
    return refs;
  }

  build(): void {
    this.logger.debug('build stage', { stage: 'ensure-vector-base' });
    this.ensureVectorBase();

    this.logger.debug('build stage', { stage: 'create-locators' });
    const locators = this.createLocators();

    this.logger.debug('build stage', { stage: 'build-angle-reader' });
    const plan = new NodeGraphPlan();
    const nameNode = this.formatName.bind(this);
    const reader = planAngleReader(plan, nameNode, locators, this.config.angleNormalization);

    this.logger.debug('build stage', { stage: 'wire-joints' });
    this.drivingJoints.forEach((joint, index) => {
      const objectId = parseNodeName(joint)?.objectId ?? index;
      const control = this.addCorrectiveControl(joint, objectId);
      planCorrectiveOffsets(plan, nameNode, reader, control, objectId);
    });

    this.logger.debug('build stage', { stage: 'replay' });
    replayPlan(plan, this.scene, (ref) => this.trackBuildNode(ref));
  }

  protected onBuildCleared(): void {
    this.vectorBaseLoc.set(null);
    this.vectorTipLoc.set(null);
    this.origPoseVectorTipLoc.set(null);
  }

  /** An empty `vectorBase` falls back to `parentJoint`; with neither there is nothing to measure from. */
  private ensureVectorBase(): void {
    if (this.vectorBase.get() === null) {
      const parent = this.parentJoint.get();
      if (parent === null) {
        throw new MissingReferenceError(this.vectorBase.key, MODULE_VECTOR_BASE_REQUIRED(this.nodeName), {
          fix: MODULE_VECTOR_BASE_REQUIRED_FIX
        });
      }
      this.vectorBase.set(parent);
    }
    this.resolveReference(this.vectorBase);
  }

  private createLocators(): CorrectiveLocators {
    const vectorBase = this.requireNode(this.vectorBase);
    const vectorTip = this.resolveReference(this.vectorTip);

    const space = this.addNode('transform', { role: 'grp', description: 'vectorsLocalSpace' });
    this.scene.reparent(space, this.requireNode(this.extrasGroup));
    this.scene.setAttr({ node: space, attr: 'inheritsTransform' }, false);
    snapFirstToLast(this.scene, space, vectorBase);
    this.scene.constrainRigid(vectorBase, space, false, { translateOnly: true });

    const base = this.addNode('locator', { role: 'loc', description: 'vectorBase' });
    snapFirstToLast(this.scene, base, vectorBase);
    this.scene.reparent(base, space);
    this.scene.constrainRigid(vectorBase, base, false);
    this.vectorBaseLoc.set(base);

    const tip = this.addNode('locator', { role: 'loc', description: 'vectorTip' });
    if (vectorTip !== null) {
      snapFirstToLast(this.scene, tip, vectorTip);
      this.scene.reparent(tip, space);
      this.scene.constrainRigid(vectorTip, tip, true);
    } else {
      this.scene.setWorldTransform(tip, offsetAlongLocalAxis(this.scene.getWorldTransform(base), 'x', this.config.vectorTipOffset));
      this.scene.reparent(tip, space);
      this.scene.constrainRigid(base, tip, true);
    }
    this.vectorTipLoc.set(tip);

    // Rest direction is the tip's own rest position rather than a fixed +X offset.
    const origTip = this.addNode('locator', { role: 'loc', description: 'origPoseVectorTip' });
    snapFirstToLast(this.scene, origTip, tip);
    this.scene.reparent(origTip, space);
    this.origPoseVectorTipLoc.set(origTip);

    return { space, base, tip, origTip };
  }

  private addCorrectiveControl(joint: NodeRef, objectId: number): NodeRef {
    const { control, buffer } = this.addControl(joint, objectId);
    this.scene.reparent(buffer, this.requireNode(this.controlsGroup));
    this.addParentGroup(control, 'offset', objectId);
    this.scene.constrainRigid(control, joint, false);

    this.persistAttribute(control, joint, 'affectedBy', 'enum', { enumNames: [...CORRECTIVE_AXES], keyable: true });
    for (const attr of ['angle', 'xValue', 'yValue', 'zValue']) {
      this.scene.addCustomAttr(control, attr, 'double', { channelBox: true });
    }
    lockTransformChannels(this.scene, control);
    for (const axis of AXIS_SUFFIXES) {
      this.persistAttribute(control, joint, `offsetPositive${axis}`, 'double', { keyable: true });
      this.persistAttribute(control, joint, `offsetNegative${axis}`, 'double', { keyable: true });
    }
    return control;
  }

  private updateJointCount(): void {
    const diff = this.jointCount.get() - this.deformJoints.get().length;
    if (diff > 0) {
      const parent = this.resolveParentJoint();
      for (let i = 0; i < diff; i += 1) {
        this.addDeformJoint(parent);
      }
      this.logger.debug('added corrective joints', { added: diff, count: this.jointCount.get() });
    } else if (diff < 0) {
      this.removeDeformJoints(-diff, { cascade: true });
    }
  }
}
