import { IntField } from '../fields/fieldDecorators';
import type { Field } from '../fields/fieldTypes';
import type { NodeRef } from '../types/scene';
import { RigModule, type RigModuleInit } from './RigModule';
import { RigModuleFields } from './RigModuleFields';
import type { RigModuleContext } from './types';

export const CHAIN_MODULE_TYPE = 'chain';

export class ChainFields extends RigModuleFields {
  @IntField({ min: 1, displayable: true, editable: true, guiOrder: 1, tooltip: 'Number of joints in the chain.' })
  chainLength = 1;
}

/** A linear joint chain with one control per joint, controls nested like the joints. */
export class ChainModule extends RigModule<ChainFields> {
  readonly moduleType = CHAIN_MODULE_TYPE;
  readonly chainLength: Field<number>;

  constructor(context: RigModuleContext, init: RigModuleInit = {}) {
    super(context, ChainFields, init);
    this.chainLength = this.store.field('chainLength');
  }

  initialize(): void {
    super.initialize();
    this.updateChainLength();
  }

  update(): void {
    super.update();
    this.updateChainLength();
  }

  build(): void {
    let parent = this.requireNode(this.controlsGroup);
    this.drivingJoints.forEach((joint, index) => {
      const { control, buffer } = this.addControl(joint, index);
      this.scene.reparent(buffer, parent);
      this.scene.constrainRigid(control, joint, false);
      parent = control;
    });
  }

  /** Each new joint hangs from the current tail, or from `parentJoint` while the chain is empty. */
  protected addDeformJoint(parent?: NodeRef | null): NodeRef {
    if (parent !== undefined) return super.addDeformJoint(parent);
    const joints = this.deformJoints.get();
    const tail = joints.length > 0 ? joints[joints.length - 1] : undefined;
    const joint = super.addDeformJoint(tail);
    this.scene.setLocalTranslation(joint, 'x', this.config.jointSpacing);
    return joint;
  }

  private updateChainLength(): void {
    const diff = this.chainLength.get() - this.deformJoints.get().length;
    if (diff > 0) {
      for (let i = 0; i < diff; i += 1) {
        this.addDeformJoint();
      }
      this.logger.debug('grew chain', { added: diff, length: this.chainLength.get() });
    } else if (diff < 0) {
      this.removeDeformJoints(-diff, { cascade: this.config.chainShrinkPolicy === 'cascade' });
    }
  }
}
