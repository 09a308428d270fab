import type { NodeGraphPlan, PlanNodeHandle } from '../../graph/NodeGraphPlan';
import { AXIS_SUFFIXES, type AxisSuffix, type NodeRef } from '../../types/scene';
import { MULTIPLY_OPERATION, type AngleReader, type NameNode } from './angleReader';

/** Deviation axes a corrective can react to, in `affectedBy` enum order. */
export const CORRECTIVE_AXES: readonly AxisSuffix[] = ['Y', 'Z'];

export const CONDITION_EQUAL = 0;
export const CONDITION_GREATER_OR_EQUAL = 3;

export type CorrectiveBranch = {
  axis: AxisSuffix;
  positiveOffset: PlanNodeHandle;
  negativeOffset: PlanNodeHandle;
  valueOpposite: PlanNodeHandle;
  condition: PlanNodeHandle;
};

export type CorrectiveWiring = {
  branches: CorrectiveBranch[];
  affectedBy: PlanNodeHandle;
};

/**
 * Plans one control's offset network: for each of Y and Z a choice between
 * `value * offsetPositive` and `-value * offsetNegative` depending on the sign
 * of the deviation, then `affectedBy` picks the branch that drives translate.
 */
export const planCorrectiveOffsets = (
  plan: NodeGraphPlan,
  nameNode: NameNode,
  reader: AngleReader,
  control: NodeRef,
  objectId: number
): CorrectiveWiring => {
  const ctl = plan.scene(control);
  const branches = CORRECTIVE_AXES.map((axis): CorrectiveBranch => {
    const value = reader.normalized.component('output', axis);

    const valueOpposite = plan.addNode(
      'multiplyScalar',
      nameNode({ role: 'mult', description: `valueOpposite${axis}`, objectId }),
      { input2: -1 }
    );
    plan.connect(value, valueOpposite.plug('input1'));

    const positiveOffset = plan.addNode(
      'multiplyVector',
      nameNode({ role: 'mult', description: `positiveOffset${axis}`, objectId }),
      { operation: MULTIPLY_OPERATION }
    );
    const negativeOffset = plan.addNode(
      'multiplyVector',
      nameNode({ role: 'mult', description: `negativeOffset${axis}`, objectId }),
      { operation: MULTIPLY_OPERATION }
    );
    for (const component of AXIS_SUFFIXES) {
      plan.connect(value, positiveOffset.component('input1', component));
      plan.connect(ctl.component('offsetPositive', component), positiveOffset.component('input2', component));
      plan.connect(valueOpposite.plug('output'), negativeOffset.component('input1', component));
      plan.connect(ctl.component('offsetNegative', component), negativeOffset.component('input2', component));
    }

    const condition = plan.addNode('condition', nameNode({ role: 'cond', description: axis, objectId }), {
      operation: CONDITION_GREATER_OR_EQUAL,
      secondTerm: 0
    });
    plan.connect(value, condition.plug('firstTerm'));
    plan.connect(positiveOffset.plug('output'), condition.plug('colorIfTrue'));
    plan.connect(negativeOffset.plug('output'), condition.plug('colorIfFalse'));

    return { axis, positiveOffset, negativeOffset, valueOpposite, condition };
  });

  const [yBranch, zBranch] = branches;
  const affectedBy = plan.addNode('condition', nameNode({ role: 'cond', description: 'affectedBy', objectId }), {
    operation: CONDITION_EQUAL,
    secondTerm: 0
  });
  plan.connect(ctl.plug('affectedBy'), affectedBy.plug('firstTerm'));
  plan.connect(yBranch.condition.plug('outColor'), affectedBy.plug('colorIfTrue'));
  plan.connect(zBranch.condition.plug('outColor'), affectedBy.plug('colorIfFalse'));
  plan.connect(affectedBy.plug('outColor'), ctl.plug('translate'));

  plan.connect(reader.angleTimesAxis.component('input2', 'X'), ctl.plug('angle'));
  plan.connect(reader.angleTimesAxis.component('input1', 'X'), ctl.plug('xValue'));
  plan.connect(reader.angleTimesAxis.component('input1', 'Y'), ctl.plug('yValue'));
  plan.connect(reader.angleTimesAxis.component('input1', 'Z'), ctl.plug('zValue'));

  return { branches, affectedBy };
};
