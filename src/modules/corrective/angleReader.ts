import type { NodeNaming } from '../../domain/naming';
import type { NodeGraphPlan, PlanNodeHandle } from '../../graph/NodeGraphPlan';
import { AXIS_SUFFIXES, type NodeRef } from '../../types/scene';

export type NameNode = (naming: NodeNaming) => string;

export type AngleReaderLocators = {
  base: NodeRef;
  tip: NodeRef;
  origTip: NodeRef;
};

export type AngleReader = {
  angleBetween: PlanNodeHandle;
  /** `axis * angle`; its inputs are what the debug attributes read. */
  angleTimesAxis: PlanNodeHandle;
  /** Signed per-axis deviation divided by the normalization, roughly in [-1, 1]. */
  normalized: PlanNodeHandle;
};

export const MULTIPLY_OPERATION = 1;
export const DIVIDE_OPERATION = 2;

/**
 * Plans the vector pair (current tip and rest tip, both relative to the base
 * locator), the angle between them, and the signed per-axis deviation.
 */
export const planAngleReader = (
  plan: NodeGraphPlan,
  nameNode: NameNode,
  locators: AngleReaderLocators,
  normalization: number
): AngleReader => {
  const base = plan.scene(locators.base);
  const tip = plan.scene(locators.tip);
  const origTip = plan.scene(locators.origTip);

  const source = plan.addNode('vectorDifference', nameNode({ role: 'vector', description: 'source' }));
  plan.connect(tip.plug('translate'), source.plug('input1'));
  plan.connect(base.plug('translate'), source.plug('input2'));

  const target = plan.addNode('vectorDifference', nameNode({ role: 'vector', description: 'target' }));
  plan.connect(origTip.plug('translate'), target.plug('input1'));
  plan.connect(base.plug('translate'), target.plug('input2'));

  const angleBetween = plan.addNode('angleBetween', nameNode({ role: 'angleBetween' }));
  plan.connect(source.plug('output'), angleBetween.plug('vector1'));
  plan.connect(target.plug('output'), angleBetween.plug('vector2'));

  const angleTimesAxis = plan.addNode('multiplyVector', nameNode({ role: 'mult', description: 'angleTimesAxis' }), {
    operation: MULTIPLY_OPERATION
  });
  plan.connect(angleBetween.plug('axis'), angleTimesAxis.plug('input1'));
  for (const axis of AXIS_SUFFIXES) {
    plan.connect(angleBetween.plug('angle'), angleTimesAxis.component('input2', axis));
  }

  const normalized = plan.addNode('multiplyVector', nameNode({ role: 'mult', description: 'normalizedRange' }), {
    operation: DIVIDE_OPERATION,
    input2: [normalization, normalization, normalization]
  });
  plan.connect(angleTimesAxis.plug('output'), normalized.plug('input1'));

  return { angleBetween, angleTimesAxis, normalized };
};
