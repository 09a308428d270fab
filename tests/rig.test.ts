import assert from 'node:assert/strict';

import { CorrectiveModule } from '../src/modules/CorrectiveModule';
import { RIG_CONTROLS_GROUP, RIG_EXTRAS_GROUP } from '../src/rig/Rig';
import { StructuralInconsistencyError, UnknownModuleError, ValidationError } from '../src/shared/errors';
import { createRigHarness } from './helpers';

{
  const { rig } = createRigHarness();
  const middle = rig.addModule('chain', { name: 'arm' });
  assert.equal(rig.module('arm'), middle);
  const left = rig.addModule('corrective', { name: 'arm', side: 'L' });
  assert.throws(
    () => rig.addModule('chain', { name: 'arm', side: 'L' }),
    (err: unknown) => err instanceof ValidationError && err.message === 'Module already exists: arm_L'
  );
  assert.equal(rig.modules().length, 2);
  assert.equal(rig.module('arm_M'), middle);
  assert.equal(rig.module('arm_L'), left);
  assert.throws(
    () => rig.module('arm'),
    (err: unknown) =>
      err instanceof UnknownModuleError && err.message === 'Module name arm is ambiguous, use one of: arm_M, arm_L'
  );
  assert.throws(
    () => rig.setModuleField('arm_M', 'side', 'L'),
    (err: unknown) => err instanceof ValidationError && err.message === 'Module already exists: arm_L'
  );
  assert.equal(middle.side.get(), 'M');
  rig.setModuleField('arm_M', 'side', 'R');
  assert.equal(rig.module('arm_R'), middle);
}

{
  const { rig } = createRigHarness();
  assert.throws(
    () => rig.addModule('wing'),
    (err: unknown) => {
      assert.ok(err instanceof UnknownModuleError);
      assert.deepEqual(err.toPayload(), {
        code: 'unknown_module',
        message: 'Unknown module type: wing',
        fix: 'Use one of: chain, corrective.',
        details: { type: 'wing', known: ['chain', 'corrective'] }
      });
      return true;
    }
  );
  assert.throws(
    () => rig.module('nope'),
    (err: unknown) => err instanceof UnknownModuleError && err.message === 'Module not found: nope'
  );
  assert.equal(rig.findModule('nope'), undefined);
}

{
  const { rig, scene } = createRigHarness();
  assert.throws(
    () => rig.add((context) => new CorrectiveModule(context, { fields: { name: 'knee', parentJoint: 'ghost' } })),
    StructuralInconsistencyError
  );
  assert.equal(rig.modules().length, 0);
  assert.equal(scene.nodes('joint').length, 1);
  rig.addModule('corrective', { name: 'knee' });
  assert.equal(rig.modules().length, 1);
}

{
  const { rig, root } = createRigHarness();
  rig.addModule('chain', { name: 'arm', parentJoint: root });
  rig.addModule('chain', { name: 'leg', parentJoint: root });
  assert.throws(
    () => rig.setModuleField('leg', 'name', 'arm'),
    (err: unknown) => err instanceof ValidationError && err.field === 'name'
  );
  assert.throws(
    () => rig.setModuleField('leg', 'name', 'left leg'),
    (err: unknown) => err instanceof ValidationError && err.field === 'name'
  );
  rig.setModuleField('leg', 'name', 'foot');
  assert.equal(rig.module('foot').nodeName, 'foot_M');
  assert.equal(rig.findModule('leg'), undefined);
  assert.equal(rig.module('foot').hasUnsavedFields(), true);
}

{
  const { rig, root } = createRigHarness();
  rig.addModule('corrective', { name: 'knee', parentJoint: root });
  rig.addModule('chain', { name: 'leg', parentJoint: root, chainLength: 2 });
  rig.setModuleField('knee', 'vectorTip', 'leg_M_1_deform');
  const report = rig.build();
  assert.equal(report.ok, true);
  assert.deepEqual(report.order, ['leg_M', 'knee_M']);
  assert.deepEqual(rig.buildRoots, { controls: RIG_CONTROLS_GROUP, extras: RIG_EXTRAS_GROUP });
}

{
  const { rig, root } = createRigHarness();
  rig.addModule('corrective', { name: 'a', parentJoint: root });
  rig.addModule('corrective', { name: 'b', parentJoint: root });
  rig.setModuleField('a', 'vectorTip', 'b_M_0_deform');
  rig.setModuleField('b', 'vectorTip', 'a_M_0_deform');
  assert.throws(
    () => rig.build(),
    (err: unknown) =>
      err instanceof StructuralInconsistencyError && err.message === 'Modules depend on each other in a cycle: a_M -> b_M'
  );
}

{
  const { rig, root, logger } = createRigHarness({ onModuleError: 'continue' });
  const loose = rig.addModule('corrective', { name: 'loose' });
  const arm = rig.addModule('chain', { name: 'arm', parentJoint: root });
  const report = rig.build();
  assert.equal(report.ok, false);
  assert.deepEqual(report.order, ['loose_M', 'arm_M']);
  const [failed, built] = report.outcomes;
  assert.equal(failed.module, 'loose_M');
  assert.equal(failed.result.ok, false);
  if (!failed.result.ok) {
    assert.equal(failed.result.error.code, 'missing_reference');
    assert.equal(failed.result.error.message, 'loose_M has neither vectorBase nor parentJoint to measure from');
  }
  assert.deepEqual(built, { module: 'arm_M', result: { ok: true, value: null } });
  assert.equal(arm.lifecycleState, 'built');
  assert.equal(loose.lifecycleState, 'updated');

  const errors = logger.entries.filter((entry) => entry.level === 'error');
  assert.equal(errors.length, 1);
  assert.equal(errors[0].message, 'Module build failed: loose_M');
  assert.equal(errors[0].meta?.module, 'loose_M');
}

{
  const { rig, scene, root } = createRigHarness();
  const corr = rig.addModule('corrective', { name: 'corr', parentJoint: root });
  rig.build();
  const ctl = 'corr_M_0_ctl';
  scene.setAttr({ node: ctl, attr: 'offsetNegativeX' }, 2.5);
  scene.setAttr({ node: ctl, attr: 'offsetPositiveZ' }, -1);
  scene.setAttr({ node: ctl, attr: 'affectedBy' }, 1);
  const nodeCount = scene.nodes().length;

  rig.rebuild();
  assert.equal(scene.nodes().length, nodeCount);
  assert.equal(scene.getAttr({ node: ctl, attr: 'offsetNegativeX' }), 2.5);
  assert.equal(scene.getAttr({ node: ctl, attr: 'offsetPositiveZ' }), -1);
  assert.equal(scene.getAttr({ node: ctl, attr: 'affectedBy' }), 1);
  assert.equal(scene.getAttr({ node: ctl, attr: 'offsetPositiveX' }), 0);
  assert.equal(corr.persistentAttributes.get().length, 7);

  rig.unbuild();
  assert.equal(scene.exists(ctl), false);
  assert.equal(rig.buildRoots, null);
  const negativeX = corr.persistentAttributes.get().find((binding) => binding.attr === 'offsetNegativeX');
  assert.deepEqual(negativeX, { node: ctl, owner: 'corr_M_0_deform', attr: 'offsetNegativeX', value: 2.5 });
}

{
  const { rig, scene, root } = createRigHarness();
  rig.addModule('chain', { name: 'arm', side: 'L', parentJoint: root, chainLength: 3 });
  const hand = rig.addModule('chain', { name: 'hand', side: 'L', parentJoint: 'arm_L_2_deform' });
  rig.build();

  rig.removeModule('arm');
  assert.deepEqual(
    rig.modules().map((module) => module.nodeName),
    ['hand_L']
  );
  assert.equal(hand.parentJoint.get(), root);
  assert.equal(scene.getParent('hand_L_0_deform'), root);
  assert.equal(scene.exists('arm_L_0_deform'), false);
  assert.equal(scene.exists('arm_L_0_ctl'), false);
  assert.equal(rig.resolveJoint('arm_L_2_deform'), null);
  assert.equal(rig.ownerOf(root), 'external');

  const report = rig.build();
  assert.deepEqual(report.order, ['hand_L']);
  rig.publish();
  assert.equal(hand.lifecycleState, 'published');
}

{
  const { rig, root } = createRigHarness();
  const arm = rig.addModule('chain', { name: 'arm', parentJoint: root, chainLength: 2 });
  assert.deepEqual(
    arm.describeFields().filter((field) => field.editable).map((field) => [field.key, field.value]),
    [
      ['name', 'arm'],
      ['side', 'M'],
      ['parentJoint', root],
      ['chainLength', 2]
    ]
  );
}

{
  const { rig, scene, root } = createRigHarness();
  const knee = rig.addModule('corrective', { name: 'knee', parentJoint: root, jointCount: 3 });
  rig.build();
  assert.equal(knee.persistentAttributes.get().length, 21);
  scene.setAttr({ node: 'knee_M_0_ctl', attr: 'offsetNegativeX' }, 2);
  scene.setAttr({ node: 'knee_M_2_ctl', attr: 'offsetNegativeX' }, 5);

  rig.setModuleField('knee', 'jointCount', 1);
  assert.deepEqual(
    [...new Set(knee.persistentAttributes.get().map((binding) => binding.owner))],
    ['knee_M_0_deform']
  );
  rig.build();
  rig.build();
  assert.equal(scene.exists('knee_M_1_ctl'), false);
  assert.equal(scene.getAttr({ node: 'knee_M_0_ctl', attr: 'offsetNegativeX' }), 2);

  const document = rig.toDocument();
  const stored = knee.persistentAttributes.get();
  assert.deepEqual(document.modules[0].fields.persistentAttributes, stored);
  assert.deepEqual(
    stored.map((binding) => binding.attr),
    ['affectedBy', 'offsetPositiveX', 'offsetNegativeX', 'offsetPositiveY', 'offsetNegativeY', 'offsetPositiveZ', 'offsetNegativeZ']
  );
  assert.deepEqual(stored[2], { node: 'knee_M_0_ctl', owner: 'knee_M_0_deform', attr: 'offsetNegativeX', value: 2 });
}

{
  const { rig, scene, root } = createRigHarness();
  rig.addModule('corrective', { name: 'knee', parentJoint: root });
  rig.build();
  scene.setAttr({ node: 'knee_M_0_ctl', attr: 'offsetPositiveY' }, 3);
  scene.setAttr({ node: 'knee_M_0_ctl', attr: 'affectedBy' }, 1);

  rig.setModuleField('knee', 'name', 'elbow');
  rig.build();
  assert.equal(scene.exists('knee_M_0_ctl'), false);
  assert.equal(scene.getAttr({ node: 'elbow_M_0_ctl', attr: 'offsetPositiveY' }), 3);
  assert.equal(scene.getAttr({ node: 'elbow_M_0_ctl', attr: 'affectedBy' }), 1);
  assert.equal(scene.getAttr({ node: 'elbow_M_0_ctl', attr: 'offsetNegativeY' }), 0);
}
