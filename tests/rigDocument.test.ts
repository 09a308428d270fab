import assert from 'node:assert/strict';

import { Rig } from '../src/rig/Rig';
import { parseRigDocument } from '../src/rig/rigDocument';
import { UnknownModuleError, ValidationError } from '../src/shared/errors';
import { createMemoryLogger, createRigHarness, noopLog } from './helpers';

type RawDocument = {
  version: number;
  name?: string;
  externalJoints: string[];
  groups: { controls: string | null; extras: string | null };
  modules: unknown[];
};

const emptyDocument = (): RawDocument => ({
  version: 1,
  name: 'empty',
  externalJoints: [],
  groups: { controls: null, extras: null },
  modules: []
});

{
  const { rig, scene, root } = createRigHarness();
  rig.addModule('chain', { name: 'arm', parentJoint: root, chainLength: 2 });
  rig.addModule('corrective', { name: 'knee', parentJoint: 'arm_M_1_deform' });
  rig.build();
  scene.setAttr({ node: 'knee_M_0_ctl', attr: 'offsetNegativeY' }, 4);

  const document = rig.toDocument();
  assert.equal(rig.modules().some((module) => module.hasUnsavedFields()), false);
  assert.equal(document.version, 1);
  assert.equal(document.name, 'testRig');
  assert.deepEqual(document.externalJoints, [root]);
  assert.deepEqual(document.groups, { controls: 'rig_controls_grp', extras: 'rig_extras_grp' });
  assert.deepEqual(document.modules[0], {
    type: 'chain',
    fields: {
      name: 'arm',
      side: 'M',
      parentJoint: root,
      deformJoints: ['arm_M_0_deform', 'arm_M_1_deform'],
      controlsGroup: 'arm_M_controls_grp',
      extrasGroup: 'arm_M_extras_grp',
      buildNodes: ['arm_M_controls_grp', 'arm_M_extras_grp', 'arm_M_0_ctl', 'arm_M_0_buffer', 'arm_M_1_ctl', 'arm_M_1_buffer'],
      persistentAttributes: [],
      chainLength: 2
    }
  });
  const kneeFields = document.modules[1].fields;
  assert.equal(kneeFields.vectorBase, 'arm_M_1_deform');
  assert.equal(kneeFields.vectorTipLoc, 'knee_M_vectorTip_loc');

  const raw: unknown = JSON.parse(JSON.stringify(document));
  const loaded = Rig.fromDocument(raw, { scene, logger: createMemoryLogger() });
  assert.equal(loaded.name, 'testRig');
  assert.deepEqual(
    loaded.modules().map((module) => [module.nodeName, module.moduleType, module.lifecycleState]),
    [
      ['arm_M', 'chain', 'updated'],
      ['knee_M', 'corrective', 'updated']
    ]
  );
  assert.equal(loaded.ownerOf('arm_M_1_deform'), loaded.module('arm'));
  assert.equal(loaded.ownerOf(root), 'external');
  assert.deepEqual(loaded.buildRoots, { controls: 'rig_controls_grp', extras: 'rig_extras_grp' });

  const before = scene.structuralMutations();
  loaded.update();
  assert.equal(scene.structuralMutations(), before);
  assert.deepEqual(loaded.toDocument(), document);

  const report = loaded.build();
  assert.deepEqual(report.order, ['arm_M', 'knee_M']);
  assert.equal(scene.getAttr({ node: 'knee_M_0_ctl', attr: 'offsetNegativeY' }), 4);
  assert.deepEqual(scene.nodes('transform').filter((ref) => ref.startsWith('rig_')), ['rig_controls_grp', 'rig_extras_grp']);

  loaded.setModuleField('arm', 'chainLength', 3);
  assert.equal(loaded.module('arm').hasUnsavedFields(), true);
}

{
  assert.throws(
    () => parseRigDocument(null),
    (err: unknown) => err instanceof ValidationError && err.field === 'document' && err.message === 'Rig document must be an object'
  );
  assert.throws(
    () => parseRigDocument([]),
    (err: unknown) => err instanceof ValidationError && err.field === 'document'
  );
  assert.throws(
    () => parseRigDocument({ ...emptyDocument(), version: 2 }),
    (err: unknown) =>
      err instanceof ValidationError &&
      err.field === 'version' &&
      err.message === 'Unsupported rig document version: 2' &&
      err.reasons[0] === 'version must be 1'
  );
  const nameless = emptyDocument();
  delete nameless.name;
  assert.throws(
    () => parseRigDocument(nameless),
    (err: unknown) => err instanceof ValidationError && err.field === 'name'
  );
  assert.throws(
    () => parseRigDocument({ ...emptyDocument(), modules: [{ type: '', fields: {} }] }),
    (err: unknown) => err instanceof ValidationError && err.field === 'modules'
  );
  assert.throws(
    () => parseRigDocument({ ...emptyDocument(), modules: [{ type: 'chain', fields: 'arm' }] }),
    (err: unknown) => err instanceof ValidationError && err.field === 'modules'
  );
  assert.deepEqual(parseRigDocument(emptyDocument()), emptyDocument());
}

{
  const { scene } = createRigHarness();
  const deps = { scene, logger: noopLog };
  assert.throws(
    () => Rig.fromDocument({ ...emptyDocument(), modules: [{ type: 'wing', fields: {} }] }, deps),
    UnknownModuleError
  );
  assert.throws(
    () => Rig.fromDocument({ ...emptyDocument(), modules: [{ type: 'chain', fields: { name: 'arm', chainLength: 0 } }] }, deps),
    (err: unknown) =>
      err instanceof ValidationError &&
      err.field === 'chainLength' &&
      err.message === 'Stored fields for ChainFields are invalid: chainLength'
  );
  assert.throws(
    () =>
      Rig.fromDocument(
        {
          ...emptyDocument(),
          modules: [
            { type: 'chain', fields: { name: 'arm', side: 'L' } },
            { type: 'corrective', fields: { name: 'arm', side: 'L' } }
          ]
        },
        deps
      ),
    (err: unknown) => err instanceof ValidationError && err.message === 'Module already exists: arm_L'
  );
  const mirrored = Rig.fromDocument(
    {
      ...emptyDocument(),
      modules: [
        { type: 'chain', fields: { name: 'arm', side: 'L' } },
        { type: 'chain', fields: { name: 'arm', side: 'R' } }
      ]
    },
    deps
  );
  assert.deepEqual(
    mirrored.modules().map((module) => module.nodeName),
    ['arm_L', 'arm_R']
  );
  const empty = Rig.fromDocument(emptyDocument(), deps);
  assert.equal(empty.modules().length, 0);
  assert.equal(empty.buildRoots, null);
}
