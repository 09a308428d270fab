import assert from 'node:assert/strict';

import {
  DEFAULT_RIG_CONFIG,
  resolveChainShrinkPolicy,
  resolveLogLevel,
  resolveModuleErrorPolicy,
  resolvePositiveNumber,
  resolveRigConfig
} from '../src/config';

{
  assert.deepEqual(resolveRigConfig({}), DEFAULT_RIG_CONFIG);
  assert.deepEqual(DEFAULT_RIG_CONFIG, {
    logLevel: 'info',
    jointSpacing: 5,
    vectorTipOffset: 1,
    angleNormalization: 180,
    chainShrinkPolicy: 'flag',
    onModuleError: 'abort'
  });
}

{
  const config = resolveRigConfig({
    RIGSMITH_LOG_LEVEL: ' DEBUG ',
    RIGSMITH_JOINT_SPACING: '2.5',
    RIGSMITH_VECTOR_TIP_OFFSET: '3',
    RIGSMITH_ANGLE_NORMALIZATION: '90',
    RIGSMITH_CHAIN_SHRINK: 'Cascade',
    RIGSMITH_ON_MODULE_ERROR: 'continue'
  });
  assert.deepEqual(config, {
    logLevel: 'debug',
    jointSpacing: 2.5,
    vectorTipOffset: 3,
    angleNormalization: 90,
    chainShrinkPolicy: 'cascade',
    onModuleError: 'continue'
  });
}

{
  const config = resolveRigConfig({ RIGSMITH_JOINT_SPACING: '-1', RIGSMITH_CHAIN_SHRINK: 'sometimes' }, { onModuleError: 'continue' });
  assert.equal(config.jointSpacing, 5);
  assert.equal(config.chainShrinkPolicy, 'flag');
  assert.equal(config.onModuleError, 'continue');
}

{
  assert.equal(resolveLogLevel('verbose', 'warn'), 'warn');
  assert.equal(resolveLogLevel(undefined, 'info'), 'info');
  assert.equal(resolvePositiveNumber('', 7), 7);
  assert.equal(resolvePositiveNumber('abc', 7), 7);
  assert.equal(resolvePositiveNumber('0', 7), 7);
  assert.equal(resolvePositiveNumber('12', 7), 12);
  assert.equal(resolveChainShrinkPolicy('FLAG', 'cascade'), 'flag');
  assert.equal(resolveModuleErrorPolicy('ignore', 'abort'), 'abort');
}
