import assert from 'node:assert/strict';

import {
  isRigError,
  MissingReferenceError,
  RigError,
  StructuralInconsistencyError,
  toRigErrorPayload,
  UnknownModuleError,
  ValidationError
} from '../src/shared/errors';
import { attempt, fail, ok } from '../src/shared/result';

{
  const error = new ValidationError('chainLength', 'chainLength must not be less than 1', ['chainLength must not be less than 1'], {
    fix: 'Use 1 or more.'
  });
  assert.equal(error instanceof RigError, true);
  assert.equal(error.name, 'ValidationError');
  assert.equal(error.code, 'invalid_field');
  assert.equal(error.field, 'chainLength');
  assert.deepEqual(error.toPayload(), {
    code: 'invalid_field',
    message: 'chainLength must not be less than 1',
    fix: 'Use 1 or more.',
    details: { field: 'chainLength', reasons: ['chainLength must not be less than 1'] }
  });
}

{
  const error = new MissingReferenceError('vectorBase', 'missing', { details: { module: 'knee_L' } });
  assert.equal(error.code, 'missing_reference');
  assert.deepEqual(error.details, { field: 'vectorBase', module: 'knee_L' });
}

{
  assert.equal(new StructuralInconsistencyError('cycle').code, 'structural_inconsistency');
  assert.equal(new UnknownModuleError('nope').code, 'unknown_module');
  assert.equal(isRigError(new UnknownModuleError('nope')), true);
  assert.equal(isRigError(new Error('plain')), false);
}

{
  assert.deepEqual(toRigErrorPayload(new TypeError('adapter blew up')), {
    code: 'adapter_error',
    message: 'adapter blew up',
    details: { name: 'TypeError' }
  });
  assert.deepEqual(toRigErrorPayload('text'), { code: 'adapter_error', message: 'scene graph adapter failed' });
}

{
  assert.deepEqual(ok(3), { ok: true, value: 3 });
  assert.deepEqual(fail({ code: 'unknown_module', message: 'x' }), { ok: false, error: { code: 'unknown_module', message: 'x' } });
  assert.deepEqual(attempt(() => 'done'), { ok: true, value: 'done' });
  assert.deepEqual(
    attempt(() => {
      throw new StructuralInconsistencyError('broken');
    }),
    { ok: false, error: { code: 'structural_inconsistency', message: 'broken' } }
  );
}
