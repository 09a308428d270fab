export const MODULE_PARENT_JOINT_MISSING = (module: string, joint: string) =>
  `Parent joint of ${module} no longer exists: ${joint}`;
export const MODULE_PARENT_JOINT_MISSING_FIX = 'Point parentJoint at an existing joint, then run update again.';
export const MODULE_REFERENCE_REQUIRED = (module: string, field: string) => `${module} requires ${field} to build`;
export const MODULE_REFERENCE_REQUIRED_FIX = (field: string) => `Set ${field} to an existing node.`;
export const MODULE_REFERENCE_MISSING = (module: string, field: string, ref: string) =>
  `${field} of ${module} points to a node that no longer exists: ${ref}`;
export const MODULE_VECTOR_BASE_REQUIRED = (module: string) =>
  `${module} has neither vectorBase nor parentJoint to measure from`;
export const MODULE_VECTOR_BASE_REQUIRED_FIX = 'Set vectorBase or parentJoint on the corrective module.';
export const MODULE_DANGLING_DEPENDENTS = (module: string, dependents: string[]) =>
  `Shrinking ${module} leaves dependents without a parent joint: ${dependents.join(', ')}`;
export const MODULE_NOT_INITIALIZED = (module: string) => `${module} was never initialized or loaded`;
export const MODULE_ALREADY_INITIALIZED = (module: string) => `${module} is already initialized`;
