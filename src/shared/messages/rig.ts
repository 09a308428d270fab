export const RIG_MODULE_EXISTS = (name: string) => `Module already exists: ${name}`;
export const RIG_MODULE_EXISTS_FIX = 'Give every module in the rig a unique name and side pair.';
export const RIG_MODULE_NOT_FOUND = (name: string) => `Module not found: ${name}`;
export const RIG_MODULE_AMBIGUOUS = (name: string, matches: string[]) =>
  `Module name ${name} is ambiguous, use one of: ${matches.join(', ')}`;
export const RIG_MODULE_TYPE_UNKNOWN = (type: string) => `Unknown module type: ${type}`;
export const RIG_MODULE_TYPE_UNKNOWN_FIX = (known: string[]) => `Use one of: ${known.join(', ')}.`;
export const RIG_BUILD_CYCLE = (modules: string[]) => `Modules depend on each other in a cycle: ${modules.join(' -> ')}`;
export const RIG_BUILD_MODULE_FAILED = (name: string) => `Module build failed: ${name}`;
export const RIG_DOCUMENT_VERSION_UNSUPPORTED = (version: unknown) => `Unsupported rig document version: ${String(version)}`;
export const RIG_DOCUMENT_VERSION_EXPECTED = (version: number) => `version must be ${version}`;
export const RIG_JOINT_OWNED = (joint: string, owner: string) => `Joint ${joint} is already owned by ${owner}`;

export const PLAN_NODE_EXISTS = (name: string) => `Planned node already exists: ${name}`;
export const PLAN_NODE_UNKNOWN = (name: string) => `Planned node not found: ${name}`;
export const PLAN_PLUG_DRIVEN = (plug: string) => `Plug already has an incoming connection: ${plug}`;
export const RIG_DOCUMENT_NOT_OBJECT = 'Rig document must be an object';
export const RIG_DOCUMENT_INVALID = (reasons: string[]) => `Invalid rig document: ${reasons.join('; ')}`;
