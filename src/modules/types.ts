import type { RigConfig } from '../config';
import type { Logger } from '../logging';
import type { SceneGraphPort } from '../ports/sceneGraph';
import type { NodeRef } from '../types/scene';
import type { RigModule } from './RigModule';

export type ModuleLifecycle = 'created' | 'initialized' | 'updated' | 'built' | 'published';

/** What a module may ask of the rig that owns it. */
export interface RigModuleHost {
  modules(): readonly RigModule[];
  /** The joint itself while it is known and alive, null once it was deleted or was never registered. */
  resolveJoint(ref: NodeRef): NodeRef | null;
  registerJoint(ref: NodeRef, owner: RigModule): void;
  unregisterJoints(refs: readonly NodeRef[]): void;
}

export type RigModuleContext = {
  scene: SceneGraphPort;
  host: RigModuleHost;
  logger: Logger;
  config: RigConfig;
};

export type BuildRoots = {
  controls: NodeRef;
  extras: NodeRef;
};

export type RigModuleRecord = {
  type: string;
  fields: Record<string, unknown>;
};
