import type { RigModule } from '../modules/RigModule';
import { StructuralInconsistencyError } from '../shared/errors';
import { RIG_JOINT_OWNED } from '../shared/messages';
import type { NodeRef } from '../types/scene';

export const EXTERNAL_OWNER = 'external';
export type JointOwner = RigModule | typeof EXTERNAL_OWNER;

const ownerLabel = (owner: JointOwner): string => (owner === EXTERNAL_OWNER ? EXTERNAL_OWNER : owner.nodeName);

/**
 * Every joint a rig knows about, with the module that owns it. Cross-module
 * references are plain refs looked up here, so a joint that was removed
 * resolves to null instead of being followed.
 */
export class JointRegistry {
  private readonly owners = new Map<NodeRef, JointOwner>();

  register(ref: NodeRef, owner: JointOwner): void {
    const current = this.owners.get(ref);
    if (current !== undefined && current !== owner) {
      throw new StructuralInconsistencyError(RIG_JOINT_OWNED(ref, ownerLabel(current)), {
        details: { joint: ref, owner: ownerLabel(current), claimant: ownerLabel(owner) }
      });
    }
    this.owners.set(ref, owner);
  }

  unregister(refs: readonly NodeRef[]): void {
    for (const ref of refs) {
      this.owners.delete(ref);
    }
  }

  resolve(ref: NodeRef): NodeRef | null {
    return this.owners.has(ref) ? ref : null;
  }

  ownerOf(ref: NodeRef): JointOwner | undefined {
    return this.owners.get(ref);
  }

  /** The owning module, or undefined for external and unknown joints. */
  moduleOf(ref: NodeRef): RigModule | undefined {
    const owner = this.owners.get(ref);
    return owner === undefined || owner === EXTERNAL_OWNER ? undefined : owner;
  }

  externalJoints(): NodeRef[] {
    return [...this.owners.entries()].filter(([, owner]) => owner === EXTERNAL_OWNER).map(([ref]) => ref);
  }
}
