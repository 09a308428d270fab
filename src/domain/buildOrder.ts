import { StructuralInconsistencyError } from '../shared/errors';
import { RIG_BUILD_CYCLE } from '../shared/messages';
import type { NodeRef } from '../types/scene';

export type BuildOrderItem = {
  readonly nodeName: string;
  dependencies(): NodeRef[];
};

/**
 * Orders `items` so each one comes after the owners of the nodes it depends
 * on. Items without pending dependencies keep their original order.
 */
export const resolveBuildOrder = <T extends BuildOrderItem>(
  items: readonly T[],
  ownerOf: (ref: NodeRef) => T | undefined
): T[] => {
  const pending = new Map<T, Set<T>>();
  for (const item of items) {
    const upstream = new Set<T>();
    for (const ref of item.dependencies()) {
      const owner = ownerOf(ref);
      if (owner !== undefined && owner !== item && items.includes(owner)) upstream.add(owner);
    }
    pending.set(item, upstream);
  }

  const ordered: T[] = [];
  while (pending.size > 0) {
    const next = items.find((item) => {
      const upstream = pending.get(item);
      return upstream !== undefined && [...upstream].every((owner) => !pending.has(owner));
    });
    if (next === undefined) {
      const stuck = [...pending.keys()].map((item) => item.nodeName);
      throw new StructuralInconsistencyError(RIG_BUILD_CYCLE(stuck), { details: { modules: stuck } });
    }
    ordered.push(next);
    pending.delete(next);
  }
  return ordered;
};
