import { ValidationError } from '../shared/errors';
import {
  NAME_OBJECT_ID_EXPECTED,
  NAME_OBJECT_ID_INVALID,
  NAME_SEGMENT_EXPECTED,
  NAME_SEGMENT_INVALID
} from '../shared/messages';

export type Side = 'M' | 'L' | 'R';
export const SIDES: readonly Side[] = ['M', 'L', 'R'];

/** Module names, descriptions and roles are single camelCase segments so names parse back unambiguously. */
export const NAME_SEGMENT_PATTERN = /^[A-Za-z][A-Za-z0-9]*$/;

export type NodeNaming = {
  role: string;
  description?: string;
  objectId?: number;
};

export type NodeNameParts = NodeNaming & {
  module: string;
  side: Side;
};

const isSide = (value: string): value is Side => value === 'M' || value === 'L' || value === 'R';

const assertSegment = (label: string, value: string): void => {
  if (!NAME_SEGMENT_PATTERN.test(value)) {
    throw new ValidationError('name', NAME_SEGMENT_INVALID(label, value), [
      NAME_SEGMENT_EXPECTED(label, NAME_SEGMENT_PATTERN.source)
    ]);
  }
};

/** `{module}_{side}[_{objectId}][_{description}]_{role}`, e.g. `arm_L_0_positiveOffsetY_mult`. */
export const formatNodeName = (parts: NodeNameParts): string => {
  assertSegment('module', parts.module);
  assertSegment('role', parts.role);
  if (parts.description !== undefined) assertSegment('description', parts.description);
  if (parts.objectId !== undefined && (!Number.isInteger(parts.objectId) || parts.objectId < 0)) {
    throw new ValidationError('name', NAME_OBJECT_ID_INVALID(parts.objectId), [NAME_OBJECT_ID_EXPECTED]);
  }
  const segments = [parts.module, parts.side];
  if (parts.objectId !== undefined) segments.push(String(parts.objectId));
  if (parts.description !== undefined) segments.push(parts.description);
  segments.push(parts.role);
  return segments.join('_');
};

export const parseNodeName = (name: string): NodeNameParts | null => {
  const segments = name.split('_');
  if (segments.length < 3 || segments.length > 5) return null;
  const [module, side] = segments;
  const role = segments[segments.length - 1];
  if (!isSide(side) || !NAME_SEGMENT_PATTERN.test(module) || !NAME_SEGMENT_PATTERN.test(role)) return null;
  const middle = segments.slice(2, -1);
  const parts: NodeNameParts = { module, side, role };
  if (middle.length > 0 && /^\d+$/.test(middle[0])) {
    parts.objectId = Number(middle.shift());
  }
  if (middle.length === 1 && NAME_SEGMENT_PATTERN.test(middle[0])) {
    parts.description = middle[0];
  } else if (middle.length > 0) {
    return null;
  }
  return parts;
};
