export type NodeRef = string;

export type DagNodeType = 'joint' | 'transform' | 'locator' | 'control';
export type UtilityNodeType = 'vectorDifference' | 'angleBetween' | 'multiplyVector' | 'multiplyScalar' | 'condition';
export type NodeType = DagNodeType | UtilityNodeType;

export const DAG_NODE_TYPES: readonly DagNodeType[] = ['joint', 'transform', 'locator', 'control'];

export type Axis = 'x' | 'y' | 'z';
export type AxisSuffix = 'X' | 'Y' | 'Z';
export const AXIS_SUFFIXES: readonly AxisSuffix[] = ['X', 'Y', 'Z'];

export type Vec3 = [number, number, number];

/** 16 numbers, column-major; translation lives in elements 12, 13 and 14. */
export type Matrix4 = number[];

export type TransformChannel = 'translate' | 'rotate' | 'scale';
export const TRANSFORM_CHANNELS: readonly TransformChannel[] = ['translate', 'rotate', 'scale'];

export type AttrPlug = {
  node: NodeRef;
  attr: string;
};

export type AttrValue = number | boolean | string | Vec3;

export type CustomAttrType = 'double' | 'enum' | 'bool';

export type CustomAttrConstraints = {
  min?: number;
  max?: number;
  enumNames?: string[];
  keyable?: boolean;
  channelBox?: boolean;
  defaultValue?: number | boolean;
};

export type RigidConstraintOptions = {
  /** Track the driver's position only; orientation and scale stay the driven node's own. */
  translateOnly?: boolean;
};

export const componentAttr = (attr: string, axis: Axis | AxisSuffix): string => `${attr}${axis.toUpperCase()}`;

export const formatPlug = (plug: AttrPlug): string => `${plug.node}.${plug.attr}`;
