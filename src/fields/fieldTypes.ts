import type { NodeRef } from '../types/scene';

export type FieldKind = 'int' | 'float' | 'string' | 'enum' | 'node' | 'nodeList' | 'attributeBindings';

export type FieldPresentation = {
  displayable?: boolean;
  editable?: boolean;
  tooltip?: string;
  guiOrder?: number;
};

export type FieldDescriptor = {
  key: string;
  kind: FieldKind;
  min?: number;
  max?: number;
  choices?: readonly string[];
  displayable: boolean;
  editable: boolean;
  tooltip?: string;
  guiOrder?: number;
};

export type FieldSchemaClass<S extends object = object> = new () => S;

export interface Field<T> {
  readonly key: string;
  readonly descriptor: FieldDescriptor;
  get(): T;
  set(value: T): void;
  isDirty(): boolean;
}

/** A custom attribute value an artist authored on a build-time node, kept across rebuilds. */
export type AttributeBindingValue = {
  node: NodeRef;
  /** Deform joint the node was built for. */
  owner: NodeRef;
  attr: string;
  value: number;
};
