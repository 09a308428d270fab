import type { FieldDescriptor } from './fieldTypes';

// eslint-disable-next-line @typescript-eslint/ban-types
type SchemaOwner = Function;

const descriptorsByOwner = new Map<SchemaOwner, FieldDescriptor[]>();

export const registerFieldDescriptor = (owner: SchemaOwner, descriptor: FieldDescriptor): void => {
  const list = descriptorsByOwner.get(owner) ?? [];
  const index = list.findIndex((entry) => entry.key === descriptor.key);
  if (index >= 0) {
    list[index] = descriptor;
  } else {
    list.push(descriptor);
  }
  descriptorsByOwner.set(owner, list);
};

/** Descriptors of `schema` and its base schemas, base fields first; a subclass may redeclare a key. */
export const getFieldDescriptors = (schema: SchemaOwner): FieldDescriptor[] => {
  const chain: SchemaOwner[] = [];
  let current: unknown = schema;
  while (typeof current === 'function' && current !== Function.prototype) {
    chain.unshift(current);
    current = Object.getPrototypeOf(current);
  }
  const merged = new Map<string, FieldDescriptor>();
  for (const owner of chain) {
    for (const descriptor of descriptorsByOwner.get(owner) ?? []) {
      merged.set(descriptor.key, descriptor);
    }
  }
  return [...merged.values()];
};
