import { instanceToPlain, plainToInstance } from 'class-transformer';
import { validateSync, type ValidationError as ClassValidationError, type ValidatorOptions } from 'class-validator';
import { ValidationError } from '../shared/errors';
import {
  FIELD_INVALID_VALUE,
  FIELD_RECORD_INVALID,
  FIELD_RECORD_INVALID_FIX,
  FIELD_UNKNOWN,
  FIELD_UNKNOWN_FIX
} from '../shared/messages';
import { getFieldDescriptors } from './fieldRegistry';
import type { Field, FieldDescriptor, FieldSchemaClass } from './fieldTypes';

const VALIDATOR_OPTIONS: ValidatorOptions = {
  whitelist: true,
  forbidNonWhitelisted: true,
  forbidUnknownValues: true
};

export const collectConstraintMessages = (errors: ClassValidationError[]): string[] => {
  const messages: string[] = [];
  for (const error of errors) {
    messages.push(...Object.values(error.constraints ?? {}));
    if (error.children && error.children.length > 0) {
      messages.push(...collectConstraintMessages(error.children));
    }
  }
  return messages;
};

/**
 * Per-instance storage for one module schema. Every write is validated against
 * the schema's class-validator constraints before it is stored; a rejected write
 * leaves the stored values untouched.
 */
export class FieldStore<S extends object> {
  private readonly schema: FieldSchemaClass<S>;
  private readonly descriptorsByKey: Map<string, FieldDescriptor>;
  private readonly defaults: S;
  private values: S;
  private readonly dirty = new Set<string>();

  private constructor(schema: FieldSchemaClass<S>, values: S) {
    this.schema = schema;
    this.descriptorsByKey = new Map(getFieldDescriptors(schema).map((descriptor) => [descriptor.key, descriptor]));
    this.defaults = new schema();
    this.values = values;
  }

  /** New storage seeded with defaults plus `initial`; every seeded key starts dirty. */
  static create<S extends object>(schema: FieldSchemaClass<S>, initial: Record<string, unknown> = {}): FieldStore<S> {
    const store = new FieldStore(schema, new schema());
    for (const [key, value] of Object.entries(initial)) {
      store.setRaw(key, value);
    }
    return store;
  }

  /** Storage rebuilt from a persisted record; nothing starts dirty. */
  static hydrate<S extends object>(schema: FieldSchemaClass<S>, plain: Record<string, unknown>): FieldStore<S> {
    const values = plainToInstance(schema, plain);
    const errors = validateSync(values, VALIDATOR_OPTIONS);
    if (errors.length > 0) {
      const keys = errors.map((error) => error.property);
      throw new ValidationError(keys[0], FIELD_RECORD_INVALID(schema.name, keys), collectConstraintMessages(errors), {
        fix: FIELD_RECORD_INVALID_FIX
      });
    }
    return new FieldStore(schema, values);
  }

  descriptors(): FieldDescriptor[] {
    return [...this.descriptorsByKey.values()];
  }

  descriptor(key: string): FieldDescriptor | undefined {
    return this.descriptorsByKey.get(key);
  }

  has(key: string): boolean {
    return this.descriptorsByKey.has(key);
  }

  field<K extends keyof S & string>(key: K): Field<S[K]> {
    const descriptor = this.requireDescriptor(key);
    return {
      key,
      descriptor,
      get: () => this.read(key),
      set: (value) => this.write(key, value),
      isDirty: () => this.dirty.has(key)
    };
  }

  read<K extends keyof S & string>(key: K): S[K] {
    return structuredClone(this.values[key]);
  }

  defaultValue<K extends keyof S & string>(key: K): S[K] {
    return structuredClone(this.defaults[key]);
  }

  write<K extends keyof S & string>(key: K, value: S[K]): void {
    this.writeChecked(key, value);
  }

  /** Untyped edit path (GUI edits, document import); the schema decides what is valid. */
  setRaw(key: string, value: unknown): void {
    this.requireDescriptor(key);
    this.writeChecked(key, value);
  }

  readRaw(key: string): unknown {
    this.requireDescriptor(key);
    return instanceToPlain(this.values)[key];
  }

  isDirty(key?: string): boolean {
    return key === undefined ? this.dirty.size > 0 : this.dirty.has(key);
  }

  dirtyKeys(): string[] {
    return [...this.dirty];
  }

  markPersisted(): void {
    this.dirty.clear();
  }

  serialize(): Record<string, unknown> {
    return instanceToPlain(this.values);
  }

  private writeChecked(key: string, value: unknown): void {
    const candidate = plainToInstance(this.schema, { ...instanceToPlain(this.values), [key]: value });
    const errors = validateSync(candidate, VALIDATOR_OPTIONS).filter((error) => error.property === key);
    if (errors.length > 0) {
      const reasons = collectConstraintMessages(errors);
      throw new ValidationError(key, FIELD_INVALID_VALUE(key, reasons), reasons);
    }
    this.values = candidate;
    this.dirty.add(key);
  }

  private requireDescriptor(key: string): FieldDescriptor {
    const descriptor = this.descriptorsByKey.get(key);
    if (!descriptor) {
      throw new ValidationError(key, FIELD_UNKNOWN(this.schema.name, key), [], { fix: FIELD_UNKNOWN_FIX });
    }
    return descriptor;
  }
}
