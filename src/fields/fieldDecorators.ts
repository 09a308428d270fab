import 'reflect-metadata';
import { Type } from 'class-transformer';
import {
  ArrayUnique,
  IsArray,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
  ValidateNested
} from 'class-validator';
import { registerFieldDescriptor } from './fieldRegistry';
import type { FieldDescriptor, FieldKind, FieldPresentation } from './fieldTypes';

export type NumericFieldOptions = FieldPresentation & {
  min?: number;
  max?: number;
};

export type StringFieldOptions = FieldPresentation & {
  pattern?: RegExp;
};

/** Element type of attribute-binding fields, validated member by member. */
export class AttributeBinding {
  @IsString()
  @IsNotEmpty()
  node!: string;

  @IsString()
  @IsNotEmpty()
  owner!: string;

  @IsString()
  @IsNotEmpty()
  attr!: string;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  value!: number;
}

const presentation = (options: FieldPresentation): Pick<FieldDescriptor, 'displayable' | 'editable' | 'tooltip' | 'guiOrder'> => ({
  displayable: options.displayable ?? false,
  editable: options.editable ?? false,
  ...(options.tooltip !== undefined ? { tooltip: options.tooltip } : {}),
  ...(options.guiOrder !== undefined ? { guiOrder: options.guiOrder } : {})
});

const numericBounds = (options: NumericFieldOptions): PropertyDecorator[] => {
  const bounds: PropertyDecorator[] = [];
  if (options.min !== undefined) bounds.push(Min(options.min));
  if (options.max !== undefined) bounds.push(Max(options.max));
  return bounds;
};

const defineField = (
  kind: FieldKind,
  details: Omit<FieldDescriptor, 'key' | 'kind'>,
  validators: PropertyDecorator[]
): PropertyDecorator => (target, propertyKey) => {
  if (typeof propertyKey !== 'string') {
    throw new TypeError(`Field keys must be strings (${String(propertyKey)})`);
  }
  registerFieldDescriptor(target.constructor, { key: propertyKey, kind, ...details });
  for (const apply of validators) {
    apply(target, propertyKey);
  }
};

export const IntField = (options: NumericFieldOptions = {}): PropertyDecorator =>
  defineField(
    'int',
    { ...presentation(options), ...(options.min !== undefined ? { min: options.min } : {}), ...(options.max !== undefined ? { max: options.max } : {}) },
    [IsInt(), ...numericBounds(options)]
  );

export const FloatField = (options: NumericFieldOptions = {}): PropertyDecorator =>
  defineField(
    'float',
    { ...presentation(options), ...(options.min !== undefined ? { min: options.min } : {}), ...(options.max !== undefined ? { max: options.max } : {}) },
    [IsNumber({ allowNaN: false, allowInfinity: false }), ...numericBounds(options)]
  );

export const StringField = (options: StringFieldOptions = {}): PropertyDecorator =>
  defineField('string', presentation(options), [IsString(), ...(options.pattern ? [Matches(options.pattern)] : [])]);

export const EnumField = (choices: readonly string[], options: FieldPresentation = {}): PropertyDecorator =>
  defineField('enum', { ...presentation(options), choices }, [IsIn([...choices])]);

/** Reference to a single node; null when unset. */
export const NodeField = (options: FieldPresentation = {}): PropertyDecorator =>
  defineField('node', presentation(options), [IsOptional(), IsString(), IsNotEmpty()]);

/** Ordered, duplicate-free node references. */
export const NodeListField = (options: FieldPresentation = {}): PropertyDecorator =>
  defineField('nodeList', presentation(options), [IsArray(), IsString({ each: true }), IsNotEmpty({ each: true }), ArrayUnique()]);

export const AttributeBindingsField = (options: FieldPresentation = {}): PropertyDecorator =>
  defineField('attributeBindings', presentation(options), [
    IsArray(),
    ValidateNested({ each: true }),
    Type(() => AttributeBinding)
  ]);
