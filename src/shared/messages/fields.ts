export const FIELD_UNKNOWN = (schema: string, key: string) => `Unknown field "${key}" on ${schema}`;
export const FIELD_UNKNOWN_FIX = 'Use one of the fields declared by the module schema.';
export const FIELD_INVALID_VALUE = (key: string, reasons: string[]) =>
  `Invalid value for field "${key}": ${reasons.join('; ')}`;
export const FIELD_RECORD_INVALID = (schema: string, keys: string[]) =>
  `Stored fields for ${schema} are invalid: ${keys.join(', ')}`;
export const FIELD_RECORD_INVALID_FIX = 'Repair or remove the listed values before loading the document.';
export const NAME_SEGMENT_INVALID = (label: string, value: string) => `Invalid ${label} name segment: "${value}"`;
export const NAME_SEGMENT_EXPECTED = (label: string, pattern: string) => `${label} must match ${pattern}`;
export const NAME_OBJECT_ID_INVALID = (objectId: number) => `Invalid object id: ${objectId}`;
export const NAME_OBJECT_ID_EXPECTED = 'object id must be a non-negative integer';
