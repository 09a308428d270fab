import { errorMessage } from '../logging';

export type RigErrorCode =
  | 'invalid_field'
  | 'structural_inconsistency'
  | 'missing_reference'
  | 'unknown_module'
  | 'adapter_error';

export type RigErrorPayload = {
  code: RigErrorCode;
  message: string;
  fix?: string;
  details?: Record<string, unknown>;
};

export type RigErrorOptions = {
  fix?: string;
  details?: Record<string, unknown>;
};

export class RigError extends Error {
  readonly code: RigErrorCode;
  readonly fix?: string;
  readonly details?: Record<string, unknown>;

  constructor(code: RigErrorCode, message: string, options: RigErrorOptions = {}) {
    super(message);
    this.name = 'RigError';
    this.code = code;
    this.fix = options.fix;
    this.details = options.details;
  }

  toPayload(): RigErrorPayload {
    return {
      code: this.code,
      message: this.message,
      ...(this.fix ? { fix: this.fix } : {}),
      ...(this.details ? { details: this.details } : {})
    };
  }
}

/** A field write (or a loaded record) violates its declared type or bounds. */
export class ValidationError extends RigError {
  readonly field: string;
  readonly reasons: string[];

  constructor(field: string, message: string, reasons: string[] = [], options: RigErrorOptions = {}) {
    super('invalid_field', message, { ...options, details: { field, reasons, ...(options.details ?? {}) } });
    this.name = 'ValidationError';
    this.field = field;
    this.reasons = reasons;
  }
}

export class StructuralInconsistencyError extends RigError {
  constructor(message: string, options: RigErrorOptions = {}) {
    super('structural_inconsistency', message, options);
    this.name = 'StructuralInconsistencyError';
  }
}

export class MissingReferenceError extends RigError {
  readonly field: string;

  constructor(field: string, message: string, options: RigErrorOptions = {}) {
    super('missing_reference', message, { ...options, details: { field, ...(options.details ?? {}) } });
    this.name = 'MissingReferenceError';
    this.field = field;
  }
}

export class UnknownModuleError extends RigError {
  constructor(message: string, options: RigErrorOptions = {}) {
    super('unknown_module', message, options);
    this.name = 'UnknownModuleError';
  }
}

export const isRigError = (err: unknown): err is RigError => err instanceof RigError;

export const toRigErrorPayload = (err: unknown): RigErrorPayload => {
  if (isRigError(err)) return err.toPayload();
  return {
    code: 'adapter_error',
    message: errorMessage(err, 'scene graph adapter failed'),
    ...(err instanceof Error ? { details: { name: err.name } } : {})
  };
};
