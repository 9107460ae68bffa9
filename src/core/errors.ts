/**
 * Error types for resource lifecycle handling
 *
 * Validation problems are not thrown by strategies; they are returned as
 * FieldError lists. These classes cover the failures a strategy or the
 * request pipeline raises instead.
 */

import type { FieldError } from './types/validation.js';

export class ResourceLifecycleError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ResourceLifecycleError';
  }
}

/**
 * Raised when a hook receives an object of another kind. This is a wiring
 * bug in the caller, never a client error.
 */
export class TypeMismatchError extends ResourceLifecycleError {
  constructor(
    public readonly expectedKind: string,
    public readonly actual: unknown
  ) {
    super(`not a ${expectedKind}: received ${describeKind(actual)}`, 'TYPE_MISMATCH', {
      expectedKind,
      actualKind: describeKind(actual),
    });
    this.name = 'TypeMismatchError';
  }
}

export class InternalError extends ResourceLifecycleError {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(`Internal error occurred: ${message}`, 'INTERNAL_ERROR', { cause: errorMessage(cause) });
    this.name = 'InternalError';
  }
}

/**
 * The object failed validation. Carries every field error reported.
 */
export class InvalidError extends ResourceLifecycleError {
  constructor(
    public readonly kind: string,
    public readonly resourceName: string,
    public readonly errors: readonly FieldError[]
  ) {
    super(formatInvalidMessage(kind, resourceName, errors), 'INVALID', {
      kind,
      resourceName,
      fields: errors.map((e) => e.field),
    });
    this.name = 'InvalidError';
  }
}

export class BadRequestError extends ResourceLifecycleError {
  constructor(message: string) {
    super(message, 'BAD_REQUEST');
    this.name = 'BadRequestError';
  }
}

export class NotFoundError extends ResourceLifecycleError {
  constructor(
    public readonly kind: string,
    public readonly resourceName: string
  ) {
    super(`${kind} "${resourceName}" not found`, 'NOT_FOUND', { kind, resourceName });
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends ResourceLifecycleError {
  constructor(
    public readonly kind: string,
    public readonly resourceName: string,
    reason: string
  ) {
    super(
      `Operation cannot be fulfilled on ${kind} "${resourceName}": ${reason}`,
      'CONFLICT',
      { kind, resourceName }
    );
    this.name = 'ConflictError';
  }
}

/**
 * Render a field error list the way API clients see it:
 * `Route "web" is invalid: spec.host: Invalid value: "A": ...`
 */
export function formatInvalidMessage(
  kind: string,
  resourceName: string,
  errors: readonly FieldError[]
): string {
  const header = `${kind} "${resourceName}" is invalid`;
  if (errors.length === 0) {
    return header;
  }
  const [only] = errors;
  if (errors.length === 1 && only) {
    return `${header}: ${formatFieldError(only)}`;
  }
  return `${header}: [${errors.map(formatFieldError).join(', ')}]`;
}

export function formatFieldError(error: FieldError): string {
  const label = FIELD_ERROR_LABELS[error.type];
  switch (error.type) {
    case 'FieldValueRequired':
    case 'FieldValueForbidden':
    case 'FieldValueTooLong':
      return `${error.field}: ${label}${error.detail ? `: ${error.detail}` : ''}`;
    default:
      return `${error.field}: ${label}: ${JSON.stringify(error.badValue)}${error.detail ? `: ${error.detail}` : ''}`;
  }
}

const FIELD_ERROR_LABELS: Record<FieldError['type'], string> = {
  FieldValueRequired: 'Required value',
  FieldValueInvalid: 'Invalid value',
  FieldValueForbidden: 'Forbidden',
  FieldValueNotSupported: 'Unsupported value',
  FieldValueDuplicate: 'Duplicate value',
  FieldValueTooLong: 'Too long',
};

export function errorMessage(error: unknown): string | undefined {
  if (error === undefined) return undefined;
  return error instanceof Error ? error.message : String(error);
}

function describeKind(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value !== 'object') return typeof value;
  if ('kind' in value && typeof value.kind === 'string') return value.kind;
  return 'object';
}
