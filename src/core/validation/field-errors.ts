import type { FieldError } from '../types/validation.js';
import type { FieldPath } from './field-path.js';

export function required(path: FieldPath, detail = ''): FieldError {
  return { type: 'FieldValueRequired', field: path.toString(), detail };
}

export function invalid(path: FieldPath, badValue: unknown, detail: string): FieldError {
  return { type: 'FieldValueInvalid', field: path.toString(), badValue, detail };
}

export function forbidden(path: FieldPath, detail: string): FieldError {
  return { type: 'FieldValueForbidden', field: path.toString(), detail };
}

export function notSupported(
  path: FieldPath,
  badValue: unknown,
  validValues: readonly string[]
): FieldError {
  const detail =
    validValues.length > 0
      ? `supported values: ${validValues.map((v) => JSON.stringify(v)).join(', ')}`
      : '';
  return { type: 'FieldValueNotSupported', field: path.toString(), badValue, detail };
}

export function duplicate(path: FieldPath, badValue: unknown): FieldError {
  return { type: 'FieldValueDuplicate', field: path.toString(), badValue, detail: '' };
}

export function tooLong(path: FieldPath, maxLength: number): FieldError {
  return {
    type: 'FieldValueTooLong',
    field: path.toString(),
    detail: `must have at most ${maxLength} characters`,
  };
}

/**
 * Error for a field that may not change once set.
 */
export function immutable(path: FieldPath, badValue: unknown): FieldError {
  return invalid(path, badValue, 'field is immutable');
}
