/**
 * Field-scoped validation results
 */

export type FieldErrorType =
  | 'FieldValueRequired'
  | 'FieldValueInvalid'
  | 'FieldValueForbidden'
  | 'FieldValueNotSupported'
  | 'FieldValueDuplicate'
  | 'FieldValueTooLong';

/**
 * A single validation failure, scoped to a field path such as
 * `spec.triggers[0].github.secret`.
 */
export interface FieldError {
  type: FieldErrorType;
  field: string;
  badValue?: unknown;
  detail: string;
}

/**
 * Ordered list of field errors. Empty means the object is acceptable.
 */
export type FieldErrorList = FieldError[];
