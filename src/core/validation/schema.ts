/**
 * Structural checks with arktype, reported as field errors
 */

import { type } from 'arktype';
import type { FieldError, FieldErrorList } from '../types/validation.js';

/**
 * Check `value` against an arktype `type(...)`. Returns one field error
 * per arktype problem, in the order arktype reports them.
 */
export function checkShape(schema: (data: unknown) => unknown, value: unknown): FieldErrorList {
  const out = schema(value);
  if (!(out instanceof type.errors)) {
    return [];
  }
  return Array.from(
    out,
    (problem): FieldError =>
      problem.code === 'required'
        ? { type: 'FieldValueRequired', field: formatPath(problem.path), detail: problem.message }
        : {
            type: 'FieldValueInvalid',
            field: formatPath(problem.path),
            badValue: problem.data,
            detail: problem.message,
          }
  );
}

/**
 * Render an arktype path as `spec.triggers[0].type`.
 */
export function formatPath(path: readonly PropertyKey[]): string {
  let rendered = '';
  for (const segment of path) {
    if (typeof segment === 'number' || (typeof segment === 'string' && /^\d+$/.test(segment))) {
      rendered += `[${String(segment)}]`;
    } else {
      const name = String(segment);
      rendered += rendered ? `.${name}` : name;
    }
  }
  return rendered;
}
