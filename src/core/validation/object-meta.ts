/**
 * Metadata checks shared by every kind's validator
 */

import type { ObjectMeta } from '../types/object.js';
import type { FieldErrorList } from '../types/validation.js';
import { isDNS1123Label, isDNS1123Subdomain, isValidLabelValue } from './dns.js';
import { forbidden, immutable, invalid, required } from './field-errors.js';
import { FieldPath } from './field-path.js';

export const METADATA_PATH = FieldPath.of('metadata');

/**
 * Upper bound for the combined size of all annotation keys and values.
 */
export const TOTAL_ANNOTATION_SIZE_LIMIT = 256 * 1024;

export type NameValidator = (name: string, prefix: boolean) => string[];

/**
 * Names must be DNS subdomains. A generateName prefix may end in '-', so it
 * is checked with a trailing character appended.
 */
export const validateNameAsSubdomain: NameValidator = (name, prefix) =>
  isDNS1123Subdomain(prefix ? maskTrailingDash(name) : name);

function maskTrailingDash(name: string): string {
  return name.length > 1 && name.endsWith('-') ? `${name.slice(0, -1)}a` : name;
}

export function validateObjectMeta(
  meta: ObjectMeta,
  namespaced: boolean,
  nameFn: NameValidator = validateNameAsSubdomain,
  path: FieldPath = METADATA_PATH
): FieldErrorList {
  const errors: FieldErrorList = [];

  if (meta.generateName) {
    for (const msg of nameFn(meta.generateName, true)) {
      errors.push(invalid(path.child('generateName'), meta.generateName, msg));
    }
  }
  if (!meta.name) {
    errors.push(required(path.child('name'), 'name or generateName is required'));
  } else {
    for (const msg of nameFn(meta.name, false)) {
      errors.push(invalid(path.child('name'), meta.name, msg));
    }
  }

  if (namespaced) {
    if (!meta.namespace) {
      errors.push(required(path.child('namespace')));
    } else {
      for (const msg of isDNS1123Label(meta.namespace)) {
        errors.push(invalid(path.child('namespace'), meta.namespace, msg));
      }
    }
  } else if (meta.namespace) {
    errors.push(forbidden(path.child('namespace'), 'not allowed on this type'));
  }

  for (const [key, value] of Object.entries(meta.labels ?? {})) {
    for (const msg of isValidLabelValue(value)) {
      errors.push(invalid(path.child('labels').key(key), value, msg));
    }
  }

  let annotationSize = 0;
  for (const [key, value] of Object.entries(meta.annotations ?? {})) {
    annotationSize += key.length + value.length;
  }
  if (annotationSize > TOTAL_ANNOTATION_SIZE_LIMIT) {
    errors.push(
      invalid(
        path.child('annotations'),
        '',
        `annotations size ${annotationSize} is larger than limit ${TOTAL_ANNOTATION_SIZE_LIMIT}`
      )
    );
  }

  return errors;
}

/**
 * Identity fields may not change across an update.
 */
export function validateObjectMetaUpdate(
  meta: ObjectMeta,
  old: ObjectMeta,
  path: FieldPath = METADATA_PATH
): FieldErrorList {
  const errors: FieldErrorList = [];

  if (meta.name !== old.name) {
    errors.push(immutable(path.child('name'), meta.name));
  }
  if ((meta.namespace ?? '') !== (old.namespace ?? '')) {
    errors.push(immutable(path.child('namespace'), meta.namespace));
  }
  if (old.uid && meta.uid !== old.uid) {
    errors.push(immutable(path.child('uid'), meta.uid));
  }
  if (old.creationTimestamp && timeOf(meta.creationTimestamp) !== timeOf(old.creationTimestamp)) {
    errors.push(immutable(path.child('creationTimestamp'), meta.creationTimestamp));
  }

  return errors;
}

// Objects decoded from JSON carry timestamps as ISO strings.
function timeOf(value: Date | string | undefined): number | undefined {
  return value === undefined ? undefined : new Date(value).getTime();
}
