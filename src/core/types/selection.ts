/**
 * Label and field selection types
 */

import type { ApiObject } from './object.js';

export type LabelSet = Readonly<Record<string, string>>;
export type FieldSet = Readonly<Record<string, string>>;

export type SelectorOperator = '=' | '!=' | 'in' | 'notin' | 'exists' | '!';

export interface Requirement {
  key: string;
  operator: SelectorOperator;
  values: readonly string[];
}

export interface Selector {
  matches(set: Readonly<Record<string, string>>): boolean;
  empty(): boolean;
  /**
   * The value `key` must equal for a set to match, if the selector pins one.
   */
  requiresExactMatch(key: string): string | undefined;
  requirements(): readonly Requirement[];
  toString(): string;
}

export interface ObjectAttributes {
  labels: LabelSet;
  fields: FieldSet;
}

/**
 * Projects an object into the attributes selectors run against. Throws
 * TypeMismatchError when the object is not of the expected kind.
 */
export type AttrFunc = (obj: ApiObject) => ObjectAttributes;

export interface SelectionPredicate {
  readonly label: Selector;
  readonly field: Selector;
  readonly getAttrs: AttrFunc;
  matches(obj: ApiObject): boolean;
  empty(): boolean;
  /** The object name when the field selector pins `metadata.name`. */
  matchesSingle(): string | undefined;
}
