import { objectMetaFieldsSet } from '../../core/selection/predicate.js';
import type { FieldSet } from '../../core/types/selection.js';
import type { BuildConfigObject } from './types.js';

/**
 * Fields a BuildConfig can be selected by.
 */
export function buildConfigToSelectableFields(config: BuildConfigObject): FieldSet {
  return objectMetaFieldsSet(config, true);
}
