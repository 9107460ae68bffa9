import { objectMetaFieldsSet } from '../../core/selection/predicate.js';
import type { FieldSet } from '../../core/types/selection.js';
import type { RouteObject } from './types.js';

/**
 * Fields a Route can be selected by: the metadata fields plus `spec.path`,
 * `spec.host` and `spec.to.name`.
 */
export function routeToSelectableFields(route: RouteObject): FieldSet {
  return {
    ...objectMetaFieldsSet(route, true),
    'spec.path': route.spec?.path ?? '',
    'spec.host': route.spec?.host ?? '',
    'spec.to.name': route.spec?.to?.name ?? '',
  };
}
