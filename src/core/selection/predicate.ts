import type { ApiObject } from '../types/object.js';
import type { AttrFunc, SelectionPredicate, Selector } from '../types/selection.js';
import { everything } from './selector.js';

export const NAME_FIELD = 'metadata.name';
export const NAMESPACE_FIELD = 'metadata.namespace';

/**
 * Combine a label selector, a field selector and an attribute projection
 * into one predicate for list and watch queries. Nothing is cached: every
 * call to `matches` projects the object again.
 */
export function createSelectionPredicate(
  label: Selector | undefined,
  field: Selector | undefined,
  getAttrs: AttrFunc
): SelectionPredicate {
  const labelSelector = label ?? everything();
  const fieldSelector = field ?? everything();

  const empty = () => labelSelector.empty() && fieldSelector.empty();

  return {
    label: labelSelector,
    field: fieldSelector,
    getAttrs,
    empty,
    matches(obj: ApiObject): boolean {
      if (empty()) {
        return true;
      }
      const { labels, fields } = getAttrs(obj);
      return labelSelector.matches(labels) && fieldSelector.matches(fields);
    },
    matchesSingle(): string | undefined {
      return fieldSelector.requiresExactMatch(NAME_FIELD);
    },
  };
}

/**
 * The fields every object exposes for selection.
 */
export function objectMetaFieldsSet(obj: ApiObject, namespaced: boolean): Record<string, string> {
  const fields: Record<string, string> = { [NAME_FIELD]: obj.metadata.name ?? '' };
  if (namespaced) {
    fields[NAMESPACE_FIELD] = obj.metadata.namespace ?? '';
  }
  return fields;
}
