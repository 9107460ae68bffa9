export {
  createSelectionPredicate,
  NAME_FIELD,
  NAMESPACE_FIELD,
  objectMetaFieldsSet,
} from './predicate.js';
export {
  everything,
  nothing,
  requirement,
  selectorFromRequirements,
  selectorFromSet,
} from './selector.js';
