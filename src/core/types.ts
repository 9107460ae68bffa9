export type { ApiObject, DeleteOptions, ObjectMeta, RequestContext } from './types/object.js';
export type {
  AttrFunc,
  FieldSet,
  LabelSet,
  ObjectAttributes,
  Requirement,
  SelectionPredicate,
  Selector,
  SelectorOperator,
} from './types/selection.js';
export type {
  NameGenerator,
  RESTCreateStrategy,
  RESTDeleteStrategy,
  RESTStrategy,
  RESTUpdateStrategy,
} from './types/strategy.js';
export type { FieldError, FieldErrorList, FieldErrorType } from './types/validation.js';
