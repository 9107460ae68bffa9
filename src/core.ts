/**
 * Core - strategy contract, request pipeline, selection, validation
 * helpers, errors and logging.
 */

export { loadStrategyConfig, type StrategyConfig } from './core/config.js';
export {
  BadRequestError,
  ConflictError,
  formatFieldError,
  formatInvalidMessage,
  InternalError,
  InvalidError,
  NotFoundError,
  ResourceLifecycleError,
  TypeMismatchError,
} from './core/errors.js';
export * from './core/logging/index.js';
export { simpleNameGenerator } from './core/names.js';
export * from './core/rest/index.js';
export {
  type ErrorHandler,
  getErrorHandlers,
  handleError,
  logErrorHandler,
  setErrorHandlers,
} from './core/runtime/error-handler.js';
export * from './core/selection/index.js';
export type * from './core/types.js';
export { isDNS1123Label, isDNS1123Subdomain, isValidLabelValue } from './core/validation/dns.js';
export {
  duplicate,
  forbidden,
  immutable,
  invalid,
  notSupported,
  required,
  tooLong,
} from './core/validation/field-errors.js';
export { FieldPath } from './core/validation/field-path.js';
export { validateObjectMeta, validateObjectMetaUpdate } from './core/validation/object-meta.js';
export { checkShape } from './core/validation/schema.js';
