import { InvalidError } from '../errors.js';
import { getResourceLogger } from '../logging/index.js';
import type { ApiObject, RequestContext } from '../types/object.js';
import type { RESTCreateStrategy } from '../types/strategy.js';
import { checkNamespace, describeObject, fillObjectMetaSystemFields } from './meta.js';

/**
 * Run a strategy's create hooks on `obj`: prepareForCreate, validate and,
 * when valid, canonicalize. Throws InvalidError with every field error when
 * validation fails.
 */
export function beforeCreate(
  strategy: RESTCreateStrategy,
  ctx: RequestContext,
  obj: ApiObject
): void {
  checkNamespace(strategy.namespaceScoped(), ctx, obj);

  const meta = obj.metadata;
  meta.deletionTimestamp = undefined;
  meta.deletionGracePeriodSeconds = undefined;
  if (meta.generateName && !meta.name) {
    meta.name = strategy.generateName(meta.generateName);
  }
  fillObjectMetaSystemFields(obj);

  strategy.prepareForCreate(obj);

  const errors = strategy.validate(obj);
  if (errors.length > 0) {
    getResourceLogger(strategy.kind, meta.namespace, meta.name).debug('Create rejected', {
      fields: errors.map((e) => e.field),
    });
    throw new InvalidError(strategy.kind, describeObject(obj), errors);
  }

  strategy.canonicalize(obj);
}
