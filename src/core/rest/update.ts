import { InvalidError, NotFoundError } from '../errors.js';
import { getResourceLogger } from '../logging/index.js';
import type { ApiObject, RequestContext } from '../types/object.js';
import type { RESTUpdateStrategy } from '../types/strategy.js';
import { required } from '../validation/field-errors.js';
import { FieldPath } from '../validation/field-path.js';
import { beforeCreate } from './create.js';
import { checkNamespace, describeObject } from './meta.js';

/**
 * Run a strategy's update hooks on `obj` against the stored `old`.
 *
 * With no stored object the update becomes a create when the strategy
 * allows it, and a NotFoundError otherwise. Updates without a
 * resourceVersion are refused unless the strategy allows unconditional
 * updates.
 */
export function beforeUpdate(
  strategy: RESTUpdateStrategy,
  ctx: RequestContext,
  obj: ApiObject,
  old: ApiObject | undefined
): void {
  if (!old) {
    if (!strategy.allowCreateOnUpdate()) {
      throw new NotFoundError(strategy.kind, describeObject(obj));
    }
    beforeCreate(strategy, ctx, obj);
    return;
  }

  if (!obj.metadata.resourceVersion && !strategy.allowUnconditionalUpdate()) {
    throw new InvalidError(strategy.kind, describeObject(obj), [
      required(FieldPath.of('metadata', 'resourceVersion'), 'must be specified for an update'),
    ]);
  }

  checkNamespace(strategy.namespaceScoped(), ctx, obj);

  obj.metadata.uid = old.metadata.uid;
  obj.metadata.creationTimestamp = old.metadata.creationTimestamp;

  strategy.prepareForUpdate(obj, old);

  const errors = strategy.validateUpdate(obj, old);
  if (errors.length > 0) {
    const meta = obj.metadata;
    getResourceLogger(strategy.kind, meta.namespace, meta.name).debug('Update rejected', {
      fields: errors.map((e) => e.field),
    });
    throw new InvalidError(strategy.kind, describeObject(obj), errors);
  }

  strategy.canonicalize(obj);
}
