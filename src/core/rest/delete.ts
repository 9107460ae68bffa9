import { ConflictError } from '../errors.js';
import type { ApiObject, DeleteOptions, RequestContext } from '../types/object.js';
import type { RESTDeleteStrategy } from '../types/strategy.js';
import { checkNamespace, describeObject } from './meta.js';

export interface DeleteDecision {
  /** Whether the object may linger until its grace period ends. */
  graceful: boolean;
  gracePeriodSeconds: number;
}

/**
 * Decide how `obj` is deleted. Strategies that refuse graceful deletion get
 * an immediate delete whatever grace period the client asked for.
 */
export function beforeDelete(
  strategy: RESTDeleteStrategy,
  ctx: RequestContext,
  obj: ApiObject,
  options: DeleteOptions = {}
): DeleteDecision {
  checkNamespace(strategy.namespaceScoped(), ctx, obj);

  const uid = options.preconditions?.uid;
  if (uid && uid !== obj.metadata.uid) {
    throw new ConflictError(
      strategy.kind,
      describeObject(obj),
      `Precondition failed: UID in precondition: ${uid}, UID in object meta: ${obj.metadata.uid ?? ''}`
    );
  }

  if (!strategy.checkGracefulDelete(obj, options)) {
    return { graceful: false, gracePeriodSeconds: 0 };
  }
  return { graceful: true, gracePeriodSeconds: options.gracePeriodSeconds ?? 0 };
}
