import { randomUUID } from 'node:crypto';
import { BadRequestError } from '../errors.js';
import type { ApiObject, RequestContext } from '../types/object.js';

/**
 * An object without a namespace takes the request's. Returns false when the
 * two disagree.
 */
export function validNamespace(ctx: RequestContext, obj: ApiObject): boolean {
  const namespace = ctx.namespace ?? '';
  if (!obj.metadata.namespace) {
    obj.metadata.namespace = namespace;
  }
  return obj.metadata.namespace === namespace;
}

/**
 * Apply the namespace rules of a strategy to `obj`.
 */
export function checkNamespace(namespaceScoped: boolean, ctx: RequestContext, obj: ApiObject): void {
  if (!namespaceScoped) {
    obj.metadata.namespace = undefined;
    return;
  }
  if (!validNamespace(ctx, obj)) {
    throw new BadRequestError(
      'the namespace of the provided object does not match the namespace sent on the request'
    );
  }
}

/**
 * Fill the fields the server assigns when an object is first stored.
 */
export function fillObjectMetaSystemFields(obj: ApiObject, now: Date = new Date()): void {
  obj.metadata.uid = randomUUID();
  obj.metadata.creationTimestamp = now;
}

export function describeObject(obj: ApiObject): string {
  return obj.metadata.name ?? obj.metadata.generateName ?? '';
}
