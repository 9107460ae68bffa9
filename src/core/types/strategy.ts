/**
 * Lifecycle strategy contract
 *
 * Every resource kind supplies one strategy. The request pipeline calls its
 * hooks in a fixed order:
 *
 * - create: prepareForCreate, validate, canonicalize
 * - update: prepareForUpdate, validateUpdate, canonicalize
 *
 * Strategies hold no per-request state and are safe to share across
 * concurrent requests for distinct objects.
 */

import type { ApiObject, DeleteOptions } from './object.js';
import type { FieldErrorList } from './validation.js';

export interface NameGenerator {
  /**
   * Produce a unique name from a client-supplied `metadata.generateName`.
   */
  generateName(base: string): string;
}

export interface RESTCreateStrategy extends NameGenerator {
  /** The kind of object this strategy handles. */
  readonly kind: string;

  namespaceScoped(): boolean;

  /**
   * Strip or normalize fields the client may not set. Mutates `obj`.
   * Calling it twice on a normalized object changes nothing.
   */
  prepareForCreate(obj: ApiObject): void;

  validate(obj: ApiObject): FieldErrorList;

  /** Runs after validation succeeded. */
  canonicalize(obj: ApiObject): void;
}

export interface RESTUpdateStrategy extends RESTCreateStrategy {
  /** Whether an update of a missing object may create it. */
  allowCreateOnUpdate(): boolean;

  /** Whether an update may omit `metadata.resourceVersion`. */
  allowUnconditionalUpdate(): boolean;

  /**
   * Enforce immutability and monotonicity using `old` as the stored state.
   * Mutates `obj`.
   */
  prepareForUpdate(obj: ApiObject, old: ApiObject): void;

  validateUpdate(obj: ApiObject, old: ApiObject): FieldErrorList;
}

export interface RESTDeleteStrategy {
  readonly kind: string;

  namespaceScoped(): boolean;

  /** Whether deletion of `obj` may be deferred. */
  checkGracefulDelete(obj: ApiObject, options?: DeleteOptions): boolean;
}

export interface RESTStrategy extends RESTUpdateStrategy, RESTDeleteStrategy {}
