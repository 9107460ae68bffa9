/**
 * Route lifecycle strategies
 *
 * Status is owned by the server: it is cleared on create and carried over
 * from the stored object on a spec update. The status sub-resource does the
 * opposite and keeps the stored spec.
 */

import { routeToSelectableFields } from '../../apis/route/fields.js';
import {
  HOST_GENERATED_ANNOTATION_KEY,
  hasRouteSpec,
  isRoute,
  type Route,
  type RouteObject,
  ROUTE_KIND,
  WildcardPolicy,
} from '../../apis/route/types.js';
import { defaultRouteValidator, type RouteValidator } from '../../apis/route/validation.js';
import type { RouteAllocator } from '../../allocation/types.js';
import { errorMessage, InternalError, TypeMismatchError } from '../../core/errors.js';
import { getComponentLogger } from '../../core/logging/index.js';
import { simpleNameGenerator } from '../../core/names.js';
import { type ErrorHandler, handleError } from '../../core/runtime/error-handler.js';
import { createSelectionPredicate } from '../../core/selection/predicate.js';
import type { ApiObject, DeleteOptions } from '../../core/types/object.js';
import type {
  ObjectAttributes,
  SelectionPredicate,
  Selector,
} from '../../core/types/selection.js';
import type { NameGenerator, RESTStrategy } from '../../core/types/strategy.js';
import type { FieldErrorList } from '../../core/types/validation.js';

const logger = getComponentLogger('route-strategy');

export interface RouteStrategyOptions {
  /**
   * Host allocator. Without one, routes keep whatever host they were
   * created with.
   */
  allocator?: RouteAllocator;
  validator?: RouteValidator;
  /** Where failed allocations are reported. Defaults to handleError. */
  errorHandler?: ErrorHandler;
  nameGenerator?: NameGenerator;
}

function asRoute(obj: unknown): RouteObject {
  if (!isRoute(obj)) {
    throw new TypeMismatchError(ROUTE_KIND, obj);
  }
  return obj;
}

function describeRoute(route: RouteObject): string {
  return `${route.metadata.namespace ?? ''}/${route.metadata.name ?? ''}`;
}

export class RouteStrategy implements RESTStrategy {
  readonly kind = ROUTE_KIND;

  readonly allocator: RouteAllocator | undefined;
  readonly validator: RouteValidator;
  private readonly errorHandler: ErrorHandler;
  private readonly nameGenerator: NameGenerator;

  constructor(options: RouteStrategyOptions = {}) {
    this.allocator = options.allocator;
    this.validator = options.validator ?? defaultRouteValidator;
    this.errorHandler = options.errorHandler ?? handleError;
    this.nameGenerator = options.nameGenerator ?? simpleNameGenerator;
  }

  generateName(base: string): string {
    return this.nameGenerator.generateName(base);
  }

  namespaceScoped(): boolean {
    return true;
  }

  allowCreateOnUpdate(): boolean {
    return false;
  }

  allowUnconditionalUpdate(): boolean {
    return false;
  }

  /**
   * Resets status and allocates a host when the route has none. A failed
   * allocation is reported and the route is created with an empty host.
   */
  prepareForCreate(obj: ApiObject): void {
    const route = asRoute(obj);
    route.status = {};
    if (!hasRouteSpec(route)) {
      // Validation reports the missing spec.
      return;
    }
    const error = this.allocateHost(route);
    if (error) {
      // TODO: move host allocation into a controller that retries, and stop reporting from here
      this.errorHandler(error);
    }
  }

  /**
   * Status is taken from the stored route. An empty host keeps the stored
   * host.
   */
  prepareForUpdate(obj: ApiObject, old: ApiObject): void {
    const route = asRoute(obj);
    const oldRoute = asRoute(old);
    route.status = oldRoute.status ? structuredClone(oldRoute.status) : {};

    if (route.spec && !route.spec.host) {
      route.spec.host = oldRoute.spec?.host;
    }
  }

  /**
   * Allocates a host only when the wildcard policy is not Subdomain, the
   * host is empty and an allocator is configured. Returns the failure
   * instead of throwing it.
   */
  private allocateHost(route: Route): InternalError | undefined {
    if (route.spec.wildcardPolicy === WildcardPolicy.Subdomain) {
      return undefined;
    }
    if (route.spec.host || !this.allocator) {
      return undefined;
    }

    let hostname: string;
    try {
      const shard = this.allocator.allocateRouterShard(route);
      hostname = this.allocator.generateHostname(route, shard);
    } catch (error) {
      return new InternalError(
        `allocation error: ${errorMessage(error) ?? 'unknown'} for route: ${describeRoute(route)}`,
        error
      );
    }
    // An empty hostname is a failure: no host and no generated-host annotation.
    if (!hostname) {
      return new InternalError(`allocation error: empty hostname generated for route: ${describeRoute(route)}`);
    }

    route.spec.host = hostname;
    route.metadata.annotations = {
      ...route.metadata.annotations,
      [HOST_GENERATED_ANNOTATION_KEY]: 'true',
    };
    logger.debug('Generated route host', { route: describeRoute(route), host: hostname });
    return undefined;
  }

  validate(obj: ApiObject): FieldErrorList {
    return this.validator.validateRoute(asRoute(obj));
  }

  validateUpdate(obj: ApiObject, old: ApiObject): FieldErrorList {
    return this.validator.validateRouteUpdate(asRoute(obj), asRoute(old));
  }

  canonicalize(_obj: ApiObject): void {}

  checkGracefulDelete(_obj: ApiObject, _options?: DeleteOptions): boolean {
    return false;
  }
}

/**
 * Strategy for the status sub-resource. Wraps a RouteStrategy and only
 * replaces the update hooks: the stored spec always wins, and validation
 * covers the status.
 */
export class RouteStatusStrategy implements RESTStrategy {
  readonly kind = ROUTE_KIND;

  constructor(private readonly base: RouteStrategy = new RouteStrategy()) {}

  generateName(base: string): string {
    return this.base.generateName(base);
  }

  namespaceScoped(): boolean {
    return this.base.namespaceScoped();
  }

  allowCreateOnUpdate(): boolean {
    return this.base.allowCreateOnUpdate();
  }

  allowUnconditionalUpdate(): boolean {
    return this.base.allowUnconditionalUpdate();
  }

  prepareForCreate(obj: ApiObject): void {
    this.base.prepareForCreate(obj);
  }

  prepareForUpdate(obj: ApiObject, old: ApiObject): void {
    const oldSpec = asRoute(old).spec;
    asRoute(obj).spec = oldSpec && structuredClone(oldSpec);
  }

  validate(obj: ApiObject): FieldErrorList {
    return this.base.validate(obj);
  }

  validateUpdate(obj: ApiObject, old: ApiObject): FieldErrorList {
    return this.base.validator.validateRouteStatusUpdate(asRoute(obj), asRoute(old));
  }

  canonicalize(obj: ApiObject): void {
    this.base.canonicalize(obj);
  }

  checkGracefulDelete(obj: ApiObject, options?: DeleteOptions): boolean {
    return this.base.checkGracefulDelete(obj, options);
  }
}

/**
 * Status strategy used when none is configured explicitly. Its base has no
 * allocator.
 */
export const routeStatusStrategy = new RouteStatusStrategy();

/**
 * Labels and fields of a Route, for filtering.
 */
export function getRouteAttrs(obj: ApiObject): ObjectAttributes {
  const route = asRoute(obj);
  return {
    labels: { ...route.metadata.labels },
    fields: routeToSelectableFields(route),
  };
}

export function routeMatcher(label?: Selector, field?: Selector): SelectionPredicate {
  return createSelectionPredicate(label, field, getRouteAttrs);
}
