/**
 * Route API types
 */

import type { ApiObject } from '../../core/types/object.js';

export const ROUTE_API_VERSION = 'route.openshift.io/v1';
export const ROUTE_KIND = 'Route';

/**
 * Annotation set to "true" when the server generated the route's host.
 */
export const HOST_GENERATED_ANNOTATION_KEY = 'openshift.io/host.generated';

export const WildcardPolicy = {
  None: 'None',
  Subdomain: 'Subdomain',
} as const;
export type WildcardPolicyType = (typeof WildcardPolicy)[keyof typeof WildcardPolicy];

export type TLSTerminationType = 'edge' | 'passthrough' | 'reencrypt';
export type InsecureEdgeTerminationPolicy = 'None' | 'Allow' | 'Redirect';

export interface RouteTargetReference {
  kind: 'Service';
  name: string;
  weight?: number;
}

export interface RoutePort {
  targetPort: string | number;
}

export interface TLSConfig {
  termination: TLSTerminationType;
  certificate?: string;
  key?: string;
  caCertificate?: string;
  destinationCACertificate?: string;
  insecureEdgeTerminationPolicy?: InsecureEdgeTerminationPolicy;
}

export interface RouteSpec {
  /**
   * Public host name. Empty until allocated, unless the client set it.
   */
  host?: string;
  path?: string;
  to: RouteTargetReference;
  alternateBackends?: RouteTargetReference[];
  port?: RoutePort;
  tls?: TLSConfig;
  wildcardPolicy?: WildcardPolicyType;
}

export interface RouteIngressCondition {
  type: 'Admitted';
  status: 'True' | 'False' | 'Unknown';
  reason?: string;
  message?: string;
  lastTransitionTime?: string;
}

export interface RouteIngress {
  host: string;
  routerName: string;
  wildcardPolicy?: WildcardPolicyType;
  conditions?: RouteIngressCondition[];
  routerCanonicalHostname?: string;
}

export interface RouteStatus {
  ingress?: RouteIngress[];
}

export interface Route extends ApiObject {
  kind: typeof ROUTE_KIND;
  spec: RouteSpec;
  status?: RouteStatus;
}

/**
 * A Route as a hook receives it. A status update body, or a malformed
 * create, may carry no spec.
 */
export type RouteObject = Omit<Route, 'spec'> & { spec?: RouteSpec };

export function isRoute(obj: unknown): obj is RouteObject {
  return typeof obj === 'object' && obj !== null && 'kind' in obj && obj.kind === ROUTE_KIND;
}

export function hasRouteSpec(route: RouteObject): route is Route {
  return typeof route.spec === 'object' && route.spec !== null;
}
