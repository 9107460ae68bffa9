/**
 * Shapes shared by every managed API object
 */

import type { V1DeleteOptions, V1ObjectMeta } from '@kubernetes/client-node';

export type ObjectMeta = V1ObjectMeta;
export type DeleteOptions = V1DeleteOptions;

/**
 * The envelope every API object has. Hooks receive this and narrow it to
 * their own kind.
 */
export interface ApiObject {
  apiVersion?: string;
  kind: string;
  metadata: ObjectMeta;
}

/**
 * Information about the request an object arrived with.
 */
export interface RequestContext {
  /**
   * Namespace from the request path. Empty for cluster-wide requests.
   */
  namespace?: string;
  user?: string;
}
