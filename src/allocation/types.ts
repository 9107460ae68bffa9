import type { Route } from '../apis/route/types.js';

/**
 * A set of routers serving one DNS suffix.
 */
export interface RouterShard {
  shardName: string;
  dnsSuffix: string;
}

/**
 * Allocates hosts for routes that were created without one. Both calls are
 * synchronous; `allocateRouterShard` throws when no shard can be chosen.
 */
export interface RouteAllocator {
  allocateRouterShard(route: Route): RouterShard;
  generateHostname(route: Route, shard: RouterShard): string;
}

/**
 * Pluggable policy behind a RouteAllocationController.
 */
export interface AllocationPlugin {
  allocate(route: Route): RouterShard;
  generateHostname(route: Route, shard: RouterShard): string;
}
