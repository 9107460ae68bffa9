import type { Route } from '../apis/route/types.js';
import { getComponentLogger } from '../core/logging/index.js';
import type { AllocationPlugin, RouteAllocator, RouterShard } from './types.js';

const logger = getComponentLogger('route-allocation');

/**
 * Exposes an allocation plugin as a RouteAllocator.
 */
export class RouteAllocationController implements RouteAllocator {
  constructor(private readonly plugin: AllocationPlugin) {}

  allocateRouterShard(route: Route): RouterShard {
    const shard = this.plugin.allocate(route);
    logger.info('Allocated router shard', {
      namespace: route.metadata.namespace,
      name: route.metadata.name,
      shardName: shard.shardName,
      dnsSuffix: shard.dnsSuffix,
    });
    return shard;
  }

  generateHostname(route: Route, shard: RouterShard): string {
    return this.plugin.generateHostname(route, shard);
  }
}
