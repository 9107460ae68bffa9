/**
 * Process-wide strategy set
 */

import { KNOWN_TRIGGER_TYPES } from '../apis/build/types.js';
import { RouteAllocationController } from '../allocation/controller.js';
import { SimpleAllocationPlugin } from '../allocation/simple-plugin.js';
import type { RouteAllocator } from '../allocation/types.js';
import type { StrategyConfig } from '../core/config.js';
import { ResourceLifecycleError } from '../core/errors.js';
import { getComponentLogger } from '../core/logging/index.js';
import type { RESTStrategy } from '../core/types/strategy.js';
import { BuildConfigStrategy } from './buildconfig/strategy.js';
import { RouteStatusStrategy, RouteStrategy } from './route/strategy.js';

const logger = getComponentLogger('strategy-registry');

export interface Strategies {
  buildConfig: BuildConfigStrategy;
  route: RouteStrategy;
  routeStatus: RouteStatusStrategy;
}

/**
 * Build the strategies once at startup. They hold only configuration and
 * are shared by every request.
 */
export function createStrategies(config: StrategyConfig = {}): Strategies {
  let allocator: RouteAllocator | undefined;
  if (config.routeAllocationDnsSuffix) {
    allocator = new RouteAllocationController(
      new SimpleAllocationPlugin(config.routeAllocationDnsSuffix)
    );
  }

  let knownTriggerTypes: ReadonlySet<string> = KNOWN_TRIGGER_TYPES;
  if (config.knownTriggerTypes) {
    const unknown = config.knownTriggerTypes.filter((t) => !KNOWN_TRIGGER_TYPES.has(t));
    if (unknown.length > 0) {
      throw new ResourceLifecycleError(
        `Unknown build trigger types: ${unknown.join(', ')}`,
        'CONFIG_ERROR',
        { unknown }
      );
    }
    knownTriggerTypes = new Set(config.knownTriggerTypes);
  }

  logger.info('Strategies configured', {
    routeAllocation: allocator ? config.routeAllocationDnsSuffix : 'disabled',
    knownTriggerTypes: [...knownTriggerTypes],
  });

  const route = new RouteStrategy({ allocator });
  return {
    buildConfig: new BuildConfigStrategy({ knownTriggerTypes }),
    route,
    // Status updates never allocate hosts.
    routeStatus: new RouteStatusStrategy(new RouteStrategy({ validator: route.validator })),
  };
}

/**
 * Look up a strategy by kind.
 */
export function strategyFor(strategies: Strategies, kind: string): RESTStrategy | undefined {
  switch (kind) {
    case strategies.buildConfig.kind:
      return strategies.buildConfig;
    case strategies.route.kind:
      return strategies.route;
    default:
      return undefined;
  }
}

export * from './buildconfig/index.js';
export * from './route/index.js';
