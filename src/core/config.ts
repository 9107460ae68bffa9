/**
 * Strategy configuration read from the environment
 */

import { type } from 'arktype';
import { ResourceLifecycleError } from './errors.js';

export interface StrategyConfig {
  /**
   * DNS suffix for generated route hosts. No allocator is configured when
   * unset.
   */
  routeAllocationDnsSuffix?: string;

  /**
   * Trigger types BuildConfigs may use. Defaults to every type the server
   * knows.
   */
  knownTriggerTypes?: string[];
}

const strategyEnv = type({
  'ROUTE_ALLOCATION_DNS_SUFFIX?': 'string',
  'BUILD_KNOWN_TRIGGER_TYPES?': 'string',
});

export function loadStrategyConfig(env: NodeJS.ProcessEnv = process.env): StrategyConfig {
  const parsed = strategyEnv(env);
  if (parsed instanceof type.errors) {
    throw new ResourceLifecycleError(`Invalid strategy configuration: ${parsed.summary}`, 'CONFIG_ERROR');
  }

  const config: StrategyConfig = {};

  const suffix = parsed.ROUTE_ALLOCATION_DNS_SUFFIX?.trim();
  if (suffix) {
    config.routeAllocationDnsSuffix = suffix;
  }

  const triggers = parsed.BUILD_KNOWN_TRIGGER_TYPES?.split(',')
    .map((t) => t.trim())
    .filter((t) => t.length > 0);
  if (triggers && triggers.length > 0) {
    config.knownTriggerTypes = triggers;
  }

  return config;
}
