import type { Route } from '../apis/route/types.js';
import { ResourceLifecycleError } from '../core/errors.js';
import { getComponentLogger } from '../core/logging/index.js';
import { isDNS1123Subdomain } from '../core/validation/dns.js';
import type { AllocationPlugin, RouterShard } from './types.js';

const logger = getComponentLogger('simple-allocation-plugin');

/**
 * Every route lands on one global shard and gets the host
 * `<name>-<namespace>.<dnsSuffix>`.
 */
export class SimpleAllocationPlugin implements AllocationPlugin {
  readonly defaultShard: RouterShard;

  constructor(dnsSuffix: string) {
    const problems = isDNS1123Subdomain(dnsSuffix);
    if (problems.length > 0) {
      throw new ResourceLifecycleError(
        `invalid DNS suffix "${dnsSuffix}": ${problems.join('; ')}`,
        'CONFIG_ERROR',
        { dnsSuffix }
      );
    }
    this.defaultShard = { shardName: '', dnsSuffix };
  }

  allocate(route: Route): RouterShard {
    logger.debug('Allocating global shard', {
      dnsSuffix: this.defaultShard.dnsSuffix,
      route: route.metadata.name,
    });
    return { ...this.defaultShard };
  }

  /**
   * Returns '' when the route has no name or namespace yet.
   */
  generateHostname(route: Route, shard: RouterShard): string {
    const { name, namespace } = route.metadata;
    if (!name || !namespace) {
      return '';
    }
    return `${name.replaceAll('.', '-')}-${namespace}.${shard.dnsSuffix}`;
  }
}
