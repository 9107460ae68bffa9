import { describe, expect, it } from 'vitest';
import { RouteAllocationController } from '../../src/allocation/controller.js';
import { SimpleAllocationPlugin } from '../../src/allocation/simple-plugin.js';
import { ResourceLifecycleError } from '../../src/core/errors.js';
import { RouteStrategy } from '../../src/registry/route/strategy.js';
import { newRoute } from '../fixtures/objects.js';

describe('SimpleAllocationPlugin', () => {
  it('should reject an invalid DNS suffix', () => {
    expect(() => new SimpleAllocationPlugin('Not_A_Domain')).toThrow('invalid DNS suffix "Not_A_Domain"');
  });

  it('should report an invalid DNS suffix as a configuration error', () => {
    let caught: unknown;
    try {
      new SimpleAllocationPlugin('Not_A_Domain');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ResourceLifecycleError);
    expect(caught).toMatchObject({ code: 'CONFIG_ERROR', context: { dnsSuffix: 'Not_A_Domain' } });
  });

  it('should allocate the default shard', () => {
    const plugin = new SimpleAllocationPlugin('apps.example.com');
    expect(plugin.allocate(newRoute())).toEqual({ shardName: '', dnsSuffix: 'apps.example.com' });
  });

  it('should generate <name>-<namespace>.<suffix>', () => {
    const plugin = new SimpleAllocationPlugin('apps.example.com');
    const route = newRoute({}, 'shop.v2');
    route.metadata.namespace = 'team-a';

    expect(plugin.generateHostname(route, plugin.allocate(route))).toBe('shop-v2-team-a.apps.example.com');
  });

  it('should generate nothing without a name or namespace', () => {
    const plugin = new SimpleAllocationPlugin('apps.example.com');
    const route = newRoute();
    route.metadata.namespace = undefined;

    expect(plugin.generateHostname(route, plugin.defaultShard)).toBe('');
  });
});

describe('RouteAllocationController', () => {
  it('should give routes a host through the strategy', () => {
    const allocator = new RouteAllocationController(new SimpleAllocationPlugin('apps.example.com'));
    const route = newRoute();

    new RouteStrategy({ allocator }).prepareForCreate(route);

    expect(route.spec.host).toBe('web-default.apps.example.com');
    expect(route.metadata.annotations).toEqual({ 'openshift.io/host.generated': 'true' });
  });
});
