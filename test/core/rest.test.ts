import { describe, expect, it, vi } from 'vitest';
import type { Route } from '../../src/apis/route/types.js';
import {
  BadRequestError,
  ConflictError,
  InvalidError,
  NotFoundError,
} from '../../src/core/errors.js';
import { beforeCreate } from '../../src/core/rest/create.js';
import { beforeDelete } from '../../src/core/rest/delete.js';
import { beforeUpdate } from '../../src/core/rest/update.js';
import type { ApiObject } from '../../src/core/types/object.js';
import type { RESTStrategy } from '../../src/core/types/strategy.js';
import { buildConfigStrategy } from '../../src/registry/buildconfig/strategy.js';
import { RouteStrategy } from '../../src/registry/route/strategy.js';
import { genericTrigger, newBuildConfig, newRoute } from '../fixtures/objects.js';

const ctx = { namespace: 'default' };

function recordingStrategy(overrides: Partial<RESTStrategy> = {}) {
  const calls: string[] = [];
  const strategy: RESTStrategy = {
    kind: 'Widget',
    generateName: (base) => `${base}abcde`,
    namespaceScoped: () => true,
    allowCreateOnUpdate: () => false,
    allowUnconditionalUpdate: () => false,
    prepareForCreate: () => {
      calls.push('prepareForCreate');
    },
    prepareForUpdate: () => {
      calls.push('prepareForUpdate');
    },
    validate: () => {
      calls.push('validate');
      return [];
    },
    validateUpdate: () => {
      calls.push('validateUpdate');
      return [];
    },
    canonicalize: () => {
      calls.push('canonicalize');
    },
    checkGracefulDelete: () => false,
    ...overrides,
  };
  return { strategy, calls };
}

const widget = (meta: ApiObject['metadata'] = { name: 'w' }): ApiObject => ({
  kind: 'Widget',
  metadata: meta,
});

describe('beforeCreate', () => {
  it('should call the create hooks in order', () => {
    const { strategy, calls } = recordingStrategy();

    beforeCreate(strategy, ctx, widget());

    expect(calls).toEqual(['prepareForCreate', 'validate', 'canonicalize']);
  });

  it('should not canonicalize an invalid object', () => {
    const { strategy, calls } = recordingStrategy({
      validate: () => {
        calls.push('validate');
        return [{ type: 'FieldValueRequired', field: 'spec.size', detail: '' }];
      },
    });

    expect(() => beforeCreate(strategy, ctx, widget())).toThrow(InvalidError);
    expect(calls).toEqual(['prepareForCreate', 'validate']);
  });

  it('should fill namespace, uid and creation timestamp', () => {
    const { strategy } = recordingStrategy();
    const obj = widget();

    beforeCreate(strategy, ctx, obj);

    expect(obj.metadata.namespace).toBe('default');
    expect(obj.metadata.uid).toMatch(/^[0-9a-f-]{36}$/);
    expect(obj.metadata.creationTimestamp).toBeInstanceOf(Date);
  });

  it('should generate a name from generateName', () => {
    const { strategy } = recordingStrategy();
    const obj = widget({ generateName: 'web-' });

    beforeCreate(strategy, ctx, obj);

    expect(obj.metadata.name).toBe('web-abcde');
  });

  it('should reject an object from another namespace', () => {
    const { strategy, calls } = recordingStrategy();

    expect(() => beforeCreate(strategy, ctx, widget({ name: 'w', namespace: 'other' }))).toThrow(
      BadRequestError
    );
    expect(calls).toEqual([]);
  });

  it('should clear the namespace of cluster-scoped objects', () => {
    const { strategy } = recordingStrategy({ namespaceScoped: () => false });
    const obj = widget({ name: 'w', namespace: 'default' });

    beforeCreate(strategy, ctx, obj);

    expect(obj.metadata.namespace).toBeUndefined();
  });

  it('should create a build config with sanitized triggers', () => {
    const bc = newBuildConfig([genericTrigger(), { type: 'BogusType' }]);

    beforeCreate(buildConfigStrategy, ctx, bc);

    expect(bc.spec.triggers).toEqual([genericTrigger()]);
  });

  it('should allocate a host for a generated route name', () => {
    const strategy = new RouteStrategy({
      allocator: {
        allocateRouterShard: () => ({ shardName: '', dnsSuffix: 'apps.example.com' }),
        generateHostname: (route: Route, shard) => `${route.metadata.name ?? ''}.${shard.dnsSuffix}`,
      },
      nameGenerator: { generateName: (base) => `${base}xyz12` },
    });
    const route = newRoute();
    route.metadata = { generateName: 'shop-' };

    beforeCreate(strategy, ctx, route);

    expect(route.metadata.name).toBe('shop-xyz12');
    expect(route.spec.host).toBe('shop-xyz12.apps.example.com');
  });

  it('should list every field error in the thrown error', () => {
    const route = newRoute({ path: 'cart', wildcardPolicy: 'Subdomain' });

    try {
      beforeCreate(new RouteStrategy(), ctx, route);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidError);
      if (error instanceof InvalidError) {
        expect(error.errors.map((e) => e.field)).toEqual(['spec.wildcardPolicy', 'spec.path']);
        expect(error.message).toBe(
          'Route "web" is invalid: [spec.wildcardPolicy: Invalid value: "Subdomain": host name not specified for wildcard policy, spec.path: Invalid value: "cart": path must begin with /]'
        );
      }
    }
  });
});

describe('beforeUpdate', () => {
  const stored = () => widget({ name: 'w', namespace: 'default', uid: 'uid-1', resourceVersion: '7' });

  it('should call the update hooks in order', () => {
    const { strategy, calls } = recordingStrategy();

    beforeUpdate(strategy, ctx, widget({ name: 'w', resourceVersion: '7' }), stored());

    expect(calls).toEqual(['prepareForUpdate', 'validateUpdate', 'canonicalize']);
  });

  it('should not create missing objects when the strategy forbids it', () => {
    const { strategy, calls } = recordingStrategy();

    expect(() => beforeUpdate(strategy, ctx, widget(), undefined)).toThrow(NotFoundError);
    expect(calls).toEqual([]);
  });

  it('should fall back to create when the strategy allows it', () => {
    const { strategy, calls } = recordingStrategy({ allowCreateOnUpdate: () => true });

    beforeUpdate(strategy, ctx, widget(), undefined);

    expect(calls).toEqual(['prepareForCreate', 'validate', 'canonicalize']);
  });

  it('should require a resourceVersion for conditional strategies', () => {
    const { strategy } = recordingStrategy();

    expect(() => beforeUpdate(strategy, ctx, widget(), stored())).toThrow(
      'Widget "w" is invalid: metadata.resourceVersion: Required value: must be specified for an update'
    );
  });

  it('should allow unconditional updates when the strategy does', () => {
    const { strategy, calls } = recordingStrategy({ allowUnconditionalUpdate: () => true });

    beforeUpdate(strategy, ctx, widget(), stored());

    expect(calls).toEqual(['prepareForUpdate', 'validateUpdate', 'canonicalize']);
  });

  it('should carry uid and creation timestamp from the stored object', () => {
    const { strategy } = recordingStrategy();
    const old = stored();
    old.metadata.creationTimestamp = new Date('2024-01-02T03:04:05Z');
    const obj = widget({ name: 'w', resourceVersion: '7', uid: 'forged' });

    beforeUpdate(strategy, ctx, obj, old);

    expect(obj.metadata.uid).toBe('uid-1');
    expect(obj.metadata.creationTimestamp).toEqual(new Date('2024-01-02T03:04:05Z'));
  });

  it('should keep the stored route host through the pipeline', () => {
    const old = newRoute({ host: 'foo.example.com' });
    old.metadata.resourceVersion = '3';
    old.status = {};
    const route = newRoute({ host: '' });
    route.metadata.resourceVersion = '3';

    beforeUpdate(new RouteStrategy(), ctx, route, old);

    expect(route.spec.host).toBe('foo.example.com');
  });

  it('should raise the build config version to the stored one', () => {
    const old = newBuildConfig([], 5);
    old.metadata.resourceVersion = '10';
    const bc = newBuildConfig([], 3);
    bc.metadata.resourceVersion = '10';

    beforeUpdate(buildConfigStrategy, ctx, bc, old);

    expect(bc.status?.lastVersion).toBe(5);
  });
});

describe('beforeDelete', () => {
  it('should delete immediately when the strategy refuses graceful deletion', () => {
    const checkGracefulDelete = vi.fn(() => false);
    const { strategy } = recordingStrategy({ checkGracefulDelete });
    const obj = widget({ name: 'w', namespace: 'default' });

    expect(beforeDelete(strategy, ctx, obj, { gracePeriodSeconds: 30 })).toEqual({
      graceful: false,
      gracePeriodSeconds: 0,
    });
    expect(checkGracefulDelete).toHaveBeenCalledWith(obj, { gracePeriodSeconds: 30 });
  });

  it('should pass the grace period through for graceful strategies', () => {
    const { strategy } = recordingStrategy({ checkGracefulDelete: () => true });

    expect(beforeDelete(strategy, ctx, widget(), { gracePeriodSeconds: 30 })).toEqual({
      graceful: true,
      gracePeriodSeconds: 30,
    });
  });

  it('should fail when the uid precondition does not hold', () => {
    const { strategy } = recordingStrategy();
    const obj = widget({ name: 'w', uid: 'uid-1' });

    expect(() => beforeDelete(strategy, ctx, obj, { preconditions: { uid: 'uid-2' } })).toThrow(
      ConflictError
    );
  });

  it('should delete routes and build configs immediately', () => {
    expect(beforeDelete(new RouteStrategy(), ctx, newRoute()).graceful).toBe(false);
    expect(beforeDelete(buildConfigStrategy, ctx, newBuildConfig()).graceful).toBe(false);
  });
});
