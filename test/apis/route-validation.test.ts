import { describe, expect, it } from 'vitest';
import {
  validateRoute,
  validateRouteStatusUpdate,
  validateRouteUpdate,
} from '../../src/apis/route/validation.js';
import { newRoute } from '../fixtures/objects.js';

describe('validateRoute', () => {
  it('should accept a minimal route', () => {
    expect(validateRoute(newRoute())).toEqual([]);
  });

  it('should accept a route with a host, path and edge TLS', () => {
    const route = newRoute({
      host: 'shop.example.com',
      path: '/cart',
      tls: { termination: 'edge', insecureEdgeTerminationPolicy: 'Redirect' },
      port: { targetPort: 'http' },
    });
    expect(validateRoute(route)).toEqual([]);
  });

  it('should reject a host that is not a DNS subdomain', () => {
    const errors = validateRoute(newRoute({ host: 'Shop_Example' }));
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({
      type: 'FieldValueInvalid',
      field: 'spec.host',
      badValue: 'Shop_Example',
    });
  });

  it('should require a host for subdomain wildcard routes', () => {
    expect(validateRoute(newRoute({ wildcardPolicy: 'Subdomain' }))).toEqual([
      {
        type: 'FieldValueInvalid',
        field: 'spec.wildcardPolicy',
        badValue: 'Subdomain',
        detail: 'host name not specified for wildcard policy',
      },
    ]);
  });

  it('should require paths to start with a slash', () => {
    expect(validateRoute(newRoute({ path: 'cart' }))).toEqual([
      { type: 'FieldValueInvalid', field: 'spec.path', badValue: 'cart', detail: 'path must begin with /' },
    ]);
  });

  it('should reject paths and certificates on passthrough routes', () => {
    const route = newRoute({
      path: '/cart',
      tls: { termination: 'passthrough', certificate: 'test-cert' },
    });

    expect(validateRoute(route).map((e) => e.field)).toEqual(['spec.path', 'spec.tls.certificate']);
  });

  it('should reject Allow insecure policy on passthrough routes', () => {
    const route = newRoute({ tls: { termination: 'passthrough', insecureEdgeTerminationPolicy: 'Allow' } });

    expect(validateRoute(route)).toEqual([
      {
        type: 'FieldValueNotSupported',
        field: 'spec.tls.insecureEdgeTerminationPolicy',
        badValue: 'Allow',
        detail: 'supported values: "None", "Redirect"',
      },
    ]);
  });

  it('should check backend weights and the number of alternates', () => {
    const route = newRoute({
      to: { kind: 'Service', name: 'a', weight: 300 },
      alternateBackends: [
        { kind: 'Service', name: 'b' },
        { kind: 'Service', name: 'c' },
        { kind: 'Service', name: 'd' },
        { kind: 'Service', name: '' },
      ],
    });

    expect(validateRoute(route).map((e) => `${e.type} ${e.field}`)).toEqual([
      'FieldValueInvalid spec.to.weight',
      'FieldValueInvalid spec.alternateBackends',
      'FieldValueRequired spec.alternateBackends[3].name',
    ]);
  });

  it('should report a missing backend name from the shape check', () => {
    const route = newRoute();
    const to: Record<string, unknown> = { kind: 'Service' };
    Reflect.set(route.spec, 'to', to);

    const errors = validateRoute(route);

    expect(errors.map((e) => e.field)).toEqual(['spec.to.name']);
  });

  it('should validate metadata', () => {
    const route = newRoute();
    route.metadata = { namespace: 'default' };

    expect(validateRoute(route)).toEqual([
      { type: 'FieldValueRequired', field: 'metadata.name', detail: 'name or generateName is required' },
    ]);
  });
});

describe('validateRouteUpdate', () => {
  it('should not allow the wildcard policy to change', () => {
    const old = newRoute({ host: 'shop.example.com' });
    const route = newRoute({ host: 'shop.example.com', wildcardPolicy: 'Subdomain' });

    expect(validateRouteUpdate(route, old)).toEqual([
      {
        type: 'FieldValueInvalid',
        field: 'spec.wildcardPolicy',
        badValue: 'Subdomain',
        detail: 'field is immutable',
      },
    ]);
  });

  it('should treat an unset wildcard policy as None', () => {
    const old = newRoute({ host: 'shop.example.com' });
    const route = newRoute({ host: 'shop.example.com', wildcardPolicy: 'None' });

    expect(validateRouteUpdate(route, old)).toEqual([]);
  });

  it('should not allow the name to change', () => {
    const errors = validateRouteUpdate(newRoute({}, 'other'), newRoute());
    expect(errors.map((e) => e.field)).toEqual(['metadata.name']);
  });
});

describe('validateRouteStatusUpdate', () => {
  it('should require host and router name on ingress entries', () => {
    const route = newRoute();
    route.status = { ingress: [{ host: 'shop.example.com', routerName: '' }, { host: '', routerName: 'r' }] };

    expect(validateRouteStatusUpdate(route, newRoute()).map((e) => e.field)).toEqual([
      'status.ingress[0].routerName',
      'status.ingress[1].host',
    ]);
  });

  it('should ignore the spec', () => {
    const route = newRoute({ path: 'no-slash' });
    expect(validateRouteStatusUpdate(route, newRoute())).toEqual([]);
  });
});
