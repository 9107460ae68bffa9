/**
 * Default Route validation
 */

import { type } from 'arktype';
import { isDNS1123Subdomain } from '../../core/validation/dns.js';
import {
  forbidden,
  immutable,
  invalid,
  notSupported,
  required,
} from '../../core/validation/field-errors.js';
import { FieldPath } from '../../core/validation/field-path.js';
import { validateObjectMeta, validateObjectMetaUpdate } from '../../core/validation/object-meta.js';
import { checkShape } from '../../core/validation/schema.js';
import type { FieldErrorList } from '../../core/types/validation.js';
import { hasRouteSpec, type RouteObject, type RouteTargetReference, WildcardPolicy } from './types.js';

export interface RouteValidator {
  validateRoute(route: RouteObject): FieldErrorList;
  validateRouteUpdate(route: RouteObject, old: RouteObject): FieldErrorList;
  validateRouteStatusUpdate(route: RouteObject, old: RouteObject): FieldErrorList;
}

export const MAX_ALTERNATE_BACKENDS = 3;
export const MAX_BACKEND_WEIGHT = 256;

const routeTargetReference = type({
  kind: 'string',
  name: 'string',
  'weight?': 'number',
});

const routeIngress = type({
  host: 'string',
  routerName: 'string',
  'wildcardPolicy?': "'None' | 'Subdomain'",
  'conditions?': 'object[]',
  'routerCanonicalHostname?': 'string',
});

const routeShape = type({
  kind: "'Route'",
  metadata: 'object',
  spec: {
    'host?': 'string',
    'path?': 'string',
    to: routeTargetReference,
    'alternateBackends?': routeTargetReference.array(),
    'port?': {
      targetPort: 'string | number',
    },
    'tls?': {
      termination: "'edge' | 'passthrough' | 'reencrypt'",
      'certificate?': 'string',
      'key?': 'string',
      'caCertificate?': 'string',
      'destinationCACertificate?': 'string',
      'insecureEdgeTerminationPolicy?': "'None' | 'Allow' | 'Redirect'",
    },
    'wildcardPolicy?': "'None' | 'Subdomain'",
  },
  'status?': {
    'ingress?': routeIngress.array(),
  },
});

const specPath = FieldPath.of('spec');

export function validateRoute(route: RouteObject): FieldErrorList {
  const shapeErrors = checkShape(routeShape, route);
  if (shapeErrors.length > 0) {
    return shapeErrors;
  }
  if (!hasRouteSpec(route)) {
    return [required(specPath)];
  }

  const errors: FieldErrorList = [...validateObjectMeta(route.metadata, true)];
  const spec = route.spec;

  if (spec.host) {
    for (const msg of isDNS1123Subdomain(spec.host)) {
      errors.push(invalid(specPath.child('host'), spec.host, msg));
    }
  }

  if (spec.wildcardPolicy === WildcardPolicy.Subdomain && !spec.host) {
    errors.push(
      invalid(
        specPath.child('wildcardPolicy'),
        spec.wildcardPolicy,
        'host name not specified for wildcard policy'
      )
    );
  }

  if (spec.path) {
    if (!spec.path.startsWith('/')) {
      errors.push(invalid(specPath.child('path'), spec.path, 'path must begin with /'));
    }
    if (spec.tls?.termination === 'passthrough') {
      errors.push(
        invalid(specPath.child('path'), spec.path, 'passthrough termination does not support paths')
      );
    }
  }

  errors.push(...validateTarget(spec.to, specPath.child('to')));

  const alternates = spec.alternateBackends ?? [];
  if (alternates.length > MAX_ALTERNATE_BACKENDS) {
    errors.push(
      invalid(
        specPath.child('alternateBackends'),
        alternates.length,
        `cannot specify more than ${MAX_ALTERNATE_BACKENDS} alternate backends`
      )
    );
  }
  alternates.forEach((backend, i) => {
    errors.push(...validateTarget(backend, specPath.child('alternateBackends').index(i)));
  });

  if (spec.port && (spec.port.targetPort === '' || spec.port.targetPort === 0)) {
    errors.push(required(specPath.child('port', 'targetPort')));
  }

  const tls = spec.tls;
  if (tls?.termination === 'passthrough') {
    const tlsPath = specPath.child('tls');
    for (const field of ['certificate', 'key', 'caCertificate', 'destinationCACertificate'] as const) {
      if (tls[field]) {
        errors.push(forbidden(tlsPath.child(field), 'passthrough termination does not support certificates'));
      }
    }
    if (tls.insecureEdgeTerminationPolicy === 'Allow') {
      errors.push(
        notSupported(tlsPath.child('insecureEdgeTerminationPolicy'), 'Allow', ['None', 'Redirect'])
      );
    }
  }

  return errors;
}

function validateTarget(target: RouteTargetReference, path: FieldPath): FieldErrorList {
  const errors: FieldErrorList = [];
  if (target.kind !== 'Service') {
    errors.push(notSupported(path.child('kind'), target.kind, ['Service']));
  }
  if (!target.name) {
    errors.push(required(path.child('name')));
  }
  if (
    target.weight !== undefined &&
    (!Number.isInteger(target.weight) || target.weight < 0 || target.weight > MAX_BACKEND_WEIGHT)
  ) {
    errors.push(
      invalid(
        path.child('weight'),
        target.weight,
        `weight must be an integer between 0 and ${MAX_BACKEND_WEIGHT}`
      )
    );
  }
  return errors;
}

export function validateRouteUpdate(route: RouteObject, old: RouteObject): FieldErrorList {
  const errors: FieldErrorList = [
    ...validateObjectMetaUpdate(route.metadata, old.metadata),
    ...validateRoute(route),
  ];

  if (route.spec) {
    const policy = route.spec.wildcardPolicy ?? WildcardPolicy.None;
    const oldPolicy = old.spec?.wildcardPolicy ?? WildcardPolicy.None;
    if (policy !== oldPolicy) {
      errors.push(immutable(specPath.child('wildcardPolicy'), route.spec.wildcardPolicy));
    }
  }

  return errors;
}

export function validateRouteStatusUpdate(route: RouteObject, old: RouteObject): FieldErrorList {
  const errors: FieldErrorList = [...validateObjectMetaUpdate(route.metadata, old.metadata)];

  const ingressPath = FieldPath.of('status', 'ingress');
  (route.status?.ingress ?? []).forEach((ingress, i) => {
    const path = ingressPath.index(i);
    if (!ingress.host) {
      errors.push(required(path.child('host')));
    }
    if (!ingress.routerName) {
      errors.push(required(path.child('routerName')));
    }
  });

  return errors;
}

export const defaultRouteValidator: RouteValidator = {
  validateRoute,
  validateRouteUpdate,
  validateRouteStatusUpdate,
};
