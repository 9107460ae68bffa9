/**
 * Programmatic label and field selectors
 *
 * Selectors are built from requirements and only evaluated here; parsing a
 * textual selector is left to the transport layer.
 */

import { ResourceLifecycleError } from '../errors.js';
import type { Requirement, Selector, SelectorOperator } from '../types/selection.js';

class RequirementSelector implements Selector {
  constructor(private readonly reqs: readonly Requirement[]) {}

  matches(set: Readonly<Record<string, string>>): boolean {
    return this.reqs.every((req) => requirementMatches(req, set));
  }

  empty(): boolean {
    return this.reqs.length === 0;
  }

  requiresExactMatch(key: string): string | undefined {
    for (const req of this.reqs) {
      if (req.key !== key) continue;
      if (req.operator === '=' || (req.operator === 'in' && req.values.length === 1)) {
        return req.values[0];
      }
    }
    return undefined;
  }

  requirements(): readonly Requirement[] {
    return this.reqs;
  }

  toString(): string {
    return this.reqs.map(formatRequirement).join(',');
  }
}

class NothingSelector implements Selector {
  matches(): boolean {
    return false;
  }

  empty(): boolean {
    return false;
  }

  requiresExactMatch(): string | undefined {
    return undefined;
  }

  requirements(): readonly Requirement[] {
    return [];
  }

  toString(): string {
    return '';
  }
}

function requirementMatches(req: Requirement, set: Readonly<Record<string, string>>): boolean {
  const has = Object.hasOwn(set, req.key);
  const value = set[req.key];
  switch (req.operator) {
    case '=':
    case 'in':
      return has && value !== undefined && req.values.includes(value);
    case '!=':
    case 'notin':
      return !has || value === undefined || !req.values.includes(value);
    case 'exists':
      return has;
    case '!':
      return !has;
  }
}

function formatRequirement(req: Requirement): string {
  switch (req.operator) {
    case '=':
    case '!=':
      return `${req.key}${req.operator}${req.values[0] ?? ''}`;
    case 'in':
    case 'notin':
      return `${req.key} ${req.operator} (${[...req.values].sort().join(',')})`;
    case 'exists':
      return req.key;
    case '!':
      return `!${req.key}`;
  }
}

const VALUE_COUNTS: Record<SelectorOperator, 'one' | 'some' | 'none'> = {
  '=': 'one',
  '!=': 'one',
  in: 'some',
  notin: 'some',
  exists: 'none',
  '!': 'none',
};

function invalidSelector(message: string): ResourceLifecycleError {
  return new ResourceLifecycleError(message, 'INVALID_SELECTOR');
}

/**
 * Build a requirement, checking the operator gets the number of values it
 * needs.
 */
export function requirement(
  key: string,
  operator: SelectorOperator,
  values: readonly string[] = []
): Requirement {
  if (!key) {
    throw invalidSelector('selector requirement key must not be empty');
  }
  const expected = VALUE_COUNTS[operator];
  if (expected === 'one' && values.length !== 1) {
    throw invalidSelector(`operator '${operator}' requires exactly one value, got ${values.length}`);
  }
  if (expected === 'some' && values.length === 0) {
    throw invalidSelector(`operator '${operator}' requires at least one value`);
  }
  if (expected === 'none' && values.length > 0) {
    throw invalidSelector(`operator '${operator}' takes no values`);
  }
  return { key, operator, values: [...values] };
}

/**
 * Matches every set.
 */
export function everything(): Selector {
  return new RequirementSelector([]);
}

/**
 * Matches no set.
 */
export function nothing(): Selector {
  return new NothingSelector();
}

/**
 * Equality selector requiring each key to hold the given value.
 */
export function selectorFromSet(set: Readonly<Record<string, string>>): Selector {
  const reqs = Object.keys(set)
    .sort()
    .map((key) => requirement(key, '=', [set[key] ?? '']));
  return new RequirementSelector(reqs);
}

export function selectorFromRequirements(reqs: readonly Requirement[]): Selector {
  return new RequirementSelector([...reqs].sort((a, b) => a.key.localeCompare(b.key)));
}
