import { randomInt } from 'node:crypto';
import type { NameGenerator } from './types/strategy.js';

// No vowels, and no 0/1/3 which read like o/l/e.
const ALPHANUMS = 'bcdfghjklmnpqrstvwxz2456789';

const MAX_NAME_LENGTH = 63;
const RANDOM_LENGTH = 5;
const MAX_GENERATED_NAME_LENGTH = MAX_NAME_LENGTH - RANDOM_LENGTH;

function randomSuffix(length: number): string {
  let suffix = '';
  for (let i = 0; i < length; i++) {
    suffix += ALPHANUMS.charAt(randomInt(ALPHANUMS.length));
  }
  return suffix;
}

/**
 * Appends five random characters to the base, truncating the base so the
 * result fits in 63 characters.
 */
export const simpleNameGenerator: NameGenerator = {
  generateName(base: string): string {
    const prefix = base.length > MAX_GENERATED_NAME_LENGTH ? base.slice(0, MAX_GENERATED_NAME_LENGTH) : base;
    return `${prefix}${randomSuffix(RANDOM_LENGTH)}`;
  },
};
