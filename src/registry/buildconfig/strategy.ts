/**
 * BuildConfig lifecycle strategy
 */

import {
  BUILD_CONFIG_KIND,
  type BuildConfigObject,
  type BuildConfigSpec,
  isBuildConfig,
  KNOWN_TRIGGER_TYPES,
} from '../../apis/build/types.js';
import { buildConfigToSelectableFields } from '../../apis/build/fields.js';
import {
  type BuildConfigValidator,
  defaultBuildConfigValidator,
} from '../../apis/build/validation.js';
import { TypeMismatchError } from '../../core/errors.js';
import { simpleNameGenerator } from '../../core/names.js';
import { createSelectionPredicate } from '../../core/selection/predicate.js';
import type { ApiObject, DeleteOptions } from '../../core/types/object.js';
import type {
  ObjectAttributes,
  SelectionPredicate,
  Selector,
} from '../../core/types/selection.js';
import type { NameGenerator, RESTStrategy } from '../../core/types/strategy.js';
import type { FieldErrorList } from '../../core/types/validation.js';

export interface BuildConfigStrategyOptions {
  validator?: BuildConfigValidator;
  knownTriggerTypes?: ReadonlySet<string>;
  nameGenerator?: NameGenerator;
}

function asBuildConfig(obj: unknown): BuildConfigObject {
  if (!isBuildConfig(obj)) {
    throw new TypeMismatchError(BUILD_CONFIG_KIND, obj);
  }
  return obj;
}

export class BuildConfigStrategy implements RESTStrategy {
  readonly kind = BUILD_CONFIG_KIND;

  private readonly validator: BuildConfigValidator;
  private readonly knownTriggerTypes: ReadonlySet<string>;
  private readonly nameGenerator: NameGenerator;

  constructor(options: BuildConfigStrategyOptions = {}) {
    this.validator = options.validator ?? defaultBuildConfigValidator;
    this.knownTriggerTypes = options.knownTriggerTypes ?? KNOWN_TRIGGER_TYPES;
    this.nameGenerator = options.nameGenerator ?? simpleNameGenerator;
  }

  generateName(base: string): string {
    return this.nameGenerator.generateName(base);
  }

  namespaceScoped(): boolean {
    return true;
  }

  allowCreateOnUpdate(): boolean {
    return false;
  }

  allowUnconditionalUpdate(): boolean {
    return false;
  }

  /**
   * Clears fields that are not allowed to be set by end users on creation.
   */
  prepareForCreate(obj: ApiObject): void {
    const config = asBuildConfig(obj);
    if (config.spec) {
      this.dropUnknownTriggers(config.spec);
    }
  }

  /**
   * Same trigger filtering as create. lastVersion never goes below the
   * stored value.
   */
  prepareForUpdate(obj: ApiObject, old: ApiObject): void {
    const config = asBuildConfig(obj);
    const oldConfig = asBuildConfig(old);
    if (config.spec) {
      this.dropUnknownTriggers(config.spec);
    }

    const previous = oldConfig.status?.lastVersion ?? 0;
    if ((config.status?.lastVersion ?? 0) < previous) {
      config.status = { ...config.status, lastVersion: previous };
    }
  }

  validate(obj: ApiObject): FieldErrorList {
    return this.validator.validateBuildConfig(asBuildConfig(obj));
  }

  validateUpdate(obj: ApiObject, old: ApiObject): FieldErrorList {
    return this.validator.validateBuildConfigUpdate(asBuildConfig(obj), asBuildConfig(old));
  }

  canonicalize(_obj: ApiObject): void {}

  checkGracefulDelete(_obj: ApiObject, _options?: DeleteOptions): boolean {
    return false;
  }

  private dropUnknownTriggers(spec: BuildConfigSpec): void {
    spec.triggers = (spec.triggers ?? []).filter((trigger) =>
      this.knownTriggerTypes.has(trigger.type)
    );
  }
}

/**
 * Default strategy for BuildConfig objects.
 */
export const buildConfigStrategy = new BuildConfigStrategy();

/**
 * Labels and fields of a BuildConfig, for filtering.
 */
export function getBuildConfigAttrs(obj: ApiObject): ObjectAttributes {
  const config = asBuildConfig(obj);
  return {
    labels: { ...config.metadata.labels },
    fields: buildConfigToSelectableFields(config),
  };
}

export function buildConfigMatcher(label?: Selector, field?: Selector): SelectionPredicate {
  return createSelectionPredicate(label, field, getBuildConfigAttrs);
}
