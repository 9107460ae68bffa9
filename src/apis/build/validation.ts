/**
 * Default BuildConfig validation
 */

import { type } from 'arktype';
import {
  duplicate,
  invalid,
  notSupported,
  required,
} from '../../core/validation/field-errors.js';
import { FieldPath } from '../../core/validation/field-path.js';
import { validateObjectMeta, validateObjectMetaUpdate } from '../../core/validation/object-meta.js';
import { checkShape } from '../../core/validation/schema.js';
import type { FieldErrorList } from '../../core/types/validation.js';
import {
  type BuildConfigObject,
  type BuildTriggerPolicy,
  BuildTriggerType,
  hasBuildConfigSpec,
  KNOWN_TRIGGER_TYPES,
  type WebHookTrigger,
} from './types.js';

export interface BuildConfigValidator {
  validateBuildConfig(config: BuildConfigObject): FieldErrorList;
  validateBuildConfigUpdate(config: BuildConfigObject, old: BuildConfigObject): FieldErrorList;
}

const webHookTrigger = type({
  'secret?': 'string',
  'allowEnv?': 'boolean',
});

const buildTriggerPolicy = type({
  type: 'string',
  'github?': webHookTrigger,
  'generic?': webHookTrigger,
  'gitlab?': webHookTrigger,
  'bitbucket?': webHookTrigger,
  'imageChange?': 'object',
});

const buildConfigShape = type({
  kind: "'BuildConfig'",
  metadata: 'object',
  spec: {
    triggers: buildTriggerPolicy.array(),
    'runPolicy?': "'Serial' | 'Parallel' | 'SerialLatestOnly'",
    'source?': 'object',
    strategy: {
      type: "'Source' | 'Docker' | 'Custom' | 'JenkinsPipeline'",
    },
    'output?': 'object',
    'successfulBuildsHistoryLimit?': 'number',
    'failedBuildsHistoryLimit?': 'number',
  },
  'status?': {
    lastVersion: 'number',
  },
});

const specPath = FieldPath.of('spec');

const WEBHOOK_FIELDS = {
  [BuildTriggerType.GitHub]: 'github',
  [BuildTriggerType.Generic]: 'generic',
  [BuildTriggerType.GitLab]: 'gitlab',
  [BuildTriggerType.Bitbucket]: 'bitbucket',
} as const satisfies Record<string, keyof BuildTriggerPolicy>;

function isWebHookType(triggerType: string): triggerType is keyof typeof WEBHOOK_FIELDS {
  return Object.hasOwn(WEBHOOK_FIELDS, triggerType);
}

export function validateBuildConfig(config: BuildConfigObject): FieldErrorList {
  const shapeErrors = checkShape(buildConfigShape, config);
  if (shapeErrors.length > 0) {
    return shapeErrors;
  }
  if (!hasBuildConfigSpec(config)) {
    return [required(specPath)];
  }

  const errors: FieldErrorList = [...validateObjectMeta(config.metadata, true)];
  const spec = config.spec;

  let configChangeSeen = false;
  spec.triggers.forEach((trigger, i) => {
    const path = specPath.child('triggers').index(i);
    if (trigger.type === BuildTriggerType.ConfigChange) {
      if (configChangeSeen) {
        errors.push(duplicate(path.child('type'), trigger.type));
      }
      configChangeSeen = true;
    }
    errors.push(...validateTrigger(trigger, path));
  });

  if (spec.source?.git && !spec.source.git.uri) {
    errors.push(required(specPath.child('source', 'git', 'uri')));
  }

  for (const limit of ['successfulBuildsHistoryLimit', 'failedBuildsHistoryLimit'] as const) {
    const value = spec[limit];
    if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
      errors.push(invalid(specPath.child(limit), value, 'must be a non-negative integer'));
    }
  }

  const lastVersion = config.status?.lastVersion;
  if (lastVersion !== undefined && (!Number.isInteger(lastVersion) || lastVersion < 0)) {
    errors.push(
      invalid(FieldPath.of('status', 'lastVersion'), lastVersion, 'must be a non-negative integer')
    );
  }

  return errors;
}

function validateTrigger(trigger: BuildTriggerPolicy, path: FieldPath): FieldErrorList {
  if (!trigger.type) {
    return [required(path.child('type'), 'type of trigger must be specified')];
  }
  if (!KNOWN_TRIGGER_TYPES.has(trigger.type)) {
    return [notSupported(path.child('type'), trigger.type, [...KNOWN_TRIGGER_TYPES])];
  }

  if (isWebHookType(trigger.type)) {
    const field = WEBHOOK_FIELDS[trigger.type];
    return validateWebHook(trigger[field], path.child(field));
  }
  if (trigger.type === BuildTriggerType.ImageChange && !trigger.imageChange) {
    return [required(path.child('imageChange'))];
  }
  return [];
}

function validateWebHook(hook: WebHookTrigger | undefined, path: FieldPath): FieldErrorList {
  if (!hook) {
    return [required(path)];
  }
  if (!hook.secret) {
    return [required(path.child('secret'))];
  }
  return [];
}

export function validateBuildConfigUpdate(
  config: BuildConfigObject,
  old: BuildConfigObject
): FieldErrorList {
  const errors: FieldErrorList = [
    ...validateObjectMetaUpdate(config.metadata, old.metadata),
    ...validateBuildConfig(config),
  ];

  const next = config.status?.lastVersion ?? 0;
  const previous = old.status?.lastVersion ?? 0;
  if (next < previous) {
    errors.push(
      invalid(
        FieldPath.of('status', 'lastVersion'),
        next,
        'must be greater than or equal to last version'
      )
    );
  }

  return errors;
}

export const defaultBuildConfigValidator: BuildConfigValidator = {
  validateBuildConfig,
  validateBuildConfigUpdate,
};
