/**
 * BuildConfig API types
 */

import type { V1ObjectReference } from '@kubernetes/client-node';
import type { ApiObject } from '../../core/types/object.js';

export const BUILD_API_VERSION = 'build.openshift.io/v1';
export const BUILD_CONFIG_KIND = 'BuildConfig';

export const BuildTriggerType = {
  GitHub: 'GitHub',
  Generic: 'Generic',
  GitLab: 'GitLab',
  Bitbucket: 'Bitbucket',
  ImageChange: 'ImageChange',
  ConfigChange: 'ConfigChange',
} as const;

/**
 * Trigger type tag. Typed as a plain string because clients may submit
 * types this server does not know; those are dropped before validation.
 */
export type BuildTriggerTypeName = (typeof BuildTriggerType)[keyof typeof BuildTriggerType] | (string & {});

/**
 * Trigger types this server understands.
 */
export const KNOWN_TRIGGER_TYPES: ReadonlySet<string> = new Set(Object.values(BuildTriggerType));

export interface WebHookTrigger {
  secret?: string;
  allowEnv?: boolean;
}

export interface ImageChangeTrigger {
  lastTriggeredImageID?: string;
  from?: V1ObjectReference;
}

export interface BuildTriggerPolicy {
  type: BuildTriggerTypeName;
  github?: WebHookTrigger;
  generic?: WebHookTrigger;
  gitlab?: WebHookTrigger;
  bitbucket?: WebHookTrigger;
  imageChange?: ImageChangeTrigger;
}

export type BuildRunPolicy = 'Serial' | 'Parallel' | 'SerialLatestOnly';
export type BuildStrategyType = 'Source' | 'Docker' | 'Custom' | 'JenkinsPipeline';

export interface GitBuildSource {
  uri: string;
  ref?: string;
}

export interface BuildSource {
  git?: GitBuildSource;
  dockerfile?: string;
  contextDir?: string;
}

export interface BuildStrategy {
  type: BuildStrategyType;
  from?: V1ObjectReference;
}

export interface BuildOutput {
  to?: V1ObjectReference;
}

export interface BuildConfigSpec {
  triggers: BuildTriggerPolicy[];
  runPolicy?: BuildRunPolicy;
  source?: BuildSource;
  strategy: BuildStrategy;
  output?: BuildOutput;
  successfulBuildsHistoryLimit?: number;
  failedBuildsHistoryLimit?: number;
}

export interface BuildConfigStatus {
  /**
   * Number of the most recently started build. Owned by the server.
   */
  lastVersion: number;
}

export interface BuildConfig extends ApiObject {
  kind: typeof BUILD_CONFIG_KIND;
  spec: BuildConfigSpec;
  /** Missing on most client-submitted objects; treated as lastVersion 0. */
  status?: BuildConfigStatus;
}

/**
 * A BuildConfig as a hook receives it, before validation has checked that
 * it has a spec.
 */
export type BuildConfigObject = Omit<BuildConfig, 'spec'> & { spec?: BuildConfigSpec };

export function isBuildConfig(obj: unknown): obj is BuildConfigObject {
  return typeof obj === 'object' && obj !== null && 'kind' in obj && obj.kind === BUILD_CONFIG_KIND;
}

export function hasBuildConfigSpec(config: BuildConfigObject): config is BuildConfig {
  return typeof config.spec === 'object' && config.spec !== null;
}
