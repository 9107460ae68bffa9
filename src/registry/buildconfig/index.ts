export {
  buildConfigMatcher,
  BuildConfigStrategy,
  type BuildConfigStrategyOptions,
  buildConfigStrategy,
  getBuildConfigAttrs,
} from './strategy.js';
