export { buildConfigToSelectableFields } from './fields.js';
export * from './types.js';
export {
  type BuildConfigValidator,
  defaultBuildConfigValidator,
  validateBuildConfig,
  validateBuildConfigUpdate,
} from './validation.js';
