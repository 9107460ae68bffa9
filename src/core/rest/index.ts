export { beforeCreate } from './create.js';
export { beforeDelete, type DeleteDecision } from './delete.js';
export { checkNamespace, fillObjectMetaSystemFields, validNamespace } from './meta.js';
export { beforeUpdate } from './update.js';
