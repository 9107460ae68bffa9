export { routeToSelectableFields } from './fields.js';
export * from './types.js';
export {
  defaultRouteValidator,
  MAX_ALTERNATE_BACKENDS,
  MAX_BACKEND_WEIGHT,
  type RouteValidator,
  validateRoute,
  validateRouteStatusUpdate,
  validateRouteUpdate,
} from './validation.js';
