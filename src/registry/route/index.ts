export {
  getRouteAttrs,
  routeMatcher,
  RouteStatusStrategy,
  RouteStrategy,
  type RouteStrategyOptions,
  routeStatusStrategy,
} from './strategy.js';
