export { RouteAllocationController } from './controller.js';
export { SimpleAllocationPlugin } from './simple-plugin.js';
export type { AllocationPlugin, RouteAllocator, RouterShard } from './types.js';
