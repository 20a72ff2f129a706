export type { TaskDispatcher, UnitContext, WorkUnit } from './dispatcher.js';
export type { LocalDispatcherOptions } from './local.js';
export { LocalDispatcher } from './local.js';
export type { ScatterUnit } from './scatter-gather.js';
export { scatterGather } from './scatter-gather.js';
