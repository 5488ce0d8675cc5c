export { createTask, assignOwner, withCancelRequest } from './model.js';
export { canTransition, isTerminal, nextTimestamp, transition } from './state.js';
export { HandlerRegistry, buildPayloadSchema } from './registry.js';
export type {
  HandlerContext,
  HandlerDefinition,
  HandlerToolDefinition,
  ParamKind,
  ParamShape,
  ParamSpec,
  RegisteredHandler,
  TaskHandler,
} from './registry.js';
export { LocalTaskQueue } from './queue.js';
export { TaskProcessor } from './processor.js';
export type { TaskProcessorOptions } from './processor.js';
export { DelegationRouter, leastLoaded } from './router.js';
export type { DelegationPolicy, DelegationRouterOptions, RouteDecision } from './router.js';
export { purgeExpired } from './retention.js';
