export { HandlerAdapter, classifyFrameworkError, DEFAULT_HEADERS, type HandlerAdapterOptions } from './HandlerAdapter.js';
export { RecoveryRouter, type RecoveryOptions } from './RecoveryRouter.js';
export { OverrideRegistry, overrideKindFor, type OverrideHandlers, type OverrideKind } from './OverrideRegistry.js';
export type {
  Handler,
  HandlerOutcome,
  LifecycleState,
  RecoveryResolution,
  RequestOutcome,
} from './types.js';
