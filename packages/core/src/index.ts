// Shared
export * from './shared/protocol.js';
export * from './shared/errors.js';
export * from './shared/config.js';
export { createLogger } from './shared/logger.js';
export { KeyedLock } from './shared/keyed-lock.js';
export { withTimeout } from './shared/timeout.js';

// Features: execution
export * from './features/execution/venue-client.js';
export { PrecisionResolver, type PrecisionResolverOptions } from './features/execution/precision-resolver.js';
export {
  parseInstrument,
  parseOrderType,
  isOrderType,
  toVenueRequest,
  mapVenueStatus,
  fromVenueOrder,
  fromVenuePosition,
  fromVenueAccount,
  toTrade,
  type InstrumentRef,
  type FillEvent,
} from './features/execution/order-normalizer.js';
export { advanceOrder, canTransition, isTerminal, type OrderPatch } from './features/execution/order-state.js';
export { PositionTracker } from './features/execution/position-tracker.js';
export {
  OrderRouter,
  type OrderRouterOptions,
  type CancelAllResult,
  type MergeOutcome,
  type MergeResult,
} from './features/execution/order-router.js';

// Features: reconciliation
export { Reconciler, type ReconcilerOptions, type ReconcileSummary } from './features/reconciliation/reconciler.js';

// Features: simulator
export { SimulatorVenueClient, DEFAULT_SIMULATOR_CONFIG, type SimulatorConfig } from './features/simulator/simulator.js';

// Root
export { TradingGateway, type GatewayStatus, type GatewayOptions } from './gateway.js';
