export { AuctionEngine } from './auction-engine';
export { AccessControl } from './access-control';
export { AuctionRegistry } from './auction-registry';
export { BidLedger } from './bid-ledger';
export { CooldownGuard } from './cooldown-guard';
export { RateLimiter } from './rate-limiter';
export { SystemStateController } from './system-state';
export { MetricsAggregator } from './metrics';
export { Treasury } from './treasury';
export { DomainEventLog } from './events';
export { KeyedLock } from './keyed-lock';
export {
  LedgerPaymentAdapter,
  CUSTODY_ACCOUNT,
} from './ledger-payment-adapter';
export { EngineError, isEngineError } from './errors';
export {
  NATIVE_ASSET,
  ROLES,
  DEFAULT_ENGINE_LIMITS,
  isRole,
} from './types';
export type { EngineErrorKind } from './errors';
export type {
  DomainEvent,
  DomainEventBody,
  DomainEventType,
  DomainEventListener,
} from './events';
export type { PaymentAdapter, TransferResult } from './payment-adapter';
export type { TreasuryBalance } from './treasury';
export type {
  AuctionItem,
  AuctionView,
  Bid,
  CallContext,
  CreateAuctionInput,
  EngineConfig,
  HighestBidState,
  PaymentProof,
  RateLimitStatus,
  Role,
  RoleGrants,
  SystemMetrics,
  SystemMode,
  SystemState,
} from './types';
