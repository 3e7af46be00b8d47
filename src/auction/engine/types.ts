/**
 * Sentinel payment asset for the ledger's native currency.
 */
export const NATIVE_ASSET = 'native';

export type Role =
  | 'Admin'
  | 'Auctioneer'
  | 'Operator'
  | 'Maintainer'
  | 'Recovery';

export const ROLES: readonly Role[] = [
  'Admin',
  'Auctioneer',
  'Operator',
  'Maintainer',
  'Recovery',
];

export function isRole(value: unknown): value is Role {
  return ROLES.some((role) => role === value);
}

/**
 * Caller identity and current time (Unix seconds). Supplied to every
 * operation; the engine never samples either itself.
 */
export interface CallContext {
  actor: string;
  now: number;
}

/**
 * Global mode: ACTIVE → MAINTENANCE | EMERGENCY. `paused` is independent.
 */
export type SystemMode = 'Active' | 'Maintenance' | 'Emergency';

export interface SystemState {
  mode: SystemMode;
  paused: boolean;
}

/**
 * Single auction record. Never deleted, only deactivated.
 */
export interface AuctionItem {
  id: number;
  owner: string;
  asset: string;
  assetAmount: number;
  paymentAsset: string;
  reservePrice: number;
  buyNowPrice: number;
  minimumBidIncrement: number;
  timeExtensionSeconds: number;
  extensionWindowSeconds: number;
  feePercentage: number;
  startTime: number;
  endTime: number;
  extensionCount: number;
  isActive: boolean;
  canceled: boolean;
  ended: boolean;
}

export interface Bid {
  bidder: string;
  amount: number;
  timestamp: number;
  withdrawn: boolean;
}

export interface HighestBidState {
  highestBidder: string | null;
  highestBid: number;
}

/**
 * Read model returned to callers: item plus its current highest bid.
 */
export interface AuctionView extends AuctionItem, HighestBidState {
  bidCount: number;
}

export interface SystemMetrics {
  totalAuctions: number;
  activeAuctions: number;
  totalVolume: number;
  lastUpdateTimestamp: number;
}

export interface RateLimitStatus {
  actionsRemaining: number;
  cooldownEnds: number;
}

export interface CreateAuctionInput {
  asset: string;
  /** Units of `asset` taken into custody; 1 for a unique item. */
  assetAmount?: number;
  paymentAsset: string;
  reservePrice: number;
  buyNowPrice: number;
  minimumBidIncrement: number;
  durationSeconds: number;
  timeExtensionSeconds: number;
  extensionWindowSeconds: number;
}

/**
 * Evidence accompanying a bid. For the native asset the attached value must
 * match the bid amount exactly.
 */
export interface PaymentProof {
  attachedValue?: number;
  reference?: string;
}

export interface RoleGrants {
  admin: string;
  auctioneers?: string[];
  operators?: string[];
  maintainers?: string[];
  recovery?: string[];
}

/**
 * Construction-time configuration; replaces any deferred initializer.
 */
export interface EngineConfig {
  roles: RoleGrants;
  platformFeePercentage: number;
  maxFeePercentage: number;
  rateLimitPeriodSeconds: number;
  maxActionsPerPeriod: number;
  actionCooldownSeconds: number;
}

export const DEFAULT_ENGINE_LIMITS = {
  platformFeePercentage: 0,
  maxFeePercentage: 10,
  rateLimitPeriodSeconds: 3600,
  maxActionsPerPeriod: 100,
  actionCooldownSeconds: 60,
} as const;
