export type EngineErrorKind =
  | 'InvalidFeePercentage'
  | 'InvalidAuction'
  | 'AuctionNotActive'
  | 'BidTooLow'
  | 'AuctionEnded'
  | 'AuctionNotEnded'
  | 'BlacklistedBidder'
  | 'TransferFailed'
  | 'InvalidAmount'
  | 'Unauthorized'
  | 'RateLimitExceeded'
  | 'CooldownPeriod'
  | 'InvalidSystemState'
  | 'EmergencyPaused';

/**
 * Raised by every failed engine operation. A thrown EngineError means no state
 * was changed and no event was published.
 */
export class EngineError extends Error {
  readonly kind: EngineErrorKind;

  constructor(kind: EngineErrorKind, message?: string) {
    super(message ?? kind);
    this.name = 'EngineError';
    this.kind = kind;
  }
}

export function isEngineError(
  err: unknown,
  kind?: EngineErrorKind,
): err is EngineError {
  return (
    err instanceof EngineError && (kind === undefined || err.kind === kind)
  );
}

/** Non-negative safe integer, or InvalidAmount. */
export function assertAmount(value: number, field: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new EngineError(
      'InvalidAmount',
      `${field} must be a non-negative integer (got ${value})`,
    );
  }
}
