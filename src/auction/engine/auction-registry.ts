import { assertAmount, EngineError } from './errors';
import type { AuctionItem, CreateAuctionInput } from './types';

/**
 * Owns AuctionItem records: ACTIVE → ENDED | CANCELED. Records are never
 * removed. plan* methods only read; the rest mutate and must run after every
 * check of the enclosing operation has passed.
 */
export class AuctionRegistry {
  private readonly items = new Map<number, AuctionItem>();
  private nextId = 1;

  get(auctionId: number): AuctionItem {
    const item = this.items.get(auctionId);
    if (!item) {
      throw new EngineError('InvalidAuction', `Auction ${auctionId} not found`);
    }
    return item;
  }

  snapshot(auctionId: number): AuctionItem {
    return { ...this.get(auctionId) };
  }

  all(): AuctionItem[] {
    return [...this.items.values()].map((item) => ({ ...item }));
  }

  planCreate(
    owner: string,
    input: CreateAuctionInput,
    now: number,
    feePercentage: number,
  ): AuctionItem {
    const assetAmount = input.assetAmount ?? 1;
    assertAmount(input.reservePrice, 'reservePrice');
    assertAmount(input.buyNowPrice, 'buyNowPrice');
    assertAmount(input.minimumBidIncrement, 'minimumBidIncrement');
    assertAmount(input.durationSeconds, 'durationSeconds');
    assertAmount(input.timeExtensionSeconds, 'timeExtensionSeconds');
    assertAmount(input.extensionWindowSeconds, 'extensionWindowSeconds');
    assertAmount(assetAmount, 'assetAmount');
    if (!input.asset || !input.paymentAsset) {
      throw new EngineError('InvalidAmount', 'asset and paymentAsset required');
    }
    if (assetAmount === 0) {
      throw new EngineError('InvalidAmount', 'assetAmount must be positive');
    }
    if (input.durationSeconds === 0) {
      throw new EngineError('InvalidAmount', 'durationSeconds must be positive');
    }
    if (input.reservePrice >= input.buyNowPrice) {
      throw new EngineError(
        'InvalidAmount',
        `buyNowPrice (${input.buyNowPrice}) must exceed reservePrice (${input.reservePrice})`,
      );
    }

    return {
      id: this.nextId,
      owner,
      asset: input.asset,
      assetAmount,
      paymentAsset: input.paymentAsset,
      reservePrice: input.reservePrice,
      buyNowPrice: input.buyNowPrice,
      minimumBidIncrement: input.minimumBidIncrement,
      timeExtensionSeconds: input.timeExtensionSeconds,
      extensionWindowSeconds: input.extensionWindowSeconds,
      feePercentage,
      startTime: now,
      endTime: now + input.durationSeconds,
      extensionCount: 0,
      isActive: true,
      canceled: false,
      ended: false,
    };
  }

  insert(item: AuctionItem): void {
    if (item.id !== this.nextId) {
      throw new EngineError('InvalidAuction', `Auction id ${item.id} is stale`);
    }
    this.items.set(item.id, { ...item });
    this.nextId += 1;
  }

  /** End time after a bid at `now`, or null when outside the extension window. */
  planExtension(item: AuctionItem, now: number): number | null {
    if (now >= item.endTime - item.extensionWindowSeconds) {
      return item.endTime + item.timeExtensionSeconds;
    }
    return null;
  }

  extend(auctionId: number, endTime: number): AuctionItem {
    const item = this.get(auctionId);
    item.endTime = endTime;
    item.extensionCount += 1;
    return { ...item };
  }

  assertBiddable(item: AuctionItem): void {
    if (!item.isActive) {
      throw new EngineError(
        'AuctionNotActive',
        `Auction ${item.id} is not active`,
      );
    }
  }

  /**
   * `explicit` is false for a buy-now end, which may happen before endTime.
   */
  assertEndable(item: AuctionItem, now: number, explicit: boolean): void {
    if (item.canceled) {
      throw new EngineError('InvalidAuction', `Auction ${item.id} was canceled`);
    }
    if (!item.isActive) {
      throw new EngineError(
        'AuctionNotActive',
        `Auction ${item.id} is not active`,
      );
    }
    if (explicit && now < item.endTime) {
      throw new EngineError(
        'AuctionNotEnded',
        `Auction ${item.id} ends at ${item.endTime}`,
      );
    }
  }

  assertCancelable(item: AuctionItem): void {
    if (item.canceled) {
      throw new EngineError(
        'InvalidAuction',
        `Auction ${item.id} is already canceled`,
      );
    }
    if (!item.isActive) {
      throw new EngineError(
        'AuctionNotActive',
        `Auction ${item.id} has already ended`,
      );
    }
  }

  markEnded(auctionId: number): void {
    const item = this.get(auctionId);
    item.isActive = false;
    item.ended = true;
  }

  markCanceled(auctionId: number): void {
    const item = this.get(auctionId);
    item.isActive = false;
    item.canceled = true;
  }
}
