import { assertAmount, EngineError } from './errors';
import {
  NATIVE_ASSET,
  type AuctionItem,
  type Bid,
  type HighestBidState,
  type PaymentProof,
} from './types';

interface AuctionBook {
  highest: HighestBidState;
  bids: Bid[];
  escrow: Map<string, number>;
  /** Bid whose funds are held; null once paid out or refunded. */
  heldBidIndex: number | null;
  /** Index of the winning bid paid to the owner. */
  paidBidIndex: number | null;
}

export interface BidPlan {
  auctionId: number;
  bidder: string;
  amount: number;
  timestamp: number;
  /** Previous highest bidder and the amount to credit to their escrow. */
  displaced: { bidder: string; amount: number } | null;
  buyNow: boolean;
}

/**
 * Bids, highest-bid state and escrow per auction. Escrow entries grow only
 * when a held bid is displaced (outbid or canceled) and are zeroed only by a
 * withdrawal.
 */
export class BidLedger {
  private readonly books = new Map<number, AuctionBook>();
  private readonly blacklist = new Set<string>();

  open(auctionId: number, reservePrice: number): void {
    this.books.set(auctionId, {
      highest: { highestBidder: null, highestBid: reservePrice },
      bids: [],
      escrow: new Map(),
      heldBidIndex: null,
      paidBidIndex: null,
    });
  }

  isBlacklisted(actor: string): boolean {
    return this.blacklist.has(actor);
  }

  assertNotBlacklisted(actor: string): void {
    if (this.blacklist.has(actor)) {
      throw new EngineError('BlacklistedBidder', `${actor} is blacklisted`);
    }
  }

  setBlacklisted(actor: string, blacklisted: boolean): void {
    if (blacklisted) this.blacklist.add(actor);
    else this.blacklist.delete(actor);
  }

  highest(auctionId: number): HighestBidState {
    return { ...this.book(auctionId).highest };
  }

  bidCount(auctionId: number): number {
    return this.book(auctionId).bids.length;
  }

  bid(auctionId: number, index: number): Bid {
    const bids = this.book(auctionId).bids;
    const bid = Number.isInteger(index) && index >= 0 ? bids[index] : undefined;
    if (!bid) {
      throw new RangeError(
        `Bid index ${index} out of range for auction ${auctionId}`,
      );
    }
    return { ...bid };
  }

  bids(auctionId: number): Bid[] {
    return this.book(auctionId).bids.map((b) => ({ ...b }));
  }

  escrowOf(auctionId: number, bidder: string): number {
    return this.book(auctionId).escrow.get(bidder) ?? 0;
  }

  /**
   * Remaining bid checks once the auction is known to be active. Order:
   * blacklist, deadline, owner, amount, native payment proof.
   */
  planBid(
    item: AuctionItem,
    bidder: string,
    amount: number,
    now: number,
    proof?: PaymentProof,
  ): BidPlan {
    this.assertNotBlacklisted(bidder);
    if (now >= item.endTime) {
      throw new EngineError(
        'AuctionEnded',
        `Auction ${item.id} ended at ${item.endTime}`,
      );
    }
    if (bidder === item.owner) {
      throw new EngineError('Unauthorized', 'Owner cannot bid on own auction');
    }
    assertAmount(amount, 'amount');

    const { highest } = this.book(item.id);
    if (amount <= highest.highestBid + item.minimumBidIncrement) {
      throw new EngineError(
        'BidTooLow',
        `Bid must exceed ${highest.highestBid + item.minimumBidIncrement}`,
      );
    }
    if (item.paymentAsset === NATIVE_ASSET && proof?.attachedValue !== amount) {
      throw new EngineError(
        'InvalidAmount',
        `Attached value ${proof?.attachedValue ?? 0} does not match bid ${amount}`,
      );
    }

    return {
      auctionId: item.id,
      bidder,
      amount,
      timestamp: now,
      displaced:
        highest.highestBidder === null
          ? null
          : { bidder: highest.highestBidder, amount: highest.highestBid },
      buyNow: amount >= item.buyNowPrice,
    };
  }

  commitBid(plan: BidPlan): void {
    const book = this.book(plan.auctionId);
    if (plan.displaced) {
      this.credit(book, plan.displaced.bidder, plan.displaced.amount);
    }
    book.highest = { highestBidder: plan.bidder, highestBid: plan.amount };
    book.bids.push({
      bidder: plan.bidder,
      amount: plan.amount,
      timestamp: plan.timestamp,
      withdrawn: false,
    });
    book.heldBidIndex = book.bids.length - 1;
  }

  /** The held bid was paid to the owner at settlement. */
  releaseHeld(auctionId: number): void {
    const book = this.book(auctionId);
    book.paidBidIndex = book.heldBidIndex;
    book.heldBidIndex = null;
  }

  /** The held bid goes back to its bidder's escrow (cancellation). */
  refundHeld(auctionId: number): void {
    const book = this.book(auctionId);
    const { highestBidder, highestBid } = book.highest;
    if (book.heldBidIndex === null || highestBidder === null) return;
    this.credit(book, highestBidder, highestBid);
    book.heldBidIndex = null;
  }

  /** Zeroes the entry and returns what it held. */
  takeEscrow(auctionId: number, bidder: string): number {
    const book = this.book(auctionId);
    const amount = book.escrow.get(bidder) ?? 0;
    book.escrow.delete(bidder);
    return amount;
  }

  restoreEscrow(auctionId: number, bidder: string, amount: number): void {
    this.credit(this.book(auctionId), bidder, amount);
  }

  /** Flags the bidder's refunded bids. Held and paid-out bids stay. */
  markWithdrawn(auctionId: number, bidder: string): void {
    const book = this.book(auctionId);
    book.bids.forEach((bid, index) => {
      if (bid.bidder !== bidder) return;
      if (index === book.heldBidIndex || index === book.paidBidIndex) return;
      bid.withdrawn = true;
    });
  }

  private credit(book: AuctionBook, bidder: string, amount: number): void {
    book.escrow.set(bidder, (book.escrow.get(bidder) ?? 0) + amount);
  }

  private book(auctionId: number): AuctionBook {
    const book = this.books.get(auctionId);
    if (!book) {
      throw new EngineError('InvalidAuction', `Auction ${auctionId} not found`);
    }
    return book;
  }
}
