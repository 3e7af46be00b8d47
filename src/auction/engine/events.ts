import { EventEmitter } from 'node:events';
import type { SystemMetrics, SystemMode } from './types';

export type DomainEventBody =
  | {
      type: 'AuctionCreated';
      auctionId: number;
      owner: string;
      asset: string;
      assetAmount: number;
      paymentAsset: string;
      reservePrice: number;
      buyNowPrice: number;
      endTime: number;
    }
  | { type: 'BidPlaced'; auctionId: number; bidder: string; amount: number }
  | {
      type: 'AuctionEnded';
      auctionId: number;
      winner: string;
      amount: number;
      fee: number;
    }
  | { type: 'BidWithdrawn'; auctionId: number; bidder: string; amount: number }
  | {
      type: 'AuctionExtended';
      auctionId: number;
      endTime: number;
      extensionCount: number;
    }
  | { type: 'AuctionCanceled'; auctionId: number; canceledBy: string }
  | { type: 'BidderBlacklisted'; bidder: string; blacklisted: boolean }
  | { type: 'FeeUpdated'; previous: number; current: number }
  | {
      type: 'SystemStateChanged';
      previous: SystemMode;
      current: SystemMode;
      paused: boolean;
    }
  | { type: 'SecurityAlert'; actor: string; reason: string; subject?: string }
  | { type: 'MetricsUpdated'; metrics: SystemMetrics }
  | {
      type: 'EmergencyAction';
      actor: string;
      action: 'emergency_on' | 'emergency_off' | 'recover_token';
      asset?: string;
      amount?: number;
    };

export type DomainEventType = DomainEventBody['type'];

export type DomainEvent = DomainEventBody & { seq: number; at: number };

export type DomainEventListener = (event: DomainEvent) => void;

export type ListenerErrorHandler = (err: unknown, event: DomainEvent) => void;

const EVENT = 'event';

function seal(body: DomainEventBody, seq: number, at: number): DomainEvent {
  if (body.type === 'MetricsUpdated') {
    const metrics = Object.freeze({ ...body.metrics });
    return Object.freeze({ ...body, metrics, seq, at });
  }
  return Object.freeze({ ...body, seq, at });
}

/**
 * Append-only event log of frozen entries. Listeners run synchronously after
 * an operation commits; a throwing listener is reported to `onListenerError`
 * and does not reach the engine.
 */
export class DomainEventLog {
  private readonly entries: DomainEvent[] = [];
  private readonly emitter = new EventEmitter();

  constructor(
    private readonly onListenerError: ListenerErrorHandler = (err, event) =>
      process.emitWarning(
        `Domain event listener failed on ${event.type}#${event.seq}: ${String(err)}`,
      ),
  ) {
    this.emitter.setMaxListeners(0);
  }

  get size(): number {
    return this.entries.length;
  }

  /** Up to `limit` events with seq greater than `afterSeq`. */
  since(afterSeq = 0, limit = this.entries.length): DomainEvent[] {
    const start = Math.max(0, afterSeq);
    return this.entries.slice(start, start + Math.max(0, limit));
  }

  ofType<T extends DomainEventType>(
    type: T,
  ): Array<Extract<DomainEvent, { type: T }>> {
    return this.entries.filter(
      (e): e is Extract<DomainEvent, { type: T }> => e.type === type,
    );
  }

  subscribe(listener: DomainEventListener): () => void {
    const wrapped = (event: DomainEvent) => {
      try {
        listener(event);
      } catch (err) {
        this.onListenerError(err, event);
      }
    };
    this.emitter.on(EVENT, wrapped);
    return () => {
      this.emitter.off(EVENT, wrapped);
    };
  }

  publish(bodies: DomainEventBody[], at: number): DomainEvent[] {
    const appended: DomainEvent[] = [];
    for (const body of bodies) {
      const entry = seal(body, this.entries.length + 1, at);
      this.entries.push(entry);
      appended.push(entry);
    }
    for (const entry of appended) this.emitter.emit(EVENT, entry);
    return appended;
  }
}
