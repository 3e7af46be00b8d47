import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter } from 'node:events';
import {
  AuctionEngine,
  isEngineError,
  type AuctionView,
  type Bid,
  type CallContext,
  type CreateAuctionInput,
  type DomainEvent,
  type PaymentProof,
  type RateLimitStatus,
  type Role,
  type SystemMetrics,
  type SystemState,
  type TreasuryBalance,
} from './engine';
import { CLOCK, type Clock } from './clock';

const AUCTION_ROOM_PREFIX = 'auction:';

export const DOMAIN_EVENT = 'domain_event';

/** Actor recorded for settlements triggered by the end-time scheduler. */
export const SYSTEM_ACTOR = 'system';

const SETTLEMENT_RETRY_SECONDS = 60;

export const EVENT_PAGE_SIZE = 100;
export const MAX_EVENT_PAGE_SIZE = 1_000;

// setTimeout overflows above 2^31 - 1 ms; longer waits are re-armed.
const MAX_TIMER_MS = 2_147_483_647;

export interface RoleChange {
  account: string;
  role: Role;
  changed: boolean;
  roles: Role[];
}

export interface SystemOverview extends SystemState {
  platformFeePercentage: number;
}

@Injectable()
export class AuctionService implements OnModuleInit, OnModuleDestroy {
  private readonly eventEmitter = new EventEmitter();
  private readonly logger = new Logger(AuctionService.name);
  private readonly endTimers = new Map<number, ReturnType<typeof setTimeout>>();
  private readonly autoEnd: boolean;
  private unsubscribe: (() => void) | null = null;

  constructor(
    private readonly engine: AuctionEngine,
    @Inject(CLOCK) private readonly clock: Clock,
    config: ConfigService,
  ) {
    this.autoEnd = config.get<boolean>('auction.autoEnd') ?? true;
    this.eventEmitter.setMaxListeners(0);
  }

  /* ------------------------------------------------------------------ */
  /*  LIFECYCLE                                                          */
  /* ------------------------------------------------------------------ */

  onModuleInit(): void {
    this.unsubscribe = this.engine.events.subscribe((event) =>
      this.onDomainEvent(event),
    );
  }

  onModuleDestroy(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
    for (const timer of this.endTimers.values()) clearTimeout(timer);
    this.endTimers.clear();
  }

  /* ------------------------------------------------------------------ */
  /*  PUBLIC API                                                         */
  /* ------------------------------------------------------------------ */

  getEventEmitter(): EventEmitter {
    return this.eventEmitter;
  }

  getRoomName(auctionId: number): string {
    return `${AUCTION_ROOM_PREFIX}${auctionId}`;
  }

  async createAuction(
    actor: string,
    input: CreateAuctionInput,
  ): Promise<AuctionView> {
    const id = await this.execute('createAuction', actor, (ctx) =>
      this.engine.createAuction(ctx, input),
    );
    return this.engine.getAuction(id);
  }

  async placeBid(
    actor: string,
    auctionId: number,
    amount: number,
    proof?: PaymentProof,
  ): Promise<AuctionView> {
    await this.execute(`placeBid #${auctionId}`, actor, (ctx) =>
      this.engine.placeBid(ctx, auctionId, amount, proof),
    );
    return this.engine.getAuction(auctionId);
  }

  async endAuction(actor: string, auctionId: number): Promise<AuctionView> {
    await this.execute(`endAuction #${auctionId}`, actor, (ctx) =>
      this.engine.endAuction(ctx, auctionId),
    );
    return this.engine.getAuction(auctionId);
  }

  async cancelAuction(actor: string, auctionId: number): Promise<AuctionView> {
    await this.execute(`cancelAuction #${auctionId}`, actor, (ctx) =>
      this.engine.cancelAuction(ctx, auctionId),
    );
    return this.engine.getAuction(auctionId);
  }

  async withdrawFunds(
    actor: string,
    auctionId: number,
  ): Promise<{ auctionId: number; amount: number }> {
    const amount = await this.execute(
      `withdrawFunds #${auctionId}`,
      actor,
      (ctx) => this.engine.withdrawFunds(ctx, auctionId),
    );
    return { auctionId, amount };
  }

  async setEmergencyState(
    actor: string,
    enabled: boolean,
  ): Promise<SystemState> {
    return this.execute(`setEmergencyState(${enabled})`, actor, (ctx) =>
      this.engine.setEmergencyState(ctx, enabled),
    );
  }

  async setMaintenanceMode(
    actor: string,
    enabled: boolean,
  ): Promise<SystemState> {
    return this.execute(`setMaintenanceMode(${enabled})`, actor, (ctx) =>
      this.engine.setMaintenanceMode(ctx, enabled),
    );
  }

  async recoverToken(
    actor: string,
    asset: string,
    amount: number,
  ): Promise<TreasuryBalance> {
    await this.execute(`recoverToken ${amount} ${asset}`, actor, (ctx) =>
      this.engine.recoverToken(ctx, asset, amount),
    );
    return this.engine.getTreasuryBalance(asset);
  }

  async setBlacklisted(
    actor: string,
    bidder: string,
    blacklisted: boolean,
  ): Promise<{ bidder: string; blacklisted: boolean }> {
    await this.execute(`setBlacklisted ${bidder}=${blacklisted}`, actor, (ctx) =>
      this.engine.setBlacklisted(ctx, bidder, blacklisted),
    );
    return { bidder, blacklisted: this.engine.isBlacklisted(bidder) };
  }

  async setPlatformFee(
    actor: string,
    percentage: number,
  ): Promise<SystemOverview> {
    await this.execute(`setPlatformFee ${percentage}`, actor, (ctx) =>
      this.engine.setPlatformFee(ctx, percentage),
    );
    return this.getSystemState();
  }

  async grantRole(
    actor: string,
    role: Role,
    account: string,
  ): Promise<RoleChange> {
    const changed = await this.execute(
      `grantRole ${role} to ${account}`,
      actor,
      (ctx) => this.engine.grantRole(ctx, role, account),
    );
    return { account, role, changed, roles: this.engine.rolesOf(account) };
  }

  async revokeRole(
    actor: string,
    role: Role,
    account: string,
  ): Promise<RoleChange> {
    const changed = await this.execute(
      `revokeRole ${role} from ${account}`,
      actor,
      (ctx) => this.engine.revokeRole(ctx, role, account),
    );
    return { account, role, changed, roles: this.engine.rolesOf(account) };
  }

  /* ------------------------------------------------------------------ */
  /*  READS                                                              */
  /* ------------------------------------------------------------------ */

  getAuction(auctionId: number): AuctionView {
    return this.engine.getAuction(auctionId);
  }

  listAuctions(): AuctionView[] {
    return this.engine.listAuctions();
  }

  getBids(auctionId: number): Bid[] {
    return this.engine.getBids(auctionId);
  }

  getBid(auctionId: number, index: number): Bid {
    return this.engine.getBid(auctionId, index);
  }

  getEscrowBalance(
    auctionId: number,
    bidder: string,
  ): { auctionId: number; bidder: string; amount: number } {
    return {
      auctionId,
      bidder,
      amount: this.engine.getEscrowBalance(auctionId, bidder),
    };
  }

  getSystemMetrics(): SystemMetrics {
    return this.engine.getSystemMetrics();
  }

  getSystemState(): SystemOverview {
    return {
      ...this.engine.getSystemState(),
      platformFeePercentage: this.engine.getPlatformFee(),
    };
  }

  checkRateLimit(actor: string): RateLimitStatus {
    return this.engine.checkRateLimit(actor, this.clock.now());
  }

  getTreasuryBalance(asset: string): TreasuryBalance {
    return this.engine.getTreasuryBalance(asset);
  }

  getEvents(afterSeq = 0, limit = EVENT_PAGE_SIZE): DomainEvent[] {
    const pageSize = Math.min(Math.max(limit, 1), MAX_EVENT_PAGE_SIZE);
    return this.engine.events.since(afterSeq, pageSize);
  }

  rolesOf(actor: string): Role[] {
    return this.engine.rolesOf(actor);
  }

  /* ------------------------------------------------------------------ */
  /*  SCHEDULED SETTLEMENT                                               */
  /* ------------------------------------------------------------------ */

  private onDomainEvent(event: DomainEvent): void {
    switch (event.type) {
      case 'AuctionCreated':
      case 'AuctionExtended':
        this.scheduleEnd(event.auctionId, event.endTime);
        break;
      case 'AuctionEnded':
      case 'AuctionCanceled':
        this.clearEndTimer(event.auctionId);
        break;
      default:
        break;
    }
    this.eventEmitter.emit(DOMAIN_EVENT, event);
  }

  private scheduleEnd(auctionId: number, endTime: number): void {
    if (!this.autoEnd) return;
    this.clearEndTimer(auctionId);
    const delayMs = Math.max(0, (endTime - this.clock.now()) * 1000);
    const timer = setTimeout(() => {
      this.onEndTimeReached(auctionId).catch((err: unknown) =>
        this.logger.error(
          `Scheduled settlement of auction ${auctionId} crashed`,
          err instanceof Error ? err.stack : String(err),
        ),
      );
    }, Math.min(delayMs, MAX_TIMER_MS));
    timer.unref();
    this.endTimers.set(auctionId, timer);
  }

  private clearEndTimer(auctionId: number): void {
    const timer = this.endTimers.get(auctionId);
    if (timer) clearTimeout(timer);
    this.endTimers.delete(auctionId);
  }

  private async onEndTimeReached(auctionId: number): Promise<void> {
    this.endTimers.delete(auctionId);
    const auction = this.engine.getAuction(auctionId);
    if (!auction.isActive) return;

    const now = this.clock.now();
    if (now < auction.endTime) {
      this.scheduleEnd(auctionId, auction.endTime);
      return;
    }
    if (auction.highestBidder === null) {
      this.logger.log(
        `Auction ${auctionId} reached its end time without bids; awaiting cancel`,
      );
      return;
    }

    try {
      await this.endAuction(SYSTEM_ACTOR, auctionId);
    } catch (err) {
      const reason = isEngineError(err) ? err.kind : String(err);
      this.logger.warn(
        `Scheduled settlement of auction ${auctionId} failed (${reason}); retrying in ${SETTLEMENT_RETRY_SECONDS}s`,
      );
      if (this.engine.getAuction(auctionId).isActive) {
        this.scheduleEnd(auctionId, now + SETTLEMENT_RETRY_SECONDS);
      }
    }
  }

  /* ------------------------------------------------------------------ */
  /*  INTERNAL                                                           */
  /* ------------------------------------------------------------------ */

  private async execute<T>(
    operation: string,
    actor: string,
    fn: (ctx: CallContext) => T | Promise<T>,
  ): Promise<T> {
    const ctx: CallContext = { actor, now: this.clock.now() };
    try {
      const result = await fn(ctx);
      this.logger.log(`${operation} by ${actor} at ${ctx.now}`);
      return result;
    } catch (err) {
      if (isEngineError(err)) {
        this.logger.debug(
          `${operation} by ${actor} rejected: ${err.kind} (${err.message})`,
        );
      } else {
        this.logger.error(
          `${operation} by ${actor} failed`,
          err instanceof Error ? err.stack : String(err),
        );
      }
      throw err;
    }
  }
}
