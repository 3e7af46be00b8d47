import { AccessControl } from './access-control';
import { AuctionRegistry } from './auction-registry';
import { BidLedger } from './bid-ledger';
import { CooldownGuard } from './cooldown-guard';
import { assertAmount, EngineError } from './errors';
import { DomainEventLog, type DomainEventBody } from './events';
import { KeyedLock } from './keyed-lock';
import { MetricsAggregator } from './metrics';
import type { PaymentAdapter } from './payment-adapter';
import { RateLimiter } from './rate-limiter';
import { settle, type Transfer } from './settlement';
import { SystemStateController } from './system-state';
import { Treasury, type TreasuryBalance } from './treasury';
import type {
  AuctionItem,
  AuctionView,
  Bid,
  CallContext,
  CreateAuctionInput,
  EngineConfig,
  PaymentProof,
  RateLimitStatus,
  Role,
  SystemMetrics,
  SystemState,
} from './types';

const REGISTRY_KEY = 'registry';
const actorKey = (actor: string) => `actor:${actor}`;
const auctionKey = (auctionId: number) => `auction:${auctionId}`;
const treasuryKey = (asset: string) => `treasury:${asset}`;

interface EndPlan {
  auctionId: number;
  winner: string;
  amount: number;
  fee: number;
  transfers: Transfer[];
}

/** Floor of amount * percentage / 100 without leaving the safe-integer range. */
export function feeOf(amount: number, percentage: number): number {
  const whole = Math.floor(amount / 100);
  const rest = amount % 100;
  return whole * percentage + Math.floor((rest * percentage) / 100);
}

function assertFeePercentage(percentage: number, max: number): void {
  if (!Number.isInteger(percentage) || percentage < 0 || percentage > max) {
    throw new EngineError(
      'InvalidFeePercentage',
      `Fee percentage must be an integer in [0, ${max}] (got ${percentage})`,
    );
  }
}

/**
 * Multi-auction escrow and bidding engine. Deterministic: caller and time come
 * from the CallContext, transfers go through the PaymentAdapter, and every
 * state change is announced on `events`.
 *
 * Each operation validates everything first, then runs its transfers, then
 * commits. A thrown EngineError leaves state and the event log untouched.
 * Administrative changes take effect immediately; an operation whose
 * transfers were in flight re-checks them before it commits and is undone if
 * they now reject it.
 */
export class AuctionEngine {
  readonly events: DomainEventLog;

  private readonly access: AccessControl;
  private readonly systemState = new SystemStateController();
  private readonly rateLimiter: RateLimiter;
  private readonly cooldown: CooldownGuard;
  private readonly registry = new AuctionRegistry();
  private readonly ledger = new BidLedger();
  private readonly treasury = new Treasury();
  private readonly metrics = new MetricsAggregator();
  private readonly locks = new KeyedLock();
  private readonly maxFeePercentage: number;
  private platformFeePercentage: number;

  constructor(
    config: EngineConfig,
    private readonly payments: PaymentAdapter,
    events?: DomainEventLog,
  ) {
    assertFeePercentage(config.maxFeePercentage, 100);
    assertFeePercentage(config.platformFeePercentage, config.maxFeePercentage);
    assertAmount(config.rateLimitPeriodSeconds, 'rateLimitPeriodSeconds');
    assertAmount(config.maxActionsPerPeriod, 'maxActionsPerPeriod');
    assertAmount(config.actionCooldownSeconds, 'actionCooldownSeconds');
    if (!config.roles.admin) {
      throw new EngineError('Unauthorized', 'An admin actor is required');
    }

    this.events = events ?? new DomainEventLog();
    this.access = new AccessControl(config.roles);
    this.rateLimiter = new RateLimiter(
      config.rateLimitPeriodSeconds,
      config.maxActionsPerPeriod,
    );
    this.cooldown = new CooldownGuard(config.actionCooldownSeconds);
    this.maxFeePercentage = config.maxFeePercentage;
    this.platformFeePercentage = config.platformFeePercentage;
  }

  /* ------------------------------------------------------------------ */
  /*  AUCTIONS                                                           */
  /* ------------------------------------------------------------------ */

  async createAuction(
    ctx: CallContext,
    input: CreateAuctionInput,
  ): Promise<number> {
    return this.locks.run([actorKey(ctx.actor), REGISTRY_KEY], async () => {
      this.systemState.assertOperable();
      const ticket = this.rateLimiter.check(ctx.actor, ctx.now);
      const item = this.registry.planCreate(
        ctx.actor,
        input,
        ctx.now,
        this.platformFeePercentage,
      );

      await settle(
        this.payments,
        [
          {
            kind: 'custody',
            asset: item.asset,
            party: ctx.actor,
            amount: item.assetAmount,
          },
        ],
        () => this.systemState.assertOperable(),
      );

      this.registry.insert(item);
      this.ledger.open(item.id, item.reservePrice);
      this.treasury.receiveOwed(item.asset, item.assetAmount);
      this.rateLimiter.commit(ticket);
      const metrics = this.metrics.apply(
        { totalAuctions: 1, activeAuctions: 1 },
        ctx.now,
      );
      this.events.publish(
        [
          {
            type: 'AuctionCreated',
            auctionId: item.id,
            owner: item.owner,
            asset: item.asset,
            assetAmount: item.assetAmount,
            paymentAsset: item.paymentAsset,
            reservePrice: item.reservePrice,
            buyNowPrice: item.buyNowPrice,
            endTime: item.endTime,
          },
          { type: 'MetricsUpdated', metrics },
        ],
        ctx.now,
      );
      return item.id;
    });
  }

  async placeBid(
    ctx: CallContext,
    auctionId: number,
    amount: number,
    proof?: PaymentProof,
  ): Promise<void> {
    const keys = [actorKey(ctx.actor), auctionKey(auctionId)];
    return this.locks.run(keys, async () => {
      this.systemState.assertOperable();
      const ticket = this.rateLimiter.check(ctx.actor, ctx.now);
      this.cooldown.check(ctx.actor, ctx.now);
      const item = this.registry.snapshot(auctionId);
      this.registry.assertBiddable(item);
      const plan = this.ledger.planBid(item, ctx.actor, amount, ctx.now, proof);
      const extendTo = this.registry.planExtension(item, ctx.now);
      const ending = plan.buyNow
        ? this.planEnd(item, ctx.now, false, {
            bidder: plan.bidder,
            amount: plan.amount,
          })
        : null;

      await settle(
        this.payments,
        [
          { kind: 'pull', asset: item.paymentAsset, party: ctx.actor, amount },
          ...(ending?.transfers ?? []),
        ],
        () => {
          this.systemState.assertOperable();
          this.ledger.assertNotBlacklisted(ctx.actor);
        },
      );

      const events: DomainEventBody[] = [];
      this.ledger.commitBid(plan);
      this.treasury.receiveOwed(item.paymentAsset, amount);
      this.rateLimiter.commit(ticket);
      this.cooldown.arm(ctx.actor, ctx.now);
      if (extendTo !== null) {
        const extended = this.registry.extend(auctionId, extendTo);
        events.push({
          type: 'AuctionExtended',
          auctionId,
          endTime: extended.endTime,
          extensionCount: extended.extensionCount,
        });
      }
      events.push({ type: 'BidPlaced', auctionId, bidder: ctx.actor, amount });
      events.push({
        type: 'MetricsUpdated',
        metrics: this.metrics.apply({ totalVolume: amount }, ctx.now),
      });
      if (ending) {
        events.push(...this.commitEnd(item, ending, ctx.now));
      }
      this.events.publish(events, ctx.now);
    });
  }

  async endAuction(ctx: CallContext, auctionId: number): Promise<void> {
    return this.locks.run([auctionKey(auctionId)], async () => {
      this.systemState.assertNotPaused();
      const item = this.registry.snapshot(auctionId);
      const plan = this.planEnd(item, ctx.now, true);

      await settle(this.payments, plan.transfers, () =>
        this.systemState.assertNotPaused(),
      );

      this.events.publish(this.commitEnd(item, plan, ctx.now), ctx.now);
    });
  }

  async cancelAuction(ctx: CallContext, auctionId: number): Promise<void> {
    return this.locks.run([auctionKey(auctionId)], async () => {
      this.systemState.assertNotPaused();
      const item = this.registry.snapshot(auctionId);
      const authorize = () => {
        this.systemState.assertNotPaused();
        if (ctx.actor !== item.owner) {
          this.access.requireRole(ctx.actor, 'Auctioneer');
        }
      };
      authorize();
      this.registry.assertCancelable(item);

      await settle(
        this.payments,
        [
          {
            kind: 'release',
            asset: item.asset,
            party: item.owner,
            amount: item.assetAmount,
          },
        ],
        authorize,
      );

      this.registry.markCanceled(auctionId);
      this.ledger.refundHeld(auctionId);
      this.treasury.payOwed(item.asset, item.assetAmount);
      const metrics = this.metrics.apply({ activeAuctions: -1 }, ctx.now);
      this.events.publish(
        [
          { type: 'AuctionCanceled', auctionId, canceledBy: ctx.actor },
          { type: 'MetricsUpdated', metrics },
        ],
        ctx.now,
      );
    });
  }

  /**
   * Pays out the caller's escrow for one auction. The entry is zeroed before
   * the payout is issued and restored only if the payout fails.
   */
  async withdrawFunds(ctx: CallContext, auctionId: number): Promise<number> {
    return this.locks.run([auctionKey(auctionId)], async () => {
      const item = this.registry.snapshot(auctionId);
      if (this.ledger.escrowOf(auctionId, ctx.actor) === 0) {
        throw new EngineError(
          'InvalidAmount',
          `No funds to withdraw for ${ctx.actor} on auction ${auctionId}`,
        );
      }

      const amount = this.ledger.takeEscrow(auctionId, ctx.actor);
      try {
        await settle(this.payments, [
          {
            kind: 'release',
            asset: item.paymentAsset,
            party: ctx.actor,
            amount,
          },
        ]);
      } catch (err) {
        this.ledger.restoreEscrow(auctionId, ctx.actor, amount);
        throw err;
      }

      this.ledger.markWithdrawn(auctionId, ctx.actor);
      this.treasury.payOwed(item.paymentAsset, amount);
      this.events.publish(
        [{ type: 'BidWithdrawn', auctionId, bidder: ctx.actor, amount }],
        ctx.now,
      );
      return amount;
    });
  }

  /* ------------------------------------------------------------------ */
  /*  ADMINISTRATION                                                     */
  /* ------------------------------------------------------------------ */

  setEmergencyState(ctx: CallContext, enabled: boolean): SystemState {
    this.access.requireRole(ctx.actor, 'Admin');
    const previous = this.systemState.snapshot();
    const next = this.systemState.planEmergency(enabled);
    this.systemState.apply(next);
    this.events.publish(
      [
        ...this.stateChangeEvents(previous, next),
        {
          type: 'EmergencyAction',
          actor: ctx.actor,
          action: enabled ? 'emergency_on' : 'emergency_off',
        },
      ],
      ctx.now,
    );
    return next;
  }

  setMaintenanceMode(ctx: CallContext, enabled: boolean): SystemState {
    this.access.requireRole(ctx.actor, 'Maintainer');
    const previous = this.systemState.snapshot();
    const next = this.systemState.planMaintenance(enabled);
    this.systemState.apply(next);
    this.events.publish(this.stateChangeEvents(previous, next), ctx.now);
    return next;
  }

  /**
   * Sends free custody balance (retained fees) to the caller. Funds owed to
   * owners and bidders are never recoverable.
   */
  async recoverToken(
    ctx: CallContext,
    asset: string,
    amount: number,
  ): Promise<void> {
    return this.locks.run([treasuryKey(asset)], async () => {
      this.access.requireRole(ctx.actor, 'Recovery');
      assertAmount(amount, 'amount');
      const { free } = this.treasury.balance(asset);
      if (amount === 0 || amount > free) {
        throw new EngineError(
          'InvalidAmount',
          `Recoverable ${asset} balance is ${free} (requested ${amount})`,
        );
      }

      await settle(
        this.payments,
        [{ kind: 'release', asset, party: ctx.actor, amount }],
        () => this.access.requireRole(ctx.actor, 'Recovery'),
      );

      this.treasury.payFree(asset, amount);
      this.events.publish(
        [
          {
            type: 'EmergencyAction',
            actor: ctx.actor,
            action: 'recover_token',
            asset,
            amount,
          },
        ],
        ctx.now,
      );
    });
  }

  setBlacklisted(ctx: CallContext, bidder: string, blacklisted: boolean): void {
    this.access.requireAnyRole(ctx.actor, ['Admin', 'Operator']);
    this.ledger.setBlacklisted(bidder, blacklisted);
    this.events.publish(
      [
        { type: 'BidderBlacklisted', bidder, blacklisted },
        {
          type: 'SecurityAlert',
          actor: ctx.actor,
          reason: blacklisted ? 'bidder_blacklisted' : 'bidder_unblacklisted',
          subject: bidder,
        },
      ],
      ctx.now,
    );
  }

  setPlatformFee(ctx: CallContext, percentage: number): void {
    this.access.requireRole(ctx.actor, 'Admin');
    assertFeePercentage(percentage, this.maxFeePercentage);
    const previous = this.platformFeePercentage;
    this.platformFeePercentage = percentage;
    this.events.publish(
      [{ type: 'FeeUpdated', previous, current: percentage }],
      ctx.now,
    );
  }

  grantRole(ctx: CallContext, role: Role, account: string): boolean {
    this.access.requireRole(ctx.actor, 'Admin');
    const granted = this.access.grant(role, account);
    if (granted) {
      this.events.publish(
        [
          {
            type: 'SecurityAlert',
            actor: ctx.actor,
            reason: `role_granted:${role}`,
            subject: account,
          },
        ],
        ctx.now,
      );
    }
    return granted;
  }

  revokeRole(ctx: CallContext, role: Role, account: string): boolean {
    this.access.requireRole(ctx.actor, 'Admin');
    if (role === 'Admin' && account === ctx.actor) {
      throw new EngineError(
        'Unauthorized',
        'An admin cannot revoke its own Admin role',
      );
    }
    const revoked = this.access.revoke(role, account);
    if (revoked) {
      this.events.publish(
        [
          {
            type: 'SecurityAlert',
            actor: ctx.actor,
            reason: `role_revoked:${role}`,
            subject: account,
          },
        ],
        ctx.now,
      );
    }
    return revoked;
  }

  /* ------------------------------------------------------------------ */
  /*  READS                                                              */
  /* ------------------------------------------------------------------ */

  getAuction(auctionId: number): AuctionView {
    const item = this.registry.snapshot(auctionId);
    return {
      ...item,
      ...this.ledger.highest(auctionId),
      bidCount: this.ledger.bidCount(auctionId),
    };
  }

  listAuctions(): AuctionView[] {
    return this.registry.all().map((item) => this.getAuction(item.id));
  }

  getBidCount(auctionId: number): number {
    this.registry.get(auctionId);
    return this.ledger.bidCount(auctionId);
  }

  getBid(auctionId: number, index: number): Bid {
    this.registry.get(auctionId);
    return this.ledger.bid(auctionId, index);
  }

  getBids(auctionId: number): Bid[] {
    this.registry.get(auctionId);
    return this.ledger.bids(auctionId);
  }

  getEscrowBalance(auctionId: number, bidder: string): number {
    this.registry.get(auctionId);
    return this.ledger.escrowOf(auctionId, bidder);
  }

  getSystemMetrics(): SystemMetrics {
    return this.metrics.get();
  }

  getSystemState(): SystemState {
    return this.systemState.snapshot();
  }

  checkRateLimit(actor: string, now: number): RateLimitStatus {
    return {
      actionsRemaining: this.rateLimiter.remaining(actor, now),
      cooldownEnds: this.cooldown.cooldownEnds(actor),
    };
  }

  getPlatformFee(): number {
    return this.platformFeePercentage;
  }

  getTreasuryBalance(asset: string): TreasuryBalance {
    return this.treasury.balance(asset);
  }

  rolesOf(actor: string): Role[] {
    return this.access.rolesOf(actor);
  }

  isBlacklisted(actor: string): boolean {
    return this.ledger.isBlacklisted(actor);
  }

  /* ------------------------------------------------------------------ */
  /*  INTERNAL                                                           */
  /* ------------------------------------------------------------------ */

  /**
   * `pending` is the bid being placed when a buy-now bid ends the auction;
   * it is not committed yet, so the ledger does not know it.
   */
  private planEnd(
    item: AuctionItem,
    now: number,
    explicit: boolean,
    pending?: { bidder: string; amount: number },
  ): EndPlan {
    this.registry.assertEndable(item, now, explicit);
    const highest = this.ledger.highest(item.id);
    const winner = pending?.bidder ?? highest.highestBidder;
    const amount = pending?.amount ?? highest.highestBid;
    if (winner === null) {
      throw new EngineError('InvalidAuction', `Auction ${item.id} has no bids`);
    }
    const fee = feeOf(amount, item.feePercentage);
    return {
      auctionId: item.id,
      winner,
      amount,
      fee,
      transfers: [
        {
          kind: 'release',
          asset: item.asset,
          party: winner,
          amount: item.assetAmount,
        },
        {
          kind: 'release',
          asset: item.paymentAsset,
          party: item.owner,
          amount: amount - fee,
        },
      ],
    };
  }

  private commitEnd(
    item: AuctionItem,
    plan: EndPlan,
    now: number,
  ): DomainEventBody[] {
    this.registry.markEnded(plan.auctionId);
    this.ledger.releaseHeld(plan.auctionId);
    this.treasury.payOwed(item.asset, item.assetAmount);
    this.treasury.payOwed(item.paymentAsset, plan.amount - plan.fee);
    this.treasury.retain(item.paymentAsset, plan.fee);
    const metrics = this.metrics.apply({ activeAuctions: -1 }, now);
    return [
      {
        type: 'AuctionEnded',
        auctionId: plan.auctionId,
        winner: plan.winner,
        amount: plan.amount,
        fee: plan.fee,
      },
      { type: 'MetricsUpdated', metrics },
    ];
  }

  private stateChangeEvents(
    previous: SystemState,
    next: SystemState,
  ): DomainEventBody[] {
    if (previous.mode === next.mode && previous.paused === next.paused) {
      return [];
    }
    return [
      {
        type: 'SystemStateChanged',
        previous: previous.mode,
        current: next.mode,
        paused: next.paused,
      },
    ];
  }
}
