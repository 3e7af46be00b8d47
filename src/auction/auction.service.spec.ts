import { ConfigService } from '@nestjs/config';
import { AuctionService, DOMAIN_EVENT, SYSTEM_ACTOR } from './auction.service';
import { systemClock } from './clock';
import {
  AuctionEngine,
  CUSTODY_ACCOUNT,
  DEFAULT_ENGINE_LIMITS,
  LedgerPaymentAdapter,
  type CreateAuctionInput,
  type DomainEvent,
  type DomainEventType,
} from './engine';

const START = new Date('2026-01-01T00:00:00.000Z');
const T0 = START.getTime() / 1000;

const input: CreateAuctionInput = {
  asset: 'painting',
  paymentAsset: 'usd',
  reservePrice: 100,
  buyNowPrice: 10_000,
  minimumBidIncrement: 1,
  durationSeconds: 100,
  timeExtensionSeconds: 30,
  extensionWindowSeconds: 10,
};

describe('AuctionService', () => {
  let ledger: LedgerPaymentAdapter;
  let engine: AuctionEngine;
  let service: AuctionService;
  let published: DomainEvent[];

  const build = (autoEnd = true) => {
    ledger = new LedgerPaymentAdapter();
    ledger.credit('painting', 'seller', 1);
    for (let i = 0; i < 30; i += 1) ledger.credit('usd', `user-${i}`, 1_000);
    engine = new AuctionEngine(
      {
        ...DEFAULT_ENGINE_LIMITS,
        roles: { admin: 'admin', auctioneers: ['ann'] },
      },
      ledger,
    );
    service = new AuctionService(
      engine,
      systemClock,
      new ConfigService({ auction: { autoEnd } }),
    );
    service.onModuleInit();
    published = [];
    service
      .getEventEmitter()
      .on(DOMAIN_EVENT, (event: DomainEvent) => published.push(event));
  };

  const nextEvent = (type: DomainEventType) =>
    new Promise<DomainEvent>((resolve) => {
      const listener = (event: DomainEvent) => {
        if (event.type !== type) return;
        service.getEventEmitter().off(DOMAIN_EVENT, listener);
        resolve(event);
      };
      service.getEventEmitter().on(DOMAIN_EVENT, listener);
    });

  beforeEach(() => {
    jest.useFakeTimers();
    jest.setSystemTime(START);
    build();
  });

  afterEach(() => {
    service.onModuleDestroy();
    jest.useRealTimers();
  });

  it('stamps operations with the clock and re-emits engine events', async () => {
    const created = await service.createAuction('seller', input);
    expect(created).toMatchObject({
      id: 1,
      owner: 'seller',
      startTime: T0,
      endTime: T0 + 100,
      highestBid: 100,
      highestBidder: null,
      bidCount: 0,
    });
    expect(published.map((e) => e.type)).toEqual([
      'AuctionCreated',
      'MetricsUpdated',
    ]);
    expect(published[0]?.at).toBe(T0);
  });

  it('rethrows engine rejections unchanged', async () => {
    await service.createAuction('seller', input);
    await expect(service.placeBid('user-1', 1, 100)).rejects.toMatchObject({
      kind: 'BidTooLow',
    });
    await expect(service.placeBid('user-1', 7, 500)).rejects.toMatchObject({
      kind: 'InvalidAuction',
    });
  });

  it('keeps escrow conserved under 25 simultaneous bids', async () => {
    await service.createAuction('seller', input);

    const bids = Array.from({ length: 25 }, (_, i) => ({
      bidder: `user-${i}`,
      amount: 102 + i * 2,
    }));
    const results = await Promise.allSettled(
      bids.map((b) => service.placeBid(b.bidder, 1, b.amount)),
    );

    const accepted = bids.filter((_, i) => results[i]?.status === 'fulfilled');
    expect(accepted.length).toBeGreaterThan(0);

    const auction = service.getAuction(1);
    const top = Math.max(...accepted.map((b) => b.amount));
    expect(auction.highestBid).toBe(top);
    expect(accepted.map((b) => b.bidder)).toContain(auction.highestBidder);

    const escrow = accepted.reduce(
      (sum, b) => sum + service.getEscrowBalance(1, b.bidder).amount,
      0,
    );
    const pulled = accepted.reduce((sum, b) => sum + b.amount, 0);
    expect(escrow + auction.highestBid).toBe(pulled);
    expect(ledger.balanceOf('usd', CUSTODY_ACCOUNT)).toBe(pulled);
  });

  it('pays out a withdrawal and reports the amount', async () => {
    await service.createAuction('seller', input);
    await service.placeBid('user-1', 1, 150);
    await service.placeBid('user-2', 1, 160);

    await expect(service.withdrawFunds('user-1', 1)).resolves.toEqual({
      auctionId: 1,
      amount: 150,
    });
    expect(ledger.balanceOf('usd', 'user-1')).toBe(1_000);
    expect(service.getEscrowBalance(1, 'user-1').amount).toBe(0);
  });

  describe('scheduled settlement', () => {
    it('ends the auction at its end time', async () => {
      await service.createAuction('seller', input);
      await service.placeBid('user-1', 1, 150);

      const ended = nextEvent('AuctionEnded');
      await jest.advanceTimersByTimeAsync(100_000);
      await expect(ended).resolves.toMatchObject({
        auctionId: 1,
        winner: 'user-1',
        amount: 150,
        fee: 0,
        at: T0 + 100,
      });
      expect(service.getAuction(1)).toMatchObject({
        isActive: false,
        ended: true,
      });
      expect(ledger.balanceOf('painting', 'user-1')).toBe(1);
      expect(ledger.balanceOf('usd', 'seller')).toBe(150);
    });

    it('follows anti-sniping extensions', async () => {
      await service.createAuction('seller', input);
      await jest.advanceTimersByTimeAsync(95_000);
      await service.placeBid('user-1', 1, 150);
      expect(service.getAuction(1).endTime).toBe(T0 + 130);

      await jest.advanceTimersByTimeAsync(5_000);
      expect(service.getAuction(1).isActive).toBe(true);

      const ended = nextEvent('AuctionEnded');
      await jest.advanceTimersByTimeAsync(30_000);
      await expect(ended).resolves.toMatchObject({ at: T0 + 130 });
    });

    it('leaves an auction without bids open for cancellation', async () => {
      await service.createAuction('seller', input);
      await jest.advanceTimersByTimeAsync(200_000);

      expect(service.getAuction(1).isActive).toBe(true);
      expect(published.map((e) => e.type)).not.toContain('AuctionEnded');

      await service.cancelAuction('seller', 1);
      expect(ledger.balanceOf('painting', 'seller')).toBe(1);
    });

    it('retries after a paused system resumes', async () => {
      await service.createAuction('seller', input);
      await service.placeBid('user-1', 1, 150);
      await service.setEmergencyState('admin', true);

      await jest.advanceTimersByTimeAsync(100_000);
      expect(service.getAuction(1).isActive).toBe(true);

      await service.setEmergencyState('admin', false);
      const ended = nextEvent('AuctionEnded');
      await jest.advanceTimersByTimeAsync(60_000);
      await expect(ended).resolves.toMatchObject({ at: T0 + 160 });
    });

    it('does nothing when disabled', async () => {
      service.onModuleDestroy();
      build(false);
      await service.createAuction('seller', input);
      await service.placeBid('user-1', 1, 150);
      await jest.advanceTimersByTimeAsync(150_000);
      expect(service.getAuction(1).isActive).toBe(true);

      await service.endAuction(SYSTEM_ACTOR, 1);
      expect(service.getAuction(1).ended).toBe(true);
    });
  });

  describe('administration', () => {
    it('returns the fee alongside the system state', async () => {
      await expect(service.setPlatformFee('admin', 4)).resolves.toEqual({
        mode: 'Active',
        paused: false,
        platformFeePercentage: 4,
      });
    });

    it('reports the account roles after a grant', async () => {
      await expect(
        service.grantRole('admin', 'Operator', 'olivia'),
      ).resolves.toEqual({
        account: 'olivia',
        role: 'Operator',
        changed: true,
        roles: ['Operator'],
      });
    });

    it('tracks rate-limit status with the clock', async () => {
      await service.createAuction('seller', input);
      expect(service.checkRateLimit('seller')).toEqual({
        actionsRemaining: 99,
        cooldownEnds: 0,
      });
    });

    it('pages the event log and bounds the page size', async () => {
      await service.createAuction('seller', input);
      expect(service.getEvents(0, 1).map((e) => e.type)).toEqual([
        'AuctionCreated',
      ]);
      expect(service.getEvents(0, 0)).toHaveLength(1);
      expect(service.getEvents(1).map((e) => e.seq)).toEqual([2]);
    });
  });
});
