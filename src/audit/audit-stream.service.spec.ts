import { ConfigService } from '@nestjs/config';
import { EventEmitter } from 'node:events';
import { DOMAIN_EVENT } from '../auction/auction.service';
import type { DomainEvent } from '../auction/engine';
import { AuditStreamService } from './audit-stream.service';

class RedisTestDouble {
  readonly streams = new Map<
    string,
    Array<{ id: string; fields: Record<string, string> }>
  >();
  failNext = false;

  async appendToStream(
    key: string,
    maxLength: number,
    fields: Record<string, string>,
  ): Promise<string | null> {
    if (this.failNext) {
      this.failNext = false;
      throw new Error('connection reset');
    }
    const entries = this.streams.get(key) ?? [];
    const id = `${entries.length + 1}-0`;
    entries.push({ id, fields });
    if (entries.length > maxLength) entries.splice(0, entries.length - maxLength);
    this.streams.set(key, entries);
    return id;
  }
}

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('AuditStreamService', () => {
  let emitter: EventEmitter;
  let redis: RedisTestDouble;

  const created: DomainEvent = {
    type: 'AuctionCreated',
    auctionId: 1,
    owner: 'seller',
    asset: 'painting',
    assetAmount: 1,
    paymentAsset: 'usd',
    reservePrice: 100,
    buyNowPrice: 500,
    endTime: 3600,
    seq: 1,
    at: 0,
  };
  const fee: DomainEvent = {
    type: 'FeeUpdated',
    previous: 0,
    current: 3,
    seq: 2,
    at: 5,
  };

  const start = (audit: Record<string, unknown>) => {
    const service = new AuditStreamService(
      { getEventEmitter: () => emitter } as never,
      redis as never,
      new ConfigService({ audit }),
    );
    service.onModuleInit();
    return service;
  };

  beforeEach(() => {
    emitter = new EventEmitter();
    redis = new RedisTestDouble();
  });

  it('appends every domain event with its type, sequence and payload', async () => {
    start({ enabled: true, streamKey: 'audit:test', maxLength: 100 });
    emitter.emit(DOMAIN_EVENT, created);
    emitter.emit(DOMAIN_EVENT, fee);
    await flush();

    const entries = redis.streams.get('audit:test') ?? [];
    expect(entries.map((e) => e.fields.type)).toEqual([
      'AuctionCreated',
      'FeeUpdated',
    ]);
    expect(entries[1]?.fields).toEqual({
      type: 'FeeUpdated',
      seq: '2',
      at: '5',
      payload: JSON.stringify(fee),
    });
  });

  it('caps the stream length', async () => {
    start({ enabled: true, streamKey: 'audit:test', maxLength: 1 });
    emitter.emit(DOMAIN_EVENT, created);
    emitter.emit(DOMAIN_EVENT, fee);
    await flush();
    expect(redis.streams.get('audit:test')?.map((e) => e.fields.seq)).toEqual([
      '2',
    ]);
  });

  it('keeps running after a failed append', async () => {
    start({ enabled: true, streamKey: 'audit:test', maxLength: 100 });
    redis.failNext = true;
    emitter.emit(DOMAIN_EVENT, created);
    emitter.emit(DOMAIN_EVENT, fee);
    await flush();
    expect(redis.streams.get('audit:test')?.map((e) => e.fields.seq)).toEqual([
      '2',
    ]);
  });

  it('does not subscribe when disabled', () => {
    start({ enabled: false });
    expect(emitter.listenerCount(DOMAIN_EVENT)).toBe(0);
  });
});
