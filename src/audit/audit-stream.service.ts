import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AuctionService, DOMAIN_EVENT } from '../auction/auction.service';
import type { DomainEvent } from '../auction/engine';
import { RedisService } from '../redis/redis.service';

/**
 * Mirrors the domain event log into a capped Redis stream for consumers
 * outside this process.
 */
@Injectable()
export class AuditStreamService implements OnModuleInit {
  private readonly logger = new Logger(AuditStreamService.name);
  private readonly enabled: boolean;
  private readonly streamKey: string;
  private readonly maxLength: number;

  constructor(
    private readonly auctionService: AuctionService,
    private readonly redis: RedisService,
    config: ConfigService,
  ) {
    this.enabled = config.get<boolean>('audit.enabled') ?? true;
    this.streamKey = config.get<string>('audit.streamKey') ?? 'auction:events';
    this.maxLength = config.get<number>('audit.maxLength') ?? 10_000;
  }

  onModuleInit(): void {
    if (!this.enabled) {
      this.logger.log('Audit stream disabled');
      return;
    }
    this.auctionService
      .getEventEmitter()
      .on(DOMAIN_EVENT, (event: DomainEvent) => {
        this.append(event).catch((err: unknown) =>
          this.logger.error(
            `Failed to append ${event.type}#${event.seq} to ${this.streamKey}`,
            err instanceof Error ? err.stack : String(err),
          ),
        );
      });
    this.logger.log(`Publishing domain events to stream ${this.streamKey}`);
  }

  async append(event: DomainEvent): Promise<string | null> {
    return this.redis.appendToStream(this.streamKey, this.maxLength, {
      type: event.type,
      seq: String(event.seq),
      at: String(event.at),
      payload: JSON.stringify(event),
    });
  }
}
