import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { buildEngineConfig } from '../config/engine-config';
import { PAYMENT_ADAPTER } from '../payments/payments.constants';
import { AdminController } from './admin.controller';
import { AuctionController } from './auction.controller';
import { AuctionGateway } from './auction.gateway';
import { AuctionService } from './auction.service';
import { CLOCK, systemClock } from './clock';
import { AuctionEngine, DomainEventLog, type PaymentAdapter } from './engine';
import { SystemController } from './system.controller';

export function createEngine(
  config: ConfigService,
  payments: PaymentAdapter,
): AuctionEngine {
  const logger = new Logger('DomainEventLog');
  const events = new DomainEventLog((err, event) =>
    logger.error(
      `Listener failed on ${event.type}#${event.seq}`,
      err instanceof Error ? err.stack : String(err),
    ),
  );
  return new AuctionEngine(buildEngineConfig(config), payments, events);
}

@Module({
  controllers: [AuctionController, SystemController, AdminController],
  providers: [
    {
      provide: AuctionEngine,
      useFactory: createEngine,
      inject: [ConfigService, PAYMENT_ADAPTER],
    },
    { provide: CLOCK, useValue: systemClock },
    AuctionService,
    AuctionGateway,
  ],
  exports: [AuctionService],
})
export class AuctionModule {}
