import { Module } from '@nestjs/common';
import { AuctionModule } from './auction/auction.module';
import { AuditModule } from './audit/audit.module';
import { AuthModule } from './auth/auth.module';
import { ConfigModule } from './config/config.module';
import { PaymentsModule } from './payments/payments.module';
import { RedisModule } from './redis/redis.module';

@Module({
  imports: [
    ConfigModule,
    AuthModule,
    RedisModule,
    PaymentsModule,
    AuctionModule,
    AuditModule,
  ],
})
export class AppModule {}
