import { Module } from '@nestjs/common';
import { AuctionModule } from '../auction/auction.module';
import { AuditStreamService } from './audit-stream.service';

@Module({
  imports: [AuctionModule],
  providers: [AuditStreamService],
})
export class AuditModule {}
