import {
  Controller,
  DefaultValuePipe,
  Get,
  Param,
  ParseIntPipe,
  Query,
  UseGuards,
} from '@nestjs/common';
import { ActorId } from '../auth/decorators/actor-id.decorator';
import { ClerkAuthGuard } from '../auth/guards/clerk-auth.guard';
import { AuctionService, EVENT_PAGE_SIZE } from './auction.service';

@Controller('system')
@UseGuards(ClerkAuthGuard)
export class SystemController {
  constructor(private readonly auctionService: AuctionService) {}

  @Get('metrics')
  metrics() {
    return this.auctionService.getSystemMetrics();
  }

  @Get('state')
  state() {
    return this.auctionService.getSystemState();
  }

  @Get('rate-limit')
  rateLimit(@ActorId() actor: string) {
    return this.auctionService.checkRateLimit(actor);
  }

  @Get('events')
  events(
    @Query('after', new DefaultValuePipe(0), ParseIntPipe) after: number,
    @Query('limit', new DefaultValuePipe(EVENT_PAGE_SIZE), ParseIntPipe)
    limit: number,
  ) {
    return this.auctionService.getEvents(after, limit);
  }

  @Get('treasury/:asset')
  treasury(@Param('asset') asset: string) {
    return this.auctionService.getTreasuryBalance(asset);
  }
}
