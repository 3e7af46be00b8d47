import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  NotFoundException,
  Param,
  ParseIntPipe,
  Post,
  UseGuards,
} from '@nestjs/common';
import { ActorId } from '../auth/decorators/actor-id.decorator';
import { ClerkAuthGuard } from '../auth/guards/clerk-auth.guard';
import { AuctionService } from './auction.service';
import type { CreateAuctionInput } from './engine';

interface PlaceBidBody {
  amount: number;
  /** Required for native-asset auctions; must equal `amount`. */
  attachedValue?: number;
  reference?: string;
}

@Controller('auctions')
@UseGuards(ClerkAuthGuard)
export class AuctionController {
  constructor(private readonly auctionService: AuctionService) {}

  @Post()
  async create(
    @ActorId() actor: string,
    @Body() body: CreateAuctionInput,
  ) {
    return this.auctionService.createAuction(actor, body);
  }

  @Get()
  list() {
    return this.auctionService.listAuctions();
  }

  @Get(':id')
  get(@Param('id', ParseIntPipe) id: number) {
    return this.auctionService.getAuction(id);
  }

  @Get(':id/bids')
  bids(@Param('id', ParseIntPipe) id: number) {
    return this.auctionService.getBids(id);
  }

  @Get(':id/bids/:index')
  bid(
    @Param('id', ParseIntPipe) id: number,
    @Param('index', ParseIntPipe) index: number,
  ) {
    try {
      return this.auctionService.getBid(id, index);
    } catch (err) {
      if (err instanceof RangeError) throw new NotFoundException(err.message);
      throw err;
    }
  }

  @Post(':id/bids')
  async placeBid(
    @ActorId() actor: string,
    @Param('id', ParseIntPipe) id: number,
    @Body() body: PlaceBidBody,
  ) {
    return this.auctionService.placeBid(actor, id, body.amount, {
      attachedValue: body.attachedValue,
      reference: body.reference,
    });
  }

  @Post(':id/end')
  @HttpCode(HttpStatus.OK)
  async end(@ActorId() actor: string, @Param('id', ParseIntPipe) id: number) {
    return this.auctionService.endAuction(actor, id);
  }

  @Post(':id/cancel')
  @HttpCode(HttpStatus.OK)
  async cancel(
    @ActorId() actor: string,
    @Param('id', ParseIntPipe) id: number,
  ) {
    return this.auctionService.cancelAuction(actor, id);
  }

  @Post(':id/withdraw')
  @HttpCode(HttpStatus.OK)
  async withdraw(
    @ActorId() actor: string,
    @Param('id', ParseIntPipe) id: number,
  ) {
    return this.auctionService.withdrawFunds(actor, id);
  }

  @Get(':id/escrow')
  escrow(@ActorId() actor: string, @Param('id', ParseIntPipe) id: number) {
    return this.auctionService.getEscrowBalance(id, actor);
  }
}
