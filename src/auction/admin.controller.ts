import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  ParseBoolPipe,
  Post,
  UseGuards,
} from '@nestjs/common';
import { ActorId } from '../auth/decorators/actor-id.decorator';
import { ClerkAuthGuard } from '../auth/guards/clerk-auth.guard';
import { AuctionService } from './auction.service';
import type { Role } from './engine';
import { ParseRolePipe } from './pipes/parse-role.pipe';
import { RequiredStringPipe } from './pipes/required-string.pipe';

/**
 * Role-gated operations. Authorization is checked by the engine against the
 * caller's roles, so every route here is reachable by any signed-in actor.
 */
@Controller('admin')
@UseGuards(ClerkAuthGuard)
export class AdminController {
  constructor(private readonly auctionService: AuctionService) {}

  @Post('emergency')
  @HttpCode(HttpStatus.OK)
  emergency(
    @ActorId() actor: string,
    @Body('enabled', ParseBoolPipe) enabled: boolean,
  ) {
    return this.auctionService.setEmergencyState(actor, enabled);
  }

  @Post('maintenance')
  @HttpCode(HttpStatus.OK)
  maintenance(
    @ActorId() actor: string,
    @Body('enabled', ParseBoolPipe) enabled: boolean,
  ) {
    return this.auctionService.setMaintenanceMode(actor, enabled);
  }

  @Post('recover')
  @HttpCode(HttpStatus.OK)
  recover(
    @ActorId() actor: string,
    @Body('asset', RequiredStringPipe) asset: string,
    @Body('amount') amount: number,
  ) {
    return this.auctionService.recoverToken(actor, asset, amount);
  }

  @Post('blacklist')
  @HttpCode(HttpStatus.OK)
  blacklist(
    @ActorId() actor: string,
    @Body('bidder', RequiredStringPipe) bidder: string,
    @Body('blacklisted', ParseBoolPipe) blacklisted: boolean,
  ) {
    return this.auctionService.setBlacklisted(actor, bidder, blacklisted);
  }

  @Post('fee')
  @HttpCode(HttpStatus.OK)
  fee(@ActorId() actor: string, @Body('percentage') percentage: number) {
    return this.auctionService.setPlatformFee(actor, percentage);
  }

  @Post('roles/grant')
  @HttpCode(HttpStatus.OK)
  grantRole(
    @ActorId() actor: string,
    @Body('role', ParseRolePipe) role: Role,
    @Body('account', RequiredStringPipe) account: string,
  ) {
    return this.auctionService.grantRole(actor, role, account);
  }

  @Post('roles/revoke')
  @HttpCode(HttpStatus.OK)
  revokeRole(
    @ActorId() actor: string,
    @Body('role', ParseRolePipe) role: Role,
    @Body('account', RequiredStringPipe) account: string,
  ) {
    return this.auctionService.revokeRole(actor, role, account);
  }
}
