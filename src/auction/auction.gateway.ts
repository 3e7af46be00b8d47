import {
  WebSocketGateway,
  WebSocketServer,
  SubscribeMessage,
  OnGatewayConnection,
  OnGatewayDisconnect,
} from '@nestjs/websockets';
import { Logger, OnModuleInit } from '@nestjs/common';
import { Server, Socket } from 'socket.io';
import {
  ClerkTokenVerifier,
  extractBearerToken,
} from '../auth/clerk-token.verifier';
import { AuctionService, DOMAIN_EVENT } from './auction.service';
import { isEngineError, type AuctionView, type DomainEvent } from './engine';
import { toErrorBody } from './engine-error.filter';

interface AuctionRoomPayload {
  auctionId?: unknown;
}

interface PlaceBidPayload extends AuctionRoomPayload {
  amount?: unknown;
  attachedValue?: number;
  reference?: string;
}

export type BidResult =
  | { accepted: true; auction: AuctionView }
  | { accepted: false; error?: string; reason: string };

function auctionIdOf(payload: AuctionRoomPayload | undefined): number | null {
  const id = payload?.auctionId;
  return typeof id === 'number' && Number.isSafeInteger(id) && id > 0
    ? id
    : null;
}

@WebSocketGateway({ cors: { origin: '*' } })
export class AuctionGateway
  implements OnModuleInit, OnGatewayConnection, OnGatewayDisconnect
{
  @WebSocketServer()
  server!: Server;

  private readonly logger = new Logger(AuctionGateway.name);
  private readonly actorBySocketId = new Map<string, string>();

  constructor(
    private readonly auctionService: AuctionService,
    private readonly verifier: ClerkTokenVerifier,
  ) {}

  async handleConnection(client: Socket): Promise<void> {
    const token = this.extractToken(client);
    if (!token) {
      client.emit('auth_error', { message: 'Authentication required' });
      client.disconnect(true);
      return;
    }

    try {
      const actor = await this.verifier.verify(token);
      this.actorBySocketId.set(client.id, actor);
      this.logger.debug(`Socket authenticated id=${client.id} actor=${actor}`);
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      this.logger.warn(`Socket auth failed: ${msg}`);
      client.emit('auth_error', { message: 'Authentication failed' });
      client.disconnect(true);
    }
  }

  handleDisconnect(client: Socket): void {
    this.actorBySocketId.delete(client.id);
  }

  onModuleInit(): void {
    this.auctionService
      .getEventEmitter()
      .on(DOMAIN_EVENT, (event: DomainEvent) => this.broadcast(event));
  }

  @SubscribeMessage('join_auction')
  handleJoinAuction(client: Socket, payload?: AuctionRoomPayload): void {
    if (!this.requireActor(client)) return;

    const auctionId = auctionIdOf(payload);
    if (auctionId === null) {
      client.emit('error', { message: 'auctionId required' });
      return;
    }
    try {
      const auction = this.auctionService.getAuction(auctionId);
      void client.join(this.auctionService.getRoomName(auctionId));
      client.emit('auction_state', auction);
    } catch (err) {
      if (!isEngineError(err)) throw err;
      client.emit('auction_state', { error: 'Auction not found' });
    }
  }

  @SubscribeMessage('leave_auction')
  handleLeaveAuction(client: Socket, payload?: AuctionRoomPayload): void {
    if (!this.requireActor(client)) return;

    const auctionId = auctionIdOf(payload);
    if (auctionId !== null) {
      void client.leave(this.auctionService.getRoomName(auctionId));
    }
  }

  @SubscribeMessage('place_bid')
  async handlePlaceBid(
    client: Socket,
    payload?: PlaceBidPayload,
  ): Promise<void> {
    const actor = this.requireActor(client);
    if (!actor) return;

    const auctionId = auctionIdOf(payload);
    const amount = payload?.amount;
    if (auctionId === null || typeof amount !== 'number') {
      client.emit('bid_result', {
        accepted: false,
        reason: 'auctionId, amount required',
      } satisfies BidResult);
      return;
    }

    const result = await this.bid(actor, auctionId, amount, payload);
    client.emit('bid_result', result);
  }

  private async bid(
    actor: string,
    auctionId: number,
    amount: number,
    payload: PlaceBidPayload | undefined,
  ): Promise<BidResult> {
    try {
      const auction = await this.auctionService.placeBid(
        actor,
        auctionId,
        amount,
        {
          attachedValue: payload?.attachedValue,
          reference: payload?.reference,
        },
      );
      return { accepted: true, auction };
    } catch (err) {
      if (isEngineError(err)) {
        const body = toErrorBody(err);
        return { accepted: false, error: body.error, reason: body.message };
      }
      const msg = err instanceof Error ? err.message : String(err);
      this.logger.error(`place_bid failed unexpectedly: ${msg}`);
      return { accepted: false, reason: 'Internal error' };
    }
  }

  private broadcast(event: DomainEvent): void {
    if ('auctionId' in event) {
      this.server
        .to(this.auctionService.getRoomName(event.auctionId))
        .emit(DOMAIN_EVENT, event);
    } else {
      this.server.emit(DOMAIN_EVENT, event);
    }
  }

  private extractToken(client: Socket): string | null {
    const authToken: unknown = client.handshake.auth?.token;
    if (typeof authToken === 'string' && authToken.trim()) {
      return authToken.trim();
    }
    return extractBearerToken(client.handshake.headers?.authorization);
  }

  private requireActor(client: Socket): string | null {
    const actor = this.actorBySocketId.get(client.id) ?? null;
    if (!actor) {
      client.emit('auth_error', { message: 'Authentication required' });
      client.disconnect(true);
      return null;
    }
    return actor;
  }
}
