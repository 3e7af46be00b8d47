import { Test, TestingModule } from '@nestjs/testing';
import { EventEmitter } from 'node:events';
import { ClerkTokenVerifier } from '../auth/clerk-token.verifier';
import { AuctionGateway } from './auction.gateway';
import { AuctionService, DOMAIN_EVENT } from './auction.service';
import { EngineError, type DomainEvent } from './engine';

describe('AuctionGateway', () => {
  let gateway: AuctionGateway;
  let auctionService: AuctionService;
  let verifier: ClerkTokenVerifier;
  let emitter: EventEmitter;
  let roomEmit: jest.Mock;
  let mockServer: { to: jest.Mock; emit: jest.Mock };

  const auction = { id: 1, owner: 'seller', highestBid: 150 };

  const makeClient = (id: string, token?: string) => ({
    id,
    handshake: { auth: token ? { token } : {}, headers: {} },
    join: jest.fn(),
    leave: jest.fn(),
    emit: jest.fn(),
    disconnect: jest.fn(),
  });

  const connect = async (id: string) => {
    const client = makeClient(id, 'tok');
    await gateway.handleConnection(client as never);
    return client;
  };

  beforeEach(async () => {
    emitter = new EventEmitter();
    roomEmit = jest.fn();
    mockServer = {
      to: jest.fn().mockReturnValue({ emit: roomEmit }),
      emit: jest.fn(),
    };
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AuctionGateway,
        {
          provide: AuctionService,
          useValue: {
            getRoomName: jest.fn((id: number) => `auction:${id}`),
            getAuction: jest.fn().mockReturnValue(auction),
            getEventEmitter: jest.fn().mockReturnValue(emitter),
            placeBid: jest.fn().mockResolvedValue(auction),
          },
        },
        {
          provide: ClerkTokenVerifier,
          useValue: { verify: jest.fn().mockResolvedValue('user_1') },
        },
      ],
    }).compile();

    gateway = module.get(AuctionGateway);
    auctionService = module.get(AuctionService);
    verifier = module.get(ClerkTokenVerifier);
    gateway.server = mockServer as never;
    gateway.onModuleInit();
  });

  describe('handleConnection', () => {
    it('disconnects a client without a token', async () => {
      const client = makeClient('c0');
      await gateway.handleConnection(client as never);
      expect(client.emit).toHaveBeenCalledWith('auth_error', {
        message: 'Authentication required',
      });
      expect(client.disconnect).toHaveBeenCalledWith(true);
      expect(verifier.verify).not.toHaveBeenCalled();
    });

    it('disconnects a client whose token fails verification', async () => {
      jest.mocked(verifier.verify).mockRejectedValue(new Error('expired'));
      const client = makeClient('c1', 'bad');
      await gateway.handleConnection(client as never);
      expect(client.emit).toHaveBeenCalledWith('auth_error', {
        message: 'Authentication failed',
      });
      expect(client.disconnect).toHaveBeenCalledWith(true);
    });

    it('refuses room commands from an unauthenticated socket', () => {
      const client = makeClient('stranger');
      gateway.handleJoinAuction(client as never, { auctionId: 1 });
      expect(client.join).not.toHaveBeenCalled();
      expect(client.disconnect).toHaveBeenCalledWith(true);
    });
  });

  describe('handleJoinAuction', () => {
    it('joins the room and sends the auction state', async () => {
      const client = await connect('c2');
      gateway.handleJoinAuction(client as never, { auctionId: 1 });
      expect(client.join).toHaveBeenCalledWith('auction:1');
      expect(client.emit).toHaveBeenCalledWith('auction_state', auction);
    });

    it('emits error when auctionId is missing', async () => {
      const client = await connect('c3');
      gateway.handleJoinAuction(client as never, { auctionId: '' });
      expect(client.emit).toHaveBeenCalledWith('error', {
        message: 'auctionId required',
      });
    });

    it('reports an unknown auction without joining', async () => {
      jest.mocked(auctionService.getAuction).mockImplementation(() => {
        throw new EngineError('InvalidAuction', 'Auction 9 not found');
      });
      const client = await connect('c4');
      gateway.handleJoinAuction(client as never, { auctionId: 9 });
      expect(client.join).not.toHaveBeenCalled();
      expect(client.emit).toHaveBeenCalledWith('auction_state', {
        error: 'Auction not found',
      });
    });
  });

  describe('handleLeaveAuction', () => {
    it('leaves the room', async () => {
      const client = await connect('c5');
      gateway.handleLeaveAuction(client as never, { auctionId: 1 });
      expect(client.leave).toHaveBeenCalledWith('auction:1');
    });
  });

  describe('handlePlaceBid', () => {
    it('bids as the authenticated actor and emits bid_result', async () => {
      const client = await connect('c6');
      await gateway.handlePlaceBid(client as never, {
        auctionId: 1,
        amount: 150,
      });
      expect(auctionService.placeBid).toHaveBeenCalledWith('user_1', 1, 150, {
        attachedValue: undefined,
        reference: undefined,
      });
      expect(client.emit).toHaveBeenCalledWith('bid_result', {
        accepted: true,
        auction,
      });
    });

    it('returns the engine error kind on rejection', async () => {
      jest
        .mocked(auctionService.placeBid)
        .mockRejectedValue(new EngineError('BidTooLow', 'Bid must exceed 160'));
      const client = await connect('c7');
      await gateway.handlePlaceBid(client as never, {
        auctionId: 1,
        amount: 155,
      });
      expect(client.emit).toHaveBeenCalledWith('bid_result', {
        accepted: false,
        error: 'BidTooLow',
        reason: 'Bid must exceed 160',
      });
    });

    it('emits bid_result with error when payload incomplete', async () => {
      const client = await connect('c8');
      await gateway.handlePlaceBid(client as never, {});
      expect(auctionService.placeBid).not.toHaveBeenCalled();
      expect(client.emit).toHaveBeenCalledWith('bid_result', {
        accepted: false,
        reason: 'auctionId, amount required',
      });
    });
  });

  describe('domain event broadcast', () => {
    it('sends auction events to the auction room', () => {
      const placed: DomainEvent = {
        type: 'BidPlaced',
        auctionId: 3,
        bidder: 'bob',
        amount: 20,
        seq: 1,
        at: 100,
      };
      emitter.emit(DOMAIN_EVENT, placed);
      expect(mockServer.to).toHaveBeenCalledWith('auction:3');
      expect(roomEmit).toHaveBeenCalledWith(DOMAIN_EVENT, placed);
      expect(mockServer.emit).not.toHaveBeenCalled();
    });

    it('sends system events to every client', () => {
      const fee: DomainEvent = {
        type: 'FeeUpdated',
        previous: 0,
        current: 2,
        seq: 2,
        at: 100,
      };
      emitter.emit(DOMAIN_EVENT, fee);
      expect(mockServer.emit).toHaveBeenCalledWith(DOMAIN_EVENT, fee);
      expect(mockServer.to).not.toHaveBeenCalled();
    });
  });
});
