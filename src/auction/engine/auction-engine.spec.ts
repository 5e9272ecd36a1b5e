import { ManualClock } from '../../clock/manual-clock';
import { AuctionEngine, resolveOutcome } from './auction-engine';
import { createItem } from './item';

const START = 1_700_000_000_000;

const createInput = () => ({
  id: 'ID1001',
  name: 'Lamp',
  description: 'Brass desk lamp',
  startingPrice: 10,
  reservePrice: 50,
  sellerId: 'S',
  durationMinutes: 1,
});

describe('AuctionEngine (isolated)', () => {
  let clock: ManualClock;
  let engine: AuctionEngine;

  beforeEach(() => {
    clock = new ManualClock(START);
    engine = new AuctionEngine(createItem(createInput(), clock.now()), clock);
  });

  describe('creation', () => {
    it('starts ACTIVE at the starting price with no bids', () => {
      const state = engine.getState();
      expect(state.status).toBe('ACTIVE');
      expect(state.id).toBe('ID1001');
      expect(state.currentPrice).toBe(10);
      expect(state.highestBid).toBeNull();
      expect(state.bids).toEqual([]);
      expect(state.remainingSeconds).toBe(60);
      expect(engine.isActive()).toBe(true);
    });

    it('owns its own copy of the item', () => {
      const item = createItem(createInput(), clock.now());
      const owned = new AuctionEngine(item, clock);
      item.isActive = false;
      expect(owned.isActive()).toBe(true);
      expect(owned.getItem().isActive).toBe(true);
    });
  });

  describe('placeBid', () => {
    it('accepts a bid above the starting price and stamps it', () => {
      clock.advance(1_000);
      expect(engine.placeBid('A', 20)).toEqual({ accepted: true, amount: 20 });
      expect(engine.currentPrice()).toBe(20);
      expect(engine.getHighestBid()).toEqual({
        bidderId: 'A',
        amount: 20,
        itemId: 'ID1001',
        timestamp: START + 1_000,
      });
    });

    it('rejects bids at or below the starting price', () => {
      for (const amount of [10, 5, Number.NaN]) {
        expect(engine.placeBid('A', amount)).toEqual({
          accepted: false,
          reason: 'BELOW_STARTING_PRICE',
          message: 'Bid must be higher than starting price (10)',
        });
      }
      expect(engine.getBidHistory()).toEqual([]);
    });

    it('rejects bids at or below the current best, ties included', () => {
      engine.placeBid('A', 20);
      for (const amount of [15, 20]) {
        expect(engine.placeBid('B', amount)).toEqual({
          accepted: false,
          reason: 'BELOW_CURRENT_BID',
          message: 'Bid must be higher than current highest bid (20)',
        });
      }
      expect(engine.getBidHistory()).toHaveLength(1);
    });

    it('rejects the seller bidding on their own item', () => {
      expect(engine.placeBid('S', 1_000)).toEqual({
        accepted: false,
        reason: 'SELF_BID',
        message: 'Cannot bid on your own item',
      });
    });

    it('checks price rules before the self-bid guard', () => {
      engine.placeBid('A', 20);
      expect(engine.placeBid('S', 20)).toMatchObject({
        reason: 'BELOW_CURRENT_BID',
      });
    });

    it('rejects any bid once the auction is closed', () => {
      engine.endAuction();
      expect(engine.placeBid('A', 1_000)).toEqual({
        accepted: false,
        reason: 'AUCTION_CLOSED',
        message: 'Auction is not active',
      });
      expect(engine.placeBid('S', 1_000)).toMatchObject({
        accepted: false,
        reason: 'AUCTION_CLOSED',
      });
    });

    it('keeps accepted amounts strictly increasing', () => {
      const attempts = [12, 11, 30, 30, 25, 31, 100, 99, 101];
      attempts.forEach((amount, i) => {
        clock.advance(10);
        engine.placeBid(`bidder-${i % 3}`, amount);
      });
      const amounts = engine.getBidHistory().map((b) => b.amount);
      expect(amounts).toEqual([12, 30, 31, 100, 101]);
      for (let i = 1; i < amounts.length; i += 1) {
        expect(amounts[i]).toBeGreaterThan(amounts[i - 1] ?? 0);
      }
      expect(engine.getHighestBid()?.amount).toBe(101);
    });

    it('tracks the highest amount per bidder', () => {
      engine.placeBid('A', 20);
      engine.placeBid('B', 25);
      engine.placeBid('A', 60);
      expect(engine.getBidderHighs()).toEqual({ A: 60, B: 25 });
    });
  });

  describe('expiry', () => {
    it('freezes bidding after endTime but keeps the price and the auction open', () => {
      engine.placeBid('A', 20);
      clock.set(START + 60_000);
      expect(engine.isActive()).toBe(true);
      clock.advance(1);
      expect(engine.isActive()).toBe(false);
      expect(engine.placeBid('B', 500)).toMatchObject({
        accepted: false,
        reason: 'AUCTION_CLOSED',
      });
      expect(engine.currentPrice()).toBe(20);
      expect(engine.getStatus()).toBe('EXPIRED');
      expect(engine.getState().remainingSeconds).toBe(0);
    });

    it('can still be closed and resolved after expiry', () => {
      engine.placeBid('A', 60);
      clock.advance(120_000);
      expect(engine.endAuction()).toEqual({
        ended: true,
        outcome: {
          status: 'SOLD',
          itemId: 'ID1001',
          sellerId: 'S',
          winnerId: 'A',
          price: 60,
        },
      });
    });
  });

  describe('reserve', () => {
    it('compares the current price against the reserve inclusively', () => {
      expect(engine.hasReserveBeenMet()).toBe(false);
      engine.placeBid('A', 49);
      expect(engine.hasReserveBeenMet()).toBe(false);
      engine.placeBid('B', 50);
      expect(engine.hasReserveBeenMet()).toBe(true);
    });

    it('is met before any bid when the reserve is below the starting price', () => {
      const item = createItem({ ...createInput(), reservePrice: 0 }, START);
      expect(new AuctionEngine(item, clock).hasReserveBeenMet()).toBe(true);
    });
  });

  describe('endAuction', () => {
    it('closes unsold when nobody bid', () => {
      expect(engine.endAuction()).toEqual({
        ended: true,
        outcome: { status: 'UNSOLD', itemId: 'ID1001', reason: 'NO_BIDS' },
      });
      expect(engine.getStatus()).toBe('UNSOLD');
      expect(engine.isActive()).toBe(false);
    });

    it('closes unsold when the best bid misses the reserve', () => {
      engine.placeBid('A', 40);
      expect(engine.endAuction()).toEqual({
        ended: true,
        outcome: {
          status: 'UNSOLD',
          itemId: 'ID1001',
          reason: 'RESERVE_NOT_MET',
        },
      });
    });

    it('is idempotent once closed', () => {
      engine.placeBid('A', 60);
      expect(engine.endAuction().ended).toBe(true);
      expect(engine.endAuction()).toEqual({
        ended: false,
        reason: 'ALREADY_CLOSED',
        message: 'Auction already ended',
      });
      expect(engine.getStatus()).toBe('SOLD');
    });

    it('reports SETTLEMENT_FAILED once marked', () => {
      engine.placeBid('A', 60);
      engine.endAuction();
      engine.markSettlementFailed('Insufficient balance');
      const state = engine.getState();
      expect(state.status).toBe('SETTLEMENT_FAILED');
      expect(state.settlementError).toBe('Insufficient balance');
    });
  });

  describe('resolveOutcome (pure)', () => {
    it('sells to the best bidder at their amount when the reserve is met', () => {
      const item = createItem(createInput(), START);
      const outcome = resolveOutcome(item, {
        bidderId: 'A',
        amount: 50,
        itemId: item.id,
        timestamp: START,
      });
      expect(outcome).toEqual({
        status: 'SOLD',
        itemId: 'ID1001',
        sellerId: 'S',
        winnerId: 'A',
        price: 50,
      });
    });
  });

  describe('worked scenario', () => {
    it('start 10, reserve 50: A 20, B 15 rejected, A 60, sold to A for 60', () => {
      expect(engine.placeBid('A', 20)).toEqual({ accepted: true, amount: 20 });
      expect(engine.currentPrice()).toBe(20);
      expect(engine.placeBid('B', 15)).toMatchObject({
        reason: 'BELOW_CURRENT_BID',
      });
      expect(engine.placeBid('A', 60)).toEqual({ accepted: true, amount: 60 });
      expect(engine.currentPrice()).toBe(60);
      const result = engine.endAuction();
      expect(result).toEqual({
        ended: true,
        outcome: {
          status: 'SOLD',
          itemId: 'ID1001',
          sellerId: 'S',
          winnerId: 'A',
          price: 60,
        },
      });
    });
  });

  describe('getState', () => {
    it('returns a copy so caller cannot mutate internal state', () => {
      engine.placeBid('A', 20);
      const a = engine.getState();
      const b = engine.getState();
      expect(a).toEqual(b);
      a.item.isActive = false;
      a.bids.push({ bidderId: 'X', amount: 1, itemId: 'ID1001', timestamp: 0 });
      expect(engine.isActive()).toBe(true);
      expect(engine.getBidHistory()).toHaveLength(1);
    });
  });
});
