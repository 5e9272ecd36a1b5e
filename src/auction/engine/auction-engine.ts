import type { Clock } from '../../clock/clock';
import { compareBids, createBid } from './bid';
import { remainingSeconds } from './item';
import type {
  AuctionState,
  AuctionStatus,
  Bid,
  EndAuctionResult,
  Item,
  PlaceBidResult,
  SettlementOutcome,
} from './types';

/**
 * Decide how a closed auction resolves. Pure: no ledger, no clock.
 */
export function resolveOutcome(
  item: Item,
  highestBid: Bid | null,
): SettlementOutcome {
  if (!highestBid) {
    return { status: 'UNSOLD', itemId: item.id, reason: 'NO_BIDS' };
  }
  if (highestBid.amount < item.reservePrice) {
    return { status: 'UNSOLD', itemId: item.id, reason: 'RESERVE_NOT_MET' };
  }
  return {
    status: 'SOLD',
    itemId: item.id,
    sellerId: item.sellerId,
    winnerId: highestBid.bidderId,
    price: highestBid.amount,
  };
}

/**
 * Bidding core for one item: admission, best-bid tracking, close decision.
 * Synchronous and side-effect free beyond its own state; settlement and
 * serialization belong to the service layer.
 */
export class AuctionEngine {
  private readonly item: Item;
  private readonly bids: Bid[] = [];
  private readonly bidderHighs = new Map<string, number>();
  private highestBid: Bid | null = null;
  private outcome: SettlementOutcome | null = null;
  private settlementError: string | null = null;

  constructor(
    item: Item,
    private readonly clock: Clock,
  ) {
    this.item = { ...item };
  }

  get id(): string {
    return this.item.id;
  }

  get sellerId(): string {
    return this.item.sellerId;
  }

  /**
   * Open for bids: not closed and the window has not passed.
   */
  isActive(): boolean {
    return this.item.isActive && this.clock.now() <= this.item.endTime;
  }

  /**
   * Admit or reject a bid. First failing check wins; nothing is mutated
   * unless every check passes.
   */
  placeBid(bidderId: string, amount: number): PlaceBidResult {
    if (!this.isActive()) {
      return {
        accepted: false,
        reason: 'AUCTION_CLOSED',
        message: 'Auction is not active',
      };
    }
    if (!(amount > this.item.startingPrice)) {
      return {
        accepted: false,
        reason: 'BELOW_STARTING_PRICE',
        message: `Bid must be higher than starting price (${this.item.startingPrice})`,
      };
    }
    if (this.highestBid && !(amount > this.highestBid.amount)) {
      return {
        accepted: false,
        reason: 'BELOW_CURRENT_BID',
        message: `Bid must be higher than current highest bid (${this.highestBid.amount})`,
      };
    }
    if (bidderId === this.item.sellerId) {
      return {
        accepted: false,
        reason: 'SELF_BID',
        message: 'Cannot bid on your own item',
      };
    }

    const bid = createBid(bidderId, amount, this.item.id, this.clock.now());
    this.bids.push(bid);
    if (!this.highestBid || compareBids(bid, this.highestBid) < 0) {
      this.highestBid = bid;
    }
    const previous = this.bidderHighs.get(bidderId) ?? 0;
    this.bidderHighs.set(bidderId, Math.max(previous, amount));
    return { accepted: true, amount };
  }

  currentPrice(): number {
    return this.highestBid ? this.highestBid.amount : this.item.startingPrice;
  }

  hasReserveBeenMet(): boolean {
    return this.currentPrice() >= this.item.reservePrice;
  }

  /**
   * Close the auction (irreversible) and decide the outcome. Works on an
   * expired auction too; a second call reports ALREADY_CLOSED.
   */
  endAuction(): EndAuctionResult {
    if (!this.item.isActive) {
      return {
        ended: false,
        reason: 'ALREADY_CLOSED',
        message: 'Auction already ended',
      };
    }
    this.item.isActive = false;
    this.outcome = resolveOutcome(this.item, this.highestBid);
    return { ended: true, outcome: this.outcome };
  }

  /**
   * Record that a SOLD outcome could not be settled.
   */
  markSettlementFailed(message: string): void {
    this.settlementError = message;
  }

  getStatus(): AuctionStatus {
    if (!this.outcome) return this.isActive() ? 'ACTIVE' : 'EXPIRED';
    if (this.settlementError !== null) return 'SETTLEMENT_FAILED';
    return this.outcome.status;
  }

  getItem(): Readonly<Item> {
    return { ...this.item };
  }

  getHighestBid(): Bid | null {
    return this.highestBid;
  }

  /** Accepted bids in acceptance order. */
  getBidHistory(): Bid[] {
    return [...this.bids];
  }

  getBidderHighs(): Record<string, number> {
    return Object.fromEntries(this.bidderHighs);
  }

  getState(): AuctionState {
    return JSON.parse(
      JSON.stringify({
        id: this.item.id,
        item: this.item,
        status: this.getStatus(),
        currentPrice: this.currentPrice(),
        reserveMet: this.hasReserveBeenMet(),
        remainingSeconds: remainingSeconds(this.item, this.clock.now()),
        highestBid: this.highestBid,
        bids: this.bids,
        bidderHighs: this.getBidderHighs(),
        outcome: this.outcome,
        settlementError: this.settlementError,
      } satisfies AuctionState),
    ) as AuctionState;
  }
}
