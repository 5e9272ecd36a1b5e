/**
 * The thing being sold and its bidding window.
 * Only the owning AuctionEngine ever clears `isActive`.
 */
export interface Item {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly startingPrice: number;
  readonly reservePrice: number;
  readonly sellerId: string;
  readonly startTime: number;
  readonly endTime: number;
  isActive: boolean;
}

/**
 * Input to create an item (prices and window, without id/timestamps).
 */
export interface CreateItemInput {
  id: string;
  name: string;
  description: string;
  startingPrice: number;
  reservePrice: number;
  sellerId: string;
  durationMinutes: number;
}

/**
 * One accepted bid. Created only by AuctionEngine.placeBid, never mutated.
 */
export interface Bid {
  readonly bidderId: string;
  readonly amount: number;
  readonly timestamp: number;
  readonly itemId: string;
}

/**
 * Auction lifecycle: ACTIVE → (EXPIRED) → SOLD | UNSOLD | SETTLEMENT_FAILED.
 * EXPIRED means the window has passed but nobody has closed the auction yet.
 */
export type AuctionStatus =
  | 'ACTIVE'
  | 'EXPIRED'
  | 'SOLD'
  | 'UNSOLD'
  | 'SETTLEMENT_FAILED';

export type BidRejectionReason =
  | 'AUCTION_CLOSED'
  | 'BELOW_STARTING_PRICE'
  | 'BELOW_CURRENT_BID'
  | 'SELF_BID';

/**
 * Result of placeBid() – explicit accepted/rejected with reason.
 */
export type PlaceBidResult =
  | { accepted: true; amount: number }
  | { accepted: false; reason: BidRejectionReason; message: string };

export type UnsoldReason = 'NO_BIDS' | 'RESERVE_NOT_MET';

/**
 * What closing an auction decided. SOLD still has to be settled.
 */
export type SettlementOutcome =
  | {
      status: 'SOLD';
      itemId: string;
      sellerId: string;
      winnerId: string;
      price: number;
    }
  | { status: 'UNSOLD'; itemId: string; reason: UnsoldReason };

/**
 * Result of endAuction() – outcome on first close, ALREADY_CLOSED after.
 */
export type EndAuctionResult =
  | { ended: true; outcome: SettlementOutcome }
  | { ended: false; reason: 'ALREADY_CLOSED'; message: string };

/**
 * Read-only bundle for one auction, detached from engine internals.
 */
export interface AuctionState {
  id: string;
  item: Item;
  status: AuctionStatus;
  currentPrice: number;
  reserveMet: boolean;
  remainingSeconds: number;
  highestBid: Bid | null;
  bids: Bid[];
  bidderHighs: Record<string, number>;
  outcome: SettlementOutcome | null;
  settlementError: string | null;
}
