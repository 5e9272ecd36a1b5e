export { AuctionEngine, resolveOutcome } from './auction-engine';
export { createItem, isExpired, remainingSeconds } from './item';
export { compareBids, createBid, rankBids } from './bid';
export type {
  AuctionState,
  AuctionStatus,
  Bid,
  BidRejectionReason,
  CreateItemInput,
  EndAuctionResult,
  Item,
  PlaceBidResult,
  SettlementOutcome,
  UnsoldReason,
} from './types';
