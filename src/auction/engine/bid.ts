import type { Bid } from './types';

export function createBid(
  bidderId: string,
  amount: number,
  itemId: string,
  timestamp: number,
): Bid {
  return Object.freeze({ bidderId, amount, itemId, timestamp });
}

/**
 * Best-first ordering: higher amount wins, then the earlier timestamp.
 * Negative when `a` ranks ahead of `b`.
 */
export function compareBids(a: Bid, b: Bid): number {
  if (a.amount !== b.amount) return b.amount - a.amount;
  return a.timestamp - b.timestamp;
}

/** Bids best-first. Stable, so full ties keep insertion order. */
export function rankBids(bids: readonly Bid[]): Bid[] {
  return [...bids].sort(compareBids);
}
