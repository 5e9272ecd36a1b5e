import type { CreateItemInput, Item } from './types';

const MS_PER_MINUTE = 60_000;

/**
 * Builds an active item whose window opens at `now`. Callers validate input
 * first; this only guards the invariants it cannot live without.
 */
export function createItem(input: CreateItemInput, now: number): Item {
  if (!(input.durationMinutes > 0)) {
    throw new RangeError(
      `durationMinutes must be positive (got ${input.durationMinutes})`,
    );
  }
  if (!(input.startingPrice > 0)) {
    throw new RangeError(
      `startingPrice must be positive (got ${input.startingPrice})`,
    );
  }
  return {
    id: input.id,
    name: input.name,
    description: input.description,
    startingPrice: input.startingPrice,
    reservePrice: input.reservePrice,
    sellerId: input.sellerId,
    startTime: now,
    endTime: now + input.durationMinutes * MS_PER_MINUTE,
    isActive: true,
  };
}

export function isExpired(item: Item, now: number): boolean {
  return now > item.endTime;
}

/** Whole seconds left in the window, floored, never negative. */
export function remainingSeconds(item: Item, now: number): number {
  return Math.max(0, Math.floor((item.endTime - now) / 1000));
}
