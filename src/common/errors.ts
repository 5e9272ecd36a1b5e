/**
 * Thrown for invariant violations. Ordinary rejections (bad bids, unknown
 * ids) are returned as result values instead.
 */
export class DuplicateAuctionIdError extends Error {
  constructor(readonly auctionId: string) {
    super(`Auction id already registered: ${auctionId}`);
    this.name = 'DuplicateAuctionIdError';
  }
}

export class AccountNotFoundError extends Error {
  constructor(readonly accountId: string) {
    super(`Account not found: ${accountId}`);
    this.name = 'AccountNotFoundError';
  }
}

export class SettlementError extends Error {
  constructor(
    readonly auctionId: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Settlement failed for auction ${auctionId}: ${message}`, options);
    this.name = 'SettlementError';
  }
}
