import { Injectable, Logger } from '@nestjs/common';
import { DuplicateAuctionIdError } from '../common/errors';
import type { AuctionEngine } from './engine';

/**
 * One engine per auction id for the life of the process. Closed auctions
 * stay here for history queries.
 */
@Injectable()
export class AuctionRegistry {
  private readonly auctions = new Map<string, AuctionEngine>();
  private readonly logger = new Logger(AuctionRegistry.name);

  add(engine: AuctionEngine): void {
    if (this.auctions.has(engine.id)) {
      const err = new DuplicateAuctionIdError(engine.id);
      this.logger.error(err.message, err.stack);
      throw err;
    }
    this.auctions.set(engine.id, engine);
  }

  find(auctionId: string): AuctionEngine | null {
    return this.auctions.get(auctionId) ?? null;
  }

  /** Live view: evaluated against the clock on every call. */
  listActive(): AuctionEngine[] {
    return this.listAll().filter((engine) => engine.isActive());
  }

  listAll(): AuctionEngine[] {
    return [...this.auctions.values()];
  }

  listBySeller(sellerId: string): AuctionEngine[] {
    return this.listAll().filter((engine) => engine.sellerId === sellerId);
  }
}
