import { Inject, Injectable, Logger } from '@nestjs/common';
import { AccountService } from '../account/account.service';
import {
  SETTLEMENT_LEDGER,
  type SettlementLedger,
} from '../account/account.types';
import { CLOCK, type Clock } from '../clock/clock';
import { SettlementError } from '../common/errors';
import { ID_GENERATOR, type IdGenerator } from '../ids/id-generator';
import { AuctionRegistry } from './auction.registry';
import { AuctionEngine, createItem } from './engine';
import type {
  AuctionState,
  BidRejectionReason,
  EndAuctionResult,
  SettlementOutcome,
} from './engine';

export interface CreateAuctionInput {
  name: string;
  description: string;
  startingPrice: number;
  reservePrice: number;
  durationMinutes: number;
}

export type PlaceBidOutcome =
  | { accepted: true; amount: number }
  | {
      accepted: false;
      reason:
        | BidRejectionReason
        | 'NOT_FOUND'
        | 'ACCOUNT_NOT_FOUND'
        | 'INSUFFICIENT_FUNDS';
      message: string;
    };

export type EndAuctionOutcome =
  | EndAuctionResult
  | { ended: false; reason: 'NOT_FOUND'; message: string };

const NOT_FOUND_MESSAGE = 'Auction not found';

@Injectable()
export class AuctionService {
  private readonly logger = new Logger(AuctionService.name);
  private readonly auctionLocks = new Map<string, Promise<void>>();

  constructor(
    private readonly registry: AuctionRegistry,
    private readonly accounts: AccountService,
    @Inject(SETTLEMENT_LEDGER) private readonly ledger: SettlementLedger,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(ID_GENERATOR) private readonly ids: IdGenerator,
  ) {}

  /* ------------------------------------------------------------------ */
  /*  PUBLIC API                                                         */
  /* ------------------------------------------------------------------ */

  /** Create auction: validate seller and input, build engine, register */
  createAuction(
    sellerId: string,
    input: CreateAuctionInput,
  ): AuctionState | { error: string } {
    if (!this.accounts.exists(sellerId)) {
      return { error: 'Seller not found. Register a user first.' };
    }
    const error = this.validateCreateInput(input);
    if (error) return { error };

    const item = createItem(
      {
        id: this.ids.next(),
        name: input.name.trim(),
        description: input.description.trim(),
        startingPrice: input.startingPrice,
        reservePrice: input.reservePrice,
        sellerId,
        durationMinutes: input.durationMinutes,
      },
      this.clock.now(),
    );
    const engine = new AuctionEngine(item, this.clock);
    this.registry.add(engine);

    this.logger.log(
      `Auction ${item.id} created by ${sellerId} (start ${item.startingPrice}, reserve ${item.reservePrice})`,
    );
    return engine.getState();
  }

  getState(auctionId: string): AuctionState | null {
    return this.registry.find(auctionId)?.getState() ?? null;
  }

  listActive(): AuctionState[] {
    return this.registry.listActive().map((engine) => engine.getState());
  }

  listBySeller(sellerId: string): AuctionState[] {
    return this.registry
      .listBySeller(sellerId)
      .map((engine) => engine.getState());
  }

  /**
   * Place bid: the account store gates on balance, the engine on its own
   * admission rules. Serialized per auction.
   */
  async placeBid(
    auctionId: string,
    bidderId: string,
    amount: number,
  ): Promise<PlaceBidOutcome> {
    return this.withAuctionLock<PlaceBidOutcome>(auctionId, async () => {
      const engine = this.registry.find(auctionId);
      if (!engine) {
        return { accepted: false, reason: 'NOT_FOUND', message: NOT_FOUND_MESSAGE };
      }

      const bidder = this.accounts.findById(bidderId);
      if (!bidder) {
        return {
          accepted: false,
          reason: 'ACCOUNT_NOT_FOUND',
          message: 'Bidder not found',
        };
      }
      if (!this.accounts.canAfford(bidderId, amount)) {
        return {
          accepted: false,
          reason: 'INSUFFICIENT_FUNDS',
          message: `Insufficient balance (${bidder.balance})`,
        };
      }

      const result = engine.placeBid(bidderId, amount);
      if (!result.accepted) {
        this.logger.debug(
          `Bid ${amount} by ${bidderId} on ${auctionId} rejected: ${result.reason}`,
        );
        return result;
      }

      this.accounts.recordBid(bidderId, auctionId);
      this.logger.log(`Bid ${amount} by ${bidderId} accepted on ${auctionId}`);
      return result;
    });
  }

  /**
   * End auction: close the engine, then settle a SOLD outcome. Calling it
   * again reports ALREADY_CLOSED and moves no money.
   */
  async endAuction(auctionId: string): Promise<EndAuctionOutcome> {
    return this.withAuctionLock<EndAuctionOutcome>(auctionId, async () => {
      const engine = this.registry.find(auctionId);
      if (!engine) {
        return { ended: false, reason: 'NOT_FOUND', message: NOT_FOUND_MESSAGE };
      }

      const result = engine.endAuction();
      if (!result.ended) return result;

      const { outcome } = result;
      if (outcome.status === 'SOLD') {
        try {
          this.settle(auctionId, outcome);
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          engine.markSettlementFailed(message);
          this.logger.error(
            `Auction ${auctionId} closed but not settled: ${message}`,
            err instanceof Error ? err.stack : undefined,
          );
          throw err;
        }
        this.logger.log(
          `Auction ${auctionId} sold to ${outcome.winnerId} for ${outcome.price}`,
        );
      } else {
        this.logger.log(`Auction ${auctionId} closed unsold (${outcome.reason})`);
      }
      return result;
    });
  }

  /* ------------------------------------------------------------------ */
  /*  INTERNAL                                                           */
  /* ------------------------------------------------------------------ */

  private validateCreateInput(input: CreateAuctionInput): string | null {
    if (!input.name.trim()) return 'Item name is required';
    if (!Number.isFinite(input.startingPrice) || input.startingPrice <= 0) {
      return 'Starting price must be positive';
    }
    if (!Number.isFinite(input.reservePrice) || input.reservePrice < 0) {
      return 'Reserve price cannot be negative';
    }
    if (
      !Number.isInteger(input.durationMinutes) ||
      input.durationMinutes <= 0
    ) {
      return 'Duration must be a positive number of minutes';
    }
    return null;
  }

  /**
   * Debit the winner first, then apply the remaining effects. If any of them
   * throws, every applied effect is undone in reverse order so the accounts
   * end up as they were before settlement.
   */
  private settle(
    auctionId: string,
    outcome: Extract<SettlementOutcome, { status: 'SOLD' }>,
  ): void {
    const { winnerId, sellerId, itemId, price } = outcome;
    const debit = this.ledger.debit(winnerId, price);
    if (!debit.debited) {
      throw new SettlementError(auctionId, debit.message);
    }

    const undo: Array<() => void> = [
      () => this.ledger.credit(winnerId, price),
    ];
    try {
      this.ledger.credit(sellerId, price);
      undo.push(() => {
        const reverted = this.ledger.debit(sellerId, price);
        if (!reverted.debited) throw new Error(reverted.message);
      });
      this.ledger.recordSale(sellerId, itemId);
      undo.push(() => this.ledger.revokeSale(sellerId, itemId));
      this.ledger.recordOwnership(winnerId, itemId);
    } catch (err) {
      this.rollback(auctionId, undo);
      const message = err instanceof Error ? err.message : String(err);
      throw new SettlementError(auctionId, message, { cause: err });
    }
  }

  private rollback(auctionId: string, undo: Array<() => void>): void {
    for (const step of undo.reverse()) {
      try {
        step();
      } catch (err) {
        this.logger.error(
          `Rollback step failed for auction ${auctionId}: ${err instanceof Error ? err.message : String(err)}`,
        );
      }
    }
  }

  private async withAuctionLock<T>(
    auctionId: string,
    fn: () => Promise<T>,
  ): Promise<T> {
    const prev = this.auctionLocks.get(auctionId) ?? Promise.resolve();
    let release!: () => void;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = prev.then(() => current);
    this.auctionLocks.set(auctionId, tail);

    await prev;
    try {
      return await fn();
    } finally {
      release();
      if (this.auctionLocks.get(auctionId) === tail) {
        this.auctionLocks.delete(auctionId);
      }
    }
  }
}
