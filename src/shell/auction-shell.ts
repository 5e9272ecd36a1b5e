import { Injectable, Logger } from '@nestjs/common';
import { AccountService } from '../account/account.service';
import { AuctionService } from '../auction/auction.service';
import { rankBids, type AuctionState } from '../auction/engine';
import { SettlementError } from '../common/errors';
import { splitArgs } from './split-args';

export interface ShellReply {
  lines: string[];
  exit?: boolean;
}

type CommandHandler = (args: string[]) => Promise<string[]> | string[];

const TOP_BIDS_SHOWN = 5;

export const HELP_LINES = [
  'register <username> <email>',
  'login <username>',
  'logout',
  'create "<name>" "<description>" <startingPrice> <reservePrice> <minutes>',
  'bid <itemId> <amount>',
  'list',
  'show <itemId>',
  'profile',
  'end <itemId>',
  'deposit <amount>',
  'help',
  'exit',
];

const money = (amount: number): string => `$${amount}`;

/**
 * Line-oriented front end. Holds the logged-in identity for the session and
 * passes it explicitly to every core call.
 */
@Injectable()
export class AuctionShell {
  private readonly logger = new Logger(AuctionShell.name);
  private currentUserId: string | null = null;
  private readonly commands = new Map<string, CommandHandler>([
    ['register', (args) => this.register(args)],
    ['login', (args) => this.login(args)],
    ['logout', () => this.logout()],
    ['create', (args) => this.create(args)],
    ['bid', (args) => this.bid(args)],
    ['list', () => this.list()],
    ['show', (args) => this.show(args)],
    ['profile', () => this.profile()],
    ['end', (args) => this.end(args)],
    ['deposit', (args) => this.deposit(args)],
    ['help', () => HELP_LINES],
  ]);

  constructor(
    private readonly auctions: AuctionService,
    private readonly accounts: AccountService,
  ) {}

  async execute(line: string): Promise<ShellReply> {
    let tokens: string[];
    try {
      tokens = splitArgs(line);
    } catch (err) {
      return { lines: [err instanceof Error ? err.message : String(err)] };
    }
    const [name, ...args] = tokens;
    if (!name) return { lines: [] };
    if (name === 'exit' || name === 'quit') {
      return { lines: ['Goodbye!'], exit: true };
    }

    const handler = this.commands.get(name);
    if (!handler) {
      return { lines: [`Unknown command: ${name}. Type "help" for commands.`] };
    }
    try {
      return { lines: await handler(args) };
    } catch (err) {
      if (err instanceof SettlementError) return { lines: [err.message] };
      throw err;
    }
  }

  /* ------------------------------------------------------------------ */
  /*  SESSION                                                            */
  /* ------------------------------------------------------------------ */

  private register([username, email]: string[]): string[] {
    if (!username || !email) return ['Usage: register <username> <email>'];
    const result = this.accounts.register(username, email);
    if ('error' in result) return [result.error];
    return [`User registered successfully! User ID: ${result.id}`];
  }

  private login([username]: string[]): string[] {
    if (!username) return ['Usage: login <username>'];
    const account = this.accounts.findByUsername(username);
    if (!account) return ['User not found'];
    this.currentUserId = account.id;
    this.logger.debug(`Session bound to ${account.id}`);
    return [`Login successful! Welcome ${account.username}`];
  }

  private logout(): string[] {
    this.currentUserId = null;
    return ['Logged out successfully!'];
  }

  /* ------------------------------------------------------------------ */
  /*  AUCTIONS                                                           */
  /* ------------------------------------------------------------------ */

  private create(args: string[]): string[] {
    const userId = this.currentUserId;
    if (!userId) return ['Please login first!'];
    const [name, description, start, reserve, minutes] = args;
    if (
      name === undefined ||
      description === undefined ||
      start === undefined ||
      reserve === undefined ||
      minutes === undefined
    ) {
      return [
        'Usage: create "<name>" "<description>" <startingPrice> <reservePrice> <minutes>',
      ];
    }
    const result = this.auctions.createAuction(userId, {
      name,
      description,
      startingPrice: Number(start),
      reservePrice: Number(reserve),
      durationMinutes: Number(minutes),
    });
    if ('error' in result) return [result.error];
    return [`Auction created successfully! Item ID: ${result.id}`];
  }

  private async bid([itemId, rawAmount]: string[]): Promise<string[]> {
    const userId = this.currentUserId;
    if (!userId) return ['Please login first!'];
    if (!itemId || rawAmount === undefined) return ['Usage: bid <itemId> <amount>'];
    const amount = Number(rawAmount);
    if (!Number.isFinite(amount)) return [`Invalid amount: ${rawAmount}`];

    const result = await this.auctions.placeBid(itemId, userId, amount);
    if (!result.accepted) return [result.message];
    return [`Bid placed successfully! Current highest bid: ${money(result.amount)}`];
  }

  private list(): string[] {
    const active = this.auctions.listActive();
    if (active.length === 0) return ['No active auctions available.'];
    return active.map(
      (state) =>
        `ID: ${state.id} | ${state.item.name} | Current Price: ${money(state.currentPrice)} | Time Left: ${state.remainingSeconds}s`,
    );
  }

  private show([itemId]: string[]): string[] {
    if (!itemId) return ['Usage: show <itemId>'];
    const state = this.auctions.getState(itemId);
    if (!state) return ['Auction not found'];
    return describeAuction(state);
  }

  private async end([itemId]: string[]): Promise<string[]> {
    if (!itemId) return ['Usage: end <itemId>'];
    const result = await this.auctions.endAuction(itemId);
    if (!result.ended) return [result.message];

    const { outcome } = result;
    if (outcome.status === 'SOLD') {
      return [`Item sold to ${outcome.winnerId} for ${money(outcome.price)}`];
    }
    return outcome.reason === 'NO_BIDS'
      ? ['No bids were placed. Item remains unsold.']
      : ['Reserve price not met. Item remains unsold.'];
  }

  /* ------------------------------------------------------------------ */
  /*  ACCOUNT                                                            */
  /* ------------------------------------------------------------------ */

  private profile(): string[] {
    const userId = this.currentUserId;
    if (!userId) return ['Please login first!'];
    const account = this.accounts.findById(userId);
    if (!account) return ['User not found'];
    return [
      `Username: ${account.username}`,
      `Email: ${account.email}`,
      `Balance: ${money(account.balance)}`,
      `Bids Placed: ${account.bidHistory.length}`,
      `Items Owned: ${account.ownedItems.length}`,
      `Items Sold: ${account.soldItems.length}`,
      `Auctions Created: ${this.auctions.listBySeller(userId).length}`,
    ];
  }

  private deposit([rawAmount]: string[]): string[] {
    const userId = this.currentUserId;
    if (!userId) return ['Please login first!'];
    if (rawAmount === undefined) return ['Usage: deposit <amount>'];
    const result = this.accounts.deposit(userId, Number(rawAmount));
    if ('error' in result) return [result.error];
    return [`Balance added successfully! New balance: ${money(result.balance)}`];
  }
}

export function describeAuction(state: AuctionState): string[] {
  const { item } = state;
  const lines = [
    `Item: ${item.name} (ID: ${item.id})`,
    `Description: ${item.description}`,
    `Starting Price: ${money(item.startingPrice)}`,
    `Reserve Price: ${money(item.reservePrice)}`,
    `Current Price: ${money(state.currentPrice)}`,
    `Seller: ${item.sellerId}`,
    `Status: ${state.status}`,
    `Time Remaining: ${state.remainingSeconds} seconds`,
    `Reserve Met: ${state.reserveMet ? 'Yes' : 'No'}`,
    `Total Bids: ${state.bids.length}`,
  ];
  if (state.highestBid) {
    lines.push(`Highest Bidder: ${state.highestBid.bidderId}`);
  }
  for (const bid of rankBids(state.bids).slice(0, TOP_BIDS_SHOWN)) {
    lines.push(`  ${bid.bidderId}: ${money(bid.amount)}`);
  }
  return lines;
}
