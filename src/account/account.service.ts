import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AccountNotFoundError } from '../common/errors';
import { ID_GENERATOR, type IdGenerator } from '../ids/id-generator';
import type { Account, DebitResult, SettlementLedger } from './account.types';

const DEFAULT_INITIAL_BALANCE = 1000;

@Injectable()
export class AccountService implements SettlementLedger {
  private readonly accounts = new Map<string, Account>();
  private readonly logger = new Logger(AccountService.name);
  private readonly initialBalance: number;

  constructor(
    config: ConfigService,
    @Inject(ID_GENERATOR) private readonly ids: IdGenerator,
  ) {
    this.initialBalance =
      config.get<number>('accounts.initialBalance') ?? DEFAULT_INITIAL_BALANCE;
  }

  register(
    username: string,
    email: string,
    initialBalance = this.initialBalance,
  ): Account | { error: string } {
    const name = username.trim();
    if (!name) return { error: 'Username is required' };
    if (this.findByUsername(name)) return { error: 'Username already exists' };
    if (!(initialBalance >= 0)) {
      return { error: 'Initial balance cannot be negative' };
    }

    const account: Account = {
      id: this.ids.next(),
      username: name,
      email: email.trim(),
      balance: initialBalance,
      bidHistory: [],
      ownedItems: [],
      soldItems: [],
    };
    this.accounts.set(account.id, account);
    this.logger.log(`Registered ${account.username} as ${account.id}`);
    return this.copy(account);
  }

  findById(id: string): Account | null {
    const account = this.accounts.get(id);
    return account ? this.copy(account) : null;
  }

  findByUsername(username: string): Account | null {
    for (const account of this.accounts.values()) {
      if (account.username === username) return this.copy(account);
    }
    return null;
  }

  exists(id: string): boolean {
    return this.accounts.has(id);
  }

  canAfford(id: string, amount: number): boolean {
    const account = this.accounts.get(id);
    return account !== undefined && account.balance >= amount;
  }

  recordBid(id: string, itemId: string): void {
    this.require(id).bidHistory.push(itemId);
  }

  deposit(id: string, amount: number): Account | { error: string } {
    const account = this.accounts.get(id);
    if (!account) return { error: 'Account not found' };
    if (!Number.isFinite(amount) || amount <= 0) {
      return { error: 'Deposit amount must be positive' };
    }
    account.balance += amount;
    return this.copy(account);
  }

  /* ------------------------------------------------------------------ */
  /*  SETTLEMENT LEDGER                                                  */
  /* ------------------------------------------------------------------ */

  debit(accountId: string, amount: number): DebitResult {
    const account = this.accounts.get(accountId);
    if (!account) {
      return {
        debited: false,
        reason: 'ACCOUNT_NOT_FOUND',
        message: `Account not found: ${accountId}`,
      };
    }
    if (account.balance < amount) {
      return {
        debited: false,
        reason: 'INSUFFICIENT_FUNDS',
        message: `Insufficient balance (${account.balance} < ${amount})`,
      };
    }
    account.balance -= amount;
    return { debited: true };
  }

  credit(accountId: string, amount: number): void {
    this.require(accountId).balance += amount;
  }

  recordOwnership(accountId: string, itemId: string): void {
    this.require(accountId).ownedItems.push(itemId);
  }

  recordSale(accountId: string, itemId: string): void {
    this.require(accountId).soldItems.push(itemId);
  }

  revokeSale(accountId: string, itemId: string): void {
    removeLast(this.require(accountId).soldItems, itemId);
  }

  private require(id: string): Account {
    const account = this.accounts.get(id);
    if (!account) throw new AccountNotFoundError(id);
    return account;
  }

  private copy(account: Account): Account {
    return {
      ...account,
      bidHistory: [...account.bidHistory],
      ownedItems: [...account.ownedItems],
      soldItems: [...account.soldItems],
    };
  }
}

function removeLast(list: string[], value: string): void {
  const index = list.lastIndexOf(value);
  if (index >= 0) list.splice(index, 1);
}
