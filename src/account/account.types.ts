export interface Account {
  id: string;
  username: string;
  email: string;
  balance: number;
  /** Item ids, one entry per accepted bid. */
  bidHistory: string[];
  ownedItems: string[];
  soldItems: string[];
}

export type DebitResult =
  | { debited: true }
  | {
      debited: false;
      reason: 'INSUFFICIENT_FUNDS' | 'ACCOUNT_NOT_FOUND';
      message: string;
    };

/**
 * Moves money and ownership when an auction sells. The auction service
 * applies all four effects or compensates back to none.
 */
export interface SettlementLedger {
  debit(accountId: string, amount: number): DebitResult;
  credit(accountId: string, amount: number): void;
  recordOwnership(accountId: string, itemId: string): void;
  recordSale(accountId: string, itemId: string): void;
  revokeSale(accountId: string, itemId: string): void;
}

export const SETTLEMENT_LEDGER = Symbol('SETTLEMENT_LEDGER');
