/**
 * Ledger Store contract
 *
 * The store owns the only persisted state of the ledger: accounts and ledger
 * entries. Balances move only inside `withLockedAccounts`, through the unit of
 * work it hands out; everything else is read-only.
 */

import {
  Account,
  EntryKind,
  LedgerEntry,
  NewAccount,
  NewLedgerEntry,
  PartyRole,
  SortOrder,
} from '../types/ledger';

export interface EntryQuery {
  /** Entries sent or received by this account; all entries when omitted */
  accountId?: string;
  from?: Date;
  to?: Date;
  counterpartRole?: PartyRole;
  kind?: EntryKind;
  /** Exclusive entryId bound in the direction of `order` */
  cursor?: number;
  limit: number;
  order: SortOrder;
}

export interface AccountTotals {
  totalSent: number;
  totalReceived: number;
  entryCount: number;
  firstEntryAt: Date | null;
  lastEntryAt: Date | null;
}

export interface PlatformTotals {
  totalBalance: number;
  totalIssued: number;
  issuanceCount: number;
  transferCount: number;
  transferVolume: number;
}

export interface ResellerTotals {
  resellerId: string;
  balance: number;
  totalDistributed: number;
  transferCount: number;
  businessOwnerCount: number;
  businessOwnerBalance: number;
}

export interface LedgerReader {
  findAccount(accountId: string): Promise<Account | null>;
  listBusinessOwners(resellerId: string): Promise<Account[]>;
  findEntry(entryId: number): Promise<LedgerEntry | null>;
  findEntryByIdempotencyKey(key: string): Promise<LedgerEntry | null>;
  listEntries(query: EntryQuery): Promise<LedgerEntry[]>;
  accountTotals(accountId: string): Promise<AccountTotals>;
  platformTotals(): Promise<PlatformTotals>;
  resellerTotals(): Promise<ResellerTotals[]>;
}

/**
 * Balance store and entry log operations available inside one transfer unit.
 * Nothing done through it is visible to other readers until the unit commits.
 */
export interface LedgerUnitOfWork {
  getAccount(accountId: string): Promise<Account | null>;
  /** Balance as this unit sees it; null for an unknown account */
  getBalance(accountId: string): Promise<number | null>;
  findEntryByIdempotencyKey(key: string): Promise<LedgerEntry | null>;
  /** Returns the balance after the debit; rejects with InsufficientFunds */
  debit(accountId: string, amount: number): Promise<number>;
  /** Returns the balance after the credit; rejects with BalanceLimitExceeded past CREDIT_LIMIT */
  credit(accountId: string, amount: number): Promise<number>;
  /** Sum of every issuance, this unit's included */
  issuedTotal(): Promise<number>;
  append(entry: NewLedgerEntry): Promise<LedgerEntry>;
}

export interface LedgerStore extends LedgerReader {
  readonly driver: 'mongo' | 'memory';

  createAccount(input: NewAccount): Promise<Account>;
  setAccountActive(accountId: string, isActive: boolean): Promise<Account | null>;

  /**
   * Run `work` holding exclusive locks on every listed account, taken in
   * ascending id order. Commits when `work` resolves, rolls back when it
   * rejects. Lock waits past the configured timeout reject with
   * TransientStoreFailure.
   */
  withLockedAccounts<T>(
    accountIds: readonly string[],
    work: (unit: LedgerUnitOfWork) => Promise<T>
  ): Promise<T>;

  /**
   * Run read-only `work` against one consistent snapshot: every entry it sees
   * has its balance changes visible too, and vice versa.
   */
  readSnapshot<T>(work: (reader: LedgerReader) => Promise<T>): Promise<T>;

  isReady(): boolean;
}

/**
 * Ascending, de-duplicated lock order shared by every store
 */
export const lockOrder = (accountIds: readonly string[]): string[] =>
  [...new Set(accountIds)].sort();
