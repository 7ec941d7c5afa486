/**
 * In-process Ledger Store
 *
 * Keeps accounts and entries in memory for single-instance deployments
 * (LEDGER_STORE=memory) and for tests. A transfer unit stages its balance
 * changes and entries, then applies them in one synchronous step, so a reader
 * never observes half of a unit.
 *
 * Entry ids are handed out under a commit-order lock held from `append` until
 * the unit settles; entries therefore become visible strictly in id order and
 * an entryId cursor never skips a late commit.
 */

import { ApiError } from '../middlewares/errorHandler';
import { lockTimeoutsTotal } from '../observability/metrics';
import {
  Account,
  CREDIT_LIMIT,
  EntryKind,
  LedgerEntry,
  NewAccount,
  Role,
} from '../types/ledger';

import { KeyedLock, LockTimeoutError, ReleaseLock } from './keyedLock';
import {
  AccountTotals,
  EntryQuery,
  LedgerReader,
  LedgerStore,
  LedgerUnitOfWork,
  PlatformTotals,
  ResellerTotals,
  lockOrder,
} from './ledger.store';

export interface MemoryLedgerStoreOptions {
  lockTimeoutMs: number;
}

interface StagedWrites {
  balances: Map<string, number>;
  entries: LedgerEntry[];
  releaseCommitTurn: ReleaseLock | null;
}

const COMMIT_ORDER_KEY = 'commit-order';

const cloneAccount = (account: Account): Account => ({
  ...account,
  createdAt: new Date(account.createdAt),
  updatedAt: new Date(account.updatedAt),
});

const cloneEntry = (entry: LedgerEntry): LedgerEntry => ({
  ...entry,
  createdAt: new Date(entry.createdAt),
});

const matchesQuery = (entry: LedgerEntry, query: EntryQuery): boolean => {
  const { accountId, counterpartRole } = query;

  if (accountId) {
    const sent = entry.fromAccountId === accountId;
    const received = entry.toAccountId === accountId;
    if (!sent && !received) return false;
    if (
      counterpartRole &&
      !((sent && entry.toRole === counterpartRole) || (received && entry.fromRole === counterpartRole))
    ) {
      return false;
    }
  } else if (
    counterpartRole &&
    entry.fromRole !== counterpartRole &&
    entry.toRole !== counterpartRole
  ) {
    return false;
  }

  if (query.kind && entry.kind !== query.kind) return false;
  if (query.from && entry.createdAt < query.from) return false;
  if (query.to && entry.createdAt >= query.to) return false;

  if (query.cursor !== undefined) {
    if (query.order === 'asc' && entry.entryId <= query.cursor) return false;
    if (query.order === 'desc' && entry.entryId >= query.cursor) return false;
  }

  return true;
};

/**
 * Read-only view over one state of the store. Account objects are replaced,
 * never mutated, and entries only grow, so copies of the map and array freeze
 * a snapshot.
 */
class MemoryLedgerView implements LedgerReader {
  constructor(
    private readonly accounts: ReadonlyMap<string, Account>,
    private readonly entries: readonly LedgerEntry[]
  ) {}

  async findAccount(accountId: string): Promise<Account | null> {
    const account = this.accounts.get(accountId);
    return account ? cloneAccount(account) : null;
  }

  async listBusinessOwners(resellerId: string): Promise<Account[]> {
    return [...this.accounts.values()]
      .filter(
        (account) =>
          account.role === Role.BUSINESS_OWNER && account.owningResellerId === resellerId
      )
      .sort((a, b) => a.accountId.localeCompare(b.accountId))
      .map(cloneAccount);
  }

  async findEntry(entryId: number): Promise<LedgerEntry | null> {
    const entry = this.entries.find((candidate) => candidate.entryId === entryId);
    return entry ? cloneEntry(entry) : null;
  }

  async findEntryByIdempotencyKey(key: string): Promise<LedgerEntry | null> {
    const entry = this.entries.find((candidate) => candidate.idempotencyKey === key);
    return entry ? cloneEntry(entry) : null;
  }

  async listEntries(query: EntryQuery): Promise<LedgerEntry[]> {
    const ordered = query.order === 'asc' ? this.entries : [...this.entries].reverse();
    const page: LedgerEntry[] = [];

    for (const entry of ordered) {
      if (page.length >= query.limit) break;
      if (matchesQuery(entry, query)) {
        page.push(cloneEntry(entry));
      }
    }

    return page;
  }

  async accountTotals(accountId: string): Promise<AccountTotals> {
    const totals: AccountTotals = {
      totalSent: 0,
      totalReceived: 0,
      entryCount: 0,
      firstEntryAt: null,
      lastEntryAt: null,
    };

    for (const entry of this.entries) {
      const sent = entry.fromAccountId === accountId;
      const received = entry.toAccountId === accountId;
      if (!sent && !received) continue;

      if (sent) totals.totalSent += entry.amount;
      if (received) totals.totalReceived += entry.amount;
      totals.entryCount += 1;
      totals.firstEntryAt ??= new Date(entry.createdAt);
      totals.lastEntryAt = new Date(entry.createdAt);
    }

    return totals;
  }

  async platformTotals(): Promise<PlatformTotals> {
    const totals: PlatformTotals = {
      totalBalance: 0,
      totalIssued: 0,
      issuanceCount: 0,
      transferCount: 0,
      transferVolume: 0,
    };

    for (const account of this.accounts.values()) {
      totals.totalBalance += account.balance;
    }

    for (const entry of this.entries) {
      if (entry.kind === EntryKind.ISSUANCE) {
        totals.totalIssued += entry.amount;
        totals.issuanceCount += 1;
      } else {
        totals.transferVolume += entry.amount;
        totals.transferCount += 1;
      }
    }

    return totals;
  }

  async resellerTotals(): Promise<ResellerTotals[]> {
    const rows = new Map<string, ResellerTotals>();

    const resellers = [...this.accounts.values()]
      .filter((account) => account.role === Role.RESELLER)
      .sort((a, b) => a.accountId.localeCompare(b.accountId));

    for (const reseller of resellers) {
      rows.set(reseller.accountId, {
        resellerId: reseller.accountId,
        balance: reseller.balance,
        totalDistributed: 0,
        transferCount: 0,
        businessOwnerCount: 0,
        businessOwnerBalance: 0,
      });
    }

    for (const account of this.accounts.values()) {
      if (account.role !== Role.BUSINESS_OWNER) continue;
      const row = rows.get(account.owningResellerId);
      if (!row) continue;
      row.businessOwnerCount += 1;
      row.businessOwnerBalance += account.balance;
    }

    for (const entry of this.entries) {
      if (entry.kind !== EntryKind.TRANSFER) continue;
      const row = rows.get(entry.fromAccountId);
      if (!row) continue;
      row.totalDistributed += entry.amount;
      row.transferCount += 1;
    }

    return [...rows.values()];
  }
}

export class MemoryLedgerStore implements LedgerStore {
  readonly driver = 'memory' as const;

  private accounts = new Map<string, Account>();
  private entries: LedgerEntry[] = [];
  private idempotencyKeys = new Set<string>();
  private sequence = 0;
  private readonly locks = new KeyedLock();

  constructor(private readonly options: MemoryLedgerStoreOptions) {}

  private view(): MemoryLedgerView {
    return new MemoryLedgerView(this.accounts, this.entries);
  }

  findAccount(accountId: string): Promise<Account | null> {
    return this.view().findAccount(accountId);
  }

  listBusinessOwners(resellerId: string): Promise<Account[]> {
    return this.view().listBusinessOwners(resellerId);
  }

  findEntry(entryId: number): Promise<LedgerEntry | null> {
    return this.view().findEntry(entryId);
  }

  findEntryByIdempotencyKey(key: string): Promise<LedgerEntry | null> {
    return this.view().findEntryByIdempotencyKey(key);
  }

  listEntries(query: EntryQuery): Promise<LedgerEntry[]> {
    return this.view().listEntries(query);
  }

  accountTotals(accountId: string): Promise<AccountTotals> {
    return this.view().accountTotals(accountId);
  }

  platformTotals(): Promise<PlatformTotals> {
    return this.view().platformTotals();
  }

  resellerTotals(): Promise<ResellerTotals[]> {
    return this.view().resellerTotals();
  }

  async createAccount(input: NewAccount): Promise<Account> {
    if (this.accounts.has(input.accountId)) {
      throw ApiError.alreadyExists('Account');
    }

    const now = new Date();
    const base = {
      accountId: input.accountId,
      name: input.name,
      balance: 0,
      isActive: true,
      createdAt: now,
      updatedAt: now,
    };

    let account: Account;
    if (input.role === Role.BUSINESS_OWNER) {
      if (!input.owningResellerId) {
        throw ApiError.validationError('Business owner accounts need an owning reseller');
      }
      account = { ...base, role: Role.BUSINESS_OWNER, owningResellerId: input.owningResellerId };
    } else {
      account = { ...base, role: Role.RESELLER, owningResellerId: null };
    }

    this.accounts.set(account.accountId, account);
    return cloneAccount(account);
  }

  async setAccountActive(accountId: string, isActive: boolean): Promise<Account | null> {
    const account = this.accounts.get(accountId);
    if (!account) {
      return null;
    }

    const updated: Account = { ...account, isActive, updatedAt: new Date() };
    this.accounts.set(accountId, updated);
    return cloneAccount(updated);
  }

  async withLockedAccounts<T>(
    accountIds: readonly string[],
    work: (unit: LedgerUnitOfWork) => Promise<T>
  ): Promise<T> {
    const ids = lockOrder(accountIds);
    const held: ReleaseLock[] = [];
    const staged: StagedWrites = { balances: new Map(), entries: [], releaseCommitTurn: null };

    try {
      for (const accountId of ids) {
        held.push(await this.acquire(`account:${accountId}`));
      }

      const result = await work(this.createUnit(new Set(ids), staged));
      this.commit(staged);
      return result;
    } catch (error) {
      if (error instanceof LockTimeoutError) {
        lockTimeoutsTotal.inc();
        throw ApiError.transientStoreFailure(error.message);
      }
      throw error;
    } finally {
      staged.releaseCommitTurn?.();
      held.reverse().forEach((release) => release());
    }
  }

  async readSnapshot<T>(work: (reader: LedgerReader) => Promise<T>): Promise<T> {
    return work(new MemoryLedgerView(new Map(this.accounts), [...this.entries]));
  }

  isReady(): boolean {
    return true;
  }

  private acquire(key: string): Promise<ReleaseLock> {
    return this.locks.acquire(key, this.options.lockTimeoutMs);
  }

  private createUnit(locked: ReadonlySet<string>, staged: StagedWrites): LedgerUnitOfWork {
    const current = (accountId: string): Account | null => {
      const account = this.accounts.get(accountId);
      if (!account) return null;
      const balance = staged.balances.get(accountId);
      return balance === undefined ? account : { ...account, balance };
    };

    const lockedAccount = (accountId: string): Account => {
      if (!locked.has(accountId)) {
        throw ApiError.internal(`Account ${accountId} is not locked by this transfer unit`);
      }
      const account = current(accountId);
      if (!account) {
        throw ApiError.notFound('Account');
      }
      return account;
    };

    const keyTaken = (key: string): boolean =>
      this.idempotencyKeys.has(key) || staged.entries.some((entry) => entry.idempotencyKey === key);

    return {
      getAccount: async (accountId) => {
        const account = current(accountId);
        return account ? cloneAccount(account) : null;
      },

      getBalance: async (accountId) => current(accountId)?.balance ?? null,

      findEntryByIdempotencyKey: async (key) => {
        const entry =
          staged.entries.find((candidate) => candidate.idempotencyKey === key) ??
          this.entries.find((candidate) => candidate.idempotencyKey === key);
        return entry ? cloneEntry(entry) : null;
      },

      debit: async (accountId, amount) => {
        const account = lockedAccount(accountId);
        if (amount > account.balance) {
          throw ApiError.insufficientFunds();
        }
        const balance = account.balance - amount;
        staged.balances.set(accountId, balance);
        return balance;
      },

      credit: async (accountId, amount) => {
        const account = lockedAccount(accountId);
        if (amount > CREDIT_LIMIT - account.balance) {
          throw ApiError.balanceLimitExceeded();
        }
        const balance = account.balance + amount;
        staged.balances.set(accountId, balance);
        return balance;
      },

      issuedTotal: async () =>
        [...this.entries, ...staged.entries]
          .filter((entry) => entry.kind === EntryKind.ISSUANCE)
          .reduce((total, entry) => total + entry.amount, 0),

      append: async (entry) => {
        if (!staged.releaseCommitTurn) {
          staged.releaseCommitTurn = await this.acquire(COMMIT_ORDER_KEY);
        }

        if (entry.idempotencyKey && keyTaken(entry.idempotencyKey)) {
          throw ApiError.idempotencyConflict();
        }

        this.sequence += 1;
        const appended: LedgerEntry = { ...entry, entryId: this.sequence, createdAt: new Date() };
        staged.entries.push(appended);
        return cloneEntry(appended);
      },
    };
  }

  private commit(staged: StagedWrites): void {
    const now = new Date();

    for (const [accountId, balance] of staged.balances) {
      const account = this.accounts.get(accountId);
      if (account) {
        this.accounts.set(accountId, { ...account, balance, updatedAt: now });
      }
    }

    for (const entry of staged.entries) {
      this.entries.push(entry);
      if (entry.idempotencyKey) {
        this.idempotencyKeys.add(entry.idempotencyKey);
      }
    }
  }
}
