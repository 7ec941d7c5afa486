/**
 * MongoDB Ledger Store
 *
 * Transfers run as multi-document transactions (replica set required).
 * Account documents are write-locked up front by bumping `lockVersion` in
 * ascending id order; a conflicting transaction gets a transient write
 * conflict and is retried until the lock is free or the lock timeout passes.
 *
 * Every transfer also increments the ledger entry counter, so two units that
 * both append are serialised on that document and commit in entryId order.
 * That counter write is also what serialises issuances: the system sentinel
 * has no account document to lock.
 */

import mongoose, { ClientSession, FilterQuery } from 'mongoose';

import { ApiError } from '../middlewares/errorHandler';
import {
  Account as AccountModel,
  Counter,
  IAccount,
  ILedgerEntry,
  LEDGER_ENTRY_SEQUENCE,
  LedgerEntry as LedgerEntryModel,
} from '../models';
import { createServiceLogger } from '../observability/logger';
import { lockTimeoutsTotal } from '../observability/metrics';
import {
  Account,
  CREDIT_LIMIT,
  EntryKind,
  LedgerEntry,
  NewAccount,
  NewLedgerEntry,
  Role,
} from '../types/ledger';

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

const log = createServiceLogger('mongo-store');

export interface MongoLedgerStoreOptions {
  /** Deadline for taking the account locks, write conflict retries included */
  lockTimeoutMs: number;
  maxCommitTimeMs: number;
}

const toAccount = (doc: IAccount): Account => {
  const base = {
    accountId: doc.accountId,
    name: doc.name ?? null,
    balance: doc.balance,
    isActive: doc.isActive,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };

  if (doc.role === Role.BUSINESS_OWNER && doc.owningResellerId) {
    return { ...base, role: Role.BUSINESS_OWNER, owningResellerId: doc.owningResellerId };
  }
  return { ...base, role: Role.RESELLER, owningResellerId: null };
};

const toEntry = (doc: ILedgerEntry): LedgerEntry => ({
  entryId: doc.entryId,
  kind: doc.kind,
  fromAccountId: doc.fromAccountId,
  toAccountId: doc.toAccountId,
  fromRole: doc.fromRole,
  toRole: doc.toRole,
  amount: doc.amount,
  fromBalanceAfter: doc.fromBalanceAfter ?? null,
  toBalanceAfter: doc.toBalanceAfter,
  note: doc.note ?? null,
  initiatedBy: doc.initiatedBy,
  idempotencyKey: doc.idempotencyKey ?? null,
  createdAt: doc.createdAt,
});

export const buildEntryFilter = (query: EntryQuery): FilterQuery<ILedgerEntry> => {
  const conditions: FilterQuery<ILedgerEntry>[] = [];
  const { accountId, counterpartRole } = query;

  if (accountId && counterpartRole) {
    conditions.push({
      $or: [
        { fromAccountId: accountId, toRole: counterpartRole },
        { toAccountId: accountId, fromRole: counterpartRole },
      ],
    });
  } else if (accountId) {
    conditions.push({ $or: [{ fromAccountId: accountId }, { toAccountId: accountId }] });
  } else if (counterpartRole) {
    conditions.push({ $or: [{ fromRole: counterpartRole }, { toRole: counterpartRole }] });
  }

  if (query.kind) {
    conditions.push({ kind: query.kind });
  }
  if (query.from) {
    conditions.push({ createdAt: { $gte: query.from } });
  }
  if (query.to) {
    conditions.push({ createdAt: { $lt: query.to } });
  }
  if (query.cursor !== undefined) {
    conditions.push({
      entryId: query.order === 'asc' ? { $gt: query.cursor } : { $lt: query.cursor },
    });
  }

  return conditions.length > 0 ? { $and: conditions } : {};
};

const hasKey = (value: unknown, key: string): boolean =>
  typeof value === 'object' && value !== null && key in value;

const hasErrorLabel = (error: unknown, label: string): boolean =>
  error instanceof mongoose.mongo.MongoError && error.hasErrorLabel(label);

/**
 * Map driver failures onto ledger errors. Duplicate keys become conflicts;
 * anything the driver labels retryable becomes TransientStoreFailure.
 */
export const translateStoreError = (error: unknown): Error => {
  if (error instanceof ApiError) {
    return error;
  }

  if (error instanceof mongoose.mongo.MongoServerError && error.code === 11000) {
    const keyPattern: unknown = error.keyPattern;
    if (hasKey(keyPattern, 'idempotencyKey')) {
      return ApiError.idempotencyConflict();
    }
    if (hasKey(keyPattern, 'accountId')) {
      return ApiError.alreadyExists('Account');
    }
  }

  if (
    error instanceof mongoose.mongo.MongoError &&
    (error.hasErrorLabel('TransientTransactionError') ||
      error.hasErrorLabel('UnknownTransactionCommitResult'))
  ) {
    return ApiError.transientStoreFailure();
  }

  if (
    error instanceof mongoose.mongo.MongoNetworkError ||
    error instanceof mongoose.mongo.MongoServerSelectionError
  ) {
    return ApiError.transientStoreFailure();
  }

  return error instanceof Error ? error : new Error(String(error));
};

class MongoLedgerReader implements LedgerReader {
  constructor(protected readonly session: ClientSession | null) {}

  async findAccount(accountId: string): Promise<Account | null> {
    const doc = await AccountModel.findOne({ accountId }).session(this.session);
    return doc ? toAccount(doc) : null;
  }

  async listBusinessOwners(resellerId: string): Promise<Account[]> {
    const docs = await AccountModel.find({
      role: Role.BUSINESS_OWNER,
      owningResellerId: resellerId,
    })
      .sort({ accountId: 1 })
      .session(this.session);
    return docs.map(toAccount);
  }

  async findEntry(entryId: number): Promise<LedgerEntry | null> {
    const doc = await LedgerEntryModel.findOne({ entryId }).session(this.session);
    return doc ? toEntry(doc) : null;
  }

  async findEntryByIdempotencyKey(key: string): Promise<LedgerEntry | null> {
    const doc = await LedgerEntryModel.findOne({ idempotencyKey: key }).session(this.session);
    return doc ? toEntry(doc) : null;
  }

  async listEntries(query: EntryQuery): Promise<LedgerEntry[]> {
    const docs = await LedgerEntryModel.find(buildEntryFilter(query))
      .sort({ entryId: query.order === 'asc' ? 1 : -1 })
      .limit(query.limit)
      .session(this.session);
    return docs.map(toEntry);
  }

  async accountTotals(accountId: string): Promise<AccountTotals> {
    const rows = await LedgerEntryModel.aggregate<{
      totalSent: number;
      totalReceived: number;
      entryCount: number;
      firstEntryAt: Date;
      lastEntryAt: Date;
    }>([
      { $match: { $or: [{ fromAccountId: accountId }, { toAccountId: accountId }] } },
      {
        $group: {
          _id: null,
          totalSent: {
            $sum: { $cond: [{ $eq: ['$fromAccountId', accountId] }, '$amount', 0] },
          },
          totalReceived: {
            $sum: { $cond: [{ $eq: ['$toAccountId', accountId] }, '$amount', 0] },
          },
          entryCount: { $sum: 1 },
          firstEntryAt: { $min: '$createdAt' },
          lastEntryAt: { $max: '$createdAt' },
        },
      },
    ]).session(this.session);

    const [row] = rows;
    if (!row) {
      return { totalSent: 0, totalReceived: 0, entryCount: 0, firstEntryAt: null, lastEntryAt: null };
    }

    return {
      totalSent: row.totalSent,
      totalReceived: row.totalReceived,
      entryCount: row.entryCount,
      firstEntryAt: row.firstEntryAt,
      lastEntryAt: row.lastEntryAt,
    };
  }

  async platformTotals(): Promise<PlatformTotals> {
    // Sequential: operations sharing a transaction session cannot overlap
    const balanceRows = await AccountModel.aggregate<{ total: number }>([
      { $group: { _id: null, total: { $sum: '$balance' } } },
    ]).session(this.session);

    const kindRows = await LedgerEntryModel.aggregate<{
      _id: EntryKind;
      volume: number;
      count: number;
    }>([{ $group: { _id: '$kind', volume: { $sum: '$amount' }, count: { $sum: 1 } } }]).session(
      this.session
    );

    const totals: PlatformTotals = {
      totalBalance: balanceRows[0]?.total ?? 0,
      totalIssued: 0,
      issuanceCount: 0,
      transferCount: 0,
      transferVolume: 0,
    };

    for (const row of kindRows) {
      if (row._id === EntryKind.ISSUANCE) {
        totals.totalIssued = row.volume;
        totals.issuanceCount = row.count;
      } else if (row._id === EntryKind.TRANSFER) {
        totals.transferVolume = row.volume;
        totals.transferCount = row.count;
      }
    }

    return totals;
  }

  async resellerTotals(): Promise<ResellerTotals[]> {
    const resellers = await AccountModel.find({ role: Role.RESELLER })
      .sort({ accountId: 1 })
      .session(this.session);

    const distributed = await LedgerEntryModel.aggregate<{
      _id: string;
      volume: number;
      count: number;
    }>([
      { $match: { kind: EntryKind.TRANSFER, fromRole: Role.RESELLER } },
      { $group: { _id: '$fromAccountId', volume: { $sum: '$amount' }, count: { $sum: 1 } } },
    ]).session(this.session);

    const owners = await AccountModel.aggregate<{ _id: string; count: number; balance: number }>([
      { $match: { role: Role.BUSINESS_OWNER } },
      {
        $group: {
          _id: '$owningResellerId',
          count: { $sum: 1 },
          balance: { $sum: '$balance' },
        },
      },
    ]).session(this.session);

    const distributedBy = new Map(distributed.map((row) => [row._id, row]));
    const ownersBy = new Map(owners.map((row) => [row._id, row]));

    return resellers.map((reseller) => ({
      resellerId: reseller.accountId,
      balance: reseller.balance,
      totalDistributed: distributedBy.get(reseller.accountId)?.volume ?? 0,
      transferCount: distributedBy.get(reseller.accountId)?.count ?? 0,
      businessOwnerCount: ownersBy.get(reseller.accountId)?.count ?? 0,
      businessOwnerBalance: ownersBy.get(reseller.accountId)?.balance ?? 0,
    }));
  }
}

class MongoUnitOfWork implements LedgerUnitOfWork {
  constructor(private readonly session: ClientSession) {}

  async getAccount(accountId: string): Promise<Account | null> {
    const doc = await AccountModel.findOne({ accountId }).session(this.session);
    return doc ? toAccount(doc) : null;
  }

  async getBalance(accountId: string): Promise<number | null> {
    const doc = await AccountModel.findOne({ accountId }, { balance: 1 }).session(this.session);
    return doc ? doc.balance : null;
  }

  async findEntryByIdempotencyKey(key: string): Promise<LedgerEntry | null> {
    const doc = await LedgerEntryModel.findOne({ idempotencyKey: key }).session(this.session);
    return doc ? toEntry(doc) : null;
  }

  async debit(accountId: string, amount: number): Promise<number> {
    const doc = await AccountModel.findOneAndUpdate(
      { accountId, balance: { $gte: amount } },
      { $inc: { balance: -amount } },
      { new: true, session: this.session }
    );

    if (!doc) {
      const exists = await AccountModel.exists({ accountId }).session(this.session);
      throw exists ? ApiError.insufficientFunds() : ApiError.notFound('Account');
    }

    return doc.balance;
  }

  async credit(accountId: string, amount: number): Promise<number> {
    const doc = await AccountModel.findOneAndUpdate(
      { accountId, balance: { $lte: CREDIT_LIMIT - amount } },
      { $inc: { balance: amount } },
      { new: true, session: this.session }
    );

    if (!doc) {
      const exists = await AccountModel.exists({ accountId }).session(this.session);
      throw exists ? ApiError.balanceLimitExceeded() : ApiError.notFound('Account');
    }

    return doc.balance;
  }

  async issuedTotal(): Promise<number> {
    const rows = await LedgerEntryModel.aggregate<{ total: number }>([
      { $match: { kind: EntryKind.ISSUANCE } },
      { $group: { _id: null, total: { $sum: '$amount' } } },
    ]).session(this.session);
    return rows[0]?.total ?? 0;
  }

  async append(entry: NewLedgerEntry): Promise<LedgerEntry> {
    const counter = await Counter.findOneAndUpdate(
      { _id: LEDGER_ENTRY_SEQUENCE },
      { $inc: { seq: 1 } },
      { new: true, upsert: true, session: this.session }
    );

    if (!counter) {
      throw ApiError.internal('Ledger entry sequence unavailable');
    }

    const [doc] = await LedgerEntryModel.create(
      [
        {
          ...entry,
          entryId: counter.seq,
          fromBalanceAfter: entry.fromBalanceAfter ?? undefined,
          note: entry.note ?? undefined,
          idempotencyKey: entry.idempotencyKey ?? undefined,
        },
      ],
      { session: this.session }
    );

    if (!doc) {
      throw ApiError.internal('Ledger entry was not written');
    }

    return toEntry(doc);
  }
}

export class MongoLedgerStore extends MongoLedgerReader implements LedgerStore {
  readonly driver = 'mongo' as const;

  constructor(private readonly options: MongoLedgerStoreOptions) {
    super(null);
  }

  async createAccount(input: NewAccount): Promise<Account> {
    try {
      const doc = await AccountModel.create({
        accountId: input.accountId,
        role: input.role,
        name: input.name ?? undefined,
        owningResellerId: input.owningResellerId ?? undefined,
      });
      return toAccount(doc);
    } catch (error) {
      throw translateStoreError(error);
    }
  }

  async setAccountActive(accountId: string, isActive: boolean): Promise<Account | null> {
    const doc = await AccountModel.findOneAndUpdate(
      { accountId },
      { $set: { isActive } },
      { new: true }
    );
    return doc ? toAccount(doc) : null;
  }

  async withLockedAccounts<T>(
    accountIds: readonly string[],
    work: (unit: LedgerUnitOfWork) => Promise<T>
  ): Promise<T> {
    const ids = lockOrder(accountIds);
    const { lockTimeoutMs } = this.options;
    const deadline = Date.now() + lockTimeoutMs;
    const session = await mongoose.startSession();

    try {
      for (;;) {
        session.startTransaction({
          readConcern: { level: 'snapshot' },
          writeConcern: { w: 'majority' },
          maxCommitTimeMS: this.options.maxCommitTimeMs,
        });

        try {
          for (const accountId of ids) {
            await AccountModel.updateOne(
              { accountId },
              { $inc: { lockVersion: 1 } },
              { session, timestamps: false }
            );
          }
          const result = await work(new MongoUnitOfWork(session));
          await this.commit(session, deadline);
          return result;
        } catch (error) {
          if (session.inTransaction()) {
            await session.abortTransaction();
          }
          if (!hasErrorLabel(error, 'TransientTransactionError')) {
            throw error;
          }
          if (Date.now() >= deadline) {
            lockTimeoutsTotal.inc();
            throw ApiError.transientStoreFailure(
              `Timed out after ${lockTimeoutMs}ms waiting for account locks`
            );
          }
          log.debug({ accountIds: ids }, 'Write conflict, retrying ledger transaction');
        }
      }
    } catch (error) {
      const translated = translateStoreError(error);
      if (!(translated instanceof ApiError)) {
        log.error({ err: error, accountIds: ids }, 'Ledger transaction failed');
      }
      throw translated;
    } finally {
      await session.endSession();
    }
  }

  /**
   * Commit, retrying while the outcome is unknown and the deadline allows
   */
  private async commit(session: ClientSession, deadline: number): Promise<void> {
    for (;;) {
      try {
        await session.commitTransaction();
        return;
      } catch (error) {
        if (!hasErrorLabel(error, 'UnknownTransactionCommitResult') || Date.now() >= deadline) {
          throw error;
        }
      }
    }
  }

  async readSnapshot<T>(work: (reader: LedgerReader) => Promise<T>): Promise<T> {
    try {
      return await mongoose.connection.transaction(
        (session) => work(new MongoLedgerReader(session)),
        { readConcern: { level: 'snapshot' } }
      );
    } catch (error) {
      throw translateStoreError(error);
    }
  }

  isReady(): boolean {
    return mongoose.connection.readyState === 1;
  }
}
