/**
 * Aggregation Service
 *
 * Read-only statistics over accounts and the entry log. Every call runs in
 * one store snapshot and recomputes from stored state; nothing is cached.
 */

import { ApiError } from '../../middlewares/errorHandler';
import { getLedgerStore, LedgerReader, LedgerStore, ResellerTotals } from '../../store';
import { Account, AccountRole, Actor, Role } from '../../types/ledger';
import { canViewAccount } from '../hierarchy';

export interface AccountStats {
  accountId: string;
  role: AccountRole;
  totalSent: number;
  totalReceived: number;
  currentBalance: number;
  entryCount: number;
  firstEntryAt: Date | null;
  lastEntryAt: Date | null;
}

export interface PlatformSummary {
  totalInCirculation: number;
  totalIssued: number;
  totalTransfers: number;
  totalVolume: number;
  averageTransfer: number;
  perResellerBreakdown: ResellerTotals[];
}

export interface AccountReconciliation {
  accountId: string;
  balance: number;
  ledgerNet: number;
  consistent: boolean;
}

const roundTo2 = (value: number): number => Math.round(value * 100) / 100;

const findVisibleAccount = async (
  reader: LedgerReader,
  actor: Actor,
  accountId: string
): Promise<Account> => {
  const account = await reader.findAccount(accountId);
  if (!account) {
    throw ApiError.notFound('Account');
  }
  if (!canViewAccount(actor, account)) {
    throw ApiError.forbidden('Not authorized to view this account');
  }
  return account;
};

export class StatsService {
  constructor(private readonly injected?: LedgerStore) {}

  private get store(): LedgerStore {
    return this.injected ?? getLedgerStore();
  }

  async statsForAccount(actor: Actor, accountId: string): Promise<AccountStats> {
    return this.store.readSnapshot(async (reader) => {
      const account = await findVisibleAccount(reader, actor, accountId);
      const totals = await reader.accountTotals(accountId);

      return {
        accountId: account.accountId,
        role: account.role,
        totalSent: totals.totalSent,
        totalReceived: totals.totalReceived,
        currentBalance: account.balance,
        entryCount: totals.entryCount,
        firstEntryAt: totals.firstEntryAt,
        lastEntryAt: totals.lastEntryAt,
      };
    });
  }

  /**
   * Platform-wide totals. Credits only enter through issuance, so
   * totalInCirculation equals totalIssued while the ledger is consistent.
   */
  async platformSummary(actor: Actor): Promise<PlatformSummary> {
    if (actor.role !== Role.ADMIN) {
      throw ApiError.forbidden('Only admins can view the platform summary');
    }

    return this.store.readSnapshot(async (reader) => {
      const totals = await reader.platformTotals();
      const perResellerBreakdown = await reader.resellerTotals();

      return {
        totalInCirculation: totals.totalBalance,
        totalIssued: totals.totalIssued,
        totalTransfers: totals.transferCount,
        totalVolume: totals.transferVolume,
        averageTransfer:
          totals.transferCount > 0 ? roundTo2(totals.transferVolume / totals.transferCount) : 0,
        perResellerBreakdown,
      };
    });
  }

  /**
   * Compare the stored balance with Σ received − Σ sent over the account's entries
   */
  async reconcileAccount(actor: Actor, accountId: string): Promise<AccountReconciliation> {
    if (actor.role !== Role.ADMIN) {
      throw ApiError.forbidden('Only admins can reconcile accounts');
    }

    return this.store.readSnapshot(async (reader) => {
      const account = await findVisibleAccount(reader, actor, accountId);
      const totals = await reader.accountTotals(accountId);
      const ledgerNet = totals.totalReceived - totals.totalSent;

      return {
        accountId,
        balance: account.balance,
        ledgerNet,
        consistent: ledgerNet === account.balance,
      };
    });
  }
}

export const statsService = new StatsService();
