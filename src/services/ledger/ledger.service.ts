/**
 * Ledger Entry Log reads
 *
 * Single entries, per-account history pages and the admin's platform-wide
 * listing. Pages are cut on the entryId
 * cursor, never on offsets: entries become visible in id order, so resuming
 * after the last seen id neither skips nor repeats an entry.
 */

import { config } from '../../config';
import { ApiError } from '../../middlewares/errorHandler';
import { getLedgerStore, LedgerStore } from '../../store';
import { Actor, EntryFilters, EntryPage, LedgerEntry, Role } from '../../types/ledger';
import { canViewAccount } from '../hierarchy';

export const resolvePageLimit = (limit: number | undefined): number => {
  if (limit === undefined) {
    return config.ledger.defaultPageLimit;
  }
  return Math.min(Math.max(limit, 1), config.ledger.maxPageLimit);
};

export class LedgerService {
  constructor(private readonly injected?: LedgerStore) {}

  private get store(): LedgerStore {
    return this.injected ?? getLedgerStore();
  }

  /**
   * Visible to admins and to both parties of the entry
   */
  async getEntry(actor: Actor, entryId: number): Promise<LedgerEntry> {
    const entry = await this.store.findEntry(entryId);
    if (!entry) {
      throw ApiError.notFound('Entry');
    }

    if (
      actor.role !== Role.ADMIN &&
      entry.fromAccountId !== actor.id &&
      entry.toAccountId !== actor.id
    ) {
      throw ApiError.forbidden('Not authorized to view this entry');
    }

    return entry;
  }

  async listForAccount(actor: Actor, accountId: string, filters: EntryFilters = {}): Promise<EntryPage> {
    const account = await this.store.findAccount(accountId);
    if (!account) {
      throw ApiError.notFound('Account');
    }

    if (!canViewAccount(actor, account)) {
      throw ApiError.forbidden('Not authorized to view this account');
    }

    return this.page(filters, accountId);
  }

  /**
   * Every entry on the platform (admin only). Without an account to look from,
   * `counterpartRole` matches entries where either party has that role.
   */
  async listAll(actor: Actor, filters: EntryFilters = {}): Promise<EntryPage> {
    if (actor.role !== Role.ADMIN) {
      throw ApiError.forbidden('Only admins can list all entries');
    }

    return this.page(filters);
  }

  private async page(filters: EntryFilters, accountId?: string): Promise<EntryPage> {
    const limit = resolvePageLimit(filters.limit);

    // One extra row tells whether another page exists
    const rows = await this.store.listEntries({
      accountId,
      from: filters.from,
      to: filters.to,
      counterpartRole: filters.counterpartRole,
      kind: filters.kind,
      cursor: filters.cursor,
      limit: limit + 1,
      order: filters.order ?? 'asc',
    });

    const entries = rows.slice(0, limit);
    const last = entries[entries.length - 1];

    return {
      entries,
      nextCursor: rows.length > limit && last ? last.entryId : null,
    };
  }
}

export const ledgerService = new LedgerService();
