/**
 * Concurrent transfer tests
 *
 * Interleaved transfer units against one store must never overdraw, lose an
 * update or break the reconciliation identity.
 */

import { ledgerService } from '../../../src/services/ledger';
import { statsService } from '../../../src/services/stats';
import { transferService } from '../../../src/services/transfer';
import { MemoryLedgerStore } from '../../../src/store';
import { ApiError } from '../../../src/middlewares/errorHandler';
import { ErrorCode } from '../../../src/types/errors';
import {
  adminActor,
  balanceOf,
  createBusinessOwner,
  createReseller,
  fundReseller,
  resellerActor,
  useFreshStore,
} from '../../helpers';

/**
 * Small seeded generator so a failing run can be replayed
 */
const seededRandom = (seed: number): (() => number) => {
  let state = seed;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

const errorCodeOf = (reason: unknown): ErrorCode | undefined =>
  reason instanceof ApiError ? reason.errorCode : undefined;

describe('Concurrent transfers', () => {
  let store: MemoryLedgerStore;
  const r1 = resellerActor('r1');

  beforeEach(async () => {
    store = useFreshStore();
    await createReseller(store, 'r1');
    await createBusinessOwner(store, 'b1', 'r1');
    await createBusinessOwner(store, 'b2', 'r1');
  });

  it('should let exactly one of two overdrawing transfers through', async () => {
    await fundReseller('r1', 100);

    const results = await Promise.allSettled([
      transferService.transfer(r1, { fromAccountId: 'r1', toAccountId: 'b1', amount: 60 }),
      transferService.transfer(r1, { fromAccountId: 'r1', toAccountId: 'b2', amount: 60 }),
    ]);

    const fulfilled = results.filter((result) => result.status === 'fulfilled');
    const rejected = results.flatMap((result) => (result.status === 'rejected' ? [result.reason] : []));

    expect(fulfilled).toHaveLength(1);
    expect(rejected.map(errorCodeOf)).toEqual([ErrorCode.INSUFFICIENT_FUNDS]);
    expect(await balanceOf(store, 'r1')).toBe(40);
    expect((await balanceOf(store, 'b1')) + (await balanceOf(store, 'b2'))).toBe(60);
  });

  it('should not lose updates under many parallel transfers', async () => {
    await fundReseller('r1', 1000);

    const results = await Promise.all(
      Array.from({ length: 20 }, (_, index) =>
        transferService.transfer(r1, {
          fromAccountId: 'r1',
          toAccountId: index % 2 === 0 ? 'b1' : 'b2',
          amount: 10,
        })
      )
    );

    const ids = results.map((result) => result.entry.entryId).sort((a, b) => a - b);
    expect(ids).toEqual(Array.from({ length: 20 }, (_, index) => index + 2));
    expect(await balanceOf(store, 'r1')).toBe(800);
    expect(await balanceOf(store, 'b1')).toBe(100);
    expect(await balanceOf(store, 'b2')).toBe(100);

    const debits = results.map((result) => result.entry.fromBalanceAfter).sort((a, b) => (b ?? 0) - (a ?? 0));
    expect(debits).toEqual(Array.from({ length: 20 }, (_, index) => 990 - index * 10));
  });

  it('should page the full history without gaps while transfers commit', async () => {
    await fundReseller('r1', 1000);
    for (let i = 0; i < 4; i += 1) {
      await transferService.transfer(r1, { fromAccountId: 'r1', toAccountId: 'b1', amount: 5 });
    }

    const inFlight = Promise.all(
      Array.from({ length: 6 }, () =>
        transferService.transfer(r1, { fromAccountId: 'r1', toAccountId: 'b2', amount: 5 })
      )
    );

    const seen: number[] = [];
    let cursor: number | undefined;
    for (;;) {
      const page = await ledgerService.listForAccount(adminActor, 'r1', { limit: 2, cursor });
      seen.push(...page.entries.map((entry) => entry.entryId));
      if (page.nextCursor === null) break;
      cursor = page.nextCursor;
    }

    await inFlight;

    const rest = await ledgerService.listForAccount(adminActor, 'r1', {
      cursor: seen[seen.length - 1],
      limit: 100,
    });
    seen.push(...rest.entries.map((entry) => entry.entryId));

    const all = await store.listEntries({ accountId: 'r1', limit: 100, order: 'asc' });
    expect(seen).toEqual(all.map((entry) => entry.entryId));
    expect(seen).toHaveLength(11);
  });

  it('should keep every account reconciled under a random workload', async () => {
    const random = seededRandom(20240611);
    const resellers = ['r1', 'r2', 'r3'];
    await createReseller(store, 'r2');
    await createReseller(store, 'r3');
    await createBusinessOwner(store, 'b3', 'r2');
    await createBusinessOwner(store, 'b4', 'r2');
    await createBusinessOwner(store, 'b5', 'r3');
    await createBusinessOwner(store, 'b6', 'r3');
    const owners = ['b1', 'b2', 'b3', 'b4', 'b5', 'b6'];

    await fundReseller('r1', 1000);
    await fundReseller('r2', 2000);
    await fundReseller('r3', 3000);

    let committed = 0;
    for (let round = 0; round < 10; round += 1) {
      const batch = Array.from({ length: 20 }, () => {
        const from = resellers[Math.floor(random() * resellers.length)];
        const to = owners[Math.floor(random() * owners.length)];
        const amount = 1 + Math.floor(random() * 400);
        return transferService.transfer(resellerActor(from), {
          fromAccountId: from,
          toAccountId: to,
          amount,
        });
      });

      for (const result of await Promise.allSettled(batch)) {
        if (result.status === 'fulfilled') {
          committed += 1;
        } else {
          expect([ErrorCode.INSUFFICIENT_FUNDS, ErrorCode.POLICY_VIOLATION]).toContain(
            errorCodeOf(result.reason)
          );
        }
      }
    }

    for (const accountId of [...resellers, ...owners]) {
      const reconciliation = await statsService.reconcileAccount(adminActor, accountId);
      expect(reconciliation.balance).toBeGreaterThanOrEqual(0);
      expect(reconciliation.consistent).toBe(true);
    }

    const summary = await statsService.platformSummary(adminActor);
    expect(summary.totalIssued).toBe(6000);
    expect(summary.totalInCirculation).toBe(6000);
    expect(summary.totalTransfers).toBe(committed);
    expect(committed).toBeGreaterThan(0);
  });
});
