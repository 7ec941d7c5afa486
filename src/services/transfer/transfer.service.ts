/**
 * Transfer Engine
 *
 * Validates and executes one credit movement as one atomic unit:
 * debit the sender, credit the receiver and append the ledger entry, all
 * inside the store's locked scope. Any failure after the debit rolls the
 * whole unit back.
 *
 * Validation order (first failure wins):
 *   1. amount is a positive safe integer        → InvalidAmount
 *   2. both accounts exist and are active       → AccountNotFound
 *   3. hierarchy policy                         → PolicyViolation
 *   4. sender balance covers the amount         → InsufficientFunds
 *   5. receiver balance and total issuance stay
 *      within CREDIT_LIMIT                      → BalanceLimitExceeded
 * Steps 2-5 run after the account locks are held. Issuance also locks the
 * system sentinel, so concurrent issuances read each other's totals.
 */

import { ApiError } from '../../middlewares/errorHandler';
import { addLogContext } from '../../observability/log-context';
import { createServiceLogger } from '../../observability/logger';
import {
  entriesAppendedTotal,
  transferAmount,
  transferDuration,
  transfersTotal,
} from '../../observability/metrics';
import { getLedgerStore, LedgerStore, LedgerUnitOfWork } from '../../store';
import {
  Account,
  Actor,
  CREDIT_LIMIT,
  EntryKind,
  LedgerEntry,
  SYSTEM_ACCOUNT_ID,
  SYSTEM_ROLE,
} from '../../types/ledger';
import {
  PolicyDecision,
  authorizeIssuance,
  authorizeTransfer,
  overrideNote,
} from '../hierarchy';

import { FailureStage, transferSimulation } from './transfer.simulation';
import { TransferStatus, validateTransition } from './transfer.state';

const log = createServiceLogger('transfer-engine');

export interface TransferRequest {
  fromAccountId: string;
  toAccountId: string;
  amount: number;
  note?: string | null;
  idempotencyKey?: string | null;
}

export interface IssuanceRequest {
  toAccountId: string;
  amount: number;
  note?: string | null;
  idempotencyKey?: string | null;
}

export interface TransferResult {
  entry: LedgerEntry;
  replayed: boolean;
}

interface Movement {
  kind: EntryKind;
  fromAccountId: string;
  toAccountId: string;
  amount: number;
  note: string | null;
  /** Caller key scoped to the sending party */
  scopedKey: string | null;
}

export const isValidAmount = (amount: unknown): amount is number =>
  typeof amount === 'number' && Number.isSafeInteger(amount) && amount > 0;

const normalizeNote = (note: string | null | undefined): string | null => {
  const trimmed = note?.trim();
  return trimmed ? trimmed : null;
};

/**
 * Tracks one unit through REQUESTED → VALIDATED → COMMITTED and its
 * REJECTED / ABORTED exits.
 */
class TransferLifecycle {
  private current = TransferStatus.REQUESTED;

  constructor(private readonly ref: string) {}

  get status(): TransferStatus {
    return this.current;
  }

  advance(next: TransferStatus): void {
    validateTransition(this.current, next, this.ref);
    this.current = next;
  }

  /**
   * The store may rerun a unit after a transient conflict; nothing from the
   * rolled-back attempt survives, so validation starts over.
   */
  beginAttempt(): void {
    if (this.current === TransferStatus.VALIDATED) {
      this.current = TransferStatus.REQUESTED;
    }
  }

  /**
   * Failures before validation completes reject; later ones abort
   */
  fail(): TransferStatus {
    this.advance(
      this.current === TransferStatus.REQUESTED ? TransferStatus.REJECTED : TransferStatus.ABORTED
    );
    return this.current;
  }
}

export class TransferService {
  constructor(private readonly injected?: LedgerStore) {}

  private get store(): LedgerStore {
    return this.injected ?? getLedgerStore();
  }

  /**
   * Move credits from a reseller to one of its business owners
   */
  async transfer(actor: Actor, request: TransferRequest): Promise<TransferResult> {
    const key = normalizeNote(request.idempotencyKey);

    return this.execute(actor, {
      kind: EntryKind.TRANSFER,
      fromAccountId: request.fromAccountId,
      toAccountId: request.toAccountId,
      amount: request.amount,
      note: normalizeNote(request.note),
      scopedKey: key ? `${request.fromAccountId}:${key}` : null,
    });
  }

  /**
   * Create credits from the system sentinel into a reseller (admin only)
   */
  async issue(actor: Actor, request: IssuanceRequest): Promise<TransferResult> {
    const key = normalizeNote(request.idempotencyKey);

    return this.execute(actor, {
      kind: EntryKind.ISSUANCE,
      fromAccountId: SYSTEM_ACCOUNT_ID,
      toAccountId: request.toAccountId,
      amount: request.amount,
      note: normalizeNote(request.note),
      scopedKey: key ? `issue:${request.toAccountId}:${key}` : null,
    });
  }

  private async execute(actor: Actor, movement: Movement): Promise<TransferResult> {
    const { kind, fromAccountId, toAccountId, amount } = movement;
    const lifecycle = new TransferLifecycle(
      movement.scopedKey ?? `${fromAccountId}->${toAccountId}`
    );
    const endTimer = transferDuration.startTimer({ kind });

    try {
      if (!isValidAmount(amount)) {
        throw ApiError.invalidAmount();
      }

      if (movement.scopedKey) {
        const prior = await this.store.findEntryByIdempotencyKey(movement.scopedKey);
        if (prior) {
          return this.replay(actor, movement, prior, endTimer);
        }
      }

      const lockIds =
        kind === EntryKind.ISSUANCE ? [SYSTEM_ACCOUNT_ID, toAccountId] : [fromAccountId, toAccountId];

      const outcome = await this.store.withLockedAccounts(
        lockIds,
        async (unit): Promise<TransferResult> => {
          lifecycle.beginAttempt();
          if (movement.scopedKey) {
            const prior = await unit.findEntryByIdempotencyKey(movement.scopedKey);
            if (prior) {
              return { entry: prior, replayed: true };
            }
          }

          const entry = await this.commitUnit(unit, actor, movement, lifecycle);
          return { entry, replayed: false };
        }
      );

      if (outcome.replayed) {
        return this.replay(actor, movement, outcome.entry, endTimer);
      }

      lifecycle.advance(TransferStatus.COMMITTED);
      const { entry } = outcome;

      addLogContext({ entryId: entry.entryId });
      transfersTotal.inc({ kind, outcome: 'committed' });
      transferAmount.observe({ kind }, amount);
      entriesAppendedTotal.inc({ kind });
      endTimer({ outcome: 'committed' });

      log.info(
        {
          entryId: entry.entryId,
          kind,
          fromAccountId,
          toAccountId,
          amount,
          initiatedBy: actor.id,
        },
        'Credits moved'
      );

      return { entry, replayed: false };
    } catch (error) {
      const status = lifecycle.fail();
      const outcome = status === TransferStatus.REJECTED ? 'rejected' : 'aborted';
      transfersTotal.inc({ kind, outcome });
      endTimer({ outcome });

      log.warn(
        {
          kind,
          fromAccountId,
          toAccountId,
          amount,
          status,
          err: error,
        },
        'Credit movement failed'
      );
      throw error;
    }
  }

  /**
   * Runs under the account locks: validation steps 2-5, then debit, credit
   * and append.
   */
  private async commitUnit(
    unit: LedgerUnitOfWork,
    actor: Actor,
    movement: Movement,
    lifecycle: TransferLifecycle
  ): Promise<LedgerEntry> {
    const { kind, fromAccountId, toAccountId, amount } = movement;

    const to = await this.activeAccount(unit, toAccountId);
    const from = kind === EntryKind.TRANSFER ? await this.activeAccount(unit, fromAccountId) : null;

    const decision: PolicyDecision = from
      ? authorizeTransfer(actor, from, to)
      : authorizeIssuance(actor, to);

    if (!decision.allowed) {
      throw ApiError.policyViolation(decision.reason);
    }

    if (from && from.balance < amount) {
      throw ApiError.insufficientFunds();
    }

    if (amount > CREDIT_LIMIT - to.balance) {
      throw ApiError.balanceLimitExceeded();
    }

    if (!from && amount > CREDIT_LIMIT - (await unit.issuedTotal())) {
      throw ApiError.balanceLimitExceeded('Issuance would exceed the platform credit limit');
    }

    lifecycle.advance(TransferStatus.VALIDATED);

    const fromBalanceAfter = from ? await unit.debit(from.accountId, amount) : null;
    transferSimulation.checkpoint(FailureStage.AFTER_DEBIT, fromAccountId);

    const toBalanceAfter = await unit.credit(to.accountId, amount);
    transferSimulation.checkpoint(FailureStage.AFTER_CREDIT, fromAccountId);

    return unit.append({
      kind,
      fromAccountId: from ? from.accountId : SYSTEM_ACCOUNT_ID,
      toAccountId: to.accountId,
      fromRole: from ? from.role : SYSTEM_ROLE,
      toRole: to.role,
      amount,
      fromBalanceAfter,
      toBalanceAfter,
      note: decision.override ? overrideNote(actor.id, movement.note) : movement.note,
      initiatedBy: actor.id,
      idempotencyKey: movement.scopedKey,
    });
  }

  private async activeAccount(unit: LedgerUnitOfWork, accountId: string): Promise<Account> {
    const account = await unit.getAccount(accountId);
    if (!account || !account.isActive) {
      throw ApiError.notFound('Account');
    }
    return account;
  }

  /**
   * Same key and same movement returns the original entry; anything else is
   * a conflict.
   */
  private replay(
    actor: Actor,
    movement: Movement,
    prior: LedgerEntry,
    endTimer: (labels?: { outcome?: string }) => number
  ): TransferResult {
    if (
      prior.kind !== movement.kind ||
      prior.fromAccountId !== movement.fromAccountId ||
      prior.toAccountId !== movement.toAccountId ||
      prior.amount !== movement.amount ||
      prior.initiatedBy !== actor.id
    ) {
      throw ApiError.idempotencyConflict();
    }

    transfersTotal.inc({ kind: movement.kind, outcome: 'replayed' });
    endTimer({ outcome: 'replayed' });
    log.info({ entryId: prior.entryId, idempotencyKey: prior.idempotencyKey }, 'Replayed transfer');

    return { entry: prior, replayed: true };
  }
}

export const transferService = new TransferService();
