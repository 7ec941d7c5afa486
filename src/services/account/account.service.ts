/**
 * Account provisioning and lookup
 *
 * Accounts are created by admins with a zero balance; credits only arrive
 * through issuance or transfers. Deactivation is a soft delete that keeps
 * balance and history.
 */

import { ApiError } from '../../middlewares/errorHandler';
import { createServiceLogger } from '../../observability/logger';
import { getLedgerStore, LedgerStore } from '../../store';
import { Account, AccountRole, Actor, Role, SYSTEM_ACCOUNT_ID } from '../../types/ledger';
import { canViewAccount } from '../hierarchy';

const log = createServiceLogger('account-service');

export interface ProvisionAccountRequest {
  accountId: string;
  role: AccountRole;
  owningResellerId?: string | null;
  name?: string | null;
}

const requireAdmin = (actor: Actor, action: string): void => {
  if (actor.role !== Role.ADMIN) {
    throw ApiError.forbidden(`Only admins can ${action}`);
  }
};

export class AccountService {
  constructor(private readonly injected?: LedgerStore) {}

  private get store(): LedgerStore {
    return this.injected ?? getLedgerStore();
  }

  async provisionAccount(actor: Actor, request: ProvisionAccountRequest): Promise<Account> {
    requireAdmin(actor, 'provision accounts');

    const accountId = request.accountId.trim();
    if (accountId === SYSTEM_ACCOUNT_ID) {
      throw ApiError.validationError(`Account ID "${SYSTEM_ACCOUNT_ID}" is reserved`);
    }

    const owningResellerId = request.owningResellerId?.trim() || null;

    if (request.role === Role.RESELLER && owningResellerId) {
      throw ApiError.validationError('Reseller accounts cannot have an owning reseller');
    }

    if (request.role === Role.BUSINESS_OWNER) {
      if (!owningResellerId) {
        throw ApiError.validationError('Business owner accounts need an owning reseller');
      }

      const reseller = await this.store.findAccount(owningResellerId);
      if (!reseller || !reseller.isActive) {
        throw ApiError.notFound('Account');
      }
      if (reseller.role !== Role.RESELLER) {
        throw ApiError.policyViolation('Business owners can only belong to a reseller');
      }
    }

    const account = await this.store.createAccount({
      accountId,
      role: request.role,
      owningResellerId,
      name: request.name?.trim() || null,
    });

    log.info(
      { accountId, role: account.role, owningResellerId, provisionedBy: actor.id },
      'Account provisioned'
    );

    return account;
  }

  async getAccount(actor: Actor, accountId: string): Promise<Account> {
    const account = await this.store.findAccount(accountId);
    if (!account) {
      throw ApiError.notFound('Account');
    }

    if (!canViewAccount(actor, account)) {
      throw ApiError.forbidden('Not authorized to view this account');
    }

    return account;
  }

  async deactivateAccount(actor: Actor, accountId: string): Promise<Account> {
    requireAdmin(actor, 'deactivate accounts');

    const account = await this.store.setAccountActive(accountId, false);
    if (!account) {
      throw ApiError.notFound('Account');
    }

    log.info({ accountId, deactivatedBy: actor.id }, 'Account deactivated');
    return account;
  }

  async listBusinessOwners(actor: Actor, resellerId: string): Promise<Account[]> {
    const reseller = await this.getAccount(actor, resellerId);

    if (reseller.role !== Role.RESELLER) {
      throw ApiError.validationError('Only resellers own business owners');
    }

    return this.store.listBusinessOwners(resellerId);
  }
}

export const accountService = new AccountService();
