/**
 * Hierarchy Policy
 *
 * Pure allow/deny decisions over the actor, the accounts involved and the
 * reseller → business owner ownership link. No I/O; callers pass accounts
 * read under the transfer locks.
 */

import { Account, Actor, Role } from '../../types/ledger';

export type PolicyDecision = { allowed: true; override: boolean } | { allowed: false; reason: string };

const deny = (reason: string): PolicyDecision => ({ allowed: false, reason });

/**
 * Credits only flow from a reseller to one of its own business owners.
 * Admins may move credits on a reseller's behalf; such transfers are overrides.
 */
export const authorizeTransfer = (actor: Actor, from: Account, to: Account): PolicyDecision => {
  if (from.role !== Role.RESELLER) {
    return deny('Only resellers can send credits');
  }

  if (to.role !== Role.BUSINESS_OWNER) {
    return deny('Credits can only be sent to business owners');
  }

  if (to.owningResellerId !== from.accountId) {
    return deny('Business owner does not belong to this reseller');
  }

  if (actor.role === Role.ADMIN) {
    return { allowed: true, override: true };
  }

  if (actor.id !== from.accountId) {
    return deny('Actor can only send credits from their own account');
  }

  return { allowed: true, override: false };
};

export const authorizeIssuance = (actor: Actor, to: Account): PolicyDecision => {
  if (actor.role !== Role.ADMIN) {
    return deny('Only admins can issue credits');
  }

  if (to.role !== Role.RESELLER) {
    return deny('Credits can only be issued to resellers');
  }

  return { allowed: true, override: false };
};

export const canViewAccount = (actor: Actor, account: Account): boolean => {
  if (actor.role === Role.ADMIN || actor.id === account.accountId) {
    return true;
  }

  return account.role === Role.BUSINESS_OWNER && account.owningResellerId === actor.id;
};

export const overrideNote = (actorId: string, note: string | null): string => {
  const marker = `[admin override by ${actorId}]`;
  return note ? `${marker} ${note}` : marker;
};
