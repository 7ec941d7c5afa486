/**
 * Domain types shared by the ledger store, the transfer engine and the
 * aggregation service.
 */

export enum Role {
  RESELLER = 'reseller',
  BUSINESS_OWNER = 'business_owner',
  ADMIN = 'admin',
}

/**
 * Roles that hold a balance. Admins act on accounts but own none.
 */
export type AccountRole = Role.RESELLER | Role.BUSINESS_OWNER;

/**
 * Sender of issuance entries. Never stored as an account.
 */
export const SYSTEM_ACCOUNT_ID = 'system';
export const SYSTEM_ROLE = 'system';

export type PartyRole = AccountRole | typeof SYSTEM_ROLE;

/**
 * Largest balance, and largest total issuance, the ledger accepts. Every sum
 * of balances stays an exact integer below it.
 */
export const CREDIT_LIMIT = Number.MAX_SAFE_INTEGER;

export enum EntryKind {
  TRANSFER = 'TRANSFER',
  ISSUANCE = 'ISSUANCE',
}

export interface Actor {
  id: string;
  role: Role;
}

interface AccountBase {
  accountId: string;
  name: string | null;
  balance: number;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface ResellerAccount extends AccountBase {
  role: Role.RESELLER;
  owningResellerId: null;
}

export interface BusinessOwnerAccount extends AccountBase {
  role: Role.BUSINESS_OWNER;
  owningResellerId: string;
}

export type Account = ResellerAccount | BusinessOwnerAccount;

export interface NewAccount {
  accountId: string;
  role: AccountRole;
  owningResellerId: string | null;
  name: string | null;
}

export interface LedgerEntry {
  entryId: number;
  kind: EntryKind;
  fromAccountId: string;
  toAccountId: string;
  fromRole: PartyRole;
  toRole: AccountRole;
  amount: number;
  fromBalanceAfter: number | null;
  toBalanceAfter: number;
  note: string | null;
  initiatedBy: string;
  idempotencyKey: string | null;
  createdAt: Date;
}

export type NewLedgerEntry = Omit<LedgerEntry, 'entryId' | 'createdAt'>;

export type SortOrder = 'asc' | 'desc';

export interface EntryFilters {
  from?: Date;
  to?: Date;
  counterpartRole?: PartyRole;
  kind?: EntryKind;
  cursor?: number;
  limit?: number;
  order?: SortOrder;
}

export interface EntryPage {
  entries: LedgerEntry[];
  nextCursor: number | null;
}

export const isRole = (value: unknown): value is Role =>
  value === Role.RESELLER || value === Role.BUSINESS_OWNER || value === Role.ADMIN;

export const isAccountRole = (value: unknown): value is AccountRole =>
  value === Role.RESELLER || value === Role.BUSINESS_OWNER;

export const isPartyRole = (value: unknown): value is PartyRole =>
  isAccountRole(value) || value === SYSTEM_ROLE;
