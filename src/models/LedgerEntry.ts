import mongoose, { Document, Schema } from 'mongoose';

import { AccountRole, EntryKind, PartyRole, Role, SYSTEM_ROLE } from '../types/ledger';

export interface ILedgerEntry extends Document {
  entryId: number;
  kind: EntryKind;
  fromAccountId: string;
  toAccountId: string;
  fromRole: PartyRole;
  toRole: AccountRole;
  amount: number;
  fromBalanceAfter?: number;
  toBalanceAfter: number;
  note?: string;
  initiatedBy: string;
  idempotencyKey?: string;
  createdAt: Date;
}

const ledgerEntrySchema = new Schema<ILedgerEntry>(
  {
    entryId: {
      type: Number,
      required: true,
      unique: true,
      immutable: true,
    },
    kind: {
      type: String,
      required: true,
      enum: Object.values(EntryKind),
      immutable: true,
    },
    fromAccountId: {
      type: String,
      required: true,
      immutable: true,
    },
    toAccountId: {
      type: String,
      required: true,
      immutable: true,
    },
    fromRole: {
      type: String,
      required: true,
      enum: [Role.RESELLER, Role.BUSINESS_OWNER, SYSTEM_ROLE],
      immutable: true,
    },
    toRole: {
      type: String,
      required: true,
      enum: [Role.RESELLER, Role.BUSINESS_OWNER],
      immutable: true,
    },
    amount: {
      type: Number,
      required: true,
      min: 1,
      immutable: true,
    },
    fromBalanceAfter: {
      type: Number,
      min: 0,
      immutable: true,
    },
    toBalanceAfter: {
      type: Number,
      required: true,
      min: 0,
      immutable: true,
    },
    note: {
      type: String,
      trim: true,
      immutable: true,
    },
    initiatedBy: {
      type: String,
      required: true,
      immutable: true,
    },
    idempotencyKey: {
      type: String,
      immutable: true,
    },
  },
  {
    timestamps: { createdAt: true, updatedAt: false },
  }
);

// Per-account history, walked by entryId cursor in both directions
ledgerEntrySchema.index({ fromAccountId: 1, entryId: 1 });
ledgerEntrySchema.index({ toAccountId: 1, entryId: 1 });
ledgerEntrySchema.index({ kind: 1, entryId: 1 });
ledgerEntrySchema.index(
  { idempotencyKey: 1 },
  { unique: true, partialFilterExpression: { idempotencyKey: { $type: 'string' } } }
);

// Entries are append-only
const rejectMutation = function (): never {
  throw new Error('Ledger entries are append-only');
};
ledgerEntrySchema.pre(['updateOne', 'updateMany', 'findOneAndUpdate', 'replaceOne'], rejectMutation);
ledgerEntrySchema.pre(['deleteOne', 'deleteMany', 'findOneAndDelete'], rejectMutation);

export const LedgerEntry = mongoose.model<ILedgerEntry>('LedgerEntry', ledgerEntrySchema);
