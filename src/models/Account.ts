import mongoose, { Document, Schema } from 'mongoose';

import { AccountRole, Role } from '../types/ledger';

export interface IAccount extends Document {
  accountId: string;
  role: AccountRole;
  name?: string;
  balance: number;
  owningResellerId?: string;
  isActive: boolean;
  lockVersion: number;
  createdAt: Date;
  updatedAt: Date;
}

const accountSchema = new Schema<IAccount>(
  {
    accountId: {
      type: String,
      required: true,
      unique: true,
      index: true,
      immutable: true,
    },
    role: {
      type: String,
      required: true,
      enum: [Role.RESELLER, Role.BUSINESS_OWNER],
      immutable: true,
    },
    name: {
      type: String,
      trim: true,
    },
    balance: {
      type: Number,
      required: true,
      default: 0,
      min: 0,
      validate: {
        validator: Number.isSafeInteger,
        message: 'Balance must be a whole number of credits',
      },
    },
    owningResellerId: {
      type: String,
      index: true,
      immutable: true,
      required: function (this: IAccount) {
        return this.role === Role.BUSINESS_OWNER;
      },
    },
    isActive: {
      type: Boolean,
      default: true,
    },
    // Bumped inside a transfer to take the document write lock before any read
    lockVersion: {
      type: Number,
      default: 0,
    },
  },
  {
    timestamps: true,
  }
);

accountSchema.index({ role: 1, owningResellerId: 1 });

export const Account = mongoose.model<IAccount>('Account', accountSchema);
