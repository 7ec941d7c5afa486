import mongoose, { Document, Schema } from 'mongoose';

/**
 * Named monotonic sequences. The ledger entry sequence document is written
 * inside every transfer transaction, which orders commits by entryId.
 */
export interface ICounter extends Document<string> {
  _id: string;
  seq: number;
}

const counterSchema = new Schema<ICounter>({
  _id: {
    type: String,
    required: true,
  },
  seq: {
    type: Number,
    required: true,
    default: 0,
  },
});

export const Counter = mongoose.model<ICounter>('Counter', counterSchema);

export const LEDGER_ENTRY_SEQUENCE = 'ledgerEntry';
