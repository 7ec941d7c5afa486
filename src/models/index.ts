export { Account, IAccount } from './Account';
export { LedgerEntry, ILedgerEntry } from './LedgerEntry';
export { Counter, ICounter, LEDGER_ENTRY_SEQUENCE } from './Counter';
