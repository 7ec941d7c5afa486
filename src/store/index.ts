import { config, LedgerStoreDriver } from '../config';

import { LedgerStore } from './ledger.store';
import { MemoryLedgerStore } from './memory.store';
import { MongoLedgerStore } from './mongo.store';

export * from './ledger.store';
export { MemoryLedgerStore } from './memory.store';
export { MongoLedgerStore } from './mongo.store';

let ledgerStore: LedgerStore | null = null;

export const createLedgerStore = (
  driver: LedgerStoreDriver = config.ledger.storeDriver
): LedgerStore =>
  driver === 'memory'
    ? new MemoryLedgerStore({ lockTimeoutMs: config.ledger.lockTimeoutMs })
    : new MongoLedgerStore({
        lockTimeoutMs: config.ledger.lockTimeoutMs,
        maxCommitTimeMs: config.ledger.maxCommitTimeMs,
      });

/**
 * Process-wide store, created on first use from LEDGER_STORE
 */
export const getLedgerStore = (): LedgerStore => {
  if (!ledgerStore) {
    ledgerStore = createLedgerStore();
  }
  return ledgerStore;
};

export const setLedgerStore = (store: LedgerStore): void => {
  ledgerStore = store;
};
