/**
 * Ledger Entry Log reads
 */

export { ledgerService, LedgerService, resolvePageLimit } from './ledger.service';
export { ledgerController } from './ledger.controller';
export {
  getEntryValidation,
  listAllEntriesValidation,
  listEntriesValidation,
  toEntryFilters,
} from './ledger.validation';
