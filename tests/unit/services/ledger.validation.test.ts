/**
 * Unit tests for Ledger Validation
 */

import {
  getEntryValidation,
  listEntriesValidation,
  toEntryFilters,
} from '../../../src/services/ledger/ledger.validation';
import { EntryKind, Role } from '../../../src/types/ledger';
import { runValidation } from '../helpers/runValidation';

describe('Ledger Validation', () => {
  describe('getEntryValidation', () => {
    it('should convert a numeric entry id', async () => {
      const { req, errors } = await runValidation(getEntryValidation, {
        params: { entryId: '42' },
      });
      expect(errors).toHaveLength(0);
      expect(req.params.entryId).toBe(42);
    });

    it('should reject zero and non-numeric ids', async () => {
      const zero = await runValidation(getEntryValidation, { params: { entryId: '0' } });
      const word = await runValidation(getEntryValidation, { params: { entryId: 'abc' } });
      expect(zero.failedFields).toEqual(['entryId']);
      expect(word.failedFields).toEqual(['entryId']);
    });
  });

  describe('listEntriesValidation', () => {
    it('should convert query values', async () => {
      const { req, errors } = await runValidation(listEntriesValidation, {
        params: { id: 'r1' },
        query: {
          from: '2026-01-01T00:00:00.000Z',
          cursor: '7',
          limit: '25',
          order: 'desc',
          kind: 'TRANSFER',
          counterpartRole: 'business_owner',
        },
      });

      expect(errors).toHaveLength(0);
      expect(req.query.cursor).toBe(7);
      expect(req.query.limit).toBe(25);
      expect(req.query.from).toEqual(new Date('2026-01-01T00:00:00.000Z'));
    });

    it('should reject a limit above the maximum', async () => {
      const { failedFields } = await runValidation(listEntriesValidation, {
        params: { id: 'r1' },
        query: { limit: '101' },
      });
      expect(failedFields).toEqual(['limit']);
    });

    it('should reject unknown order, kind and counterpart role', async () => {
      const { failedFields } = await runValidation(listEntriesValidation, {
        params: { id: 'r1' },
        query: { order: 'newest', kind: 'REFUND', counterpartRole: 'admin' },
      });
      expect(failedFields).toEqual(['counterpartRole', 'kind', 'order']);
    });
  });

  describe('toEntryFilters', () => {
    it('should keep only well-typed values', () => {
      const from = new Date('2026-02-01T00:00:00.000Z');

      expect(
        toEntryFilters({
          from,
          to: '2026-03-01',
          counterpartRole: 'system',
          kind: EntryKind.ISSUANCE,
          cursor: 3,
          limit: '10',
          order: 'desc',
        })
      ).toEqual({
        from,
        counterpartRole: 'system',
        kind: EntryKind.ISSUANCE,
        cursor: 3,
        order: 'desc',
      });
    });

    it('should return no filters for an empty query', () => {
      expect(toEntryFilters({})).toEqual({});
    });

    it('should accept account roles as counterpart', () => {
      expect(toEntryFilters({ counterpartRole: Role.BUSINESS_OWNER })).toEqual({
        counterpartRole: Role.BUSINESS_OWNER,
      });
    });
  });
});
