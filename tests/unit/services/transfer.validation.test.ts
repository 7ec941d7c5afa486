/**
 * Unit tests for Transfer Validation
 *
 * Tests the express-validator chains for transfer endpoints.
 */

import {
  createTransferValidation,
  issuanceValidation,
  simulationConfigValidation,
} from '../../../src/services/transfer/transfer.validation';
import { runValidation } from '../helpers/runValidation';

describe('Transfer Validation', () => {
  describe('createTransferValidation', () => {
    it('should pass a complete transfer body', async () => {
      const { errors } = await runValidation(createTransferValidation, {
        body: { fromAccountId: 'r1', toAccountId: 'b1', amount: 5000, note: 'weekly' },
      });
      expect(errors).toHaveLength(0);
    });

    it('should require both account ids', async () => {
      const { failedFields } = await runValidation(createTransferValidation, {
        body: { amount: 10 },
      });
      expect(failedFields).toContain('fromAccountId');
      expect(failedFields).toContain('toAccountId');
    });

    it('should require an amount', async () => {
      const { failedFields } = await runValidation(createTransferValidation, {
        body: { fromAccountId: 'r1', toAccountId: 'b1' },
      });
      expect(failedFields).toEqual(['amount']);
    });

    it('should leave the amount format to the engine', async () => {
      const { errors } = await runValidation(createTransferValidation, {
        body: { fromAccountId: 'r1', toAccountId: 'b1', amount: -5 },
      });
      expect(errors).toHaveLength(0);
    });

    it('should reject a note over 500 characters', async () => {
      const { failedFields } = await runValidation(createTransferValidation, {
        body: { fromAccountId: 'r1', toAccountId: 'b1', amount: 1, note: 'x'.repeat(501) },
      });
      expect(failedFields).toEqual(['note']);
    });

    it('should accept a null note', async () => {
      const { errors } = await runValidation(createTransferValidation, {
        body: { fromAccountId: 'r1', toAccountId: 'b1', amount: 1, note: null },
      });
      expect(errors).toHaveLength(0);
    });

    it('should reject an idempotency header longer than 128 characters', async () => {
      const { failedFields } = await runValidation(createTransferValidation, {
        body: { fromAccountId: 'r1', toAccountId: 'b1', amount: 1 },
        headers: { 'x-idempotency-key': 'k'.repeat(129) },
      });
      expect(failedFields).toEqual(['x-idempotency-key']);
    });

    it('should reject a non-string idempotencyKey in the body', async () => {
      const { failedFields } = await runValidation(createTransferValidation, {
        body: { fromAccountId: 'r1', toAccountId: 'b1', amount: 1, idempotencyKey: 42 },
      });
      expect(failedFields).toContain('idempotencyKey');
    });
  });

  describe('issuanceValidation', () => {
    it('should pass with a target and amount', async () => {
      const { errors } = await runValidation(issuanceValidation, {
        body: { toAccountId: 'r1', amount: 10000 },
      });
      expect(errors).toHaveLength(0);
    });

    it('should require the target account', async () => {
      const { failedFields } = await runValidation(issuanceValidation, {
        body: { amount: 10000 },
      });
      expect(failedFields).toEqual(['toAccountId']);
    });
  });

  describe('simulationConfigValidation', () => {
    it('should pass a valid config', async () => {
      const { errors } = await runValidation(simulationConfigValidation, {
        body: { enabled: true, stage: 'AFTER_CREDIT', failureRate: 0.5, failAccountIds: ['r1'] },
      });
      expect(errors).toHaveLength(0);
    });

    it('should reject an unknown stage and an out of range rate', async () => {
      const { failedFields } = await runValidation(simulationConfigValidation, {
        body: { enabled: true, stage: 'BEFORE_DEBIT', failureRate: 2 },
      });
      expect(failedFields).toEqual(['stage', 'failureRate']);
    });
  });
});
