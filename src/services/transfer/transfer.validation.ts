import { body, header } from 'express-validator';

import { config } from '../../config';
import { FailureStage } from './transfer.simulation';

const idempotencyKeyRules = [
  header('x-idempotency-key')
    .optional()
    .isString()
    .trim()
    .isLength({ min: 1, max: 128 })
    .withMessage('X-Idempotency-Key must be 1-128 characters'),
  body('idempotencyKey')
    .optional({ values: 'null' })
    .isString()
    .withMessage('idempotencyKey must be a string')
    .trim()
    .isLength({ min: 1, max: 128 })
    .withMessage('idempotencyKey must be 1-128 characters'),
];

// Amount format is checked by the engine so a bad amount reports InvalidAmount
const amountRules = [body('amount').exists({ values: 'null' }).withMessage('Amount is required')];

const noteRules = [
  body('note')
    .optional({ values: 'null' })
    .isString()
    .withMessage('Note must be a string')
    .isLength({ max: config.ledger.maxNoteLength })
    .withMessage(`Note cannot exceed ${config.ledger.maxNoteLength} characters`),
];

export const createTransferValidation = [
  body('fromAccountId')
    .isString()
    .withMessage('From account ID must be a string')
    .trim()
    .notEmpty()
    .withMessage('From account ID is required'),
  body('toAccountId')
    .isString()
    .withMessage('To account ID must be a string')
    .trim()
    .notEmpty()
    .withMessage('To account ID is required'),
  ...amountRules,
  ...noteRules,
  ...idempotencyKeyRules,
];

export const issuanceValidation = [
  body('toAccountId')
    .isString()
    .withMessage('To account ID must be a string')
    .trim()
    .notEmpty()
    .withMessage('To account ID is required'),
  ...amountRules,
  ...noteRules,
  ...idempotencyKeyRules,
];

export const simulationConfigValidation = [
  body('enabled').isBoolean().withMessage('enabled must be a boolean'),
  body('stage')
    .optional()
    .isIn(Object.values(FailureStage))
    .withMessage(`stage must be one of: ${Object.values(FailureStage).join(', ')}`),
  body('failureRate')
    .optional()
    .isFloat({ min: 0, max: 1 })
    .withMessage('failureRate must be between 0 and 1'),
  body('failAccountIds').optional().isArray().withMessage('failAccountIds must be an array'),
  body('failAccountIds.*')
    .optional()
    .isString()
    .notEmpty()
    .withMessage('Each account ID must be a non-empty string'),
];
