/**
 * Ledger API Validation Rules
 */

import { param, query } from 'express-validator';

import { config } from '../../config';
import {
  EntryFilters,
  EntryKind,
  Role,
  SYSTEM_ROLE,
  isPartyRole,
} from '../../types/ledger';

const counterpartRoles = [Role.RESELLER, Role.BUSINESS_OWNER, SYSTEM_ROLE];
const entryKinds = Object.values(EntryKind);

export const getEntryValidation = [
  param('entryId')
    .isInt({ min: 1 })
    .withMessage('Entry ID must be a positive integer')
    .toInt(),
];

const entryQueryValidation = [
  query('from').optional().isISO8601().withMessage('from must be an ISO 8601 date').toDate(),
  query('to').optional().isISO8601().withMessage('to must be an ISO 8601 date').toDate(),
  query('counterpartRole')
    .optional()
    .isIn(counterpartRoles)
    .withMessage(`counterpartRole must be one of: ${counterpartRoles.join(', ')}`),
  query('kind')
    .optional()
    .isIn(entryKinds)
    .withMessage(`kind must be one of: ${entryKinds.join(', ')}`),
  query('cursor')
    .optional()
    .isInt({ min: 0 })
    .withMessage('cursor must be a non-negative integer')
    .toInt(),
  query('limit')
    .optional()
    .isInt({ min: 1, max: config.ledger.maxPageLimit })
    .withMessage(`limit must be between 1 and ${config.ledger.maxPageLimit}`)
    .toInt(),
  query('order').optional().isIn(['asc', 'desc']).withMessage('order must be asc or desc'),
];

export const listEntriesValidation = [
  param('id').isString().trim().notEmpty().withMessage('Account ID is required'),
  ...entryQueryValidation,
];

export const listAllEntriesValidation = entryQueryValidation;

const isEntryKind = (value: unknown): value is EntryKind =>
  entryKinds.some((kind) => kind === value);

/**
 * Build filters from query values already checked and converted by
 * listEntriesValidation or listAllEntriesValidation
 */
export const toEntryFilters = (values: Record<string, unknown>): EntryFilters => {
  const filters: EntryFilters = {};

  if (values.from instanceof Date) filters.from = values.from;
  if (values.to instanceof Date) filters.to = values.to;
  if (isPartyRole(values.counterpartRole)) filters.counterpartRole = values.counterpartRole;
  if (isEntryKind(values.kind)) filters.kind = values.kind;
  if (typeof values.cursor === 'number') filters.cursor = values.cursor;
  if (typeof values.limit === 'number') filters.limit = values.limit;
  if (values.order === 'asc' || values.order === 'desc') filters.order = values.order;

  return filters;
};
