import { body, param } from 'express-validator';

import { Role } from '../../types/ledger';

const accountRoles = [Role.RESELLER, Role.BUSINESS_OWNER];

export const accountIdParamValidation = [
  param('id').isString().trim().notEmpty().withMessage('Account ID is required'),
];

export const provisionAccountValidation = [
  body('accountId')
    .isString()
    .withMessage('Account ID must be a string')
    .trim()
    .notEmpty()
    .withMessage('Account ID is required')
    .isLength({ max: 64 })
    .withMessage('Account ID cannot exceed 64 characters')
    .matches(/^[A-Za-z0-9_.-]+$/)
    .withMessage('Account ID may only contain letters, digits, dots, dashes and underscores'),
  body('role')
    .isIn(accountRoles)
    .withMessage(`Role must be one of: ${accountRoles.join(', ')}`),
  body('owningResellerId')
    .if(body('role').equals(Role.BUSINESS_OWNER))
    .isString()
    .withMessage('Owning reseller ID must be a string')
    .trim()
    .notEmpty()
    .withMessage('Owning reseller ID is required for business owners'),
  body('name')
    .optional({ values: 'null' })
    .isString()
    .withMessage('Name must be a string')
    .trim()
    .isLength({ max: 120 })
    .withMessage('Name cannot exceed 120 characters'),
];
