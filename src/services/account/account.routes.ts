import { Router, Request, Response, NextFunction } from 'express';

import { authMiddleware } from '../../auth';
import { validateRequest } from '../../middlewares/validateRequest';
import { ledgerController, listEntriesValidation } from '../ledger';
import { statsController } from '../stats/stats.controller';

import { accountController } from './account.controller';
import { accountIdParamValidation, provisionAccountValidation } from './account.validation';

const router = Router();

// All account routes require authentication
router.use(authMiddleware);

// POST /accounts - Provision an account (admin)
router.post(
  '/',
  provisionAccountValidation,
  validateRequest,
  (req: Request, res: Response, next: NextFunction) => accountController.provision(req, res, next)
);

// GET /accounts/:id - Get account
router.get(
  '/:id',
  accountIdParamValidation,
  validateRequest,
  (req: Request, res: Response, next: NextFunction) => accountController.getById(req, res, next)
);

// GET /accounts/:id/business-owners - Business owners of a reseller
router.get(
  '/:id/business-owners',
  accountIdParamValidation,
  validateRequest,
  (req: Request, res: Response, next: NextFunction) =>
    accountController.listBusinessOwners(req, res, next)
);

// POST /accounts/:id/deactivate - Soft delete (admin)
router.post(
  '/:id/deactivate',
  accountIdParamValidation,
  validateRequest,
  (req: Request, res: Response, next: NextFunction) => accountController.deactivate(req, res, next)
);

// GET /accounts/:id/transfers - Entry history, cursor paginated
router.get(
  '/:id/transfers',
  listEntriesValidation,
  validateRequest,
  (req: Request, res: Response, next: NextFunction) =>
    ledgerController.listForAccount(req, res, next)
);

// GET /accounts/:id/stats - Account statistics
router.get(
  '/:id/stats',
  accountIdParamValidation,
  validateRequest,
  (req: Request, res: Response, next: NextFunction) =>
    statsController.getAccountStats(req, res, next)
);

// GET /accounts/:id/reconciliation - Balance against ledger net (admin)
router.get(
  '/:id/reconciliation',
  accountIdParamValidation,
  validateRequest,
  (req: Request, res: Response, next: NextFunction) => statsController.reconcile(req, res, next)
);

export default router;
