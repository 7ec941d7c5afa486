import { Router, Request, Response, NextFunction } from 'express';

import { authMiddleware } from '../../auth';
import { transferLimiter } from '../../middlewares/rateLimiter';
import { validateRequest } from '../../middlewares/validateRequest';
import { getEntryValidation, ledgerController, listAllEntriesValidation } from '../ledger';

import { transferController } from './transfer.controller';
import {
  createTransferValidation,
  issuanceValidation,
  simulationConfigValidation,
} from './transfer.validation';

const router = Router();

// All transfer routes require authentication
router.use(authMiddleware);

// GET /transfers - Every entry, cursor paginated (admin)
router.get(
  '/',
  listAllEntriesValidation,
  validateRequest,
  (req: Request, res: Response, next: NextFunction) => ledgerController.listAll(req, res, next)
);

// POST /transfers - Move credits from a reseller to a business owner
router.post(
  '/',
  transferLimiter,
  createTransferValidation,
  validateRequest,
  (req: Request, res: Response, next: NextFunction) => transferController.create(req, res, next)
);

// POST /transfers/issuance - Issue credits into a reseller (admin)
router.post(
  '/issuance',
  transferLimiter,
  issuanceValidation,
  validateRequest,
  (req: Request, res: Response, next: NextFunction) => transferController.issue(req, res, next)
);

// GET /transfers/simulation - Current failure simulation config (test/development)
router.get('/simulation', (req: Request, res: Response, next: NextFunction) =>
  transferController.getSimulationConfig(req, res, next)
);

// POST /transfers/simulation - Update failure simulation config (test/development)
router.post(
  '/simulation',
  simulationConfigValidation,
  validateRequest,
  (req: Request, res: Response, next: NextFunction) =>
    transferController.updateSimulationConfig(req, res, next)
);

// POST /transfers/simulation/reset - Reset failure simulation (test/development)
router.post('/simulation/reset', (req: Request, res: Response, next: NextFunction) =>
  transferController.resetSimulation(req, res, next)
);

// GET /transfers/:entryId - Get one ledger entry
router.get(
  '/:entryId',
  getEntryValidation,
  validateRequest,
  (req: Request, res: Response, next: NextFunction) => ledgerController.getEntry(req, res, next)
);

export default router;
