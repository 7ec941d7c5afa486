import { Router, Request, Response, NextFunction } from 'express';

import { authMiddleware } from '../../auth';

import { statsController } from './stats.controller';

const router = Router();

// All stats routes require authentication
router.use(authMiddleware);

// GET /stats/summary - Platform-wide summary (admin)
router.get('/summary', (req: Request, res: Response, next: NextFunction) =>
  statsController.getSummary(req, res, next)
);

export default router;
