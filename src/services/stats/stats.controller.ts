import { Response, NextFunction } from 'express';

import { requireActor } from '../../auth/auth.service';
import { AuthRequest } from '../../auth/auth.types';

import { statsService } from './stats.service';

export class StatsController {
  /**
   * GET /accounts/:id/stats
   */
  async getAccountStats(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const stats = await statsService.statsForAccount(requireActor(req), req.params.id);

      res.status(200).json({
        success: true,
        data: {
          stats,
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /accounts/:id/reconciliation
   */
  async reconcile(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const reconciliation = await statsService.reconcileAccount(requireActor(req), req.params.id);

      res.status(200).json({
        success: true,
        data: {
          reconciliation,
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /stats/summary
   */
  async getSummary(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const summary = await statsService.platformSummary(requireActor(req));

      res.status(200).json({
        success: true,
        data: {
          summary,
        },
      });
    } catch (error) {
      next(error);
    }
  }
}

export const statsController = new StatsController();
