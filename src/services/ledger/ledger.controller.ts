/**
 * Ledger Controller
 *
 * Read endpoints over the entry log.
 */

import { Response, NextFunction } from 'express';
import { matchedData } from 'express-validator';

import { requireActor } from '../../auth/auth.service';
import { AuthRequest } from '../../auth/auth.types';

import { ledgerService } from './ledger.service';
import { toEntryFilters } from './ledger.validation';

class LedgerController {
  /**
   * Get one ledger entry
   * GET /transfers/:entryId
   */
  async getEntry(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const actor = requireActor(req);
      const entry = await ledgerService.getEntry(actor, Number(req.params.entryId));

      res.status(200).json({
        success: true,
        data: {
          entry,
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * List every entry on the platform (admin)
   * GET /transfers
   */
  async listAll(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const actor = requireActor(req);
      const filters = toEntryFilters(matchedData(req, { locations: ['query'] }));
      const page = await ledgerService.listAll(actor, filters);

      res.status(200).json({
        success: true,
        data: page,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * List an account's entries, one cursor page at a time
   * GET /accounts/:id/transfers
   */
  async listForAccount(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const actor = requireActor(req);
      const filters = toEntryFilters(matchedData(req, { locations: ['query'] }));
      const page = await ledgerService.listForAccount(actor, req.params.id, filters);

      res.status(200).json({
        success: true,
        data: page,
      });
    } catch (error) {
      next(error);
    }
  }
}

export const ledgerController = new LedgerController();
