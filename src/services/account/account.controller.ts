import { Response, NextFunction } from 'express';

import { requireActor } from '../../auth/auth.service';
import { AuthRequest } from '../../auth/auth.types';
import { isAccountRole } from '../../types/ledger';
import { ApiError } from '../../middlewares/errorHandler';

import { accountService } from './account.service';

export class AccountController {
  /**
   * Provision a reseller or business owner account
   * POST /accounts
   */
  async provision(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const actor = requireActor(req);
      const { accountId, role, owningResellerId, name } = req.body;

      if (!isAccountRole(role)) {
        throw ApiError.validationError('Role must be reseller or business_owner');
      }

      const account = await accountService.provisionAccount(actor, {
        accountId: String(accountId),
        role,
        owningResellerId: typeof owningResellerId === 'string' ? owningResellerId : null,
        name: typeof name === 'string' ? name : null,
      });

      res.status(201).json({
        success: true,
        data: {
          account,
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /accounts/:id
   */
  async getById(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const account = await accountService.getAccount(requireActor(req), req.params.id);

      res.status(200).json({
        success: true,
        data: {
          account,
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /accounts/:id/business-owners
   */
  async listBusinessOwners(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const accounts = await accountService.listBusinessOwners(requireActor(req), req.params.id);

      res.status(200).json({
        success: true,
        data: {
          accounts,
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Soft delete; balance and history stay
   * POST /accounts/:id/deactivate
   */
  async deactivate(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const account = await accountService.deactivateAccount(requireActor(req), req.params.id);

      res.status(200).json({
        success: true,
        data: {
          account,
        },
      });
    } catch (error) {
      next(error);
    }
  }
}

export const accountController = new AccountController();
