import { Response, NextFunction } from 'express';

import { requireActor } from '../../auth/auth.service';
import { AuthRequest } from '../../auth/auth.types';
import { config } from '../../config';
import { ApiError } from '../../middlewares/errorHandler';
import { Role } from '../../types/ledger';

import { transferService, TransferResult } from './transfer.service';
import { FailureStage, transferSimulation } from './transfer.simulation';

/**
 * Header wins over the body field
 */
const idempotencyKeyFrom = (req: AuthRequest): string | null => {
  const headerKey = req.get('x-idempotency-key');
  if (headerKey) {
    return headerKey;
  }
  const bodyKey: unknown = req.body.idempotencyKey;
  return typeof bodyKey === 'string' ? bodyKey : null;
};

const amountFrom = (value: unknown): number => (typeof value === 'number' ? value : Number.NaN);

const noteFrom = (value: unknown): string | null => (typeof value === 'string' ? value : null);

const isFailureStage = (value: unknown): value is FailureStage =>
  value === FailureStage.AFTER_DEBIT || value === FailureStage.AFTER_CREDIT;

const sendResult = (res: Response, result: TransferResult): void => {
  res.status(result.replayed ? 200 : 201).json({
    success: true,
    data: result,
  });
};

export class TransferController {
  /**
   * Move credits from a reseller to a business owner
   * POST /transfers
   */
  async create(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const actor = requireActor(req);

      const result = await transferService.transfer(actor, {
        fromAccountId: String(req.body.fromAccountId),
        toAccountId: String(req.body.toAccountId),
        amount: amountFrom(req.body.amount),
        note: noteFrom(req.body.note),
        idempotencyKey: idempotencyKeyFrom(req),
      });

      sendResult(res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * Issue new credits into a reseller account (admin)
   * POST /transfers/issuance
   */
  async issue(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const actor = requireActor(req);

      const result = await transferService.issue(actor, {
        toAccountId: String(req.body.toAccountId),
        amount: amountFrom(req.body.amount),
        note: noteFrom(req.body.note),
        idempotencyKey: idempotencyKeyFrom(req),
      });

      sendResult(res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /transfers/simulation
   */
  async getSimulationConfig(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      this.assertSimulationAccess(req);

      res.status(200).json({
        success: true,
        data: {
          simulation: transferSimulation.getConfig(),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /transfers/simulation
   *
   * enabled=true merges the given fields into the current config;
   * enabled=false disables simulation and clears failAccountIds.
   */
  async updateSimulationConfig(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      this.assertSimulationAccess(req);
      const { enabled, stage, failureRate, failAccountIds } = req.body;
      const accountIds: unknown[] | undefined = Array.isArray(failAccountIds)
        ? failAccountIds
        : undefined;

      if (enabled === true) {
        transferSimulation.enable({
          stage: isFailureStage(stage) ? stage : undefined,
          failureRate: typeof failureRate === 'number' ? failureRate : undefined,
          failAccountIds: accountIds
            ? new Set(accountIds.filter((id): id is string => typeof id === 'string'))
            : undefined,
        });
      } else {
        transferSimulation.disable();
      }

      res.status(200).json({
        success: true,
        data: {
          simulation: transferSimulation.getConfig(),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /transfers/simulation/reset
   */
  async resetSimulation(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      this.assertSimulationAccess(req);
      transferSimulation.reset();

      res.status(200).json({
        success: true,
        data: {
          simulation: transferSimulation.getConfig(),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  private assertSimulationAccess(req: AuthRequest): void {
    if (!config.isTest && !config.isDevelopment) {
      throw ApiError.forbidden('Simulation API only available in test/development environments');
    }
    if (requireActor(req).role !== Role.ADMIN) {
      throw ApiError.forbidden('Only admins can configure failure simulation');
    }
  }
}

export const transferController = new TransferController();
